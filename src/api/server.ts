import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { errorHandler } from './middleware';
import { ResearchController } from './controllers/researchController';
import { registerResearchRoutes } from './routes';
import { getPipelineTimeoutMs } from '../config/pipelineConfig';
import { createResearchPipeline, type ResearchPipeline } from '../pipeline/runPipeline';

export interface BuildServerOptions {
  pipeline?: ResearchPipeline;
  pipelineTimeoutMs?: number;
}

async function buildServer(options: BuildServerOptions = {}) {
  const fastify = Fastify({
    logger: {
      level: process.env.LOG_LEVEL || 'info',
      transport:
        process.env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
  });

  const pipeline = options.pipeline ?? createResearchPipeline();
  const controller = new ResearchController(
    pipeline,
    pipeline.fileStore,
    options.pipelineTimeoutMs ?? getPipelineTimeoutMs()
  );

  await fastify.register(cors, {
    origin: process.env.CORS_ORIGIN || '*',
  });

  fastify.setErrorHandler(errorHandler);

  fastify.addHook('onClose', async () => {
    pipeline.close();
  });

  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerResearchRoutes(fastify, controller);

  return fastify;
}

async function start() {
  const server = await buildServer();
  const port = parseInt(process.env.PORT || '3000', 10);
  const host = process.env.API_HOST || '0.0.0.0';

  const shutdown = (signal: string) => {
    server.log.info(`${signal} received, closing server`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error(err, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.listen({ port, host });
}

if (require.main === module) {
  start().catch((err: unknown) => {
    console.error('Error starting server:', err);
    process.exit(1);
  });
}

export { buildServer };

import type { FastifyInstance } from 'fastify';
import { ResearchController } from '../controllers/researchController';

export function registerResearchRoutes(fastify: FastifyInstance, controller: ResearchController) {
  // POST /api/research/search
  fastify.post('/api/research/search', async (request, reply) => {
    await controller.search(request, reply);
  });

  // GET /api/research/status/:slug
  fastify.get<{ Params: { slug: string } }>('/api/research/status/:slug', async (request, reply) => {
    await controller.getStatus(request, reply);
  });

  // GET /api/research/:slug/files
  fastify.get<{ Params: { slug: string } }>('/api/research/:slug/files', async (request, reply) => {
    await controller.listFiles(request, reply);
  });

  // GET /api/research/:slug/download-all
  fastify.get<{ Params: { slug: string } }>('/api/research/:slug/download-all', async (request, reply) => {
    await controller.downloadAll(request, reply);
  });

  // DELETE /api/research/:slug
  fastify.delete<{ Params: { slug: string } }>('/api/research/:slug', async (request, reply) => {
    await controller.deleteFiles(request, reply);
  });
}

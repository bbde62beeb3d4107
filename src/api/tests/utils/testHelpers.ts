import type { FastifyInstance } from 'fastify';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildServer } from '../../server';
import { ResearchPipeline, type ResearchPipelineDeps } from '../../../pipeline/runPipeline';
import { FileStore } from '../../../storage/fileStore';
import type { Logger } from '../../../utils/logger';

const quietLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

export interface TestServer {
  server: FastifyInstance;
  fileStore: FileStore;
  root: string;
  cleanup: () => Promise<void>;
}

/**
 * Server over a pipeline whose stages are in-memory stubs and a file store in
 * a fresh temporary directory.
 */
export async function createTestServer(
  stages: Partial<Omit<ResearchPipelineDeps, 'fileStore'>> = {},
  pipelineTimeoutMs = 5000
): Promise<TestServer> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'api-test-'));
  const fileStore = new FileStore(root);
  const pipeline = new ResearchPipeline({
    sources: [{ name: 'EPAR', url: 'https://ema.test/en/medicines' }],
    planner: { plan: async () => ({ EPAR: 'ibuprofen' }) },
    crawler: { discover: async () => [] },
    filter: { filter: async (candidates) => [...candidates] },
    downloader: { downloadAll: async () => [] },
    logger: quietLogger,
    ...stages,
    fileStore,
  });
  const server = await buildServer({ pipeline, pipelineTimeoutMs });

  return {
    server,
    fileStore,
    root,
    cleanup: async () => {
      await server.close();
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}

export async function seedFiles(store: FileStore, slug: string, files: Record<string, string>) {
  const dir = await store.ensureDir(slug);
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content);
  }
}

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { PipelineResult } from '../../pipeline/types';
import type { FileStore } from '../../storage/fileStore';
import { createError } from '../middleware/errorHandler';

const SearchBodySchema = z.object({
  substance_name: z.string({ required_error: 'substance_name is required' }),
});

interface SlugParams {
  slug: string;
}

export interface ResearchRunner {
  run(substanceName: string): Promise<PipelineResult>;
}

async function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(createError(`Search timed out after ${timeoutMs}ms`, 504, 'PIPELINE_TIMEOUT')),
      timeoutMs
    );
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export class ResearchController {
  constructor(
    private readonly pipeline: ResearchRunner,
    private readonly fileStore: FileStore,
    private readonly timeoutMs: number
  ) {}

  async search(request: FastifyRequest, reply: FastifyReply) {
    const { substance_name } = SearchBodySchema.parse(request.body ?? {});
    if (!substance_name.trim()) {
      throw createError('Substance name is required', 400, 'INVALID_SUBSTANCE');
    }

    request.log.info({ substance: substance_name }, 'Research search started');
    const result = await withDeadline(this.pipeline.run(substance_name), this.timeoutMs);
    reply.send(result);
  }

  async listFiles(
    request: FastifyRequest<{ Params: SlugParams }>,
    reply: FastifyReply
  ) {
    const { slug } = request.params;
    const files = await this.fileStore.listFiles(slug);
    reply.send({
      slug,
      files,
      download_all_url: this.fileStore.downloadAllUrl(slug),
    });
  }

  async downloadAll(
    request: FastifyRequest<{ Params: SlugParams }>,
    reply: FastifyReply
  ) {
    const { slug } = request.params;
    const archive = await this.fileStore.createArchive(slug);
    if (!archive) {
      throw createError(`No PDF files found for ${slug}`, 404, 'FILES_NOT_FOUND');
    }

    reply
      .header('Content-Type', 'application/zip')
      .header('Content-Disposition', `attachment; filename="${slug}_documents.zip"`)
      .send(archive);
  }

  async getStatus(
    request: FastifyRequest<{ Params: SlugParams }>,
    reply: FastifyReply
  ) {
    reply.send(await this.fileStore.getStatus(request.params.slug));
  }

  async deleteFiles(
    request: FastifyRequest<{ Params: SlugParams }>,
    reply: FastifyReply
  ) {
    const { slug } = request.params;
    const deleted = await this.fileStore.deleteFiles(slug);
    if (!deleted) {
      throw createError(`No files found for ${slug}`, 404, 'FILES_NOT_FOUND');
    }
    reply.send({ message: `Deleted files for ${slug}` });
  }
}

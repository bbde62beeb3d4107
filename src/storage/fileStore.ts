import archiver from 'archiver';
import * as fs from 'fs/promises';
import * as path from 'path';
import { InputError } from '../pipeline/errors';
import type { StoredFile } from '../pipeline/types';
import { isValidSlug } from '../utils/substance';

export interface SlugStatus {
  status: 'completed' | 'not_found';
  slug: string;
  file_count: number;
}

function isPdf(filename: string): boolean {
  return filename.toLowerCase().endsWith('.pdf');
}

/**
 * Per-substance document area: `<root>/<slug>/<filename>`, served under
 * `<publicPrefix>/<slug>/<filename>`.
 */
export class FileStore {
  constructor(
    readonly rootDir: string,
    readonly publicPrefix: string = '/static'
  ) {}

  dirFor(slug: string): string {
    if (!isValidSlug(slug)) {
      throw new InputError(`Invalid substance slug: ${slug}`);
    }
    return path.join(this.rootDir, slug);
  }

  publicPathFor(slug: string): string {
    return `${this.publicPrefix}/${slug}`;
  }

  downloadAllUrl(slug: string): string {
    return `/api/research/${slug}/download-all`;
  }

  async ensureDir(slug: string): Promise<string> {
    const dir = this.dirFor(slug);
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }

  async listFiles(slug: string): Promise<StoredFile[]> {
    const dir = this.dirFor(slug);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const files: StoredFile[] = [];
    for (const filename of names.filter(isPdf).sort()) {
      const stat = await fs.stat(path.join(dir, filename));
      if (!stat.isFile()) continue;
      files.push({
        filename,
        url: `${this.publicPathFor(slug)}/${encodeURIComponent(filename)}`,
        size_bytes: stat.size,
      });
    }
    return files;
  }

  async getStatus(slug: string): Promise<SlugStatus> {
    const dir = this.dirFor(slug);
    try {
      await fs.access(dir);
    } catch {
      return { status: 'not_found', slug, file_count: 0 };
    }
    const files = await this.listFiles(slug);
    return { status: 'completed', slug, file_count: files.length };
  }

  /** ZIP of every PDF stored for `slug`, or null when there is none. */
  async createArchive(slug: string): Promise<Buffer | null> {
    const files = await this.listFiles(slug);
    if (files.length === 0) {
      return null;
    }
    const dir = this.dirFor(slug);

    return new Promise((resolve, reject) => {
      const archive = archiver('zip', { zlib: { level: 6 } });
      const chunks: Buffer[] = [];
      archive.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      archive.on('end', () => resolve(Buffer.concat(chunks)));
      archive.on('error', reject);
      for (const file of files) {
        archive.file(path.join(dir, file.filename), { name: file.filename });
      }
      archive.finalize().catch(reject);
    });
  }

  async deleteFiles(slug: string): Promise<boolean> {
    const dir = this.dirFor(slug);
    try {
      await fs.access(dir);
    } catch {
      return false;
    }
    await fs.rm(dir, { recursive: true, force: true });
    return true;
  }
}

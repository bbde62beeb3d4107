import { createHash, randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { DOWNLOAD_BATCH_SIZE, PDF_TIMEOUT_MS } from '../config/pipelineConfig';
import { DownloadError } from '../pipeline/errors';
import type { DownloadedFile, PdfCandidate } from '../pipeline/types';
import { processInBatches } from '../utils/batch';
import type { HttpClient } from '../utils/http';
import { createLogger, errorMessage, type Logger } from '../utils/logger';

const TITLE_FILENAME_MAX = 50;

function urlBasename(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? '';
  }
  const base = path.posix.basename(pathname);
  try {
    return decodeURIComponent(base);
  } catch {
    return base;
  }
}

export function getPdfFilename(url: string, title = ''): string {
  const base = urlBasename(url).replace(/[/\\:*?"<>|\u0000-\u001f]/g, '_');
  if (base.toLowerCase().endsWith('.pdf') && base.length > '.pdf'.length) {
    return base;
  }

  const safeTitle = title
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '-')
    .slice(0, TITLE_FILENAME_MAX)
    .replace(/^-+|-+$/g, '');
  if (safeTitle) {
    return `${safeTitle}.pdf`;
  }

  const hash = createHash('sha256').update(url).digest('hex').slice(0, 8);
  return `document_${hash}.pdf`;
}

/** Appends -2, -3 … before the extension until the name is free. */
export function claimFilename(filename: string, taken: Set<string>): string {
  const ext = path.extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);
  let candidate = filename;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    candidate = `${stem}-${n}${ext}`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

async function writeAtomically(filePath: string, data: Buffer): Promise<void> {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

export interface DownloadManagerOptions {
  batchSize?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface DownloadTarget {
  /** URL prefix under which `targetDir` is served; defaults to the directory path. */
  publicPath?: string;
}

export class DownloadManager {
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly http: HttpClient,
    options: DownloadManagerOptions = {}
  ) {
    this.batchSize = options.batchSize ?? DOWNLOAD_BATCH_SIZE;
    this.timeoutMs = options.timeoutMs ?? PDF_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('Downloader');
  }

  async downloadPdf(
    candidate: PdfCandidate,
    filename: string,
    targetDir: string,
    publicPath: string
  ): Promise<DownloadedFile> {
    const res = await this.http.getBuffer(candidate.url, { timeoutMs: this.timeoutMs });
    if (res.status !== 200) {
      throw new DownloadError(candidate.url, `status ${res.status}`);
    }

    const filePath = path.join(targetDir, filename);
    await writeAtomically(filePath, res.data);
    const stat = await fs.stat(filePath);
    this.logger.info(`Downloaded PDF: ${candidate.url} -> ${filePath}`);

    return {
      source: candidate.source,
      title: candidate.title,
      filename,
      stored_url: `${publicPath.replace(/\/+$/, '')}/${encodeURIComponent(filename)}`,
      original_url: candidate.url,
      size_bytes: stat.size,
    };
  }

  /**
   * Downloads every candidate into `targetDir`, a few at a time. Failed items
   * are logged and left out of the result.
   */
  async downloadAll(
    candidates: readonly PdfCandidate[],
    targetDir: string,
    target: DownloadTarget = {}
  ): Promise<DownloadedFile[]> {
    await fs.mkdir(targetDir, { recursive: true });
    const publicPath = target.publicPath ?? targetDir;

    // Names are fixed up front so concurrent writes never share a path.
    const taken = new Set<string>();
    const jobs = candidates.map((candidate) => ({
      candidate,
      filename: claimFilename(getPdfFilename(candidate.url, candidate.title), taken),
    }));

    const settled = await processInBatches(
      jobs,
      ({ candidate, filename }) => this.downloadPdf(candidate, filename, targetDir, publicPath),
      { batchSize: this.batchSize }
    );

    const downloaded: DownloadedFile[] = [];
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        downloaded.push(result.value);
        return;
      }
      this.logger.error(`Error downloading PDF ${jobs[index]?.candidate.url ?? ''}`, {
        error: errorMessage(result.reason),
      });
    });
    return downloaded;
  }
}

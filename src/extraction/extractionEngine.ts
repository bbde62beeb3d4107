import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { CompletionClient } from '../agents/completionClient';
import {
  EXTRACTION_THROTTLE_MS,
  MIN_EXTRACTED_TEXT_LENGTH,
  PDF_TIMEOUT_MS,
  SAMPLE_MAX_PAGES,
} from '../config/pipelineConfig';
import { sleep } from '../utils/batch';
import type { HttpClient } from '../utils/http';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import { LayoutExtractor } from './layoutExtractor';
import { OcrExtractor } from './ocrExtractor';
import { PdfParseExtractor } from './pdfParseExtractor';
import type { TextExtractor } from './textExtractor';

export interface ExtractionOutcome {
  text: string;
  /** Name of the extractor that produced `text`, null when nothing was found. */
  extractor: string | null;
}

export interface TextExtractionEngineOptions {
  extractors: TextExtractor[];
  throttleMs?: number;
  minTextLength?: number;
  downloadTimeoutMs?: number;
  tempRoot?: string;
  logger?: Logger;
}

const EMPTY: ExtractionOutcome = { text: '', extractor: null };

export function createDefaultExtractors(client: CompletionClient): TextExtractor[] {
  return [new PdfParseExtractor(), new LayoutExtractor(), new OcrExtractor(client)];
}

export class TextExtractionEngine {
  private readonly extractors: TextExtractor[];
  private readonly throttleMs: number;
  private readonly minTextLength: number;
  private readonly downloadTimeoutMs: number;
  private readonly tempRoot: string;
  private readonly logger: Logger;

  constructor(
    private readonly http: HttpClient,
    options: TextExtractionEngineOptions
  ) {
    if (options.extractors.length === 0) {
      throw new Error('TextExtractionEngine needs at least one extractor');
    }
    this.extractors = options.extractors;
    this.throttleMs = options.throttleMs ?? EXTRACTION_THROTTLE_MS;
    this.minTextLength = options.minTextLength ?? MIN_EXTRACTED_TEXT_LENGTH;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? PDF_TIMEOUT_MS;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
    this.logger = options.logger ?? createLogger('TextExtraction');
  }

  async extractSample(pdfUrl: string, maxPages: number = SAMPLE_MAX_PAGES): Promise<string> {
    return (await this.extractSampleWithSource(pdfUrl, maxPages)).text;
  }

  async extractSampleWithSource(
    pdfUrl: string,
    maxPages: number = SAMPLE_MAX_PAGES
  ): Promise<ExtractionOutcome> {
    let tempDir: string | undefined;
    try {
      await sleep(this.throttleMs);

      const res = await this.http.getBuffer(pdfUrl, { timeoutMs: this.downloadTimeoutMs });
      if (res.status !== 200) {
        this.logger.warn(`Failed to download PDF: ${pdfUrl} (status: ${res.status})`);
        return EMPTY;
      }
      if (!res.contentType.toLowerCase().startsWith('application/pdf')) {
        this.logger.warn(`URL doesn't appear to be a PDF: ${pdfUrl}`, { contentType: res.contentType });
        return EMPTY;
      }

      tempDir = await fs.mkdtemp(path.join(this.tempRoot, 'regdoc-'));
      const filePath = path.join(tempDir, 'sample.pdf');
      await fs.writeFile(filePath, res.data);

      return await this.extractFromFile(filePath, maxPages);
    } catch (error) {
      this.logger.error(`Error extracting text from PDF ${pdfUrl}`, { error: errorMessage(error) });
      return EMPTY;
    } finally {
      if (tempDir) {
        await fs.rm(tempDir, { recursive: true, force: true });
      }
    }
  }

  /**
   * Runs the extractors in order and returns the first text longer than the
   * threshold. The last extractor's text is returned whatever its length.
   */
  async extractFromFile(filePath: string, maxPages: number): Promise<ExtractionOutcome> {
    const lastIndex = this.extractors.length - 1;

    for (const [index, extractor] of this.extractors.entries()) {
      let text: string;
      try {
        text = await extractor.extract(filePath, maxPages);
      } catch (error) {
        this.logger.debug(`${extractor.name} extraction failed`, { error: errorMessage(error) });
        continue;
      }

      const length = text.trim().length;
      if (length > this.minTextLength || (index === lastIndex && length > 0)) {
        this.logger.debug(`${extractor.name} extracted ${length} chars`);
        return { text, extractor: extractor.name };
      }
      this.logger.debug(`${extractor.name} extracted only ${length} chars`);
    }

    return EMPTY;
  }
}

import * as fs from 'fs/promises';
import type { CompletionClient } from '../agents/completionClient';
import { OCR_CONFIG } from '../agents/config';
import { OCR_PROMPT, buildOcrMessage } from '../agents/prompts';
import type { TextExtractor } from './textExtractor';

// Inline request payloads above this size are refused by the Gemini API.
const MAX_INLINE_PDF_BYTES = 18 * 1024 * 1024;

/**
 * Last-resort extraction for scanned documents: the vision model renders
 * and transcribes the leading pages.
 */
export class OcrExtractor implements TextExtractor {
  readonly name = 'gemini-ocr';

  constructor(private readonly client: CompletionClient) {}

  async extract(filePath: string, maxPages: number): Promise<string> {
    const data = await fs.readFile(filePath);
    if (data.length > MAX_INLINE_PDF_BYTES) {
      throw new Error(`PDF too large for OCR (${data.length} bytes)`);
    }

    const text = await this.client.complete({
      agent: 'ocr',
      systemPrompt: OCR_PROMPT,
      userMessage: buildOcrMessage(maxPages),
      attachment: { mimeType: 'application/pdf', data },
      config: OCR_CONFIG,
    });
    return text.trim();
  }
}

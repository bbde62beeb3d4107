import * as fs from 'fs/promises';
import type { TextExtractor } from './textExtractor';

/** Structural extraction from the PDF text operators (pdf-parse). */
export class PdfParseExtractor implements TextExtractor {
  readonly name = 'pdf-parse';

  async extract(filePath: string, maxPages: number): Promise<string> {
    // Loaded on first use; pdf-parse reads a bundled fixture when required without a parent module.
    const { default: pdfParse } = await import('pdf-parse');
    const buffer = await fs.readFile(filePath);
    const data = await pdfParse(buffer, { max: maxPages });
    return data.text || '';
  }
}

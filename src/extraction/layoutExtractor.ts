import * as fs from 'fs/promises';
import type { TextExtractor } from './textExtractor';

const LINE_MERGE_Y_TOLERANCE = 2.5;

export type PositionedText = {
  text: string;
  x: number;
  y: number;
};

type TextLine = {
  y: number;
  parts: PositionedText[];
};

/**
 * Rebuilds reading order from positioned glyph runs: top to bottom, then
 * left to right, runs on (nearly) the same baseline joined into one line.
 */
export function linesFromPositionedText(items: PositionedText[]): string[] {
  const sorted = items
    .filter((item) => item.text.trim().length > 0)
    .sort((a, b) => b.y - a.y || a.x - b.x);

  const lines: TextLine[] = [];
  for (const item of sorted) {
    const current = lines[lines.length - 1];
    if (current && Math.abs(current.y - item.y) <= LINE_MERGE_Y_TOLERANCE) {
      current.parts.push(item);
    } else {
      lines.push({ y: item.y, parts: [item] });
    }
  }

  return lines.map((line) =>
    line.parts
      .sort((a, b) => a.x - b.x)
      .map((part) => part.text.trim())
      .join(' ')
      .replace(/\s+/g, ' ')
  );
}

/** Layout-based extraction from pdfjs-dist text content. */
export class LayoutExtractor implements TextExtractor {
  readonly name = 'pdfjs-layout';

  async extract(filePath: string, maxPages: number): Promise<string> {
    const pdfjs = await import('pdfjs-dist');
    const data = new Uint8Array(await fs.readFile(filePath));
    const loadingTask = pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true });
    let doc: Awaited<typeof loadingTask.promise>;
    try {
      doc = await loadingTask.promise;
    } catch (error) {
      await loadingTask.destroy();
      throw error;
    }

    try {
      const pages: string[] = [];
      const pageCount = Math.min(doc.numPages, maxPages);
      for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        const items: PositionedText[] = [];
        for (const item of content.items) {
          if (!('str' in item)) continue;
          items.push({
            text: item.str,
            x: Number(item.transform[4] ?? 0),
            y: Number(item.transform[5] ?? 0),
          });
        }
        pages.push(linesFromPositionedText(items).join('\n'));
        page.cleanup();
      }
      return pages.join('\n\n');
    } finally {
      await doc.destroy();
    }
  }
}

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { TextExtractionEngine, createDefaultExtractors } from '../src/extraction/extractionEngine';
import { LayoutExtractor, linesFromPositionedText } from '../src/extraction/layoutExtractor';
import { OcrExtractor } from '../src/extraction/ocrExtractor';
import { PdfParseExtractor } from '../src/extraction/pdfParseExtractor';
import type { TextExtractor } from '../src/extraction/textExtractor';
import { FakeCompletionClient, FakeHttpClient, pdf, recordingLogger } from './helpers/fakes';
import { buildTextPdf } from './helpers/pdfFixture';

const PDF_URL = 'https://ema.test/docs/ibuprofen.pdf';
const LONG_TEXT = 'Ibuprofen film-coated tablets. '.repeat(10);

class StubExtractor implements TextExtractor {
  readonly calls: Array<{ filePath: string; maxPages: number; bytes: string }> = [];

  constructor(
    readonly name: string,
    private readonly result: string | Error
  ) {}

  async extract(filePath: string, maxPages: number): Promise<string> {
    this.calls.push({ filePath, maxPages, bytes: await fs.readFile(filePath, 'utf8') });
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

describe('TextExtractionEngine', () => {
  let tempRoot: string;

  beforeEach(async () => {
    tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'extraction-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  function engine(extractors: TextExtractor[], http = new FakeHttpClient({ [PDF_URL]: pdf() })) {
    return new TextExtractionEngine(http, {
      extractors,
      throttleMs: 0,
      tempRoot,
      logger: recordingLogger(),
    });
  }

  it('stops at the first extractor with enough text', async () => {
    const structural = new StubExtractor('structural', LONG_TEXT);
    const layout = new StubExtractor('layout', 'unused');

    const outcome = await engine([structural, layout]).extractSampleWithSource(PDF_URL, 3);

    expect(outcome).toEqual({ text: LONG_TEXT, extractor: 'structural' });
    expect(layout.calls).toHaveLength(0);
    expect(structural.calls[0]?.maxPages).toBe(3);
    expect(structural.calls[0]?.bytes).toBe('%PDF-1.4 test document');
  });

  it('moves on when the text is too short', async () => {
    const structural = new StubExtractor('structural', 'Page 1');
    const layout = new StubExtractor('layout', LONG_TEXT);

    const outcome = await engine([structural, layout]).extractSampleWithSource(PDF_URL);

    expect(outcome.extractor).toBe('layout');
  });

  it('attributes short text from the last tier to it', async () => {
    const outcome = await engine([
      new StubExtractor('structural', new Error('bad xref table')),
      new StubExtractor('layout', '   '),
      new StubExtractor('ocr', 'Scanned label text'),
    ]).extractSampleWithSource(PDF_URL);

    expect(outcome).toEqual({ text: 'Scanned label text', extractor: 'ocr' });
  });

  it('returns an empty outcome when no tier finds text', async () => {
    const outcome = await engine([
      new StubExtractor('structural', ''),
      new StubExtractor('ocr', ''),
    ]).extractSampleWithSource(PDF_URL);

    expect(outcome).toEqual({ text: '', extractor: null });
  });

  it('skips responses that are not PDFs', async () => {
    const structural = new StubExtractor('structural', LONG_TEXT);
    const http = new FakeHttpClient({
      [PDF_URL]: { contentType: 'text/html', body: '<html>Login</html>' },
    });

    expect(await engine([structural], http).extractSample(PDF_URL)).toBe('');
    expect(structural.calls).toHaveLength(0);
  });

  it('skips failed downloads', async () => {
    const structural = new StubExtractor('structural', LONG_TEXT);
    const http = new FakeHttpClient({ [PDF_URL]: { status: 404 } });

    expect(await engine([structural], http).extractSample(PDF_URL)).toBe('');
    expect(structural.calls).toHaveLength(0);
  });

  it('accepts a PDF content type with parameters', async () => {
    const http = new FakeHttpClient({
      [PDF_URL]: { contentType: 'Application/PDF; qs=0.001', body: '%PDF-1.7' },
    });

    const text = await engine([new StubExtractor('structural', LONG_TEXT)], http).extractSample(PDF_URL);

    expect(text).toBe(LONG_TEXT);
  });

  it('removes the temporary file whatever the outcome', async () => {
    const structural = new StubExtractor('structural', LONG_TEXT);
    await engine([structural]).extractSample(PDF_URL);
    await engine([new StubExtractor('broken', new Error('corrupt'))]).extractSample(PDF_URL);

    expect(structural.calls[0]?.filePath.startsWith(tempRoot)).toBe(true);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('requires at least one extractor', () => {
    expect(() => engine([])).toThrow('at least one extractor');
  });
});

describe('OcrExtractor', () => {
  it('sends the PDF to the vision model and trims the transcription', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ocr-test-'));
    const filePath = path.join(dir, 'scan.pdf');
    await fs.writeFile(filePath, '%PDF-1.4 scanned');
    const client = new FakeCompletionClient('\n  Ibuprofen 400 mg tablets  \n');

    try {
      const text = await new OcrExtractor(client).extract(filePath, 2);

      expect(text).toBe('Ibuprofen 400 mg tablets');
      const request = client.requests[0];
      expect(request?.agent).toBe('ocr');
      expect(request?.attachment?.mimeType).toBe('application/pdf');
      expect(request?.attachment?.data.toString('utf8')).toBe('%PDF-1.4 scanned');
      expect(request?.userMessage).toContain('2');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe('linesFromPositionedText', () => {
  it('orders runs top to bottom and left to right', () => {
    const lines = linesFromPositionedText([
      { text: 'tablets', x: 120, y: 700 },
      { text: 'Package leaflet', x: 50, y: 760 },
      { text: 'Ibuprofen', x: 50, y: 701.5 },
      { text: '400 mg', x: 80, y: 699 },
      { text: '   ', x: 10, y: 650 },
    ]);

    expect(lines).toEqual(['Package leaflet', 'Ibuprofen 400 mg tablets']);
  });

  it('keeps runs further apart than the tolerance on separate lines', () => {
    expect(
      linesFromPositionedText([
        { text: 'first', x: 0, y: 100 },
        { text: 'second', x: 0, y: 97 },
      ])
    ).toEqual(['first', 'second']);
  });
});

describe('PDF text tiers', () => {
  const REPORT_LINES = [
    'Ibuprofen assessment report',
    'Summary of product characteristics for ibuprofen tablets',
    'Safety and efficacy were established in adults',
  ];
  let dir: string;
  let reportPath: string;
  let blankPath: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pdf-tiers-test-'));
    reportPath = path.join(dir, 'report.pdf');
    blankPath = path.join(dir, 'blank.pdf');
    await fs.writeFile(reportPath, buildTextPdf(REPORT_LINES));
    await fs.writeFile(blankPath, buildTextPdf([]));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads the text operators with pdf-parse', async () => {
    const text = await new PdfParseExtractor().extract(reportPath, 3);

    expect(text.trim()).toBe(REPORT_LINES.join('\n'));
  });

  it('rebuilds the lines from pdfjs text positions', async () => {
    const text = await new LayoutExtractor().extract(reportPath, 3);

    expect(text.split('\n')).toEqual(REPORT_LINES);
  });

  it('runs the default tiers in order and stops at the first with enough text', async () => {
    const client = new FakeCompletionClient('unused');
    const extractors = createDefaultExtractors(client);
    const engine = new TextExtractionEngine(new FakeHttpClient(), {
      extractors,
      throttleMs: 0,
      logger: recordingLogger(),
    });

    const outcome = await engine.extractFromFile(reportPath, 3);

    expect(extractors.map((extractor) => extractor.name)).toEqual(['pdf-parse', 'pdfjs-layout', 'gemini-ocr']);
    expect(outcome.extractor).toBe('pdf-parse');
    expect(client.requests).toHaveLength(0);
  });

  it('falls through to OCR when the PDF carries no text', async () => {
    const client = new FakeCompletionClient('Scanned ibuprofen label');
    const engine = new TextExtractionEngine(new FakeHttpClient(), {
      extractors: createDefaultExtractors(client),
      throttleMs: 0,
      logger: recordingLogger(),
    });

    const outcome = await engine.extractFromFile(blankPath, 2);

    expect(outcome).toEqual({ text: 'Scanned ibuprofen label', extractor: 'gemini-ocr' });
    expect(client.requests.map((request) => request.agent)).toEqual(['ocr']);
  });
});

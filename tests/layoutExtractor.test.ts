import { describe, it, expect, beforeAll, afterAll, beforeEach, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { LayoutExtractor } from '../src/extraction/layoutExtractor';

type TextContent = { items: Array<{ str: string; transform: number[] } | { type: string }> };

const mockDestroyTask = jest.fn(async () => undefined);
const mockDestroyDoc = jest.fn(async () => undefined);
const mockGetDocument = jest.fn<(params: unknown) => { promise: Promise<unknown>; destroy: () => Promise<undefined> }>();

jest.mock('pdfjs-dist', () => ({
  getDocument: (params: unknown) => mockGetDocument(params),
}));

function documentWith(pages: TextContent[]) {
  return {
    numPages: pages.length,
    getPage: async (pageNumber: number) => ({
      getTextContent: async () => pages[pageNumber - 1] ?? { items: [] },
      cleanup: () => undefined,
    }),
    destroy: mockDestroyDoc,
  };
}

describe('LayoutExtractor', () => {
  let dir: string;
  let filePath: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'layout-test-'));
    filePath = path.join(dir, 'doc.pdf');
    await fs.writeFile(filePath, '%PDF-1.4 placeholder');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('releases the loading task when the document cannot be opened', async () => {
    mockGetDocument.mockImplementation(() => ({
      promise: Promise.reject(new Error('Invalid PDF structure.')),
      destroy: mockDestroyTask,
    }));

    await expect(new LayoutExtractor().extract(filePath, 3)).rejects.toThrow('Invalid PDF structure.');
    expect(mockDestroyTask).toHaveBeenCalledTimes(1);
    expect(mockDestroyDoc).not.toHaveBeenCalled();
  });

  it('reads no more than the requested pages and closes the document', async () => {
    mockGetDocument.mockReturnValue({
      promise: Promise.resolve(
        documentWith([
          { items: [{ str: 'Ibuprofen', transform: [1, 0, 0, 1, 72, 720] }, { type: 'beginMarkedContent' }] },
          { items: [{ str: 'Second page', transform: [1, 0, 0, 1, 72, 720] }] },
          { items: [{ str: 'Third page', transform: [1, 0, 0, 1, 72, 720] }] },
        ])
      ),
      destroy: mockDestroyTask,
    });

    const text = await new LayoutExtractor().extract(filePath, 2);

    expect(text).toBe('Ibuprofen\n\nSecond page');
    expect(mockDestroyDoc).toHaveBeenCalledTimes(1);
    expect(mockDestroyTask).not.toHaveBeenCalled();
  });
});

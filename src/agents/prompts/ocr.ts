export const OCR_PROMPT = `You are an OCR engine. Transcribe the printed text of the attached PDF pages.
Return only the raw text, page by page, preserving line breaks. Do not add commentary, headings or markdown.`;

export function buildOcrMessage(maxPages: number): string {
  return `Transcribe pages 1 to ${maxPages} only. Prefix each page with "Page <n>:" on its own line.`;
}

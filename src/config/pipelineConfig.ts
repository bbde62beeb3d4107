import * as path from 'path';

export const RELEVANCE_BATCH_SIZE = 5;
export const DOWNLOAD_BATCH_SIZE = 3;
export const INTER_BATCH_DELAY_MS = 1000;
export const EXTRACTION_THROTTLE_MS = 1000;
export const ACCEPTANCE_CONFIDENCE_THRESHOLD = 0.3;
export const MIN_EXTRACTED_TEXT_LENGTH = 100;
export const SAMPLE_MAX_PAGES = 3;
export const SAMPLE_MAX_CHARS = 3000;
export const MAX_CANDIDATES_PER_SOURCE = 10;
export const PAGE_TIMEOUT_MS = 30000;
export const PDF_TIMEOUT_MS = 60000;

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const PIPELINE_CONFIG = {
  relevanceBatchSize: RELEVANCE_BATCH_SIZE,
  downloadBatchSize: DOWNLOAD_BATCH_SIZE,
  interBatchDelayMs: INTER_BATCH_DELAY_MS,
  extractionThrottleMs: EXTRACTION_THROTTLE_MS,
  acceptanceThreshold: ACCEPTANCE_CONFIDENCE_THRESHOLD,
  minExtractedTextLength: MIN_EXTRACTED_TEXT_LENGTH,
  sampleMaxPages: SAMPLE_MAX_PAGES,
  sampleMaxChars: SAMPLE_MAX_CHARS,
  maxCandidatesPerSource: MAX_CANDIDATES_PER_SOURCE,
  pageTimeoutMs: PAGE_TIMEOUT_MS,
  pdfTimeoutMs: PDF_TIMEOUT_MS,
} as const;

export type PipelineConfig = {
  -readonly [K in keyof typeof PIPELINE_CONFIG]: number;
};

export interface PathsConfig {
  storageRoot: string;
  sourcesFile: string;
  publicPrefix: string;
}

export function getPathsConfig(): PathsConfig {
  return {
    storageRoot: path.resolve(process.env.STORAGE_ROOT || 'static'),
    sourcesFile: path.resolve(process.env.RESEARCH_SOURCES_FILE || 'config/research_resources.txt'),
    publicPrefix: '/static',
  };
}

export const DEFAULT_PIPELINE_TIMEOUT_MS = 900000;

/** Positive millisecond value from an env var, or `fallback` when unset or malformed. */
export function timeoutFromEnv(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  return raw && Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : fallback;
}

export function getPipelineTimeoutMs(): number {
  return timeoutFromEnv(process.env.PIPELINE_TIMEOUT_MS, DEFAULT_PIPELINE_TIMEOUT_MS);
}

import type { SearchPlan } from '../agents/queryPlanner';

export interface SourceConfig {
  name: string;
  url: string;
}

export interface PdfCandidate {
  /** Absolute URL; unique within one pipeline run. */
  url: string;
  title: string;
  source: string;
  found_on: string;
}

export interface DownloadedFile {
  source: string;
  title: string;
  filename: string;
  stored_url: string;
  original_url: string;
  size_bytes: number;
}

export interface StoredFile {
  filename: string;
  url: string;
  size_bytes: number;
}

export type PipelineStatus = 'completed' | 'error';

export interface PipelineDebugInfo {
  sources_searched: string[];
  search_queries: SearchPlan;
  pdf_candidates_found: number;
  relevant_pdfs_found?: number;
  files_downloaded?: number;
  processing_time_ms: number;
  error?: string;
  error_type?: string;
}

export interface PipelineResult {
  status: PipelineStatus;
  substance: string;
  slug: string;
  message?: string;
  total_found: number;
  total_relevant: number;
  total_downloaded: number;
  hits: DownloadedFile[];
  download_all_url?: string;
  debug_info: PipelineDebugInfo;
}

import type { SearchPlan } from '../agents/queryPlanner';
import { QueryPlanner } from '../agents/queryPlanner';
import { GeminiCompletionClient, type CompletionClient } from '../agents/completionClient';
import { RelevanceFilter } from '../agents/relevanceFilter';
import { PIPELINE_CONFIG, getPathsConfig, type PathsConfig, type PipelineConfig } from '../config/pipelineConfig';
import { TextExtractionEngine, createDefaultExtractors } from '../extraction/extractionEngine';
import { PageScanner } from '../ingest/crawler/pageScanner';
import { SourceCrawler, dedupeCandidates } from '../ingest/crawler/sourceCrawler';
import { DownloadManager, type DownloadTarget } from '../ingest/downloader';
import { loadSourceRegistry } from '../ingest/sources/registry';
import { FileStore } from '../storage/fileStore';
import { NodeFetchHttpClient, type HttpClient } from '../utils/http';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import { toSubstanceQuery } from '../utils/substance';
import { InputError } from './errors';
import type { DownloadedFile, PdfCandidate, PipelineResult, SourceConfig } from './types';

export interface SearchPlanner {
  plan(substanceName: string, sourceNames: string[]): Promise<SearchPlan>;
}

export interface CandidateDiscoverer {
  discover(searchPlan: SearchPlan, substanceName: string): Promise<PdfCandidate[]>;
}

export interface CandidateFilter {
  filter(candidates: readonly PdfCandidate[], substanceName: string): Promise<PdfCandidate[]>;
}

export interface DocumentDownloader {
  downloadAll(
    candidates: readonly PdfCandidate[],
    targetDir: string,
    target?: DownloadTarget
  ): Promise<DownloadedFile[]>;
}

export interface ResearchPipelineDeps {
  sources: readonly SourceConfig[];
  planner: SearchPlanner;
  crawler: CandidateDiscoverer;
  filter: CandidateFilter;
  downloader: DocumentDownloader;
  fileStore: FileStore;
  logger?: Logger;
  /** Releases resources shared by the stages (the HTTP client). */
  onClose?: () => void;
}

export class ResearchPipeline {
  private readonly sources: readonly SourceConfig[];
  private readonly logger: Logger;
  private closed = false;

  constructor(private readonly deps: ResearchPipelineDeps) {
    this.sources = deps.sources;
    this.logger = deps.logger ?? createLogger('Pipeline');
  }

  get fileStore(): FileStore {
    return this.deps.fileStore;
  }

  /**
   * Runs discovery and acquisition for one substance. Never rejects: failures
   * come back as a result with status `error`.
   */
  async run(substanceName: string): Promise<PipelineResult> {
    const startTime = Date.now();
    const query = toSubstanceQuery(typeof substanceName === 'string' ? substanceName : '');
    const sourceNames = this.sources.map((s) => s.name);
    let searchQueries: SearchPlan = {};

    const debug = (counts: { found: number; relevant?: number; downloaded?: number }) => ({
      sources_searched: sourceNames,
      search_queries: searchQueries,
      pdf_candidates_found: counts.found,
      ...(counts.relevant !== undefined ? { relevant_pdfs_found: counts.relevant } : {}),
      ...(counts.downloaded !== undefined ? { files_downloaded: counts.downloaded } : {}),
      processing_time_ms: Date.now() - startTime,
    });

    try {
      if (!query.slug) {
        throw new InputError('Substance name is required');
      }

      this.logger.info(`Starting search for substance: ${query.name}`, { slug: query.slug });
      this.logger.info(`Loaded ${sourceNames.length} research sources: ${sourceNames.join(', ')}`);

      this.logger.info('[QueryPlanning] Starting...');
      searchQueries = await this.deps.planner.plan(query.name, sourceNames);
      this.logger.info(`[QueryPlanning] Generated search queries for ${Object.keys(searchQueries).length} sources`);

      this.logger.info('[Discovery] Starting...');
      const candidates = dedupeCandidates(await this.deps.crawler.discover(searchQueries, query.name));
      this.logger.info(`[Discovery] Found ${candidates.length} unique PDF candidates`);

      if (candidates.length === 0) {
        this.logger.warn('No PDF documents found in any source');
        return {
          status: 'completed',
          substance: query.name,
          slug: query.slug,
          message: 'No PDF documents found',
          total_found: 0,
          total_relevant: 0,
          total_downloaded: 0,
          hits: [],
          debug_info: debug({ found: 0 }),
        };
      }

      this.logger.info('[RelevanceFilter] Starting...');
      const relevant = await this.deps.filter.filter(candidates, query.name);
      this.logger.info(`[RelevanceFilter] ${relevant.length}/${candidates.length} PDFs accepted`);

      if (relevant.length === 0) {
        this.logger.warn('No relevant PDF documents found after filtering');
        return {
          status: 'completed',
          substance: query.name,
          slug: query.slug,
          message: 'No relevant PDF documents found after filtering',
          total_found: candidates.length,
          total_relevant: 0,
          total_downloaded: 0,
          hits: [],
          debug_info: debug({ found: candidates.length, relevant: 0 }),
        };
      }

      const targetDir = await this.deps.fileStore.ensureDir(query.slug);
      this.logger.info(`[Download] Downloading ${relevant.length} PDFs to ${targetDir}`);
      const hits = await this.deps.downloader.downloadAll(relevant, targetDir, {
        publicPath: this.deps.fileStore.publicPathFor(query.slug),
      });
      this.logger.info(`[Download] Saved ${hits.length} files`);

      return {
        status: 'completed',
        substance: query.name,
        slug: query.slug,
        message: `Downloaded ${hits.length} of ${relevant.length} relevant documents`,
        total_found: candidates.length,
        total_relevant: relevant.length,
        total_downloaded: hits.length,
        hits,
        download_all_url: this.deps.fileStore.downloadAllUrl(query.slug),
        debug_info: debug({
          found: candidates.length,
          relevant: relevant.length,
          downloaded: hits.length,
        }),
      };
    } catch (error) {
      const errorType = error instanceof Error ? error.name : typeof error;
      this.logger.error(`Search failed for ${substanceName}`, {
        error: errorMessage(error),
        errorType,
      });
      return {
        status: 'error',
        substance: query.name || String(substanceName ?? ''),
        slug: query.slug,
        message: `Search failed: ${errorMessage(error)}`,
        total_found: 0,
        total_relevant: 0,
        total_downloaded: 0,
        hits: [],
        debug_info: {
          ...debug({ found: 0 }),
          error: errorMessage(error),
          error_type: errorType,
        },
      };
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.deps.onClose?.();
  }
}

export interface CreateResearchPipelineOptions {
  completionClient?: CompletionClient;
  http?: HttpClient;
  paths?: Partial<PathsConfig>;
  config?: Partial<PipelineConfig>;
  logger?: Logger;
}

export function createResearchPipeline(options: CreateResearchPipelineOptions = {}): ResearchPipeline {
  const paths: PathsConfig = { ...getPathsConfig(), ...options.paths };
  const config: PipelineConfig = { ...PIPELINE_CONFIG, ...options.config };
  const http = options.http ?? new NodeFetchHttpClient({ timeoutMs: config.pageTimeoutMs });
  const client = options.completionClient ?? new GeminiCompletionClient();
  const sources = loadSourceRegistry(paths.sourcesFile);

  const engine = new TextExtractionEngine(http, {
    extractors: createDefaultExtractors(client),
    throttleMs: config.extractionThrottleMs,
    minTextLength: config.minExtractedTextLength,
    downloadTimeoutMs: config.pdfTimeoutMs,
  });

  return new ResearchPipeline({
    sources,
    planner: new QueryPlanner(client),
    crawler: new SourceCrawler(sources, new PageScanner(http, undefined, config.pageTimeoutMs), {
      maxCandidatesPerSource: config.maxCandidatesPerSource,
    }),
    filter: new RelevanceFilter(client, engine, {
      batchSize: config.relevanceBatchSize,
      delayMs: config.interBatchDelayMs,
      threshold: config.acceptanceThreshold,
      sampleMaxPages: config.sampleMaxPages,
      sampleMaxChars: config.sampleMaxChars,
    }),
    downloader: new DownloadManager(http, {
      batchSize: config.downloadBatchSize,
      timeoutMs: config.pdfTimeoutMs,
    }),
    fileStore: new FileStore(paths.storageRoot, paths.publicPrefix),
    logger: options.logger,
    onClose: () => http.close(),
  });
}

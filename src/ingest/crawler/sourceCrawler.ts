import type { SearchPlan } from '../../agents/queryPlanner';
import type { PdfCandidate, SourceConfig } from '../../pipeline/types';
import { MAX_CANDIDATES_PER_SOURCE } from '../../config/pipelineConfig';
import { createLogger, errorMessage, type Logger } from '../../utils/logger';
import type { PageScanner } from './pageScanner';
import type { SourceStrategy } from './types';
import { createDefaultStrategies, genericStrategy, type StrategyRegistry } from './strategies';

export interface SourceCrawlerOptions {
  strategies?: StrategyRegistry;
  fallbackStrategy?: SourceStrategy;
  maxCandidatesPerSource?: number;
  logger?: Logger;
}

/** Keeps the first candidate seen for every URL. */
export function dedupeCandidates(candidates: readonly PdfCandidate[]): PdfCandidate[] {
  const seen = new Set<string>();
  const unique: PdfCandidate[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.url)) continue;
    seen.add(candidate.url);
    unique.push(candidate);
  }
  return unique;
}

export class SourceCrawler {
  private readonly sources: Map<string, SourceConfig>;
  private readonly strategies: StrategyRegistry;
  private readonly fallbackStrategy: SourceStrategy;
  private readonly maxCandidates: number;
  private readonly logger: Logger;

  constructor(
    sources: readonly SourceConfig[],
    private readonly scanner: PageScanner,
    options: SourceCrawlerOptions = {}
  ) {
    this.sources = new Map(sources.map((s) => [s.name, s]));
    this.strategies = options.strategies ?? createDefaultStrategies();
    this.fallbackStrategy = options.fallbackStrategy ?? genericStrategy;
    this.maxCandidates = options.maxCandidatesPerSource ?? MAX_CANDIDATES_PER_SOURCE;
    this.logger = options.logger ?? createLogger('SourceCrawler');
  }

  strategyFor(sourceName: string): SourceStrategy {
    return this.strategies.get(sourceName) ?? this.fallbackStrategy;
  }

  /**
   * Searches one source. Any failure is logged and yields no candidates so
   * that the remaining sources still run.
   */
  async discoverSource(
    sourceName: string,
    searchTerm: string,
    substanceName: string
  ): Promise<PdfCandidate[]> {
    const source = this.sources.get(sourceName);
    if (!source) {
      this.logger.warn(`No URL configured for source: ${sourceName}`);
      return [];
    }

    const strategy = this.strategyFor(sourceName);
    this.logger.info(`Searching ${sourceName} (${strategy.name}) for '${substanceName}'`, {
      searchTerm,
    });

    try {
      const links = await strategy.search({
        source,
        searchTerm,
        substanceName,
        scanner: this.scanner,
        maxCandidates: this.maxCandidates,
      });
      const candidates = links
        .slice(0, this.maxCandidates)
        .map((link) => ({ ...link, source: sourceName }));
      this.logger.info(`${sourceName}: ${candidates.length} PDFs found`);
      return candidates;
    } catch (error) {
      this.logger.error(`Error searching ${sourceName}`, { error: errorMessage(error) });
      return [];
    }
  }

  /** Candidates of every planned source, in plan order, not yet deduplicated. */
  async discover(searchPlan: SearchPlan, substanceName: string): Promise<PdfCandidate[]> {
    const all: PdfCandidate[] = [];
    for (const [sourceName, searchTerm] of Object.entries(searchPlan)) {
      all.push(...(await this.discoverSource(sourceName, searchTerm, substanceName)));
    }
    return all;
  }
}

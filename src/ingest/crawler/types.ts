import type { PdfCandidate, SourceConfig } from '../../pipeline/types';
import type { PageScanner } from './pageScanner';

/** A PDF link before it is attributed to a source. */
export type DiscoveredLink = Omit<PdfCandidate, 'source'>;

export interface SourceSearchContext {
  source: SourceConfig;
  searchTerm: string;
  substanceName: string;
  scanner: PageScanner;
  maxCandidates: number;
}

export interface SourceStrategy {
  readonly name: string;
  search(context: SourceSearchContext): Promise<DiscoveredLink[]>;
}

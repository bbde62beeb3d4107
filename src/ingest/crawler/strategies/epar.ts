import type { SourceSearchContext } from '../types';
import { ListingStrategy } from './listingStrategy';

/** EMA European Public Assessment Reports: pre-filtered search with a full-text term. */
export class EparStrategy extends ListingStrategy {
  readonly name = 'EPAR';
  protected readonly followKeywords = ['epar', 'assessment'] as const;

  protected landingUrl(context: SourceSearchContext): string {
    const url = new URL(context.source.url);
    url.searchParams.set('search_api_fulltext', context.searchTerm);
    return url.toString();
  }
}

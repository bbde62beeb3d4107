import { ListingStrategy } from './listingStrategy';

/** EMA product-specific bioequivalence guidance listing. */
export class EmaPsbgStrategy extends ListingStrategy {
  readonly name = 'EMA-PSBG';
  protected readonly followKeywords = ['guidance', 'bioequivalence', 'product-specific'] as const;
}

import { ListingStrategy } from './listingStrategy';

export class FdaPsbgStrategy extends ListingStrategy {
  readonly name = 'FDA-PSBG';
  protected readonly followKeywords = ['guidance'] as const;
}

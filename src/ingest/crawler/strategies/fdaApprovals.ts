import { ListingStrategy } from './listingStrategy';

// Drugs@FDA lists every product; only anchors naming the substance are followed.
export class FdaApprovalsStrategy extends ListingStrategy {
  readonly name = 'FDA-Approvals';
  protected readonly followKeywords = [] as const;
}

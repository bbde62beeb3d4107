import type { SourceStrategy } from '../types';
import { EparStrategy } from './epar';
import { EmaPsbgStrategy } from './emaPsbg';
import { FdaApprovalsStrategy } from './fdaApprovals';
import { FdaPsbgStrategy } from './fdaPsbg';
import { GenericStrategy } from './generic';

export { ListingStrategy } from './listingStrategy';
export { EparStrategy, EmaPsbgStrategy, FdaApprovalsStrategy, FdaPsbgStrategy, GenericStrategy };

export type StrategyRegistry = ReadonlyMap<string, SourceStrategy>;

export function createDefaultStrategies(): Map<string, SourceStrategy> {
  const strategies: SourceStrategy[] = [
    new EparStrategy(),
    new EmaPsbgStrategy(),
    new FdaApprovalsStrategy(),
    new FdaPsbgStrategy(),
  ];
  return new Map(strategies.map((s) => [s.name, s]));
}

export const genericStrategy: SourceStrategy = new GenericStrategy();

import type { LoadBalancingStrategy } from './types.js';
import { at, requireCandidates } from './types.js';

/**
 * Cycles through the list in order. One counter per instance, shared by all
 * callers; the read and increment happen in the same synchronous step, so no
 * two selections observe the same counter value.
 */
export class RoundRobinStrategy implements LoadBalancingStrategy {
  readonly name = 'round-robin' as const;
  private counter = 0;

  selectNext<T>(candidates: readonly T[]): T {
    requireCandidates(candidates, this.name);
    const ticket = this.counter;
    this.counter = (this.counter + 1) % Number.MAX_SAFE_INTEGER;
    return at(candidates, ticket % candidates.length);
  }
}

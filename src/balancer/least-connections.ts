import type { LoadBalancingStrategy, SelectionCriteria } from './types.js';
import { at, requireCandidates } from './types.js';

/**
 * Fewest in-flight requests wins; the earliest candidate wins ties. Without
 * a `scoreOf` every candidate looks idle and the first one is returned.
 */
export class LeastConnectionsStrategy implements LoadBalancingStrategy {
  readonly name = 'least-connections' as const;

  selectNext<T>(candidates: readonly T[], criteria?: SelectionCriteria<T>): T {
    requireCandidates(candidates, this.name);
    const scoreOf = criteria?.scoreOf;
    let selected = at(candidates, 0);
    if (!scoreOf) return selected;

    let fewest = scoreOf(selected).activeRequests;
    for (let i = 1; i < candidates.length; i++) {
      const candidate = at(candidates, i);
      const active = scoreOf(candidate).activeRequests;
      if (active < fewest) {
        fewest = active;
        selected = candidate;
      }
    }
    return selected;
  }
}

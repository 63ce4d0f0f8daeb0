import type { CandidateScore, LoadBalancingStrategy, RandomSource, SelectionCriteria } from './types.js';
import type { HealthStatus } from '../metrics/types.js';
import { at, pickRandom, requireCandidates } from './types.js';

const HEALTH_RANK: Record<HealthStatus, number> = {
  healthy: 0,
  unknown: 1,
  unhealthy: 2,
};

function compareScores(a: CandidateScore, b: CandidateScore): number {
  const byHealth = HEALTH_RANK[a.health] - HEALTH_RANK[b.health];
  if (byHealth !== 0) return byHealth;
  const la = a.averageResponseTimeMs ?? Number.POSITIVE_INFINITY;
  const lb = b.averageResponseTimeMs ?? Number.POSITIVE_INFINITY;
  if (la === lb) return 0;
  return la < lb ? -1 : 1;
}

/**
 * Prefers healthy candidates, then the lowest observed average latency.
 * Candidates without latency data rank after measured ones of the same
 * health. Exact ties, and calls without a `scoreOf`, are settled at random.
 */
export class PerformanceBasedStrategy implements LoadBalancingStrategy {
  readonly name = 'performance-based' as const;

  constructor(private readonly random: RandomSource = Math.random) {}

  selectNext<T>(candidates: readonly T[], criteria?: SelectionCriteria<T>): T {
    requireCandidates(candidates, this.name);
    if (candidates.length === 1) return at(candidates, 0);

    const scoreOf = criteria?.scoreOf;
    if (!scoreOf) return pickRandom(candidates, this.random);

    const scored = candidates.map(candidate => ({ candidate, score: scoreOf(candidate) }));
    let best = [at(scored, 0)];
    for (let i = 1; i < scored.length; i++) {
      const entry = at(scored, i);
      const cmp = compareScores(entry.score, at(best, 0).score);
      if (cmp < 0) {
        best = [entry];
      } else if (cmp === 0) {
        best.push(entry);
      }
    }

    return pickRandom(best, this.random).candidate;
  }
}

import type { LoadBalancingStrategy } from './types.js';
import { at, requireCandidates } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('weighted-round-robin');

const DEFAULT_WEIGHT = 1;

/**
 * Smooth weighted round-robin.
 *
 * Each candidate carries a weight and a running credit. A selection takes
 * the candidate with the highest credit (earliest in the list on ties),
 * debits it by the total weight of the current candidates, then credits
 * every candidate with its own weight. Over a full cycle each candidate is
 * chosen in proportion to its weight, and picks are spread out rather than
 * bunched.
 *
 * Candidates are keyed by identity and picked up lazily with weight 1.
 */
export class WeightedRoundRobinStrategy implements LoadBalancingStrategy {
  readonly name = 'weighted-round-robin' as const;
  private readonly weights = new Map<unknown, number>();
  private readonly credits = new Map<unknown, number>();

  selectNext<T>(candidates: readonly T[]): T {
    requireCandidates(candidates, this.name);
    if (candidates.length === 1) return at(candidates, 0);

    let totalWeight = 0;
    for (const candidate of candidates) {
      if (!this.weights.has(candidate)) {
        this.weights.set(candidate, DEFAULT_WEIGHT);
        this.credits.set(candidate, DEFAULT_WEIGHT);
      }
      totalWeight += this.weightOf(candidate);
    }

    let selected = at(candidates, 0);
    let best = this.creditOf(selected);
    for (let i = 1; i < candidates.length; i++) {
      const candidate = at(candidates, i);
      const credit = this.creditOf(candidate);
      if (credit > best) {
        best = credit;
        selected = candidate;
      }
    }

    this.credits.set(selected, best - totalWeight);
    for (const candidate of candidates) {
      this.credits.set(candidate, this.creditOf(candidate) + this.weightOf(candidate));
    }

    return selected;
  }

  /**
   * Assign a weight (clamped to at least 1) and reset the candidate's credit
   * to it.
   */
  setWeight(candidate: unknown, weight: number): void {
    const effective = Math.max(1, Math.floor(weight));
    this.weights.set(candidate, effective);
    this.credits.set(candidate, effective);
    log.debug(`Weight for ${String(candidate)} set to ${effective}`);
  }

  getWeight(candidate: unknown): number {
    return this.weights.get(candidate) ?? DEFAULT_WEIGHT;
  }

  private weightOf(candidate: unknown): number {
    return this.weights.get(candidate) ?? DEFAULT_WEIGHT;
  }

  private creditOf(candidate: unknown): number {
    return this.credits.get(candidate) ?? DEFAULT_WEIGHT;
  }
}

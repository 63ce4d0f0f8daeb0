import type { StrategyName } from '../config/types.js';
import type { HealthStatus } from '../metrics/types.js';
import { InvalidStateError } from '../errors.js';

/**
 * What a router knows about one candidate at selection time.
 */
export interface CandidateScore {
  health: HealthStatus;
  averageResponseTimeMs?: number;
  activeRequests: number;
}

export interface SelectionCriteria<T> {
  scoreOf?: (candidate: T) => CandidateScore;
}

/**
 * Picks one candidate from a non-empty list. Strategies know nothing about
 * the candidates beyond identity; anything else arrives through `criteria`.
 */
export interface LoadBalancingStrategy {
  readonly name: StrategyName;
  selectNext<T>(candidates: readonly T[], criteria?: SelectionCriteria<T>): T;
}

export type RandomSource = () => number;

export function requireCandidates<T>(candidates: readonly T[], strategy: StrategyName): void {
  if (candidates.length === 0) {
    throw new InvalidStateError(`${strategy}: no candidates available`);
  }
}

/**
 * Element at `index`, which the caller has bounds-checked.
 */
export function at<T>(candidates: readonly T[], index: number): T {
  const candidate = candidates[index];
  if (candidate === undefined) {
    throw new InvalidStateError(`Candidate index ${index} out of range (${candidates.length})`);
  }
  return candidate;
}

export function pickRandom<T>(candidates: readonly T[], random: RandomSource): T {
  const index = Math.min(candidates.length - 1, Math.floor(random() * candidates.length));
  return at(candidates, index);
}

import type { LoadBalancingStrategy, RandomSource } from './types.js';
import { pickRandom, requireCandidates } from './types.js';

export class RandomStrategy implements LoadBalancingStrategy {
  readonly name = 'random' as const;

  constructor(private readonly random: RandomSource = Math.random) {}

  selectNext<T>(candidates: readonly T[]): T {
    requireCandidates(candidates, this.name);
    return pickRandom(candidates, this.random);
  }
}

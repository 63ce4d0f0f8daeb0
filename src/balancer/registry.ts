import type { StrategyName } from '../config/types.js';
import type { LoadBalancingStrategy, RandomSource } from './types.js';
import { RoundRobinStrategy } from './round-robin.js';
import { RandomStrategy } from './random.js';
import { WeightedRoundRobinStrategy } from './weighted-round-robin.js';
import { PerformanceBasedStrategy } from './performance-based.js';
import { LeastConnectionsStrategy } from './least-connections.js';
import { RoutingError } from '../errors.js';

export interface StrategyDeps {
  random?: RandomSource;
}

export type StrategyFactory = (deps: StrategyDeps) => LoadBalancingStrategy;

/**
 * Strategy name → factory. Populated once at startup; every `create` call
 * returns a fresh instance with its own counters and weight tables.
 */
export class StrategyRegistry {
  private readonly factories = new Map<StrategyName, StrategyFactory>();

  register(name: StrategyName, factory: StrategyFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: StrategyName): boolean {
    return this.factories.has(name);
  }

  create(name: StrategyName, deps: StrategyDeps = {}): LoadBalancingStrategy {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new RoutingError(`Unknown load-balancing strategy: ${name}`);
    }
    return factory(deps);
  }

  names(): StrategyName[] {
    return Array.from(this.factories.keys());
  }
}

export function createDefaultStrategyRegistry(): StrategyRegistry {
  return new StrategyRegistry()
    .register('round-robin', () => new RoundRobinStrategy())
    .register('random', ({ random }) => new RandomStrategy(random))
    .register('weighted-round-robin', () => new WeightedRoundRobinStrategy())
    .register('performance-based', ({ random }) => new PerformanceBasedStrategy(random))
    .register('least-connections', () => new LeastConnectionsStrategy());
}

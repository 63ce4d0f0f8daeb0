export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type StrategyName =
  | 'round-robin'
  | 'random'
  | 'weighted-round-robin'
  | 'performance-based'
  | 'least-connections';

export interface RouterConfig {
  logging: {
    level: LogLevel;
  };

  cache: {
    enabled: boolean;
    keyPrefix: string;
    localTtlSeconds: number;
    sharedTtlSeconds: number;
    defaultTtlSeconds: number;
    maxLocalEntries: number;
    /** Upper bound on one shared-tier command before it counts as a failure. */
    sharedTimeoutMs: number;
    modelTypeTtlSeconds: Record<string, number>;
    redisUrl: string;
  };

  routing: {
    strategy: StrategyName;
    failover: {
      enabled: boolean;
      maxRetries: number;
    };
    skipUnhealthy: boolean;
  };

  pool: {
    idleTimeoutMs: number;
    sweepIntervalMs: number;
  };

  backend: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
  };

  modelCatalogPath: string;
}

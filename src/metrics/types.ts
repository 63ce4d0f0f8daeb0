import type { CacheTier } from '../cache/response-cache.js';

export type RequestKind = 'text_generation' | 'streaming' | 'function_call' | 'embedding';

export type HealthStatus = 'healthy' | 'unhealthy' | 'unknown';

export interface UsageRecord {
  totalTokens: number;
  costUsd?: number;
}

export interface TrackedRequest {
  trackingId: string;
  modelId: string;
  kind: RequestKind;
  startedAt: string;
  startMark: number;
}

export interface MetricsSummary {
  modelId: string;
  /** Echo of the requested window. Figures always cover the process lifetime. */
  windowMs: number | null;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  successRate: number;
  errorRate: number;
  averageResponseTimeMs: number;
  p95ResponseTimeMs: number;
  sampleCount: number;
  cacheHits: number;
  cacheMisses: number;
  cacheHitRate: number;
  totalTokens: number;
  totalCostUsd: number;
  inFlight: number;
  requestsByKind: Partial<Record<RequestKind, number>>;
  errorsByKind: Record<string, number>;
  lastUpdated: string | null;
}

export interface HealthSnapshot {
  modelId: string;
  status: HealthStatus;
  isHealthy: boolean;
  errorRate: number;
  totalRequests: number;
  averageResponseTimeMs: number;
  lastActivity: string | null;
  checkedAt: string;
}

export type CacheCounts = Record<CacheTier, { hits: number; misses: number }>;

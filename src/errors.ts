/**
 * Raised when no request can be served: no candidate model, unknown
 * strategy, or a route that the selected handle cannot perform.
 */
export class RoutingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoutingError';
  }
}

/**
 * A load-balancing strategy was asked to choose from nothing.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

/**
 * Error thrown by backend handles when an upstream API returns an error.
 * Carries the HTTP status code so callers can react (e.g., 429 rate limiting).
 */
export class BackendError extends Error {
  readonly status: number;
  readonly provider: string;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} API error (${status}): ${body}`);
    this.name = 'BackendError';
    this.status = status;
    this.provider = provider;
  }
}

/**
 * Terminal failure of a routed request. `cause` is the last backend error;
 * `attempts` lists every model that was tried, in order.
 */
export class BackendInvocationError extends Error {
  readonly attempts: readonly string[];

  constructor(message: string, attempts: readonly string[], cause: unknown) {
    super(message, { cause });
    this.name = 'BackendInvocationError';
    this.attempts = attempts;
  }
}

/**
 * Wraps anything a cache tier threw. Never thrown to callers; it only
 * appears inside a `failure` cache outcome.
 */
export class CacheFailure extends Error {
  readonly operation: 'get' | 'set' | 'remove';

  constructor(operation: 'get' | 'set' | 'remove', key: string, cause: unknown) {
    super(`Cache ${operation} failed for ${key}: ${describeError(cause)}`, { cause });
    this.name = 'CacheFailure';
    this.operation = operation;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Metric label for a failure.
 */
export function errorKind(err: unknown): string {
  if (err instanceof BackendError) {
    return err.status === 429 ? 'rate_limited' : `upstream_${err.status}`;
  }
  if (err instanceof Error) {
    if (err.name === 'TimeoutError') return 'timeout';
    if (err.name === 'AbortError') return 'aborted';
    return err.name;
  }
  return 'unknown';
}

import type { ModelSpec, RouteRequest } from '../router/types.js';

export interface BackendResult {
  content: string;
  finishReason: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * A live execution handle for one model. Handles are long-lived and shared by
 * every request routed to that model.
 */
export interface BackendHandle {
  readonly modelId: string;
  invoke(request: RouteRequest, signal?: AbortSignal): Promise<BackendResult>;
  invokeStream?(request: RouteRequest, signal?: AbortSignal): AsyncIterable<string>;
  dispose?(): void | Promise<void>;
}

export type HandleFactory = (model: ModelSpec, signal?: AbortSignal) => Promise<BackendHandle>;

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RouterService } from '../service.js';
import { messageSchema, routingHintsSchema } from '../router/types.js';
import { BackendInvocationError, describeError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('tools');

function jsonResult(value: unknown): { content: Array<{ type: 'text'; text: string }> } {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

function errorResult(message: string): { content: Array<{ type: 'text'; text: string }>; isError: true } {
  return {
    content: [{ type: 'text' as const, text: message }],
    isError: true,
  };
}

export function registerTools(server: McpServer, service: RouterService): void {
  const { router, registry } = service;

  // Tool 1: route_request - cache lookup, then balanced dispatch with failover
  server.tool(
    'route_request',
    'Send a prompt through the router. Returns a cached response when an identical request was answered before, otherwise dispatches to the requested model (or, for an unregistered ID such as "auto", to one chosen by the configured load-balancing strategy) with failover to the other candidates.',
    {
      modelId: z.string().min(1)
        .describe('Requested model; a registered ID is tried first, any other ID lets the strategy choose'),
      userPrompt: z.string()
        .describe('The prompt to answer'),
      systemPrompt: z.string().optional()
        .describe('System prompt to prepend'),
      history: z.array(messageSchema).optional()
        .describe('Earlier conversation turns in chronological order'),
      settings: z.record(z.unknown()).optional()
        .describe('Execution settings passed to the backend (temperature, max_tokens, ...)'),
      hints: routingHintsSchema.optional()
        .describe('Candidate filters: required capabilities, cost and latency ceilings'),
    },
    async (args, extra) => {
      try {
        const response = await router.route(args, extra.signal);
        return jsonResult(response);
      } catch (err) {
        log.error('route_request failed', err);
        const attempts = err instanceof BackendInvocationError ? ` (tried: ${err.attempts.join(', ')})` : '';
        return errorResult(`Routing error: ${describeError(err)}${attempts}`);
      }
    },
  );

  // Tool 2: get_model_metrics
  server.tool(
    'get_model_metrics',
    'Request, latency, token, cost and cache statistics for one model.',
    {
      modelId: z.string().min(1).describe('Model ID'),
      windowMs: z.number().int().positive().optional()
        .describe('Requested window in milliseconds (echoed; figures cover the process lifetime)'),
    },
    async ({ modelId, windowMs }) => jsonResult(router.getMetrics(modelId, windowMs)),
  );

  // Tool 3: get_model_health
  server.tool(
    'get_model_health',
    'Health snapshot for one model, or for every catalog model when no ID is given.',
    {
      modelId: z.string().min(1).optional().describe('Model ID'),
    },
    async ({ modelId }) => {
      if (modelId) return jsonResult(router.getHealth(modelId));
      return jsonResult(registry.getAll().map(model => router.getHealth(model.id)));
    },
  );

  // Tool 4: list_models
  server.tool(
    'list_models',
    'List catalog models with capabilities, pricing and current health.',
    {
      capability: z.string().optional()
        .describe('Only list models carrying this capability'),
    },
    async ({ capability }) => {
      const models = registry.withCapabilities(capability ? [capability] : []);
      return jsonResult(models.map(model => ({
        id: model.id,
        displayName: model.displayName,
        provider: model.provider,
        modelType: model.modelType,
        capabilities: model.capabilities,
        inputCostPerMTok: model.inputCostPerMTok,
        outputCostPerMTok: model.outputCostPerMTok,
        maxContextTokens: model.maxContextTokens,
        health: router.getHealth(model.id).status,
      })));
    },
  );
}

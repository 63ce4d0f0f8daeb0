import { z } from 'zod';

export const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof messageSchema>;

export const routingHintsSchema = z.object({
  requiredCapabilities: z.array(z.string()).optional(),
  maxCostPerMTok: z.number().nonnegative().optional(),
  maxLatencyMs: z.number().positive().optional(),
});

export type RoutingHints = z.infer<typeof routingHintsSchema>;

export const routeRequestSchema = z.object({
  modelId: z.string().min(1),
  systemPrompt: z.string().optional(),
  userPrompt: z.string(),
  history: z.array(messageSchema).optional(),
  settings: z.record(z.unknown()).optional(),
  hints: routingHintsSchema.optional(),
});

export type RouteRequest = Readonly<z.infer<typeof routeRequestSchema>>;

export const usageSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
  costUsd: z.number().nonnegative().optional(),
});

export type Usage = z.infer<typeof usageSchema>;

export const routeResponseSchema = z.object({
  responseId: z.string(),
  modelId: z.string(),
  content: z.string(),
  finishReason: z.string(),
  usage: usageSchema,
  latencyMs: z.number().nonnegative(),
  cacheHit: z.boolean(),
  attempts: z.array(z.string()),
  createdAt: z.string(),
});

export type RouteResponse = z.infer<typeof routeResponseSchema>;

export interface RouteStreamChunk {
  responseId: string;
  modelId: string;
  delta: string;
  sequence: number;
  done: boolean;
}

export const modelSpecSchema = z.object({
  id: z.string().min(1),
  displayName: z.string(),
  provider: z.string(),
  modelType: z.string().default('chat'),
  capabilities: z.array(z.string()).default(['text-generation']),
  inputCostPerMTok: z.number().nonnegative(),
  outputCostPerMTok: z.number().nonnegative(),
  maxContextTokens: z.number().int().positive(),
  weight: z.number().int().positive().optional(),
  cacheTtlSeconds: z.number().positive().optional(),
  baseUrl: z.string().url().optional(),
  apiKeyEnv: z.string().optional(),
});

export type ModelSpec = z.infer<typeof modelSpecSchema>;

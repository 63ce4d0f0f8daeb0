import { z } from 'zod';
import type { BackendHandle, BackendResult, HandleFactory } from './types.js';
import type { RouteRequest } from '../router/types.js';
import type { RouterConfig } from '../config/types.js';
import { BackendError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('openai-compat');

export interface OpenAiCompatOptions {
  modelId: string;
  provider: string;
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
    finish_reason: z.string().nullable().optional(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().int().nonnegative(),
    completion_tokens: z.number().int().nonnegative(),
  }).optional(),
});

const streamChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({ content: z.string().nullable().optional() }).optional(),
  })),
});

export function buildMessages(request: RouteRequest): Array<{ role: string; content: string }> {
  const messages: Array<{ role: string; content: string }> = [];
  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }
  for (const m of request.history ?? []) {
    messages.push({ role: m.role, content: m.content });
  }
  messages.push({ role: 'user', content: request.userPrompt });
  return messages;
}

/**
 * Handle for any server speaking the OpenAI `/chat/completions` dialect
 * (OpenAI, Ollama, vLLM, LM Studio, ...). Execution settings are passed
 * through as body fields.
 */
export class OpenAiCompatHandle implements BackendHandle {
  readonly modelId: string;

  constructor(private readonly options: OpenAiCompatOptions) {
    this.modelId = options.modelId;
  }

  async invoke(request: RouteRequest, signal?: AbortSignal): Promise<BackendResult> {
    const response = await this.post(request, false, signal);
    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError(this.options.provider, 502, 'Malformed completion response');
    }

    const [choice] = parsed.data.choices;
    return {
      content: choice?.message.content ?? '',
      finishReason: choice?.finish_reason ?? 'stop',
      inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
      outputTokens: parsed.data.usage?.completion_tokens ?? 0,
    };
  }

  /**
   * Yields content deltas from the SSE body until `[DONE]`.
   */
  async *invokeStream(request: RouteRequest, signal?: AbortSignal): AsyncGenerator<string> {
    const response = await this.post(request, true, signal);
    if (!response.body) {
      throw new BackendError(this.options.provider, 500, 'No response body');
    }

    const decoder = new TextDecoder();
    let buffer = '';
    for await (const bytes of response.body) {
      buffer += decoder.decode(bytes, { stream: true });
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');

        if (!line.startsWith('data:')) continue;
        const data = line.slice('data:'.length).trim();
        if (data === '[DONE]') return;

        const delta = this.parseDelta(data);
        if (delta) yield delta;
      }
    }
  }

  private parseDelta(data: string): string | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      log.debug(`Skipping non-JSON stream line from ${this.modelId}`);
      return undefined;
    }
    const parsed = streamChunkSchema.safeParse(raw);
    if (!parsed.success) return undefined;
    return parsed.data.choices[0]?.delta?.content ?? undefined;
  }

  private async post(request: RouteRequest, stream: boolean, signal?: AbortSignal): Promise<Response> {
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers['Authorization'] = `Bearer ${this.options.apiKey}`;
    }

    const response = await fetch(`${this.options.baseUrl}/chat/completions`, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        ...request.settings,
        model: this.modelId,
        messages: buildMessages(request),
        stream,
      }),
      signal: combined,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new BackendError(this.options.provider, response.status, errorText);
    }
    return response;
  }
}

export function createOpenAiCompatFactory(
  backend: RouterConfig['backend'],
  env: NodeJS.ProcessEnv = process.env,
): HandleFactory {
  return async (model) => {
    const apiKey = model.apiKeyEnv ? env[model.apiKeyEnv] ?? '' : backend.apiKey;
    return new OpenAiCompatHandle({
      modelId: model.id,
      provider: model.provider,
      baseUrl: model.baseUrl ?? backend.baseUrl,
      apiKey,
      timeoutMs: backend.timeoutMs,
    });
  };
}

/**
 * Anthropic Messages API adapter.
 *
 * Uses the Messages API directly via fetch; the reply body is validated
 * with zod before it reaches the caller.
 */

import { z } from 'zod';
import { createLogger } from '../logger.js';
import type { ProviderAdapter, AdapterRequest, AdapterResponse, SendOptions } from './adapter.js';

const logger = createLogger('anthropic-adapter');

export const ANTHROPIC_VERSION = '2023-06-01';

export interface AnthropicConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  maxTokens?: number;
  /** Injected in tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  model: z.string(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }),
});

export class AnthropicAdapter implements ProviderAdapter {
  readonly id = 'anthropic';
  readonly name = 'Anthropic Claude';
  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private maxTokens: number;
  private fetchImpl: typeof fetch;

  constructor(config: AnthropicConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? 'claude-sonnet-4-5';
    this.baseUrl = config.baseUrl ?? 'https://api.anthropic.com';
    this.maxTokens = config.maxTokens ?? 4096;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async initialize(): Promise<void> {
    if (!(await this.isAvailable())) {
      logger.warn('Anthropic API key missing; adapter will be skipped');
    } else {
      logger.info({ model: this.model }, 'Anthropic adapter initialized');
    }
  }

  async isAvailable(): Promise<boolean> {
    return this.apiKey.trim().length > 0;
  }

  async send(request: AdapterRequest, options: SendOptions = {}): Promise<AdapterResponse> {
    const startMs = Date.now();
    const requested = request.metadata?.model;
    const model = typeof requested === 'string' ? requested : this.model;

    const body: Record<string, unknown> = {
      model,
      max_tokens: request.max_tokens ?? this.maxTokens,
      messages: [{ role: 'user', content: [{ type: 'text', text: request.prompt }] }],
    };
    if (request.system_prompt) {
      body.system = request.system_prompt;
    }
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }

    try {
      const res = await this.fetchImpl(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'x-api-key': this.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
          'content-type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: options.signal,
      });

      if (!res.ok) {
        const errorText = await res.text();
        throw new Error(`Anthropic API error ${res.status}: ${errorText}`);
      }

      const parsed = MessagesResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`Anthropic API returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      const data = parsed.data;

      return {
        text: data.content
          .filter((b) => b.type === 'text')
          .map((b) => b.text ?? '')
          .join('\n'),
        provider_id: this.id,
        model: data.model,
        tokens_used: data.usage.input_tokens + data.usage.output_tokens,
        latency_ms: Date.now() - startMs,
      };
    } catch (err) {
      logger.error({ err, model }, 'Anthropic request failed');
      throw err;
    }
  }

  async destroy(): Promise<void> {}
}

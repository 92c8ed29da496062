/**
 * Unified provider adapter interface.
 *
 * Every model call from the orchestrator (planning, input translation,
 * agent workers) goes through an AdapterManager, which walks a priority
 * list of adapters until one answers.
 */

import { createLogger } from '../logger.js';

const logger = createLogger('provider-adapter');

// ─── Adapter Interface ──────────────────────────────────────────────────────

export interface AdapterRequest {
  prompt: string;
  system_prompt?: string;
  temperature?: number;
  max_tokens?: number;
  /** Free-form tags for logs; `model` overrides the adapter's default model. */
  metadata?: Record<string, unknown>;
}

export interface AdapterResponse {
  text: string;
  provider_id: string;
  model?: string;
  tokens_used?: number;
  latency_ms: number;
}

export interface FallbackResponse extends AdapterResponse {
  /** Providers tried and skipped before the one that answered. */
  fallbacks_tried: string[];
}

export interface SendOptions {
  /** Aborts the in-flight call and stops the fallback walk. */
  signal?: AbortSignal;
}

export interface ProviderAdapter {
  /** Unique provider ID, as used in provider_priority lists. */
  readonly id: string;
  readonly name: string;
  isAvailable(): Promise<boolean>;
  send(request: AdapterRequest, options?: SendOptions): Promise<AdapterResponse>;
  initialize(): Promise<void>;
  destroy(): Promise<void>;
}

export interface ProviderFailure {
  provider: string;
  reason: string;
}

export class AllProvidersFailedError extends Error {
  readonly tried: string[];

  constructor(
    readonly priority: string[],
    readonly failures: ProviderFailure[],
  ) {
    const detail = failures.map((f) => `${f.provider} (${f.reason})`).join(', ');
    super(`All providers failed: ${priority.join(', ') || 'none'}. Tried: ${detail || 'none'}`);
    this.name = 'AllProvidersFailedError';
    this.tried = failures.map((f) => f.provider);
  }
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Adapter Manager ────────────────────────────────────────────────────────

export class AdapterManager {
  private adapters: Map<string, ProviderAdapter> = new Map();

  register(adapter: ProviderAdapter): void {
    this.adapters.set(adapter.id, adapter);
    logger.info({ id: adapter.id, name: adapter.name }, 'Adapter registered');
  }

  /**
   * Try each provider in priority order until one answers. Ids with no
   * registered adapter are skipped without counting as a failure.
   */
  async sendWithFallback(
    request: AdapterRequest,
    providerPriority: string[],
    options: SendOptions = {},
  ): Promise<FallbackResponse> {
    const { signal } = options;
    const failures: ProviderFailure[] = [];

    for (const providerId of providerPriority) {
      signal?.throwIfAborted();
      const adapter = this.adapters.get(providerId);
      if (!adapter) {
        logger.debug({ providerId }, 'Adapter not registered, skipping');
        continue;
      }

      try {
        if (!(await adapter.isAvailable())) {
          failures.push({ provider: providerId, reason: 'unavailable' });
          logger.info({ providerId }, 'Provider unavailable, trying next');
          continue;
        }
        const response = await adapter.send(request, { signal });
        return { ...response, fallbacks_tried: failures.map((f) => f.provider) };
      } catch (err) {
        if (signal?.aborted) throw err;
        failures.push({ provider: providerId, reason: reasonOf(err) });
        logger.warn({ err, providerId }, 'Provider failed, trying next');
      }
    }

    throw new AllProvidersFailedError(providerPriority, failures);
  }

  /**
   * One failing adapter does not stop the rest.
   */
  async initializeAll(): Promise<void> {
    await this.eachAdapter('initialize', (adapter) => adapter.initialize());
  }

  async destroyAll(): Promise<void> {
    await this.eachAdapter('destroy', (adapter) => adapter.destroy());
  }

  listAdapters(): string[] {
    return Array.from(this.adapters.keys());
  }

  private async eachAdapter(action: string, fn: (adapter: ProviderAdapter) => Promise<void>): Promise<void> {
    for (const [id, adapter] of this.adapters) {
      try {
        await fn(adapter);
      } catch (err) {
        logger.error({ err, id }, `Failed to ${action} adapter`);
      }
    }
  }
}

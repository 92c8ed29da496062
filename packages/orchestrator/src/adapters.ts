/**
 * Pluggable provider layer, as seen from the orchestrator.
 * Structurally matches AdapterManager from the providers package without depending on it.
 */

export interface AdapterRequestLike {
  prompt: string;
  system_prompt?: string;
  temperature?: number;
  max_tokens?: number;
  metadata?: Record<string, unknown>;
}

export interface AdapterResponseLike {
  text: string;
  provider_id: string;
  model?: string;
  tokens_used?: number;
  latency_ms: number;
  fallbacks_tried: string[];
}

export interface AdapterManagerLike {
  sendWithFallback(
    request: AdapterRequestLike,
    providerPriority: string[],
    options?: { signal?: AbortSignal },
  ): Promise<AdapterResponseLike>;
  listAdapters(): string[];
}

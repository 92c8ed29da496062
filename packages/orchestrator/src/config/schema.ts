/**
 * Configuration schemas. Every section has defaults, so an empty file
 * (or no file at all) yields a working configuration.
 */

import { z } from 'zod';

export const EngineConfigSchema = z.object({
  /** Retries for timeouts and network failures, separate from the QA retry budget. */
  transient_retries: z.number().int().min(0).max(10).default(2),
  retry_backoff_ms: z.number().int().min(0).default(250),
  step_timeout_ms: z.number().int().positive().default(120_000),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const PlanningConfigSchema = z.object({
  delegate_timeout_ms: z.number().int().positive().default(15_000),
  provider_priority: z.array(z.string()).default(['anthropic']),
});

export type PlanningConfig = z.infer<typeof PlanningConfigSchema>;

export const SessionConfigSchema = z.object({
  capacity: z.number().int().positive().default(500),
  history_limit: z.number().int().positive().default(80),
  max_connections_per_session: z.number().int().positive().default(8),
  grace_ms: z.number().int().min(0).default(30_000),
  keepalive_interval_ms: z.number().int().positive().default(25_000),
  keepalive_timeout_ms: z.number().int().positive().default(60_000),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export const RateLimitConfigSchema = z.object({
  requests_per_minute: z.number().int().positive().default(120),
  messages_per_minute: z.number().int().positive().default(30),
  trust_forwarded_for: z.boolean().default(false),
});

export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;

export const PathsConfigSchema = z.object({
  artifacts_dir: z.string().default('outputs'),
  brands_dir: z.string().default('brands'),
});

export const CrewConfigSchema = z.object({
  engine: EngineConfigSchema.default({}),
  planning: PlanningConfigSchema.default({}),
  sessions: SessionConfigSchema.default({}),
  rate_limits: RateLimitConfigSchema.default({}),
  paths: PathsConfigSchema.default({}),
});

export type CrewConfig = z.infer<typeof CrewConfigSchema>;

export const IntentKeywordsSchema = z.object({
  no_text: z.array(z.string().min(1)).default(['no text', 'without text', 'sin texto', 'sin copy']),
  trends: z.array(z.string().min(1)).default(['trend', 'inspiration', 'tendencia', 'inspiracion']),
  build_confirmations: z.array(z.string().min(1)).default(['/build', 'build', 'go', 'ok']),
});

export type IntentKeywords = z.infer<typeof IntentKeywordsSchema>;

export const DEFAULT_CONFIG: CrewConfig = CrewConfigSchema.parse({});
export const DEFAULT_INTENT_KEYWORDS: IntentKeywords = IntentKeywordsSchema.parse({});

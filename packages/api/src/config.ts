/**
 * Server settings from environment variables. Orchestrator limits, retries
 * and paths live in config/campaign-crew.yaml; the variables here only
 * override what the process needs at startup.
 */

import { z } from 'zod';
import { InvalidConfigError } from '@campaigncrew/orchestrator';

export const DEFAULT_PORT = 8000;

export const DEFAULT_CORS_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:3001',
  'http://127.0.0.1:3000',
  'http://127.0.0.1:3001',
];

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(DEFAULT_PORT),
  HOST: z.string().default('0.0.0.0'),
  API_KEY: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),
  TRUST_FORWARDED_FOR: flag.optional(),
  BASE_PATH: z.string().optional(),
  CONFIG_DIR: z.string().optional(),
  ARTIFACTS_DIR: z.string().optional(),
  BRANDS_DIR: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().optional(),
  RATE_LIMIT_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().optional(),
  RATE_LIMIT_MESSAGES_PER_MINUTE: z.coerce.number().int().positive().optional(),
});

export interface ServerConfig {
  environment: string;
  port: number;
  host: string;
  /** When set, every route except health requires a matching X-API-Key header. */
  apiKey?: string;
  corsOrigins: string[];
  /** Overrides rate_limits.trust_forwarded_for from the settings file. */
  trustForwardedFor?: boolean;
  basePath: string;
  configDir?: string;
  artifactsDir?: string;
  brandsDir?: string;
  anthropicApiKey?: string;
  anthropicModel?: string;
  requestsPerMinute?: number;
  messagesPerMinute?: number;
}

/**
 * Parse server settings. Blank variables count as unset.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ''),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidConfigError(`Invalid server environment: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const isProduction = vars.NODE_ENV === 'production';
  const origins = vars.CORS_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean);

  return {
    environment: vars.NODE_ENV,
    port: vars.PORT,
    host: vars.HOST,
    apiKey: vars.API_KEY,
    // Production without explicit origins allows none.
    corsOrigins: origins ?? (isProduction ? [] : DEFAULT_CORS_ORIGINS),
    trustForwardedFor: vars.TRUST_FORWARDED_FOR,
    basePath: vars.BASE_PATH ?? cwd,
    configDir: vars.CONFIG_DIR,
    artifactsDir: vars.ARTIFACTS_DIR,
    brandsDir: vars.BRANDS_DIR,
    anthropicApiKey: vars.ANTHROPIC_API_KEY,
    anthropicModel: vars.ANTHROPIC_MODEL,
    requestsPerMinute: vars.RATE_LIMIT_REQUESTS_PER_MINUTE,
    messagesPerMinute: vars.RATE_LIMIT_MESSAGES_PER_MINUTE,
  };
}

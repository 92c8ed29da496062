export { ConfigLoader, CONFIG_FILE, INTENT_KEYWORDS_FILE } from './loader.js';
export {
  CrewConfigSchema,
  IntentKeywordsSchema,
  DEFAULT_CONFIG,
  DEFAULT_INTENT_KEYWORDS,
} from './schema.js';
export type {
  CrewConfig,
  EngineConfig,
  PlanningConfig,
  SessionConfig,
  RateLimitConfig,
  IntentKeywords,
} from './schema.js';

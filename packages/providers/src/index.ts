/**
 * @campaigncrew/providers — model provider adapters and the fallback chain
 * the orchestrator plans, translates and runs agent workers through.
 */

export { AdapterManager, AllProvidersFailedError, AnthropicAdapter, ANTHROPIC_VERSION } from './adapters/index.js';
export type {
  ProviderAdapter,
  AdapterRequest,
  AdapterResponse,
  FallbackResponse,
  ProviderFailure,
  SendOptions,
  AnthropicConfig,
} from './adapters/index.js';

export { createLogger } from './logger.js';

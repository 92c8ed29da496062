export { AdapterManager, AllProvidersFailedError } from './adapter.js';
export type {
  ProviderAdapter,
  AdapterRequest,
  AdapterResponse,
  FallbackResponse,
  ProviderFailure,
  SendOptions,
} from './adapter.js';

export { AnthropicAdapter, ANTHROPIC_VERSION } from './anthropic.js';
export type { AnthropicConfig } from './anthropic.js';

/**
 * @campaigncrew/api — REST API and WebSocket chat channel.
 */

export { ApiServer, summarizeRun } from './server.js';
export type { ApiServerOptions } from './server.js';

export { ChatChannel, CLOSE_POLICY_VIOLATION, SESSION_ID_PATTERN } from './chat/channel.js';
export type { ChatChannelOptions, ChannelRunner } from './chat/channel.js';
export { WebSocketConnection, attachSocket, rawDataToString } from './chat/ws-connection.js';

export { loadServerConfig, DEFAULT_PORT, DEFAULT_CORS_ORIGINS } from './config.js';
export type { ServerConfig } from './config.js';

export {
  createRateLimitMiddleware,
  createApiKeyMiddleware,
  deriveClientKey,
  safeEqual,
  API_KEY_HEADER,
} from './middleware/rate-limit.js';
export type { ClientRequestLike, RateLimitMiddlewareOptions } from './middleware/rate-limit.js';

export { createLogger } from './logger.js';

export {
  SessionRegistry,
  DEFAULT_SESSION_CAPACITY,
  DEFAULT_HISTORY_LIMIT,
  CLOSE_TRY_AGAIN_LATER,
  CLOSE_GOING_AWAY,
} from './registry.js';
export type {
  SessionConnection,
  ConnectionHandle,
  SessionState,
  SessionSnapshot,
  RegistryStats,
  SessionEventName,
  SessionEventHandler,
  SessionRegistryOptions,
} from './registry.js';

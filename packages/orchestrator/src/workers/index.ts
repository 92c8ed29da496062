export { CopyWorker, buildCopyItems, COPY_THEMES } from './copy.js';
export type { CopyItem, CopyTheme } from './copy.js';
export { DesignWorker, selectStyle, visualDirection, DEFAULT_STYLE } from './design.js';
export { QaCriticWorker, MIN_OUTPUT_BYTES } from './qa-critic.js';
export type { QaCriticOptions } from './qa-critic.js';
export { AgentWorker, buildAgentPrompt } from './agent.js';
export type { AgentWorkerOptions } from './agent.js';
export { WorkerRegistry } from './registry.js';
export { isRecord, readString, readNumber, readStringArray } from './payload.js';

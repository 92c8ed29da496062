export { ExecutionEngine } from './engine.js';
export type { ExecuteOptions, ExecutionReport, ExecutionEngineOptions, WorkerLookup } from './engine.js';
export { OrchestrationTrace } from './trace.js';
export { withDeadline, DeadlineExceededError, RunCancelledError } from './deadline.js';
export { QaRetryLoop, parseQaVerdict } from './qa-loop.js';
export type { QaLoopState } from './qa-loop.js';

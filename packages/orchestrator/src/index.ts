/**
 * @campaigncrew/orchestrator — worker orchestration for campaign content runs.
 *
 * The orchestrator resolves which workers a request needs (delegate or
 * deterministic rules), executes them with a bounded QA retry loop, and
 * seals every run into the file-system artifact store. The session registry
 * and rate limiter bound the real-time chat surface built on top.
 */

// Main orchestrator
export { Orchestrator } from './orchestrator.js';
export type { OrchestratorConfig, RunOptions, RunEvent, RunEventHandler, HealthReport } from './orchestrator.js';

// Requests
export { createContentRequest, ContentRequestSchema, isSafeSlug } from './request.js';
export type { ContentRequestInput } from './request.js';

// Planning
export {
  PlanResolver,
  deterministicPlan,
  repairProposal,
  ruleFor,
  buildPlan,
  AdapterPlanProposer,
  buildPlanningPrompt,
  detectIntent,
  isBuildConfirmation,
  matchesAny,
  RequestTranslator,
  heuristicTranslation,
  clampDays,
  buildTranslationPrompt,
  DEFAULT_OBJECTIVE,
  DEFAULT_DAYS,
  extractJsonObject,
} from './planning/index.js';
export type {
  PlanProposer,
  ProposedPlan,
  PlanResolverOptions,
  AdapterPlanProposerOptions,
  IntentSignals,
  RequestTranslatorOptions,
  TranslateOptions,
  Translation,
} from './planning/index.js';

// Execution
export {
  ExecutionEngine,
  OrchestrationTrace,
  withDeadline,
  DeadlineExceededError,
  RunCancelledError,
  QaRetryLoop,
  parseQaVerdict,
} from './engine/index.js';
export type { ExecuteOptions, ExecutionReport, ExecutionEngineOptions, WorkerLookup, QaLoopState } from './engine/index.js';

// Workers
export {
  CopyWorker,
  DesignWorker,
  QaCriticWorker,
  AgentWorker,
  WorkerRegistry,
  buildCopyItems,
  selectStyle,
  buildAgentPrompt,
} from './workers/index.js';
export type { CopyItem, AgentWorkerOptions, QaCriticOptions } from './workers/index.js';

// Artifacts
export { ArtifactStore, createRunId, renderSummary } from './artifacts/index.js';
export type { RunHandle, StoredArtifact } from './artifacts/index.js';

// Brands
export { FsBrandReferenceProbe } from './brands/index.js';
export type { BrandReferenceProbe } from './brands/index.js';

// Sessions
export {
  SessionRegistry,
  DEFAULT_SESSION_CAPACITY,
  DEFAULT_HISTORY_LIMIT,
  CLOSE_TRY_AGAIN_LATER,
  CLOSE_GOING_AWAY,
} from './sessions/index.js';
export type {
  SessionConnection,
  ConnectionHandle,
  SessionState,
  SessionSnapshot,
  RegistryStats,
  SessionEventName,
  SessionEventHandler,
  SessionRegistryOptions,
} from './sessions/index.js';

// Scaling
export { RateLimiter, REQUESTS_PER_MINUTE, MESSAGES_PER_MINUTE, ONE_MINUTE_MS } from './scaling/index.js';
export type { RateLimiterOptions, RateLimitResult } from './scaling/index.js';

// Config
export { ConfigLoader, CrewConfigSchema, IntentKeywordsSchema, DEFAULT_CONFIG, DEFAULT_INTENT_KEYWORDS } from './config/index.js';
export type { CrewConfig, EngineConfig, PlanningConfig, SessionConfig, RateLimitConfig, IntentKeywords } from './config/index.js';

// Errors
export {
  CampaignCrewError,
  TransientWorkerError,
  FatalWorkerError,
  PlanningDelegateError,
  CapacityExceededError,
  InvariantViolationError,
  InvalidConfigError,
  InvalidRequestError,
  classifyWorkerError,
  errorMessage,
} from './errors.js';
export type { ErrorKind } from './errors.js';

// Provider layer contract
export type { AdapterManagerLike, AdapterRequestLike, AdapterResponseLike } from './adapters.js';

// Logger
export { createLogger } from './logger.js';

// Types — re-export everything
export type * from './types.js';

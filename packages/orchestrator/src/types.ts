/**
 * Core types for the campaign orchestration layer.
 * Content requests, worker plans, worker outcomes, traces and run results.
 */

// ─── Workers ────────────────────────────────────────────────────────────────

export const WORKER_ORDER = ['research', 'copy', 'design', 'generate', 'qa'] as const;

export type WorkerName = (typeof WORKER_ORDER)[number];

export function isWorkerName(value: unknown): value is WorkerName {
  return typeof value === 'string' && WORKER_ORDER.some((name) => name === value);
}

// ─── Content Request ────────────────────────────────────────────────────────

export interface ContentRequest {
  readonly objective: string;
  readonly brand_id: string;
  readonly campaign_id?: string;
  readonly days: number;
  readonly build: boolean;
  readonly include_text: boolean;
  readonly style_ref_present: boolean;
  readonly max_retries: number;
  readonly constraints: string;
}

/** Context signals the plan resolver decides on, besides the request itself. */
export interface PlanSignals {
  has_style_reference: boolean;
  has_local_brand_references: boolean;
  mentions_trends: boolean;
  wants_text: boolean;
}

// ─── Worker Plan ────────────────────────────────────────────────────────────

export type PlanMode = 'llm' | 'fallback' | 'fallback-repaired';

export interface WorkerStep {
  readonly name: WorkerName;
  readonly will_run: boolean;
  readonly reason: string;
  readonly order: number;
}

export interface WorkerPlan {
  readonly steps: readonly WorkerStep[];
  readonly mode: PlanMode;
  readonly reason: string;
  /** Names of the steps that will run, in execution order. */
  readonly sequence: readonly WorkerName[];
}

// ─── Worker Contract ────────────────────────────────────────────────────────

export interface QaVerdict {
  passed: boolean;
  feedback?: string;
  score?: number;
  reason?: string;
}

export interface WorkerContext {
  readonly run_id: string;
  readonly request: ContentRequest;
  /** Outputs of the steps that already ran, keyed by worker. */
  readonly outputs: Readonly<Partial<Record<WorkerName, unknown>>>;
  /** Brand / product / campaign configuration, opaque to the orchestrator. */
  readonly config: Readonly<Record<string, unknown>>;
  readonly attempt: number;
  /** Last QA verdict, present when generate is re-invoked after a failed check. */
  readonly feedback?: QaVerdict;
  readonly signal: AbortSignal;
}

export interface WorkerResult {
  payload: unknown;
  cost_usd?: number;
}

export interface Worker {
  readonly name: WorkerName;
  run(context: WorkerContext): Promise<WorkerResult>;
}

// ─── Trace ──────────────────────────────────────────────────────────────────

export type OutcomeStatus = 'succeeded' | 'failed' | 'skipped';
export type WorkerErrorKind = 'transient' | 'fatal' | 'cancelled';

export interface WorkerOutcome {
  readonly step: WorkerName;
  readonly success: boolean;
  readonly status: OutcomeStatus;
  readonly payload?: unknown;
  readonly error_kind?: WorkerErrorKind;
  readonly error_message?: string;
  /** 0 for skipped steps; QA-loop attempt number otherwise. */
  readonly attempt: number;
  /** 0-based index of the transient retry that produced this outcome. */
  readonly retry: number;
  readonly reason?: string;
  readonly started_at: string;
  readonly duration_ms: number;
  readonly cost_usd: number;
}

export type RunStatus = 'completed' | 'degraded' | 'failed' | 'cancelled';

export interface SealedTrace {
  readonly entries: readonly WorkerOutcome[];
  readonly status: RunStatus;
  readonly sealed_at: string;
}

export type QaResolution = 'accepted' | 'exhausted' | 'not_run';

export interface QaSummary {
  resolution: QaResolution;
  attempts: number;
}

// ─── Artifacts ──────────────────────────────────────────────────────────────

export interface ArtifactRef {
  run_id: string;
  dir: string;
  artifact_path: string;
  summary_path: string;
}

export interface InputTranslation {
  objective: string;
  days: number;
  build: boolean;
  include_text: boolean;
  reason: string;
  mode: 'llm' | 'fallback';
}

export interface ArtifactDocument {
  run_id: string;
  created_at: string;
  sealed_at: string;
  status: RunStatus;
  input: ContentRequest;
  worker_plan: {
    sequence: readonly WorkerName[];
    mode: PlanMode;
    reason: string;
    workers: readonly WorkerStep[];
  };
  orchestration_trace: readonly WorkerOutcome[];
  input_translation: InputTranslation | null;
  result: {
    status: RunStatus;
    cost_usd: number;
    duration_ms: number;
    qa: QaSummary;
    outputs: Partial<Record<WorkerName, unknown>>;
    error?: string;
  };
}

// ─── Run Result ─────────────────────────────────────────────────────────────

export interface RunResult {
  run_id: string;
  request: ContentRequest;
  plan: WorkerPlan;
  trace: SealedTrace;
  artifact: ArtifactRef;
  status: RunStatus;
  cost_usd: number;
  duration_ms: number;
  qa: QaSummary;
  outputs: Partial<Record<WorkerName, unknown>>;
  input_translation: InputTranslation | null;
}

// ─── Chat ───────────────────────────────────────────────────────────────────

export type ChatRole = 'user' | 'assistant' | 'system';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  timestamp: string;
}

export interface ChannelEvent {
  type: string;
  data?: unknown;
  timestamp?: string;
}

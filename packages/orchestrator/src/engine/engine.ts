/**
 * Execution engine.
 *
 * Runs a resolved worker plan in the fixed step order, passing each step's
 * output to the steps after it. Generate and qa run inside the bounded QA
 * retry loop when qa is planned. Worker failures are captured as outcomes:
 * transient failures are retried a few times, anything else aborts the run.
 */

import { createLogger } from '../logger.js';
import { InvariantViolationError, classifyWorkerError, errorMessage } from '../errors.js';
import { DEFAULT_CONFIG, type EngineConfig } from '../config/schema.js';
import { WORKER_ORDER } from '../types.js';
import { OrchestrationTrace } from './trace.js';
import { withDeadline } from './deadline.js';
import { QaRetryLoop, parseQaVerdict } from './qa-loop.js';
import type {
  ContentRequest,
  QaSummary,
  QaVerdict,
  RunStatus,
  SealedTrace,
  Worker,
  WorkerErrorKind,
  WorkerName,
  WorkerOutcome,
  WorkerPlan,
} from '../types.js';

const logger = createLogger('execution-engine');

// ─── Types ──────────────────────────────────────────────────────────────────

export interface WorkerLookup {
  get(name: WorkerName): Worker | undefined;
}

export interface ExecuteOptions {
  runId: string;
  workers: WorkerLookup;
  /** Brand / product / campaign context handed to every worker. */
  config?: Readonly<Record<string, unknown>>;
  signal?: AbortSignal;
  /** Called after every outcome is appended to the trace. */
  onOutcome?: (outcome: WorkerOutcome) => void | Promise<void>;
}

export interface ExecutionReport {
  trace: SealedTrace;
  status: RunStatus;
  outputs: Partial<Record<WorkerName, unknown>>;
  cost_usd: number;
  duration_ms: number;
  qa: QaSummary;
  error?: string;
}

export interface ExecutionEngineOptions extends Partial<EngineConfig> {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

type Invocation = { ok: true; payload: unknown } | { ok: false; message: string };

/** Stops the step loop; carries the terminal status. */
class RunAborted extends Error {
  constructor(
    readonly status: 'failed' | 'cancelled',
    message: string,
  ) {
    super(message);
  }
}

interface RunState {
  request: ContentRequest;
  options: ExecuteOptions;
  signal: AbortSignal;
  trace: OrchestrationTrace;
  outputs: Partial<Record<WorkerName, unknown>>;
  cost: number;
  degraded: boolean;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

// ─── Execution Engine ───────────────────────────────────────────────────────

export class ExecutionEngine {
  private transientRetries: number;
  private backoffMs: number;
  private stepTimeoutMs: number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(options: ExecutionEngineOptions = {}) {
    this.transientRetries = options.transient_retries ?? DEFAULT_CONFIG.engine.transient_retries;
    this.backoffMs = options.retry_backoff_ms ?? DEFAULT_CONFIG.engine.retry_backoff_ms;
    this.stepTimeoutMs = options.step_timeout_ms ?? DEFAULT_CONFIG.engine.step_timeout_ms;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Execute a plan to completion, failure or cancellation. Worker problems
   * never reject; only invariant violations and onOutcome failures do.
   */
  async execute(plan: WorkerPlan, request: ContentRequest, options: ExecuteOptions): Promise<ExecutionReport> {
    assertExecutable(plan);

    const startMs = this.now();
    const state: RunState = {
      request,
      options,
      signal: options.signal ?? new AbortController().signal,
      trace: new OrchestrationTrace(this.now),
      outputs: {},
      cost: 0,
      degraded: false,
    };
    let qa: QaSummary = { resolution: 'not_run', attempts: 0 };
    let status: RunStatus;
    let error: string | undefined;

    logger.info({ run: options.runId, sequence: plan.sequence, mode: plan.mode }, 'Run started');

    try {
      const qaPlanned = plan.steps.some((s) => s.name === 'qa' && s.will_run);

      for (const step of plan.steps) {
        this.checkCancelled(state);

        if (!step.will_run) {
          await this.record(state, {
            step: step.name,
            success: true,
            status: 'skipped',
            attempt: 0,
            retry: 0,
            reason: step.reason,
            started_at: new Date(this.now()).toISOString(),
            duration_ms: 0,
            cost_usd: 0,
          });
          continue;
        }

        if (step.name === 'qa' && qaPlanned) continue;

        if (step.name === 'generate' && qaPlanned) {
          qa = await this.runQaLoop(state);
          continue;
        }

        const result = await this.invoke(state, step.name, 1);
        if (!result.ok) state.degraded = true;
      }

      status = state.degraded ? 'degraded' : 'completed';
    } catch (err) {
      if (!(err instanceof RunAborted)) throw err;
      status = err.status;
      error = err.message;
    }

    const trace = state.trace.seal(status);
    const duration = this.now() - startMs;
    logger.info({ run: options.runId, status, cost: state.cost, duration_ms: duration }, 'Run finished');

    return {
      trace,
      status,
      outputs: state.outputs,
      cost_usd: state.cost,
      duration_ms: duration,
      qa,
      ...(error !== undefined ? { error } : {}),
    };
  }

  // ─── QA Loop ───────────────────────────────────────────────────────────

  private async runQaLoop(state: RunState): Promise<QaSummary> {
    const loop = new QaRetryLoop(state.request.max_retries);
    let feedback: QaVerdict | undefined;

    while (!loop.done) {
      this.checkCancelled(state);
      const attempt = loop.beginAttempt();

      const generated = await this.invoke(state, 'generate', attempt, feedback);
      if (!generated.ok) {
        if (loop.attemptFailed() === 'retry') loop.retry();
        continue;
      }

      this.checkCancelled(state);
      const checked = await this.invoke(state, 'qa', attempt, undefined, parseQaVerdict);
      if (!checked.ok) {
        if (loop.attemptFailed() === 'retry') loop.retry();
        continue;
      }

      const verdict = parseQaVerdict(checked.payload);
      feedback = verdict;
      if (loop.evaluate(verdict) === 'retry') {
        logger.info({ run: state.options.runId, attempt, feedback: verdict.feedback }, 'QA rejected output, retrying');
        loop.retry();
      }
    }

    const resolution = loop.resolution();
    if (resolution === 'exhausted') {
      state.degraded = true;
      logger.warn({ run: state.options.runId, attempts: loop.attempts }, 'QA retries exhausted');
    }
    return { resolution, attempts: loop.attempts };
  }

  // ─── Step Invocation ───────────────────────────────────────────────────

  /**
   * Invoke one worker with transient retries. Every try is recorded.
   * Fatal errors and cancellation throw RunAborted.
   */
  private async invoke(
    state: RunState,
    name: WorkerName,
    attempt: number,
    feedback?: QaVerdict,
    validate?: (payload: unknown) => unknown,
  ): Promise<Invocation> {
    const worker = state.options.workers.get(name);
    if (!worker) {
      const message = `No worker registered for step ${name}`;
      await this.recordFailure(state, name, attempt, 0, this.now(), 'fatal', message);
      throw new RunAborted('failed', message);
    }

    let lastMessage = '';
    for (let retry = 0; retry <= this.transientRetries; retry++) {
      this.checkCancelled(state);
      const startMs = this.now();

      try {
        const result = await withDeadline(
          (signal) =>
            worker.run({
              run_id: state.options.runId,
              request: state.request,
              outputs: Object.freeze({ ...state.outputs }),
              config: state.options.config ?? {},
              attempt,
              ...(feedback ? { feedback } : {}),
              signal,
            }),
          this.stepTimeoutMs,
          state.signal,
        );
        validate?.(result.payload);

        const cost = result.cost_usd ?? 0;
        state.outputs[name] = result.payload;
        await this.record(state, {
          step: name,
          success: true,
          status: 'succeeded',
          payload: result.payload,
          attempt,
          retry,
          started_at: new Date(startMs).toISOString(),
          duration_ms: this.now() - startMs,
          cost_usd: cost,
        });
        return { ok: true, payload: result.payload };
      } catch (err) {
        if (err instanceof InvariantViolationError) throw err;
        lastMessage = errorMessage(err);

        if (state.signal.aborted) {
          await this.recordFailure(state, name, attempt, retry, startMs, 'cancelled', lastMessage);
          throw new RunAborted('cancelled', `Run cancelled during ${name}`);
        }

        const kind = classifyWorkerError(err);
        await this.recordFailure(state, name, attempt, retry, startMs, kind, lastMessage);

        if (kind === 'fatal') {
          logger.error({ run: state.options.runId, step: name, error: lastMessage }, 'Worker failed fatally');
          throw new RunAborted('failed', `${name} failed: ${lastMessage}`);
        }

        logger.warn({ run: state.options.runId, step: name, retry, error: lastMessage }, 'Transient worker failure');
        if (retry < this.transientRetries && this.backoffMs > 0) {
          await this.sleep(this.backoffMs * (retry + 1));
        }
      }
    }

    return { ok: false, message: lastMessage };
  }

  private async recordFailure(
    state: RunState,
    name: WorkerName,
    attempt: number,
    retry: number,
    startMs: number,
    kind: WorkerErrorKind,
    message: string,
  ): Promise<void> {
    await this.record(state, {
      step: name,
      success: false,
      status: 'failed',
      error_kind: kind,
      error_message: message,
      attempt,
      retry,
      started_at: new Date(startMs).toISOString(),
      duration_ms: this.now() - startMs,
      cost_usd: 0,
    });
  }

  private async record(state: RunState, outcome: WorkerOutcome): Promise<void> {
    state.trace.append(outcome);
    state.cost += outcome.cost_usd;
    await state.options.onOutcome?.(outcome);
  }

  private checkCancelled(state: RunState): void {
    if (state.signal.aborted) {
      throw new RunAborted('cancelled', 'Run cancelled');
    }
  }
}

/**
 * Reject plans that break the fixed ordering or the qa ⇒ generate implication.
 */
function assertExecutable(plan: WorkerPlan): void {
  if (plan.steps.length !== WORKER_ORDER.length) {
    throw new InvariantViolationError(`Plan has ${plan.steps.length} steps, expected ${WORKER_ORDER.length}`);
  }
  plan.steps.forEach((step, index) => {
    if (step.name !== WORKER_ORDER[index] || step.order !== index) {
      throw new InvariantViolationError(`Step ${step.name} out of order at position ${index}`);
    }
  });
  const runs = (name: WorkerName): boolean => plan.steps.some((s) => s.name === name && s.will_run);
  if (runs('qa') && !runs('generate')) {
    throw new InvariantViolationError('Plan runs qa without generate');
  }
}

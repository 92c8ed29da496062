/**
 * Bounded Generate → Evaluate → {Accept, Retry, Exhausted} state machine.
 * Total generate attempts never exceed maxRetries + 1.
 */

import { z } from 'zod';
import { FatalWorkerError, InvariantViolationError } from '../errors.js';
import type { QaResolution, QaVerdict } from '../types.js';

export type QaLoopState = 'generate' | 'evaluate' | 'accept' | 'retry' | 'exhausted';

const QaVerdictSchema = z.object({
  passed: z.boolean(),
  feedback: z.string().optional(),
  score: z.number().optional(),
  reason: z.string().optional(),
});

/**
 * Validate a QA worker payload. A malformed verdict aborts the run.
 */
export function parseQaVerdict(payload: unknown): QaVerdict {
  const result = QaVerdictSchema.safeParse(payload);
  if (!result.success) {
    throw new FatalWorkerError(`Malformed QA verdict: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}

export class QaRetryLoop {
  private current: QaLoopState = 'generate';
  private attemptCount = 0;
  private retriesUsed = 0;

  constructor(readonly maxRetries: number) {
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`max_retries must be a non-negative integer, got ${maxRetries}`);
    }
  }

  /**
   * Enter a generate attempt. Returns the 1-based attempt number.
   */
  beginAttempt(): number {
    this.expect('generate');
    this.attemptCount++;
    this.current = 'evaluate';
    return this.attemptCount;
  }

  /**
   * The attempt produced nothing to evaluate (generate or qa failed).
   */
  attemptFailed(): QaLoopState {
    this.expect('evaluate');
    return this.afterFailure();
  }

  evaluate(verdict: QaVerdict): QaLoopState {
    this.expect('evaluate');
    if (verdict.passed) {
      this.current = 'accept';
      return this.current;
    }
    return this.afterFailure();
  }

  retry(): void {
    this.expect('retry');
    this.retriesUsed++;
    this.current = 'generate';
  }

  get state(): QaLoopState {
    return this.current;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  get done(): boolean {
    return this.current === 'accept' || this.current === 'exhausted';
  }

  resolution(): QaResolution {
    if (this.current === 'accept') return 'accepted';
    if (this.current === 'exhausted') return 'exhausted';
    return 'not_run';
  }

  private afterFailure(): QaLoopState {
    this.current = this.retriesUsed < this.maxRetries ? 'retry' : 'exhausted';
    return this.current;
  }

  private expect(state: QaLoopState): void {
    if (this.current !== state) {
      throw new InvariantViolationError(`QA loop expected state ${state}, was ${this.current}`);
    }
  }
}

/**
 * Append-only record of worker outcomes for one run.
 */

import { InvariantViolationError } from '../errors.js';
import type { RunStatus, SealedTrace, WorkerOutcome } from '../types.js';

export class OrchestrationTrace {
  private entries: WorkerOutcome[] = [];
  private sealed?: SealedTrace;

  constructor(private now: () => number = Date.now) {}

  append(outcome: WorkerOutcome): void {
    if (this.sealed) {
      throw new InvariantViolationError(`Cannot append ${outcome.step} outcome to a sealed trace`);
    }
    this.entries.push(Object.freeze({ ...outcome }));
  }

  /**
   * Freeze the trace. Sealing twice returns the first seal.
   */
  seal(status: RunStatus): SealedTrace {
    if (this.sealed) return this.sealed;
    this.sealed = Object.freeze({
      entries: Object.freeze([...this.entries]),
      status,
      sealed_at: new Date(this.now()).toISOString(),
    });
    return this.sealed;
  }

  get isSealed(): boolean {
    return this.sealed !== undefined;
  }

  get length(): number {
    return this.entries.length;
  }

  snapshot(): readonly WorkerOutcome[] {
    return [...this.entries];
  }
}

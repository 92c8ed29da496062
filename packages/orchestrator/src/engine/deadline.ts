/**
 * Per-invocation deadlines linked to the run's cancellation signal.
 */

import { TransientWorkerError } from '../errors.js';

export class DeadlineExceededError extends TransientWorkerError {
  constructor(readonly timeoutMs: number) {
    super(`Worker exceeded its ${timeoutMs}ms deadline`);
  }
}

export class RunCancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'RunCancelledError';
  }
}

/**
 * Run `task` with a signal that aborts when the deadline passes or the
 * parent signal aborts. A passed deadline rejects at once, even if the task
 * ignores its signal. A parent abort is only forwarded: the task still
 * settles with its own result.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw new RunCancelledError();

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const onParentAbort = () => controller.abort(new RunCancelledError());
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Error taxonomy.
 *
 * Worker-level problems are captured into the orchestration trace; only
 * invariant violations and invalid configuration or requests reach callers.
 */

export type ErrorKind =
  | 'transient_worker'
  | 'fatal_worker'
  | 'planning_delegate'
  | 'capacity_exceeded'
  | 'invariant_violation'
  | 'invalid_config'
  | 'invalid_request';

export abstract class CampaignCrewError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeouts and network failures. Retried by the engine up to a small bound. */
export class TransientWorkerError extends CampaignCrewError {
  readonly kind = 'transient_worker';
}

/** Validation or unrecoverable failures. Abort the run immediately. */
export class FatalWorkerError extends CampaignCrewError {
  readonly kind = 'fatal_worker';
}

/** Raised by planning delegates; always downgraded to the deterministic plan. */
export class PlanningDelegateError extends CampaignCrewError {
  readonly kind = 'planning_delegate';
}

export class CapacityExceededError extends CampaignCrewError {
  readonly kind = 'capacity_exceeded';

  constructor(
    message: string,
    readonly resource: string,
    readonly limit: number,
  ) {
    super(message);
  }
}

export class InvariantViolationError extends CampaignCrewError {
  readonly kind = 'invariant_violation';
}

export class InvalidConfigError extends CampaignCrewError {
  readonly kind = 'invalid_config';
}

export class InvalidRequestError extends CampaignCrewError {
  readonly kind = 'invalid_request';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE']);

/**
 * Decide whether a worker failure may be retried. Unknown errors are fatal.
 */
export function classifyWorkerError(err: unknown): 'transient' | 'fatal' {
  if (err instanceof TransientWorkerError) return 'transient';
  if (err instanceof FatalWorkerError) return 'fatal';
  if (err instanceof Error) {
    if (err.name === 'TimeoutError') return 'transient';
    if ('code' in err && typeof err.code === 'string' && TRANSIENT_CODES.has(err.code)) return 'transient';
  }
  return 'fatal';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

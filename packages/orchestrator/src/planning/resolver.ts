/**
 * Plan resolver — turns a content request plus context signals into an
 * ordered run/skip decision over the five workers.
 *
 * Planning can be delegated to a PlanProposer (usually an LLM). The
 * deterministic rules are the mandatory fallback: a proposal is validated
 * step by step and every missing or invalid step is filled from the rules.
 * resolve() never rejects.
 */

import { z } from 'zod';
import { createLogger } from '../logger.js';
import { PlanningDelegateError, errorMessage } from '../errors.js';
import { WORKER_ORDER, isWorkerName } from '../types.js';
import type {
  ContentRequest,
  PlanMode,
  PlanSignals,
  WorkerName,
  WorkerPlan,
  WorkerStep,
} from '../types.js';

const logger = createLogger('plan-resolver');

// ─── Proposer Interface ─────────────────────────────────────────────────────

/**
 * Raw delegate output. Steps stay untyped until repairProposal checks them.
 */
export interface ProposedPlan {
  steps: unknown[];
  reason?: string;
}

const ProposedPlanSchema = z.object({
  steps: z.array(z.unknown()),
  reason: z.string().optional(),
});

const ProposedStepSchema = z.object({
  name: z.string(),
  run: z.unknown(),
  reason: z.unknown().optional(),
});

export interface PlanProposer {
  readonly name: string;
  proposePlan(request: ContentRequest, signals: PlanSignals, signal: AbortSignal): Promise<ProposedPlan>;
}

export interface PlanResolverOptions {
  proposer?: PlanProposer;
  delegateTimeoutMs?: number;
}

interface Decision {
  run: boolean;
  reason: string;
}

// ─── Deterministic Rules ────────────────────────────────────────────────────

export function ruleFor(name: WorkerName, request: ContentRequest, signals: PlanSignals): Decision {
  switch (name) {
    case 'research': {
      const noReferences = !signals.has_style_reference && !signals.has_local_brand_references;
      if (signals.mentions_trends) return { run: true, reason: 'trend request' };
      if (noReferences) return { run: true, reason: 'missing style references' };
      return { run: false, reason: 'style references present' };
    }
    case 'copy':
      if (!request.include_text) return { run: false, reason: 'include_text=false' };
      if (!signals.wants_text) return { run: false, reason: 'no-text phrasing in request' };
      return { run: true, reason: 'include_text=true' };
    case 'design':
    case 'generate':
      return request.build ? { run: true, reason: 'build=true' } : { run: false, reason: 'build=false' };
    case 'qa':
      if (!request.build) return { run: false, reason: 'build=false' };
      if (request.max_retries <= 0) return { run: false, reason: 'max_retries=0' };
      return { run: true, reason: 'max_retries>0' };
  }
}

/**
 * Hard constraints a proposal may not break. Returns a description of the
 * violation, or undefined when the decision is admissible.
 */
function violation(name: WorkerName, run: boolean, request: ContentRequest, decided: Map<WorkerName, Decision>): string | undefined {
  switch (name) {
    case 'copy':
      return run && !request.include_text ? 'copy requested with include_text=false' : undefined;
    case 'generate':
      return run !== request.build ? `generate must match build=${request.build}` : undefined;
    case 'qa':
      if (run && !(request.build && request.max_retries > 0)) return 'qa requires build and max_retries>0';
      if (run && decided.get('generate')?.run === false) return 'qa without generate';
      return undefined;
    default:
      return undefined;
  }
}

export function buildPlan(steps: Map<WorkerName, Decision>, mode: PlanMode, reason: string): WorkerPlan {
  const ordered: WorkerStep[] = WORKER_ORDER.map((name, order) => {
    const decision = steps.get(name);
    if (!decision) throw new Error(`Plan is missing step ${name}`);
    return Object.freeze({ name, will_run: decision.run, reason: decision.reason, order });
  });
  return Object.freeze({
    steps: Object.freeze(ordered),
    mode,
    reason,
    sequence: Object.freeze(ordered.filter((s) => s.will_run).map((s) => s.name)),
  });
}

export function deterministicPlan(
  request: ContentRequest,
  signals: PlanSignals,
  reason = 'fallback_policy',
): WorkerPlan {
  const decisions = new Map<WorkerName, Decision>();
  for (const name of WORKER_ORDER) decisions.set(name, ruleFor(name, request, signals));
  return buildPlan(decisions, 'fallback', reason);
}

/**
 * Validate a proposal against the fixed ordering and the hard constraints,
 * filling every rejected or missing step from the deterministic rules.
 */
export function repairProposal(
  proposal: ProposedPlan,
  request: ContentRequest,
  signals: PlanSignals,
): { plan: WorkerPlan; repairs: string[] } {
  const repairs: string[] = [];
  const accepted = new Map<WorkerName, Decision>();
  let lastOrder = -1;

  for (const [index, raw] of proposal.steps.entries()) {
    const parsed = ProposedStepSchema.safeParse(raw);
    if (!parsed.success) {
      repairs.push(`malformed step at position ${index}`);
      continue;
    }
    const step = parsed.data;
    if (!isWorkerName(step.name)) {
      repairs.push(`unknown worker "${step.name}"`);
      continue;
    }
    if (accepted.has(step.name)) {
      repairs.push(`duplicate ${step.name}`);
      continue;
    }
    const order = WORKER_ORDER.indexOf(step.name);
    if (order < lastOrder) {
      repairs.push(`${step.name} out of order`);
      continue;
    }
    if (typeof step.run !== 'boolean') {
      repairs.push(`${step.name} has non-boolean run flag`);
      continue;
    }
    lastOrder = order;
    const reason = typeof step.reason === 'string' && step.reason.trim() ? step.reason.trim() : 'proposed by planner';
    accepted.set(step.name, { run: step.run, reason });
  }

  const decisions = new Map<WorkerName, Decision>();
  for (const name of WORKER_ORDER) {
    const proposed = accepted.get(name);
    if (!proposed) {
      if (!repairs.some((r) => r.startsWith(name) || r.endsWith(name))) repairs.push(`missing ${name}`);
      decisions.set(name, ruleFor(name, request, signals));
      continue;
    }
    const broken = violation(name, proposed.run, request, decisions);
    if (broken) {
      repairs.push(broken);
      decisions.set(name, ruleFor(name, request, signals));
      continue;
    }
    decisions.set(name, proposed);
  }

  const mode: PlanMode = repairs.length === 0 ? 'llm' : 'fallback-repaired';
  const reason = (typeof proposal.reason === 'string' && proposal.reason.trim()) || 'llm_worker_plan';
  return { plan: buildPlan(decisions, mode, reason), repairs };
}

// ─── Plan Resolver ──────────────────────────────────────────────────────────

export class PlanResolver {
  private proposer?: PlanProposer;
  private delegateTimeoutMs: number;

  constructor(options: PlanResolverOptions = {}) {
    this.proposer = options.proposer;
    this.delegateTimeoutMs = options.delegateTimeoutMs ?? 15_000;
  }

  /**
   * Set (or clear) the planning delegate.
   */
  setProposer(proposer: PlanProposer | undefined): void {
    this.proposer = proposer;
    logger.info({ proposer: proposer?.name ?? 'none' }, 'Plan proposer configured');
  }

  hasDelegate(): boolean {
    return this.proposer !== undefined;
  }

  async resolve(request: ContentRequest, signals: PlanSignals): Promise<WorkerPlan> {
    const proposer = this.proposer;
    if (!proposer) {
      return deterministicPlan(request, signals, 'fallback_policy_no_delegate');
    }

    let proposal: ProposedPlan;
    try {
      proposal = await this.propose(proposer, request, signals);
    } catch (err) {
      logger.warn({ proposer: proposer.name, error: errorMessage(err) }, 'Planning delegate failed, using deterministic plan');
      return deterministicPlan(request, signals, 'fallback_delegate_error');
    }

    const { plan, repairs } = repairProposal(proposal, request, signals);
    if (repairs.length > 0) {
      logger.info({ proposer: proposer.name, repairs }, 'Delegate plan repaired');
    }
    logger.info({ mode: plan.mode, sequence: plan.sequence }, 'Worker plan resolved');
    return plan;
  }

  private async propose(proposer: PlanProposer, request: ContentRequest, signals: PlanSignals): Promise<ProposedPlan> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new PlanningDelegateError(`Planning delegate timed out after ${this.delegateTimeoutMs}ms`));
      }, this.delegateTimeoutMs);
    });

    try {
      const proposal: unknown = await Promise.race([proposer.proposePlan(request, signals, controller.signal), timeout]);
      const parsed = ProposedPlanSchema.safeParse(proposal);
      if (!parsed.success) {
        throw new PlanningDelegateError(`Planning delegate returned a malformed plan: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      return parsed.data;
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Planning delegate backed by the provider layer: asks a language model for
 * a strict-JSON worker plan and hands the raw proposal to the resolver.
 */

import { z } from 'zod';
import { createLogger } from '../logger.js';
import { PlanningDelegateError, errorMessage } from '../errors.js';
import { WORKER_ORDER } from '../types.js';
import { extractJsonObject } from './json.js';
import type { AdapterManagerLike } from '../adapters.js';
import type { ContentRequest, PlanSignals } from '../types.js';
import type { PlanProposer, ProposedPlan } from './resolver.js';

const logger = createLogger('adapter-plan-proposer');

const SYSTEM_PROMPT = 'You are a strict JSON planner for agent orchestration. No markdown.';

const ProposalSchema = z.object({
  workers: z.array(
    z.object({
      name: z.string(),
      run: z.unknown(),
      reason: z.string().optional(),
    }),
  ),
  reason: z.string().optional(),
});

type AdapterProposedPlan = Omit<ProposedPlan, 'steps'> & { steps: z.infer<typeof ProposalSchema>['workers'] };

export interface AdapterPlanProposerOptions {
  adapterManager: AdapterManagerLike;
  providerPriority: string[];
}

export class AdapterPlanProposer implements PlanProposer {
  readonly name = 'adapter';

  constructor(private options: AdapterPlanProposerOptions) {}

  async proposePlan(request: ContentRequest, signals: PlanSignals, signal: AbortSignal): Promise<AdapterProposedPlan> {
    let text: string;
    try {
      const response = await this.options.adapterManager.sendWithFallback(
        {
          prompt: buildPlanningPrompt(request, signals),
          system_prompt: SYSTEM_PROMPT,
          temperature: 0,
          max_tokens: 450,
          metadata: { purpose: 'worker_plan', brand: request.brand_id },
        },
        this.options.providerPriority,
        { signal },
      );
      text = response.text;
      logger.debug({ provider: response.provider_id, latency: response.latency_ms }, 'Planning delegate replied');
    } catch (err) {
      if (signal.aborted) throw new PlanningDelegateError('Planning delegate aborted', { cause: err });
      throw new PlanningDelegateError(`Planning provider failed: ${errorMessage(err)}`, { cause: err });
    }

    if (signal.aborted) {
      throw new PlanningDelegateError('Planning delegate aborted');
    }

    const parsed = ProposalSchema.safeParse(extractJsonObject(text));
    if (!parsed.success) {
      throw new PlanningDelegateError('Planning delegate returned malformed JSON');
    }

    return { steps: parsed.data.workers, reason: parsed.data.reason };
  }
}

export function buildPlanningPrompt(request: ContentRequest, signals: PlanSignals): string {
  return [
    'Decide which workers to run for this campaign request. Return ONLY strict JSON.',
    'Hard constraints:',
    '- If build=false: generate=false and qa=false',
    '- If include_text=false: copy=false',
    '- If build=true: generate must be true',
    '- Workers must be listed in this order: research, copy, design, generate, qa',
    'Policy guidance:',
    '- Run research if the user asks for trends/inspiration OR there is no style reference and no brand references',
    '- Run copy only if include_text=true',
    '- Run design if build=true',
    '- Run qa if build=true and max_retries>0',
    '',
    `brand=${request.brand_id}`,
    `objective=${request.objective}`,
    `constraints=${request.constraints}`,
    `days=${request.days}`,
    `build=${request.build}`,
    `include_text=${request.include_text}`,
    `max_retries=${request.max_retries}`,
    `has_style_reference=${signals.has_style_reference}`,
    `has_local_brand_references=${signals.has_local_brand_references}`,
    `allowed_workers=${WORKER_ORDER.join(',')}`,
    'JSON schema: {"workers": [{"name":"research","run":true,"reason":"..."}], "reason":"..."}',
  ].join('\n');
}

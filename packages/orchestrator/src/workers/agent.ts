/**
 * Agent worker — runs any step by prompting a model through the adapter
 * manager's fallback chain. Earlier outputs and the last QA feedback are
 * folded into the prompt.
 */

import { createLogger } from '../logger.js';
import { TransientWorkerError, errorMessage } from '../errors.js';
import type { AdapterManagerLike, AdapterResponseLike } from '../adapters.js';
import type { Worker, WorkerContext, WorkerName, WorkerResult } from '../types.js';

const logger = createLogger('agent-worker');

export interface AgentWorkerOptions {
  adapterManager: AdapterManagerLike;
  providerPriority: string[];
  systemPrompt: string;
  instruction?: string;
  temperature?: number;
  maxTokens?: number;
  /** Cost per token, when the caller wants it on the trace. */
  costPerToken?: number;
}

export function buildAgentPrompt(name: WorkerName, context: WorkerContext, instruction?: string): string {
  const { request } = context;
  const sections = [
    instruction ?? `Act as the ${name} worker for this campaign.`,
    '',
    `brand=${request.brand_id}`,
    `objective=${request.objective}`,
    `days=${request.days}`,
    `include_text=${request.include_text}`,
  ];
  if (request.constraints) sections.push(`constraints=${request.constraints}`);

  const previous = Object.entries(context.outputs);
  if (previous.length > 0) {
    sections.push('', 'Previous outputs:');
    for (const [step, output] of previous) {
      sections.push(`${step}: ${JSON.stringify(output)}`);
    }
  }

  if (context.feedback) {
    sections.push('', `QA feedback from attempt ${context.attempt - 1}: ${context.feedback.feedback ?? context.feedback.reason ?? 'rejected'}`);
  }
  return sections.join('\n');
}

export class AgentWorker implements Worker {
  constructor(
    readonly name: WorkerName,
    private options: AgentWorkerOptions,
  ) {}

  async run(context: WorkerContext): Promise<WorkerResult> {
    const prompt = buildAgentPrompt(this.name, context, this.options.instruction);

    logger.info({ run: context.run_id, step: this.name, attempt: context.attempt }, 'Executing agent step');

    let response: AdapterResponseLike;
    try {
      response = await this.options.adapterManager.sendWithFallback(
        {
          prompt,
          system_prompt: this.options.systemPrompt,
          temperature: this.options.temperature ?? 0.7,
          max_tokens: this.options.maxTokens ?? 4096,
          metadata: { run: context.run_id, step: this.name, attempt: context.attempt },
        },
        this.options.providerPriority,
        { signal: context.signal },
      );
    } catch (err) {
      throw new TransientWorkerError(`Agent ${this.name} failed: ${errorMessage(err)}`, { cause: err });
    }

    logger.info({
      run: context.run_id,
      step: this.name,
      provider: response.provider_id,
      tokens: response.tokens_used,
      latency: response.latency_ms,
      fallbacks: response.fallbacks_tried,
    }, 'Agent step completed');

    return {
      payload: {
        text: response.text,
        provider: response.provider_id,
        model: response.model,
        tokens_used: response.tokens_used,
        latency_ms: response.latency_ms,
      },
      cost_usd: (response.tokens_used ?? 0) * (this.options.costPerToken ?? 0),
    };
  }
}

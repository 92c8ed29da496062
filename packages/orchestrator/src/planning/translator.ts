/**
 * Free chat text → content request parameters.
 *
 * When an adapter manager is wired, a model is asked for the values first;
 * anything it gets wrong falls back to the keyword heuristics.
 */

import { z } from 'zod';
import { createLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { createContentRequest } from '../request.js';
import { matchesAny } from './intent.js';
import { extractJsonObject } from './json.js';
import type { IntentKeywords } from '../config/schema.js';
import type { AdapterManagerLike } from '../adapters.js';
import type { ContentRequest, InputTranslation } from '../types.js';

const logger = createLogger('request-translator');

export const DEFAULT_OBJECTIVE = 'Create on-brand social content for the coming days.';
export const DEFAULT_DAYS = 3;
export const MIN_DAYS = 1;
export const MAX_DAYS = 14;

const DAYS_PATTERN = /(\d{1,2})\s*(?:days?|d[ií]as?)\b/i;

const TranslationSchema = z.object({
  objective: z.string().trim().min(1),
  days: z.number().int(),
  build: z.boolean(),
  include_text: z.boolean(),
  reason: z.string().optional(),
});

export interface RequestTranslatorOptions {
  adapterManager?: AdapterManagerLike;
  providerPriority?: string[];
  timeoutMs?: number;
}

export interface TranslateOptions {
  maxRetries?: number;
  styleRefPresent?: boolean;
  campaignId?: string;
}

export interface Translation {
  request: ContentRequest;
  translation: InputTranslation;
}

export function clampDays(days: number): number {
  if (!Number.isFinite(days)) return DEFAULT_DAYS;
  return Math.min(MAX_DAYS, Math.max(MIN_DAYS, Math.trunc(days)));
}

/**
 * Keyword-only translation; never fails.
 */
export function heuristicTranslation(text: string, keywords: IntentKeywords): InputTranslation {
  const objective = text.trim() || DEFAULT_OBJECTIVE;
  const match = DAYS_PATTERN.exec(text);
  const days = match ? clampDays(Number(match[1])) : DEFAULT_DAYS;
  return {
    objective,
    days,
    build: true,
    include_text: !matchesAny(text, keywords.no_text),
    reason: 'heuristic_translation',
    mode: 'fallback',
  };
}

export class RequestTranslator {
  private adapterManager?: AdapterManagerLike;
  private providerPriority: string[];
  private timeoutMs: number;

  constructor(
    private keywords: IntentKeywords,
    options: RequestTranslatorOptions = {},
  ) {
    this.adapterManager = options.adapterManager;
    this.providerPriority = options.providerPriority ?? ['anthropic'];
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  setAdapterManager(manager: AdapterManagerLike | undefined, providerPriority?: string[]): void {
    this.adapterManager = manager;
    if (providerPriority) this.providerPriority = providerPriority;
  }

  /**
   * Translate chat text for a brand into a validated, frozen ContentRequest.
   */
  async translate(brandId: string, text: string, options: TranslateOptions = {}): Promise<Translation> {
    const translation = (await this.delegate(brandId, text)) ?? heuristicTranslation(text, this.keywords);
    const request = createContentRequest({
      objective: translation.objective,
      brand_id: brandId,
      campaign_id: options.campaignId,
      days: translation.days,
      build: translation.build,
      include_text: translation.include_text,
      style_ref_present: options.styleRefPresent ?? false,
      max_retries: options.maxRetries ?? 1,
      constraints: text.trim(),
    });
    logger.info({ brand: brandId, mode: translation.mode, days: request.days }, 'Chat input translated');
    return { request, translation };
  }

  private async delegate(brandId: string, text: string): Promise<InputTranslation | undefined> {
    const manager = this.adapterManager;
    if (!manager || !text.trim()) return undefined;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Translation timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    });

    try {
      const response = await Promise.race([
        manager.sendWithFallback(
          {
            prompt: buildTranslationPrompt(brandId, text),
            system_prompt: 'You convert chat requests into strict JSON. No markdown.',
            temperature: 0,
            max_tokens: 300,
            metadata: { purpose: 'input_translation', brand: brandId },
          },
          this.providerPriority,
        ),
        timeout,
      ]);
      const parsed = TranslationSchema.safeParse(extractJsonObject(response.text));
      if (!parsed.success) {
        logger.warn({ brand: brandId, provider: response.provider_id }, 'Translation reply malformed, using heuristics');
        return undefined;
      }
      const heuristic = heuristicTranslation(text, this.keywords);
      return {
        objective: parsed.data.objective,
        days: clampDays(parsed.data.days),
        build: parsed.data.build,
        // Explicit no-text phrasing wins over the model.
        include_text: parsed.data.include_text && heuristic.include_text,
        reason: parsed.data.reason?.trim() || 'llm_translation',
        mode: 'llm',
      };
    } catch (err) {
      logger.warn({ brand: brandId, error: errorMessage(err) }, 'Translation delegate failed, using heuristics');
      return undefined;
    } finally {
      clearTimeout(timer);
    }
  }
}

export function buildTranslationPrompt(brandId: string, text: string): string {
  return [
    'Extract campaign parameters from the user message. Return ONLY strict JSON.',
    `days must be an integer between ${MIN_DAYS} and ${MAX_DAYS} (default ${DEFAULT_DAYS}).`,
    'build defaults to true. include_text is false only when the user asks for no text.',
    `brand=${brandId}`,
    `message=${text.trim()}`,
    'JSON schema: {"objective":"...","days":3,"build":true,"include_text":true,"reason":"..."}',
  ].join('\n');
}

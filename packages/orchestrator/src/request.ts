/**
 * Content request construction and validation.
 */

import { z } from 'zod';
import { InvalidRequestError } from './errors.js';
import type { ContentRequest } from './types.js';

const SLUG_PATTERN = /^[a-z0-9][a-z0-9-]*[a-z0-9]$|^[a-z0-9]$/;

/**
 * Lowercase letters, digits and hyphens; 1-64 chars; safe to use as a path segment.
 */
export function isSafeSlug(value: string): boolean {
  if (!value || value.length > 64) return false;
  if (value.includes('..') || value.includes('/') || value.includes('\\')) return false;
  return SLUG_PATTERN.test(value);
}

const slug = z.string().refine(isSafeSlug, { message: 'must be a lowercase slug (a-z, 0-9, -)' });

export const ContentRequestSchema = z.object({
  objective: z.string().trim().min(1, 'objective is required'),
  brand_id: slug,
  campaign_id: slug.optional(),
  days: z.number().int().min(1).max(14).default(3),
  build: z.boolean().default(false),
  include_text: z.boolean().default(true),
  style_ref_present: z.boolean().default(false),
  max_retries: z.number().int().min(0).max(10).default(1),
  constraints: z.string().default(''),
});

export type ContentRequestInput = z.input<typeof ContentRequestSchema>;

/**
 * Validate raw input into an immutable ContentRequest.
 */
export function createContentRequest(input: unknown): ContentRequest {
  const result = ContentRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`);
    throw new InvalidRequestError(`Invalid content request: ${issues.join('; ')}`, issues);
  }
  const { campaign_id, ...rest } = result.data;
  const request: ContentRequest = campaign_id === undefined ? rest : { ...rest, campaign_id };
  return Object.freeze(request);
}

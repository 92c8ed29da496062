/**
 * Deterministic copy worker: one themed headline per product per day.
 */

import { readStringArray } from './payload.js';
import type { Worker, WorkerContext, WorkerResult } from '../types.js';

export const COPY_THEMES = ['teaser', 'main_offer', 'last_chance', 'social_proof', 'reminder'] as const;

export type CopyTheme = (typeof COPY_THEMES)[number];

export interface CopyItem {
  day: number;
  theme: CopyTheme;
  product: string;
  headline: string;
  subheadline: string;
}

function writeCopy(theme: CopyTheme, product: string, objective: string): Pick<CopyItem, 'headline' | 'subheadline'> {
  switch (theme) {
    case 'teaser':
      return { headline: `${product} feels different`, subheadline: 'A new visual story is on its way' };
    case 'main_offer':
      return { headline: `${product} takes the spotlight`, subheadline: `Campaign focused on ${objective}` };
    case 'last_chance':
      return { headline: `Last push for ${product}`, subheadline: 'Closing the campaign on a high note' };
    case 'social_proof':
      return { headline: `${product}, recommended by the community`, subheadline: 'Trust, consistency and results' };
    case 'reminder':
      return { headline: `${product} is still trending`, subheadline: 'Keep the momentum going' };
  }
}

export function buildCopyItems(products: readonly string[], days: number, objective: string): CopyItem[] {
  const items: CopyItem[] = [];
  for (let day = 1; day <= days; day++) {
    const theme = COPY_THEMES[(day - 1) % COPY_THEMES.length];
    for (const product of products) {
      items.push({ day, theme, product, ...writeCopy(theme, product, objective) });
    }
  }
  return items;
}

export class CopyWorker implements Worker {
  readonly name = 'copy';

  async run(context: WorkerContext): Promise<WorkerResult> {
    const configured = readStringArray(context.config, 'products');
    const products = configured.length > 0 ? configured : [context.request.brand_id];
    return { payload: { items: buildCopyItems(products, context.request.days, context.request.objective) } };
  }
}

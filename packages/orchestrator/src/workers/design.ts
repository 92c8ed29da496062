/**
 * Picks the visual style for the campaign and applies it to the copy items.
 */

import { isRecord, readStringArray } from './payload.js';
import type { Worker, WorkerContext, WorkerResult } from '../types.js';

export const DEFAULT_STYLE = 'minimal_clean';

export function visualDirection(style: string): string {
  return `Visual direction: ${style.replace(/_/g, ' ')} look, consistent across every piece`;
}

/**
 * Research recommendation first, then the brand's preferred style.
 */
export function selectStyle(research: unknown, config: Readonly<Record<string, unknown>>): string {
  return readStringArray(research, 'recommended_styles')[0] ?? readStringArray(config, 'preferred_styles')[0] ?? DEFAULT_STYLE;
}

export class DesignWorker implements Worker {
  readonly name = 'design';

  async run(context: WorkerContext): Promise<WorkerResult> {
    const style = selectStyle(context.outputs.research, context.config);
    const copy = context.outputs.copy;
    const items = isRecord(copy) && Array.isArray(copy.items) ? copy.items : [];

    return {
      payload: {
        selected_style: style,
        visual_direction: visualDirection(style),
        items: items.map((item: unknown) => (isRecord(item) ? { ...item, style } : item)),
      },
    };
  }
}

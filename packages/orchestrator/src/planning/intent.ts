/**
 * Free-text intent detection. Markers come from configuration
 * (config/intent-keywords.yaml), never from code.
 */

import type { IntentKeywords } from '../config/schema.js';

export interface IntentSignals {
  mentions_trends: boolean;
  wants_text: boolean;
}

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

export function matchesAny(text: string, markers: readonly string[]): boolean {
  const haystack = normalize(text);
  if (!haystack) return false;
  return markers.some((marker) => haystack.includes(normalize(marker)));
}

export function detectIntent(text: string, keywords: IntentKeywords): IntentSignals {
  return {
    mentions_trends: matchesAny(text, keywords.trends),
    wants_text: !matchesAny(text, keywords.no_text),
  };
}

/**
 * A chat message that only confirms a pending build ("ok", "/build", ...).
 */
export function isBuildConfirmation(text: string, keywords: IntentKeywords): boolean {
  const message = normalize(text);
  return keywords.build_confirmations.some((c) => normalize(c) === message);
}

/**
 * Rendering of evicted turns, and the raw-text fragment used when the
 * summarizer fails.
 */

import type { Turn } from './types.js';

export const FALLBACK_PREFIX = 'Previous conversation included discussion about: ';
export const FALLBACK_SUFFIX = '...';

/**
 * First `length` code points of `text`; never splits a surrogate pair.
 */
export function truncateCodePoints(text: string, length: number): string {
  return Array.from(text).slice(0, length).join('');
}

/**
 * Render turns as `User: ...\nAssistant: ...` blocks separated by a blank line.
 */
export function formatTurns(turns: readonly Turn[]): string {
  return turns.map((turn) => `User: ${turn.userText}\nAssistant: ${turn.assistantText}\n\n`).join('');
}

/**
 * Deterministic stand-in for a summary: a fixed-length prefix of the
 * evicted dialogue.
 */
export function buildFallbackFragment(evictedTurns: readonly Turn[], previewLength: number): string {
  const preview = truncateCodePoints(formatTurns(evictedTurns), previewLength);
  return `${FALLBACK_PREFIX}${preview}${FALLBACK_SUFFIX}`;
}

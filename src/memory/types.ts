/**
 * Types for the hybrid conversation memory.
 *
 * Two tiers:
 * - Rolling summary standing in for evicted turns
 * - Recent turns kept verbatim, bounded by `maxPairs`
 */

/**
 * One user/assistant exchange. Frozen once recorded.
 */
export interface Turn {
  readonly sequence: number;
  readonly userText: string;
  readonly assistantText: string;
}

/**
 * Entry yielded by `HybridMemory.getContext()` for prompt assembly.
 */
export type ContextEntry =
  | { kind: 'summary'; text: string }
  | { kind: 'user'; text: string; sequence: number }
  | { kind: 'assistant'; text: string; sequence: number };

export interface SummarizeOptions {
  /** Aborted when the engine's summarizer timeout expires */
  abortSignal?: AbortSignal | undefined;
}

/**
 * External collaborator that condenses evicted turns into prose.
 *
 * Both methods may reject; the engine absorbs every failure.
 */
export interface Summarizer {
  /** Summarize `evictedTurns`, given the current rolling summary ('' when none). */
  summarize(
    priorSummary: string,
    evictedTurns: readonly Turn[],
    options?: SummarizeOptions
  ): Promise<string>;
  /** Shorten an over-long rolling summary. Required when `maxSummaryLength` is set. */
  condense?(summary: string, options?: SummarizeOptions): Promise<string>;
}

/**
 * User-facing memory configuration.
 */
export interface MemoryConfig {
  /** Buffer capacity in turns (default: 5) */
  maxPairs?: number | undefined;
  /** Oldest turns removed per eviction (default: min(2, maxPairs)) */
  evictionBatchSize?: number | undefined;
  /** Joins successive summary fragments (default: blank line) */
  summarySeparator?: string | undefined;
  /** Characters of raw dialogue kept in a fallback fragment (default: 200) */
  fallbackPreviewLength?: number | undefined;
  /** Upper bound for a single summarizer call (default: 30000) */
  summarizerTimeoutMs?: number | undefined;
  /** Condense the rolling summary once it grows past this many characters (default: never) */
  maxSummaryLength?: number | undefined;
}

/**
 * Internal: all fields resolved to concrete values.
 */
export interface NormalizedMemoryConfig {
  maxPairs: number;
  evictionBatchSize: number;
  summarySeparator: string;
  fallbackPreviewLength: number;
  summarizerTimeoutMs: number;
  maxSummaryLength: number | undefined;
}

export interface MemoryStats {
  /** Eviction events since construction */
  evictions: number;
  /** Evictions that fell back to a raw-text fragment */
  summarizerFailures: number;
  /** Successful second-order compactions of the rolling summary */
  condensations: number;
}

/**
 * Read-only copy of the engine state.
 */
export interface MemorySnapshot {
  summary: string;
  turns: Turn[];
  config: NormalizedMemoryConfig;
  stats: MemoryStats;
}

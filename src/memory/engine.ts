/**
 * Hybrid conversation memory.
 *
 * Keeps the last `maxPairs` turns verbatim. When a new turn overflows the
 * buffer, the oldest `evictionBatchSize` turns are folded into a rolling
 * summary via the Summarizer. Summarizer failures are absorbed by a raw-text
 * fallback fragment, so `recordTurn` always leaves the buffer within capacity.
 */

import { createLogger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { MemoryConfigurationError, normalizeMemoryConfig } from './config.js';
import { SummarizerError } from './errors.js';
import { buildFallbackFragment } from './fallback.js';
import { AsyncLock } from './lock.js';
import type {
  ContextEntry,
  MemoryConfig,
  MemorySnapshot,
  MemoryStats,
  NormalizedMemoryConfig,
  Summarizer,
  Turn,
} from './types.js';

const logger = createLogger({ name: 'hybrid-memory' });

export interface HybridMemoryOptions extends MemoryConfig {
  summarizer: Summarizer;
}

/**
 * Resolve and validate engine options.
 *
 * @throws MemoryConfigurationError when the configuration is out of range
 */
export function validateMemoryOptions(options: HybridMemoryOptions): NormalizedMemoryConfig {
  const { summarizer, ...config } = options;
  const normalized = normalizeMemoryConfig(config);
  if (normalized.maxSummaryLength !== undefined && !summarizer.condense) {
    throw new MemoryConfigurationError('Invalid memory configuration', [
      'maxSummaryLength: the summarizer does not implement condense()',
    ]);
  }
  return normalized;
}

/**
 * Summary entry (when present) followed by the turns, oldest first.
 */
export function snapshotToContext(
  state: Pick<MemorySnapshot, 'summary' | 'turns'>
): ContextEntry[] {
  const entries: ContextEntry[] = [];
  if (state.summary) {
    entries.push({ kind: 'summary', text: state.summary });
  }
  for (const turn of state.turns) {
    entries.push({ kind: 'user', text: turn.userText, sequence: turn.sequence });
    entries.push({ kind: 'assistant', text: turn.assistantText, sequence: turn.sequence });
  }
  return entries;
}

export class HybridMemory {
  readonly config: NormalizedMemoryConfig;
  private readonly summarizer: Summarizer;
  private readonly lock = new AsyncLock();
  private turns: Turn[] = [];
  private summary = '';
  private nextSequence = 1;
  private readonly stats: MemoryStats = { evictions: 0, summarizerFailures: 0, condensations: 0 };

  /**
   * @throws MemoryConfigurationError when the configuration is out of range
   */
  constructor(options: HybridMemoryOptions) {
    this.config = validateMemoryOptions(options);
    this.summarizer = options.summarizer;
  }

  /**
   * Append a turn, then evict and summarize until the buffer is within capacity.
   */
  async recordTurn(userText: string, assistantText: string): Promise<Turn> {
    return this.lock.run(async () => {
      const turn: Turn = Object.freeze({ sequence: this.nextSequence++, userText, assistantText });
      this.turns.push(turn);

      while (this.turns.length > this.config.maxPairs) {
        const evicted = this.turns.splice(0, this.config.evictionBatchSize);
        const fragment = await this.summarizeEvicted(evicted);
        this.merge(fragment);
        this.stats.evictions++;
      }

      await this.condenseIfNeeded();
      return turn;
    });
  }

  /**
   * Summary entry (when present) followed by retained turns, oldest first.
   */
  async getContext(): Promise<ContextEntry[]> {
    return this.lock.run(() => snapshotToContext({ summary: this.summary, turns: this.turns }));
  }

  async clear(): Promise<void> {
    await this.lock.run(() => {
      this.turns = [];
      this.summary = '';
    });
  }

  async snapshot(): Promise<MemorySnapshot> {
    return this.lock.run(() => ({
      summary: this.summary,
      turns: [...this.turns],
      config: { ...this.config },
      stats: { ...this.stats },
    }));
  }

  private merge(fragment: string): void {
    this.summary = this.summary
      ? `${this.summary}${this.config.summarySeparator}${fragment}`
      : fragment;
  }

  /**
   * One summarizer attempt; any failure yields the fallback fragment.
   */
  private async summarizeEvicted(evicted: Turn[]): Promise<string> {
    const priorSummary = this.summary;
    try {
      const fragment = await this.callWithTimeout((abortSignal) =>
        this.summarizer.summarize(priorSummary, evicted, { abortSignal })
      );
      if (typeof fragment !== 'string' || fragment.length === 0) {
        throw new SummarizerError('provider', 'Summarizer returned an empty fragment');
      }
      logger.debug('Folded evicted turns into summary', {
        evicted: evicted.map((turn) => turn.sequence),
      });
      return fragment;
    } catch (err) {
      this.stats.summarizerFailures++;
      logger.warn('Summarization failed, using fallback fragment', {
        evicted: evicted.map((turn) => turn.sequence),
        kind: err instanceof SummarizerError ? err.kind : 'provider',
        error: String(err),
      });
      return buildFallbackFragment(evicted, this.config.fallbackPreviewLength);
    }
  }

  private async condenseIfNeeded(): Promise<void> {
    const { maxSummaryLength } = this.config;
    const condense = this.summarizer.condense?.bind(this.summarizer);
    if (maxSummaryLength === undefined || !condense || this.summary.length <= maxSummaryLength) {
      return;
    }

    const summary = this.summary;
    try {
      const condensed = await this.callWithTimeout((abortSignal) =>
        condense(summary, { abortSignal })
      );
      if (typeof condensed !== 'string' || condensed.length === 0) {
        throw new SummarizerError('provider', 'Summarizer returned an empty condensed summary');
      }
      this.summary = condensed;
      this.stats.condensations++;
      logger.debug('Condensed rolling summary', {
        before: summary.length,
        after: condensed.length,
      });
    } catch (err) {
      logger.warn('Summary condensation failed, keeping the current summary', {
        length: summary.length,
        error: String(err),
      });
    }
  }

  private async callWithTimeout<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(task, this.config.summarizerTimeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new SummarizerError('timeout', err.message, { cause: err });
      }
      throw err;
    }
  }
}

/**
 * Summarizer backed by a Vercel AI SDK LanguageModel.
 *
 * One model call per eviction, no retries: the memory engine falls back to a
 * raw-text fragment when a call fails.
 */

import { APICallError, generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { SummarizerError } from '../memory/errors.js';
import { formatTurns } from '../memory/fallback.js';
import type { SummarizeOptions, Summarizer, Turn } from '../memory/types.js';

// ── Constants ────────────────────────────────────────────────────────

export const SUMMARY_PROMPT = `Please provide a concise summary of this conversation.

Existing summary (if any):
{existing_summary}

New messages to fold into the summary:
{conversation}

Keep names, preferences, facts and open questions the user shared. Be factual and specific.

Summary:`;

export const CONDENSE_PROMPT = `The following is a summary of an earlier conversation that needs to be shortened.
Keep every fact, decision and open thread the user would expect to be remembered.

{summary}

Shortened summary:`;

export const SUMMARY_FRAGMENT_PREFIX = 'Previous conversation summary: ';

export const DEFAULT_SUMMARIZER_TEMPERATURE = 0.3;

export interface LLMSummarizerOptions {
  /** Model used for summaries */
  model: LanguageModel;
  /** Sampling temperature (default: 0.3) */
  temperature?: number | undefined;
  /** Prompt template with {existing_summary} and {conversation} placeholders */
  prompt?: string | undefined;
}

// ── Helpers ──────────────────────────────────────────────────────────

/**
 * Fill the summary prompt. Replacement callbacks keep `$` sequences in user
 * text literal.
 */
export function buildSummaryPrompt(
  template: string,
  priorSummary: string,
  evictedTurns: readonly Turn[]
): string {
  const conversation = formatTurns(evictedTurns).trimEnd();
  return template
    .replace('{existing_summary}', () => priorSummary || '(none)')
    .replace('{conversation}', () => conversation);
}

/**
 * Map a model call failure onto the summarizer failure taxonomy.
 */
export function toSummarizerError(err: unknown, abortSignal?: AbortSignal): SummarizerError {
  if (err instanceof SummarizerError) {
    return err;
  }
  if (abortSignal?.aborted) {
    return new SummarizerError('timeout', 'Summarizer call was aborted', { cause: err });
  }
  if (APICallError.isInstance(err)) {
    // No status code means the request never got an HTTP response.
    const kind = err.statusCode === undefined ? 'transport' : 'provider';
    return new SummarizerError(kind, err.message, { cause: err });
  }
  if (err instanceof TypeError) {
    return new SummarizerError('transport', err.message, { cause: err });
  }
  return new SummarizerError('provider', err instanceof Error ? err.message : String(err), {
    cause: err,
  });
}

// ── Summarizer ───────────────────────────────────────────────────────

/**
 * Create a Summarizer that asks `model` for each fragment.
 *
 * @example
 * ```typescript
 * import { createOpenAI } from '@ai-sdk/openai';
 *
 * const provider = createOpenAI({ apiKey: 'test-key' });
 * const memory = new HybridMemory({
 *   maxPairs: 3,
 *   summarizer: createLLMSummarizer({ model: provider.chat('gpt-4o-mini') }),
 * });
 * ```
 */
export function createLLMSummarizer(options: LLMSummarizerOptions): Summarizer {
  const { model } = options;
  const temperature = options.temperature ?? DEFAULT_SUMMARIZER_TEMPERATURE;
  const template = options.prompt ?? SUMMARY_PROMPT;

  async function complete(prompt: string, callOptions?: SummarizeOptions): Promise<string> {
    const abortSignal = callOptions?.abortSignal;
    let text: string;
    try {
      const result = await generateText({
        model,
        prompt,
        temperature,
        maxRetries: 0,
        ...(abortSignal ? { abortSignal } : {}),
      });
      text = result.text.trim();
    } catch (err) {
      throw toSummarizerError(err, abortSignal);
    }
    if (!text) {
      throw new SummarizerError('provider', 'Model returned an empty summary');
    }
    return text;
  }

  return {
    async summarize(priorSummary, evictedTurns, callOptions) {
      const text = await complete(
        buildSummaryPrompt(template, priorSummary, evictedTurns),
        callOptions
      );
      return `${SUMMARY_FRAGMENT_PREFIX}${text}`;
    },

    async condense(summary, callOptions) {
      return complete(
        CONDENSE_PROMPT.replace('{summary}', () => summary),
        callOptions
      );
    },
  };
}

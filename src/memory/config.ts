/**
 * Memory configuration defaults and validation.
 */

import { z } from 'zod';
import type { MemoryConfig, NormalizedMemoryConfig } from './types.js';

export const DEFAULT_MAX_PAIRS = 5;
export const DEFAULT_EVICTION_BATCH_SIZE = 2;
export const DEFAULT_SUMMARY_SEPARATOR = '\n\n';
export const DEFAULT_FALLBACK_PREVIEW_LENGTH = 200;
export const DEFAULT_SUMMARIZER_TIMEOUT_MS = 30_000;
/** Largest delay a Node.js timer accepts. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Error thrown when a memory configuration is rejected. Fatal at construction.
 */
export class MemoryConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'MemoryConfigurationError';
  }
}

const memoryConfigSchema = z
  .object({
    maxPairs: z.number().int().min(1),
    evictionBatchSize: z.number().int().min(1),
    summarySeparator: z.string(),
    fallbackPreviewLength: z.number().int().min(1),
    summarizerTimeoutMs: z.number().int().min(1).max(MAX_TIMER_DELAY_MS),
    maxSummaryLength: z.number().int().min(1).optional(),
  })
  .refine((config) => config.evictionBatchSize <= config.maxPairs, {
    message: 'evictionBatchSize must not exceed maxPairs',
    path: ['evictionBatchSize'],
  });

/**
 * Resolve defaults and validate.
 *
 * @throws MemoryConfigurationError when a field is out of range
 */
export function normalizeMemoryConfig(config: MemoryConfig = {}): NormalizedMemoryConfig {
  const maxPairs = config.maxPairs ?? DEFAULT_MAX_PAIRS;
  const result = memoryConfigSchema.safeParse({
    maxPairs,
    evictionBatchSize:
      config.evictionBatchSize ?? Math.max(1, Math.min(DEFAULT_EVICTION_BATCH_SIZE, maxPairs)),
    summarySeparator: config.summarySeparator ?? DEFAULT_SUMMARY_SEPARATOR,
    fallbackPreviewLength: config.fallbackPreviewLength ?? DEFAULT_FALLBACK_PREVIEW_LENGTH,
    summarizerTimeoutMs: config.summarizerTimeoutMs ?? DEFAULT_SUMMARIZER_TIMEOUT_MS,
    maxSummaryLength: config.maxSummaryLength,
  });

  if (!result.success) {
    throw new MemoryConfigurationError(
      'Invalid memory configuration',
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const parsed = result.data;
  return {
    maxPairs: parsed.maxPairs,
    evictionBatchSize: parsed.evictionBatchSize,
    summarySeparator: parsed.summarySeparator,
    fallbackPreviewLength: parsed.fallbackPreviewLength,
    summarizerTimeoutMs: parsed.summarizerTimeoutMs,
    maxSummaryLength: parsed.maxSummaryLength,
  };
}

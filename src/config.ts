/**
 * Process configuration read from environment variables.
 */

import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from './memory/config.js';
import type { MemoryConfig } from './memory/types.js';
import type { LogLevel } from './utils/logger.js';

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export interface AppConfig {
  llm: {
    apiKey: string;
    baseURL: string | undefined;
    model: string;
    temperature: number;
  };
  memory: MemoryConfig;
  server: {
    port: number;
    host: string;
  };
  logging: {
    level: LogLevel;
    file: string | undefined;
  };
}

/** Unset and blank variables both mean "use the default". */
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(fallback));

const envSchema = z.object({
  LLM_API_KEY: z.preprocess(blankToUndefined, z.string({ required_error: 'LLM_API_KEY is required' })),
  LLM_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  LLM_MODEL: z.preprocess(blankToUndefined, z.string().default('gemini-2.5-flash')),
  LLM_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0.5)),
  MEMORY_MAX_PAIRS: positiveInt(3),
  MEMORY_EVICTION_BATCH_SIZE: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).optional()
  ),
  MEMORY_SUMMARIZER_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(MAX_TIMER_DELAY_MS).default(30_000)
  ),
  MEMORY_MAX_SUMMARY_LENGTH: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).optional()
  ),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65_535).default(8000)),
  HOST: z.preprocess(blankToUndefined, z.string().default('0.0.0.0')),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
  LOG_FILE: optionalString,
});

/**
 * Validate the environment and build the process configuration.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = result.data;
  return {
    llm: {
      apiKey: vars.LLM_API_KEY,
      baseURL: vars.LLM_BASE_URL,
      model: vars.LLM_MODEL,
      temperature: vars.LLM_TEMPERATURE,
    },
    memory: {
      maxPairs: vars.MEMORY_MAX_PAIRS,
      evictionBatchSize: vars.MEMORY_EVICTION_BATCH_SIZE,
      summarizerTimeoutMs: vars.MEMORY_SUMMARIZER_TIMEOUT_MS,
      maxSummaryLength: vars.MEMORY_MAX_SUMMARY_LENGTH,
    },
    server: {
      port: vars.PORT,
      host: vars.HOST,
    },
    logging: {
      level: vars.LOG_LEVEL,
      file: vars.LOG_FILE,
    },
  };
}

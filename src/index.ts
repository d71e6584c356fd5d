/**
 * hybrid-memory: bounded conversation memory with a rolling LLM summary.
 */

// Memory engine
export { HybridMemory, snapshotToContext, validateMemoryOptions } from './memory/engine.js';
export type { HybridMemoryOptions } from './memory/engine.js';
export { SessionMemoryRegistry } from './memory/sessions.js';
export {
  MemoryConfigurationError,
  normalizeMemoryConfig,
  DEFAULT_MAX_PAIRS,
  DEFAULT_EVICTION_BATCH_SIZE,
  DEFAULT_SUMMARY_SEPARATOR,
  DEFAULT_FALLBACK_PREVIEW_LENGTH,
  DEFAULT_SUMMARIZER_TIMEOUT_MS,
  MAX_TIMER_DELAY_MS,
} from './memory/config.js';
export { SummarizerError } from './memory/errors.js';
export type { SummarizerFailureKind } from './memory/errors.js';
export {
  buildFallbackFragment,
  formatTurns,
  truncateCodePoints,
  FALLBACK_PREFIX,
  FALLBACK_SUFFIX,
} from './memory/fallback.js';
export { AsyncLock } from './memory/lock.js';
export type {
  Turn,
  ContextEntry,
  Summarizer,
  SummarizeOptions,
  MemoryConfig,
  NormalizedMemoryConfig,
  MemorySnapshot,
  MemoryStats,
} from './memory/types.js';

// LLM summarizer
export {
  createLLMSummarizer,
  buildSummaryPrompt,
  toSummarizerError,
  SUMMARY_PROMPT,
  CONDENSE_PROMPT,
  SUMMARY_FRAGMENT_PREFIX,
} from './llm/summarizer.js';
export type { LLMSummarizerOptions } from './llm/summarizer.js';

// Chat
export {
  ChatService,
  contextToMessages,
  describeMemory,
  DEFAULT_SYSTEM_PROMPT,
  SUMMARY_CONTEXT_PREFIX,
} from './chat/chat-service.js';
export type { ChatResult, ChatServiceConfig, MemoryDetails } from './chat/chat-service.js';
export { createModelResponder } from './chat/responder.js';
export type { Responder, RespondRequest, ModelResponderOptions } from './chat/responder.js';
export { ChatServer } from './server/chat-server.js';
export type { ChatServerConfig } from './server/chat-server.js';

// Configuration and logging
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger, configureLogging, resetLogging } from './utils/logger.js';
export type { Logger, LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { withTimeout, TimeoutError } from './utils/timeout.js';

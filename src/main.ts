/**
 * Chat server with hybrid memory.
 *
 * Run with:
 *   npx tsx src/main.ts
 *
 * Environment variables (see .env.example):
 *   LLM_API_KEY - API key for the OpenAI-compatible endpoint (required)
 *   LLM_BASE_URL - Endpoint base URL (default: OpenAI)
 *   LLM_MODEL - Model used for replies and summaries (default: gemini-2.5-flash)
 *   MEMORY_MAX_PAIRS / MEMORY_EVICTION_BATCH_SIZE - Buffer capacity and eviction block
 */

import 'dotenv/config';
import { createOpenAI } from '@ai-sdk/openai';
import { ChatService } from './chat/chat-service.js';
import { createModelResponder } from './chat/responder.js';
import { loadConfig } from './config.js';
import { createLLMSummarizer } from './llm/summarizer.js';
import { HybridMemory } from './memory/engine.js';
import { ChatServer } from './server/chat-server.js';
import { configureLogging, createLogger } from './utils/logger.js';

const logger = createLogger({ name: 'main' });

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.logging.level, file: config.logging.file });

  const provider = createOpenAI({
    apiKey: config.llm.apiKey,
    ...(config.llm.baseURL ? { baseURL: config.llm.baseURL } : {}),
  });
  const model = provider.chat(config.llm.model);

  // One memory for the whole process, shared by every request.
  const memory = new HybridMemory({
    ...config.memory,
    summarizer: createLLMSummarizer({ model }),
  });

  const chatService = new ChatService({
    memory,
    responder: createModelResponder({ model, temperature: config.llm.temperature }),
  });

  const server = new ChatServer({
    chatService,
    memory,
    port: config.server.port,
    host: config.server.host,
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    void server.stop().then(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
  logger.info('Hybrid memory chat server ready', {
    model: config.llm.model,
    maxPairs: memory.config.maxPairs,
    evictionBatchSize: memory.config.evictionBatchSize,
  });
}

main().catch((err: unknown) => {
  logger.error('Fatal startup error', { error: String(err) });
  process.exit(1);
});

/**
 * Fastify server exposing the chat endpoint and memory inspection routes.
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { ChatService } from '../chat/chat-service.js';
import { NO_SUMMARY } from '../chat/chat-service.js';
import type { HybridMemory } from '../memory/engine.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ name: 'chat-server' });

export const MEMORY_APPROACH = 'Rolling summary plus recent turns, evicted by turn count';

const chatRequestSchema = z.object({
  query: z.string(),
});

/**
 * Configuration for ChatServer.
 */
export interface ChatServerConfig {
  chatService: ChatService;
  memory: HybridMemory;
  /** Port to listen on (default: 8000) */
  port?: number | undefined;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string | undefined;
}

export class ChatServer {
  readonly app: FastifyInstance;
  private readonly chatService: ChatService;
  private readonly memory: HybridMemory;
  private readonly port: number;
  private readonly host: string;

  constructor(config: ChatServerConfig) {
    this.chatService = config.chatService;
    this.memory = config.memory;
    this.port = config.port ?? 8000;
    this.host = config.host ?? '0.0.0.0';

    this.app = Fastify({
      logger: false, // We use our own logger
    });

    this.setupRoutes();
  }

  private setupRoutes(): void {
    // POST /chat - Answer a query with memory, record the turn
    this.app.post('/chat', async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = chatRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Invalid request body',
          issues: parsed.error.issues.map((issue) => issue.message),
        });
      }

      try {
        const result = await this.chatService.chat(parsed.data.query);
        return await reply.status(200).send({
          response: result.response,
          memory_details: {
            summary: result.memoryDetails.summary,
            recent_message_pairs: result.memoryDetails.recentMessagePairs,
            recent_messages: result.memoryDetails.recentMessages,
            has_summary: result.memoryDetails.hasSummary,
            max_message_pairs: result.memoryDetails.maxMessagePairs,
          },
          context: result.context,
        });
      } catch (error) {
        logger.error('Error handling /chat', { error: String(error) });
        return reply.status(500).send({ error: `Error: ${String(error)}` });
      }
    });

    // GET /memory/stats - Summary and buffer occupancy
    this.app.get('/memory/stats', async (_request: FastifyRequest, reply: FastifyReply) => {
      const snapshot = await this.memory.snapshot();
      const pairs = snapshot.turns.length;
      const structure = `${snapshot.summary ? 'Summary + ' : ''}${String(pairs)} recent message pairs`;
      return reply.status(200).send({
        current_summary: snapshot.summary || NO_SUMMARY,
        recent_messages_count: pairs * 2,
        memory_structure: structure,
      });
    });

    // GET /memory/raw - Full state for debugging
    this.app.get('/memory/raw', async (_request: FastifyRequest, reply: FastifyReply) => {
      const snapshot = await this.memory.snapshot();
      return reply.status(200).send({
        summary: snapshot.summary,
        recent_messages: snapshot.turns.map((turn) => ({
          sequence: turn.sequence,
          user: turn.userText,
          assistant: turn.assistantText,
        })),
        max_message_pairs: snapshot.config.maxPairs,
        eviction_batch_size: snapshot.config.evictionBatchSize,
        stats: {
          evictions: snapshot.stats.evictions,
          summarizer_failures: snapshot.stats.summarizerFailures,
          condensations: snapshot.stats.condensations,
        },
        memory_approach: MEMORY_APPROACH,
      });
    });

    // POST /memory/clear - Reset buffer and summary
    this.app.post('/memory/clear', async (_request: FastifyRequest, reply: FastifyReply) => {
      await this.memory.clear();
      logger.info('Memory cleared');
      return reply.status(200).send({ message: 'Memory cleared successfully' });
    });

    // GET /health - Health check endpoint
    this.app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ status: 'healthy' });
    });
  }

  /**
   * Start the server.
   */
  async start(): Promise<void> {
    try {
      await this.app.listen({ port: this.port, host: this.host });
      logger.info(`Chat server listening on ${this.host}:${String(this.port)}`);
    } catch (error) {
      logger.error('Failed to start chat server', { error: String(error) });
      throw error;
    }
  }

  /**
   * Stop the server gracefully.
   */
  async stop(): Promise<void> {
    try {
      await this.app.close();
      logger.info('Chat server stopped');
    } catch (error) {
      logger.error('Error stopping chat server', { error: String(error) });
    }
  }
}

/**
 * Chat turn handling on top of the hybrid memory.
 *
 * Builds the prompt from the memory context, asks the responder for a reply
 * and records the exchange.
 */

import type { ModelMessage } from 'ai';
import { snapshotToContext } from '../memory/engine.js';
import type { HybridMemory } from '../memory/engine.js';
import { truncateCodePoints } from '../memory/fallback.js';
import type { ContextEntry, MemorySnapshot } from '../memory/types.js';
import { createLogger } from '../utils/logger.js';
import type { Responder } from './responder.js';

const logger = createLogger({ name: 'chat' });

export const DEFAULT_SYSTEM_PROMPT = `You are a friendly educational assistant that remembers conversation history.
You can recall details about the user from both recent messages and summarized older conversations.
Always try to reference previous context when relevant.`;

export const SUMMARY_CONTEXT_PREFIX = 'Context from previous conversation: ';
export const NO_SUMMARY = 'No summary yet';
export const PREVIEW_LENGTH = 100;

export interface MemoryDetails {
  summary: string;
  recentMessagePairs: number;
  recentMessages: { user: string; assistant: string }[];
  hasSummary: boolean;
  maxMessagePairs: number;
}

export interface ChatResult {
  response: string;
  memoryDetails: MemoryDetails;
  context: ContextEntry[];
}

export interface ChatServiceConfig {
  memory: HybridMemory;
  responder: Responder;
  /** System prompt (default: DEFAULT_SYSTEM_PROMPT) */
  systemPrompt?: string | undefined;
}

/**
 * Map memory context entries onto model messages.
 */
export function contextToMessages(entries: readonly ContextEntry[]): ModelMessage[] {
  return entries.map((entry): ModelMessage => {
    switch (entry.kind) {
      case 'summary':
        return { role: 'assistant', content: `${SUMMARY_CONTEXT_PREFIX}${entry.text}` };
      case 'user':
        return { role: 'user', content: entry.text };
      case 'assistant':
        return { role: 'assistant', content: entry.text };
    }
  });
}

function preview(text: string): string {
  const truncated = truncateCodePoints(text, PREVIEW_LENGTH);
  return truncated.length < text.length ? `${truncated}...` : text;
}

/**
 * Summarize a memory snapshot for API responses.
 */
export function describeMemory(snapshot: MemorySnapshot): MemoryDetails {
  return {
    summary: snapshot.summary || NO_SUMMARY,
    recentMessagePairs: snapshot.turns.length,
    recentMessages: snapshot.turns.map((turn) => ({
      user: preview(turn.userText),
      assistant: preview(turn.assistantText),
    })),
    hasSummary: snapshot.summary.length > 0,
    maxMessagePairs: snapshot.config.maxPairs,
  };
}

export class ChatService {
  private readonly memory: HybridMemory;
  private readonly responder: Responder;
  private readonly systemPrompt: string;

  constructor(config: ChatServiceConfig) {
    this.memory = config.memory;
    this.responder = config.responder;
    this.systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  }

  /**
   * Answer `query` with the remembered context, then record the turn.
   * Responder failures propagate and leave the memory untouched.
   */
  async chat(query: string): Promise<ChatResult> {
    const history = await this.memory.getContext();
    const messages: ModelMessage[] = [
      ...contextToMessages(history),
      { role: 'user', content: query },
    ];

    const response = await this.responder.respond({ system: this.systemPrompt, messages });
    const turn = await this.memory.recordTurn(query, response);
    logger.debug('Recorded chat turn', { sequence: turn.sequence });

    const snapshot = await this.memory.snapshot();
    return {
      response,
      memoryDetails: describeMemory(snapshot),
      context: snapshotToContext(snapshot),
    };
  }
}

/**
 * Per-session memory engines.
 *
 * Each session gets its own HybridMemory, and therefore its own lock, so a
 * slow summarizer call in one conversation does not hold up another.
 */

import { createLogger } from '../utils/logger.js';
import { HybridMemory, validateMemoryOptions, type HybridMemoryOptions } from './engine.js';

const logger = createLogger({ name: 'session-memory' });

export class SessionMemoryRegistry {
  private readonly sessions = new Map<string, HybridMemory>();

  /**
   * @throws MemoryConfigurationError when the shared configuration is invalid
   */
  constructor(private readonly options: HybridMemoryOptions) {
    validateMemoryOptions(options);
  }

  /**
   * Get the engine for a session, creating it on first use.
   */
  get(sessionId: string): HybridMemory {
    let memory = this.sessions.get(sessionId);
    if (!memory) {
      memory = new HybridMemory(this.options);
      this.sessions.set(sessionId, memory);
      logger.debug('Created session memory', { sessionId, sessions: this.sessions.size });
    }
    return memory;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Drop a session and its state.
   */
  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  getIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  get size(): number {
    return this.sessions.size;
  }
}

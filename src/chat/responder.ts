/**
 * Reply generation for the chat service.
 */

import { generateText } from 'ai';
import type { LanguageModel, ModelMessage } from 'ai';

export interface RespondRequest {
  system: string;
  messages: ModelMessage[];
}

/**
 * Produces the assistant reply for a prepared conversation.
 */
export interface Responder {
  respond(request: RespondRequest): Promise<string>;
}

export interface ModelResponderOptions {
  model: LanguageModel;
  /** Sampling temperature (default: 0.5) */
  temperature?: number | undefined;
}

export const DEFAULT_CHAT_TEMPERATURE = 0.5;

/**
 * Responder that calls `generateText` on a LanguageModel.
 */
export function createModelResponder(options: ModelResponderOptions): Responder {
  const temperature = options.temperature ?? DEFAULT_CHAT_TEMPERATURE;

  return {
    async respond({ system, messages }) {
      const result = await generateText({
        model: options.model,
        system,
        messages,
        temperature,
      });
      return result.text;
    },
  };
}

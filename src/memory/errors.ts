/**
 * Summarizer failure taxonomy.
 */

export type SummarizerFailureKind = 'timeout' | 'transport' | 'provider';

/**
 * Error raised by a summarizer. The engine never lets it reach its callers.
 */
export class SummarizerError extends Error {
  constructor(
    public readonly kind: SummarizerFailureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SummarizerError';
  }
}

/**
 * Deadline for async work that accepts an AbortSignal.
 */

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${String(timeoutMs)}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `task` with a deadline. On expiry the signal handed to `task` is
 * aborted and the returned promise rejects with TimeoutError, whether or not
 * the task honours the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      // Settle the deadline before aborting so it wins the race.
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

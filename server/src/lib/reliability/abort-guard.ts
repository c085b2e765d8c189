/**
 * Abort Guard
 * Request-scoped cancellation helpers shared by the pipeline stages
 */

export class RequestAbortedError extends Error {
  constructor(public operation: string) {
    super(`${operation} aborted: request was cancelled`);
    this.name = 'RequestAbortedError';
  }
}

export function isRequestAborted(error: unknown): error is RequestAbortedError {
  return error instanceof RequestAbortedError;
}

/**
 * Throw RequestAbortedError if the signal has already fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new RequestAbortedError(operation);
  }
}

/**
 * Sleep utility for backoff/retry logic
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

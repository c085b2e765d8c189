/**
 * Retry Handler
 * Retry-once policy for external calls (LLM and places lookups)
 */

import { logger } from '../lib/logger/structured-logger.js';
import { RequestAbortedError, isRequestAborted, sleep, throwIfAborted } from '../lib/reliability/abort-guard.js';

/**
 * Error categorization result
 */
export interface ErrorCategory {
  type: 'aborted' | 'timeout' | 'transport_error' | 'parse_error' | 'unknown';
  isRetriable: boolean;
  reason: string;
  statusCode?: number | undefined;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxAttempts: number;
  backoffMs: number[];
}

export interface RetryOptions {
  requestId?: string | undefined;
  stage?: string | undefined;
  signal?: AbortSignal | undefined;
  onError?: ((attempt: number, error: unknown, category: ErrorCategory) => void) | undefined;
}

function readProp(e: unknown, key: string): unknown {
  if (typeof e !== 'object' || e === null) return undefined;
  const value: unknown = Reflect.get(e, key);
  return value;
}

function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/**
 * RetryHandler
 * Every failure is retried until attempts run out, except a cancelled request
 */
export class RetryHandler {
  constructor(private readonly config: RetryConfig) {}

  async executeWithRetry<T>(
    fn: (attempt: number) => Promise<T>,
    opts?: RetryOptions
  ): Promise<T> {
    const { maxAttempts, backoffMs } = this.config;
    let lastErr: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const backoff = backoffMs[attempt] ?? 0;
      if (attempt > 0 && backoff > 0) {
        await sleep(backoff);
      }
      throwIfAborted(opts?.signal, opts?.stage ?? 'external call');

      try {
        return await fn(attempt);
      } catch (e: unknown) {
        lastErr = e;
        const category = this.categorizeError(e, opts?.signal);

        opts?.onError?.(attempt, e, category);

        if (!category.isRetriable) {
          if (category.type === 'aborted' && !isRequestAborted(e)) {
            throw new RequestAbortedError(opts?.stage ?? 'external call');
          }
          throw e;
        }

        if (attempt === maxAttempts - 1) {
          logger.warn({
            requestId: opts?.requestId,
            stage: opts?.stage,
            attempts: attempt + 1,
            errorType: category.type,
            reason: category.reason
          }, '[RETRY] All attempts exhausted');
          throw e;
        }

        logger.warn({
          requestId: opts?.requestId,
          stage: opts?.stage,
          attempt: attempt + 1,
          maxAttempts,
          errorType: category.type,
          status: category.statusCode,
          reason: category.reason
        }, '[RETRY] Retriable failure, retrying');
      }
    }

    throw lastErr ?? new Error('External call failed after all attempts');
  }

  /**
   * Categorize error for retry decision
   */
  categorizeError(e: unknown, signal?: AbortSignal): ErrorCategory {
    if (signal?.aborted || isRequestAborted(e)) {
      return { type: 'aborted', isRetriable: false, reason: 'Request cancelled by caller' };
    }

    const name = readProp(e, 'name');
    const message = errorMessage(e);
    const status = readProp(e, 'status') ?? readProp(e, 'statusCode');

    const isTimeout = name === 'AbortError' ||
      name === 'TimeoutError' ||
      readProp(e, 'errorKind') === 'TIMEOUT' ||
      /timed out|timeout|aborted/i.test(message);

    if (isTimeout) {
      return { type: 'timeout', isRetriable: true, reason: message || 'Request timed out' };
    }

    if (typeof status === 'number') {
      return {
        type: 'transport_error',
        isRetriable: true,
        reason: `HTTP ${status}`,
        statusCode: status
      };
    }

    const isParseError = name === 'ZodError' ||
      name === 'SyntaxError' ||
      message.includes('JSON');

    if (isParseError) {
      return { type: 'parse_error', isRetriable: true, reason: message || 'Parse failed' };
    }

    return { type: 'unknown', isRetriable: true, reason: message || 'unknown' };
  }
}

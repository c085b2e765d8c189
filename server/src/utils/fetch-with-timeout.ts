/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so upstream calls cannot hang.
 * A request-scoped signal, when given, cancels the fetch as well.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'HTTP_ERROR' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  requestId?: string | undefined;
  stage?: string | undefined;
  provider?: string | undefined;
  /** Optional request-scoped abort signal; when aborted, the fetch is cancelled. */
  signal?: AbortSignal | undefined;
}

export class UpstreamFetchError extends Error {
  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly provider: string,
    public readonly host: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'UpstreamFetchError';
  }
}

/**
 * Fetch with automatic timeout using AbortController
 *
 * @throws UpstreamFetchError with errorKind TIMEOUT, ABORT or NETWORK_ERROR
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<Response> {
  const controller = new AbortController();
  const startTime = Date.now();
  // Parse URL for safe logging (no query params or API keys)
  const { host, pathname } = new URL(url);
  const provider = config.provider || 'upstream';

  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const external = config.signal;
  const onExternalAbort = () => controller.abort();
  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  try {
    logger.debug({
      requestId: config.requestId,
      stage: config.stage,
      provider,
      method: options.method || 'GET',
      host,
      path: pathname,
      timeoutMs: config.timeoutMs
    }, '[FETCH] Outbound request');

    const response = await fetch(url, { ...options, signal: controller.signal });

    logger.debug({
      requestId: config.requestId,
      provider,
      status: response.status,
      durationMs: Date.now() - startTime
    }, '[FETCH] Response received');

    return response;
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const errorKind: FetchErrorKind = timedOut
      ? 'TIMEOUT'
      : external?.aborted ? 'ABORT' : 'NETWORK_ERROR';

    logger.warn({
      requestId: config.requestId,
      stage: config.stage,
      provider,
      host,
      errorKind,
      durationMs,
      error: err instanceof Error ? err.message : String(err)
    }, '[FETCH] Request failed');

    throw new UpstreamFetchError(
      `${provider} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms`,
      errorKind,
      provider,
      host
    );
  } finally {
    clearTimeout(timeoutId);
    external?.removeEventListener('abort', onExternalAbort);
  }
}

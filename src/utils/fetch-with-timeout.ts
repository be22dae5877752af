/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so an upstream call can never hang.
 * The timer is cleared in the finally block, after the body reader has finished.
 */

import { createComponentLogger } from '../lib/logger/structured-logger.js';

const log = createComponentLogger('UpstreamFetch');

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  stage?: string;
  provider?: string;
  /** Optional caller-scoped abort signal; when aborted, the fetch is cancelled. */
  signal?: AbortSignal;
}

export class UpstreamFetchError extends Error {
  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly provider: string,
    public readonly host: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'UpstreamFetchError';
  }
}

/**
 * Fetch with automatic timeout using AbortController
 *
 * The deadline only covers the response head; the caller owns the body.
 * Use {@link fetchAndRead} when the body must be read under the same deadline.
 *
 * @throws UpstreamFetchError when the request times out, is aborted or fails at the network level
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<Response> {
  return fetchAndRead(url, options, config, async (response) => response);
}

/**
 * Fetch and consume the response while the timeout is still armed.
 * A body that stalls past the deadline is aborted and reported as TIMEOUT.
 *
 * @throws UpstreamFetchError when the request or the body read times out, is aborted or fails
 */
export async function fetchAndRead<T>(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const startTime = Date.now();
  // Log host and path only, the query carries customer address data
  const urlObj = new URL(url);
  const host = urlObj.host;
  const provider = config.provider ?? 'unknown';
  let timedOut = false;

  log.debug(
    {
      event: 'upstream_fetch_start',
      provider,
      method: options.method ?? 'GET',
      host,
      path: urlObj.pathname,
      timeoutMs: config.timeoutMs,
      stage: config.stage ?? 'unknown',
    },
    '[FETCH] Outbound request'
  );

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const signal = config.signal;
  const abortListener = (): void => controller.abort();
  if (signal) {
    if (signal.aborted) {
      controller.abort();
    } else {
      signal.addEventListener('abort', abortListener);
    }
  }

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
    const result = await read(response);

    log.debug(
      {
        event: 'upstream_fetch_done',
        provider,
        host,
        path: urlObj.pathname,
        status: response.status,
        durationMs: Date.now() - startTime,
      },
      '[FETCH] Response received'
    );

    return result;
  } catch (err) {
    const durationMs = Date.now() - startTime;
    let errorKind: FetchErrorKind;
    if (timedOut) {
      errorKind = 'TIMEOUT';
    } else if (controller.signal.aborted) {
      errorKind = 'ABORT';
    } else {
      errorKind = 'NETWORK_ERROR';
    }

    const message = err instanceof Error ? err.message : String(err);
    log.error(
      { event: 'upstream_fetch_failed', provider, host, errorKind, durationMs, error: message },
      `[FETCH] ${errorKind} ${host}`
    );

    throw new UpstreamFetchError(
      `${provider} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms (${host}): ${message}`,
      errorKind,
      provider,
      host,
      config.timeoutMs
    );
  } finally {
    clearTimeout(timeoutId);
    if (signal) {
      signal.removeEventListener('abort', abortListener);
    }
  }
}

/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so upstream calls cannot hang.
 * The timer and the external abort listener stay armed until the body has been
 * read, so a stalled body times out and an abort closes the connection.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'DNS_FAIL' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  stage?: string;
  provider?: string;
  /** Request-scoped abort signal; when aborted, the fetch is cancelled. */
  signal?: AbortSignal;
}

/** Status line and fully read body of an upstream reply. */
export interface UpstreamReply {
  status: number;
  statusText: string;
  ok: boolean;
  body: Uint8Array;
}

export class UpstreamFetchError extends Error {
  constructor(message: string, public readonly errorKind: FetchErrorKind) {
    super(message);
    this.name = 'UpstreamFetchError';
  }
}

/**
 * Host and path for logs; API keys embedded in the path (Forvo) are masked.
 */
export function describeUrlForLog(url: string): { host: string; path: string } {
  try {
    const parsed = new URL(url);
    return {
      host: parsed.host,
      path: parsed.pathname.replace(/\/key\/[^/]+/, '/key/[REDACTED]'),
    };
  } catch {
    return { host: 'invalid-url', path: '' };
  }
}

function classifyError(err: unknown, timedOut: boolean, externallyAborted: boolean): FetchErrorKind {
  if (timedOut) {
    return 'TIMEOUT';
  }
  if (externallyAborted) {
    return 'ABORT';
  }
  const message = err instanceof Error ? err.message : String(err);
  const cause = err instanceof Error && err.cause instanceof Error ? err.cause.message : '';
  if (/ENOTFOUND|getaddrinfo|EAI_AGAIN/.test(`${message} ${cause}`)) {
    return 'DNS_FAIL';
  }
  return 'NETWORK_ERROR';
}

/**
 * Fetch and read the whole body with automatic timeout using AbortController
 *
 * @throws UpstreamFetchError when the request times out, is aborted or fails at the network level
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<UpstreamReply> {
  const controller = new AbortController();
  const startTime = Date.now();
  const { host, path } = describeUrlForLog(url);
  const provider = config.provider || 'upstream';
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const abortListener = (): void => controller.abort();
  if (config.signal) {
    if (config.signal.aborted) {
      controller.abort();
    } else {
      config.signal.addEventListener('abort', abortListener);
    }
  }

  logger.debug({
    event: 'upstream_fetch_started',
    method: options.method || 'GET',
    host,
    path,
    timeoutMs: config.timeoutMs,
    stage: config.stage,
    provider,
  }, '[FETCH] Outbound request');

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
    const body = new Uint8Array(await response.arrayBuffer());

    logger.debug({
      event: 'upstream_fetch_completed',
      host,
      path,
      status: response.status,
      bytes: body.byteLength,
      durationMs: Date.now() - startTime,
      provider,
    }, '[FETCH] Response received');

    return { status: response.status, statusText: response.statusText, ok: response.ok, body };
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const errorKind = classifyError(err, timedOut, config.signal?.aborted === true);

    if (errorKind !== 'ABORT') {
      logger.warn({
        event: 'upstream_fetch_failed',
        errorKind,
        host,
        durationMs,
        provider,
        error: err instanceof Error ? err.message : String(err),
      }, '[FETCH] Upstream request failed');
    }

    throw new UpstreamFetchError(
      `${provider} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms (${host})`,
      errorKind
    );
  } finally {
    clearTimeout(timeoutId);
    config.signal?.removeEventListener('abort', abortListener);
  }
}

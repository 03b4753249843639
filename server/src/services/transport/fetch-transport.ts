/**
 * Fetch Transport
 * Default Transport on Node's global fetch (via fetchWithTimeout).
 * Aborted queries never deliver a completion.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { fetchWithTimeout, UpstreamFetchError } from '../../utils/fetch-with-timeout.js';
import type { CompletionHandler, QueryId, Transport, TransportOutcome } from './transport.types.js';

export interface FetchTransportOptions {
  timeoutMs: number;
  userAgent?: string;
}

export class FetchTransport implements Transport {
  private nextId: QueryId = 1;
  private readonly inFlight = new Map<QueryId, AbortController>();

  constructor(private readonly options: FetchTransportOptions) {}

  submit(url: string, onComplete: CompletionHandler): QueryId {
    const queryId = this.nextId++;
    const controller = new AbortController();
    this.inFlight.set(queryId, controller);

    void this.perform(queryId, url, controller.signal).then((outcome) => {
      // Deleted by abort(): the caller has already moved on
      if (!this.inFlight.delete(queryId)) {
        return;
      }
      onComplete({ queryId, outcome });
    }).catch((err: unknown) => {
      logger.error({
        event: 'transport_completion_handler_failed',
        queryId,
        error: err instanceof Error ? err.message : String(err),
      }, '[Transport] Completion handler threw');
    });

    return queryId;
  }

  abort(queryId: QueryId): void {
    const controller = this.inFlight.get(queryId);
    if (!controller) {
      return;
    }
    this.inFlight.delete(queryId);
    controller.abort();
    logger.debug({ event: 'transport_query_aborted', queryId }, '[Transport] Query aborted');
  }

  /** Number of queries still waiting for a response. */
  getInFlightCount(): number {
    return this.inFlight.size;
  }

  private async perform(queryId: QueryId, url: string, signal: AbortSignal): Promise<TransportOutcome> {
    try {
      const reply = await fetchWithTimeout(url, {
        method: 'GET',
        headers: this.options.userAgent ? { 'User-Agent': this.options.userAgent } : undefined,
      }, {
        timeoutMs: this.options.timeoutMs,
        stage: 'article_fetch',
        provider: 'dictionary_service',
        signal,
      });

      if (!reply.ok) {
        return {
          kind: 'failure',
          reason: `Upstream replied ${reply.status}${reply.statusText ? ` ${reply.statusText}` : ''}`,
        };
      }

      return { kind: 'success', status: reply.status, body: reply.body };
    } catch (err) {
      if (err instanceof UpstreamFetchError) {
        logger.debug({ event: 'transport_query_failed', queryId, errorKind: err.errorKind }, '[Transport] Query failed');
      }
      return { kind: 'failure', reason: err instanceof Error ? err.message : String(err) };
    }
  }
}

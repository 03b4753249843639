/**
 * Debounced prefix search
 *
 * The query goes out immediately, but the request does not tear down before it has
 * lived `maturityMs`: a cancel that arrives earlier is parked until then.
 */

import { EventEmitter } from 'node:events';
import { logger as rootLogger, type Logger } from '../../lib/logger/structured-logger.js';
import type { QueryId, Transport, TransportCompletion } from '../transport/transport.types.js';
import type { MatchExtractor, SearchRequest } from './search-request.types.js';

export const DEFAULT_SEARCH_MATURITY_MS = 200;

export interface DebouncedSearchRequestOptions {
  sourceId: string;
  transport: Transport;
  url: string;
  extractMatches: MatchExtractor;
  maturityMs?: number;
  maxWordLength?: number;
  log?: Logger;
}

export class DebouncedSearchRequest implements SearchRequest {
  private readonly events = new EventEmitter();
  private readonly log: Logger;
  private readonly queryId: QueryId | undefined;
  private maturityTimer: ReturnType<typeof setTimeout> | undefined;
  private found: string[] = [];
  private error = '';
  private matured = false;
  private cancelling = false;
  private finished = false;

  constructor(
    readonly word: string,
    private readonly options: DebouncedSearchRequestOptions
  ) {
    this.log = (options.log ?? rootLogger).child({ sourceId: options.sourceId });

    if (options.maxWordLength !== undefined && Array.from(word).length > options.maxWordLength) {
      this.log.debug({ event: 'search_word_oversized', maxWordLength: options.maxWordLength }, '[Search] Word too long, not querying');
      this.finish();
      return;
    }

    this.queryId = options.transport.submit(options.url, (completion) => this.handleCompletion(completion));
    this.maturityTimer = setTimeout(() => this.onMatured(), options.maturityMs ?? DEFAULT_SEARCH_MATURITY_MS);
  }

  matches(): string[] {
    return [...this.found];
  }

  isFinished(): boolean {
    return this.finished;
  }

  isMatured(): boolean {
    return this.matured;
  }

  errorMessage(): string {
    return this.error;
  }

  onFinished(listener: () => void): this {
    this.events.once('finished', listener);
    return this;
  }

  whenFinished(): Promise<void> {
    if (this.finished) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.events.once('finished', () => resolve());
    });
  }

  /** Tears down now once matured; before that only records the intent. */
  cancel(): void {
    if (this.finished) {
      return;
    }
    this.cancelling = true;

    if (this.matured) {
      this.abortQuery();
      this.finish();
    } else {
      this.log.debug({ event: 'search_cancel_deferred', word: this.word }, '[Search] Cancel deferred until maturity');
    }
  }

  private onMatured(): void {
    this.maturityTimer = undefined;
    this.matured = true;

    if (this.cancelling && !this.finished) {
      this.abortQuery();
      this.finish();
    }
  }

  private handleCompletion({ outcome }: TransportCompletion): void {
    if (this.cancelling || this.finished) {
      return;
    }

    if (outcome.kind === 'failure') {
      this.log.warn({ event: 'search_query_failed', word: this.word, reason: outcome.reason }, '[Search] Query failed');
      this.error = outcome.reason;
    } else {
      try {
        const extracted = this.options.extractMatches(outcome);
        this.found = [...extracted.matches];
        if (extracted.error) {
          this.error = extracted.error;
        }
      } catch (error) {
        this.error = error instanceof Error ? error.message : String(error);
        this.log.error({ event: 'search_decode_failed', word: this.word, error: this.error }, '[Search] Failed to decode reply');
      }
    }

    this.finish();
  }

  private abortQuery(): void {
    if (this.queryId !== undefined) {
      this.options.transport.abort(this.queryId);
    }
  }

  private finish(): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    if (this.maturityTimer !== undefined) {
      clearTimeout(this.maturityTimer);
      this.maturityTimer = undefined;
    }

    this.log.debug(
      { event: 'search_finished', word: this.word, matches: this.found.length, error: this.error || undefined },
      '[Search] Prefix search finished'
    );
    this.events.emit('finished');
  }
}

/**
 * Article Fetch Request
 *
 * One lookup against a remote definition service. Queries for the word and its
 * alternates run concurrently; bodies are released in submission order, rewritten,
 * judged by the redirect policies and appended to the response buffer.
 *
 * States: active -> finished (queue drained, cancel, or oversized word).
 */

import { EventEmitter } from 'node:events';
import { v4 as uuidv4 } from 'uuid';
import { logger as rootLogger, type Logger } from '../../lib/logger/structured-logger.js';
import type { Transport, TransportCompletion } from '../transport/transport.types.js';
import type { ArticleCodec } from './article-codec.types.js';
import { QueryQueue, type CompletedQuery } from './query-queue.js';
import { planQueryWord, runPolicyChain, type RedirectPolicy } from './redirect/redirect-policy.js';
import { ResponseBuffer } from './response-buffer.js';

export const DEFAULT_MAX_WORD_LENGTH = 80;
export const DEFAULT_MAX_REDIRECT_DEPTH = 3;

export type ArticleRequestEvent = 'update' | 'finished';

export type FinishReason = 'drained' | 'cancelled' | 'oversized';

export interface ArticleFetchRequestOptions {
  sourceId: string;
  transport: Transport;
  codec: ArticleCodec;
  policies?: readonly RedirectPolicy[];
  /** When false, only the primary word is requested. */
  queryAlternates?: boolean;
  maxWordLength?: number;
  maxRedirectDepth?: number;
  log?: Logger;
}

/** Length in code points, the way users count characters. */
export function wordLength(word: string): number {
  return Array.from(word).length;
}

export class ArticleFetchRequest {
  readonly lookupId = uuidv4();

  private readonly queue: QueryQueue;
  private readonly buffer = new ResponseBuffer();
  private readonly events = new EventEmitter();
  private readonly policies: readonly RedirectPolicy[];
  private readonly maxRedirectDepth: number;
  private readonly log: Logger;
  private finished = false;
  private finishReason: FinishReason | undefined;
  private readonly startedAt = Date.now();

  constructor(
    readonly word: string,
    alternates: readonly string[],
    private readonly options: ArticleFetchRequestOptions
  ) {
    this.policies = options.policies ?? [];
    this.maxRedirectDepth = options.maxRedirectDepth ?? DEFAULT_MAX_REDIRECT_DEPTH;
    this.log = (options.log ?? rootLogger).child({ sourceId: options.sourceId, lookupId: this.lookupId });
    this.queue = new QueryQueue({
      transport: options.transport,
      buildUrl: (queryWord) => options.codec.buildUrl(queryWord),
      onCompletion: (completion) => this.handleCompletion(completion),
    });

    const maxWordLength = options.maxWordLength ?? DEFAULT_MAX_WORD_LENGTH;
    if (wordLength(word) > maxWordLength) {
      this.log.debug(
        { event: 'article_word_oversized', length: wordLength(word), maxWordLength },
        '[Article] Word too long, not querying'
      );
      this.finish('oversized');
      return;
    }

    this.addQuery(word);
    if (options.queryAlternates ?? true) {
      for (const alternate of alternates) {
        this.addQuery(alternate);
      }
    }

    this.log.debug(
      { event: 'article_lookup_started', word, queries: this.queue.size() },
      '[Article] Lookup started'
    );
  }

  on(event: ArticleRequestEvent, listener: () => void): this {
    this.events.on(event, listener);
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

  isFinished(): boolean {
    return this.finished;
  }

  getFinishReason(): FinishReason | undefined {
    return this.finishReason;
  }

  hasAnyData(): boolean {
    return this.buffer.hasAnyData();
  }

  /** Last recorded error, or empty string. */
  errorMessage(): string {
    return this.buffer.getError() ?? '';
  }

  /** Finished with nothing to show and a reason why. */
  hasNoUsableOutput(): boolean {
    return this.finished && !this.buffer.hasAnyData() && this.errorMessage().length > 0;
  }

  snapshot(): Uint8Array {
    return this.buffer.snapshot();
  }

  text(): string {
    return this.buffer.text();
  }

  /** Words still queued, front first. */
  queuedWords(): string[] {
    return this.queue.words();
  }

  cancel(): void {
    if (this.finished) {
      return;
    }

    const pending = this.queue.pendingIds();
    for (const queryId of pending) {
      this.options.transport.abort(queryId);
    }
    this.queue.clear();

    this.log.debug({ event: 'article_lookup_cancelled', aborted: pending.length }, '[Article] Lookup cancelled');
    this.finish('cancelled');
  }

  private addQuery(requestedWord: string): void {
    const submittedWord = planQueryWord(this.policies, requestedWord);
    const queryId = this.queue.enqueue(submittedWord);
    for (const policy of this.policies) {
      policy.onQueryAdded?.(queryId, requestedWord, submittedWord);
    }
  }

  private handleCompletion({ queryId, outcome }: TransportCompletion): void {
    if (this.finished) {
      return;
    }
    if (!this.queue.markCompleted(queryId, outcome)) {
      this.log.debug({ event: 'article_completion_ignored', queryId }, '[Article] Completion for unknown query');
      return;
    }

    let appended = false;
    for (const query of this.queue.drainReady()) {
      if (this.processQuery(query)) {
        appended = true;
      }
    }

    if (this.queue.isEmpty()) {
      this.finish('drained');
    } else if (appended) {
      this.events.emit('update');
    }
  }

  /** @returns whether anything was appended */
  private processQuery(query: CompletedQuery): boolean {
    const body = this.decodeBody(query);
    const { verdict, decidedBy } = runPolicyChain(this.policies, { query, body });

    if (verdict.kind === 'redirect') {
      if (query.redirectDepth < this.maxRedirectDepth) {
        this.log.debug(
          { event: 'article_redirect', from: query.word, to: verdict.word, policy: decidedBy, depth: query.redirectDepth + 1 },
          '[Article] Redirecting query'
        );
        this.queue.prepend(verdict.word, query.redirectDepth + 1);
        return false;
      }
      this.log.warn(
        { event: 'article_redirect_limit', word: query.word, to: verdict.word, policy: decidedBy, maxRedirectDepth: this.maxRedirectDepth },
        '[Article] Redirect depth limit reached, keeping body'
      );
    }

    if (body === null || body.length === 0) {
      return false;
    }
    this.buffer.append(body);
    return true;
  }

  private decodeBody(query: CompletedQuery): string | null {
    const { outcome } = query;
    if (outcome.kind === 'failure') {
      this.log.warn({ event: 'article_query_failed', word: query.word, reason: outcome.reason }, '[Article] Query failed');
      this.buffer.setError(outcome.reason);
      return null;
    }

    try {
      const extracted = this.options.codec.extractBody(outcome);
      if (extracted.error) {
        this.log.warn({ event: 'article_reply_error', word: query.word, error: extracted.error }, '[Article] Reply carried an error');
        this.buffer.setError(extracted.error);
      }
      return extracted.body === null ? null : this.options.codec.rewrite(extracted.body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ event: 'article_decode_failed', word: query.word, error: message }, '[Article] Failed to decode reply');
      this.buffer.setError(message);
      return null;
    }
  }

  private finish(reason: FinishReason): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.finishReason = reason;

    this.log.debug(
      {
        event: 'article_lookup_finished',
        reason,
        bytes: this.buffer.size(),
        error: this.buffer.getError(),
        durationMs: Date.now() - this.startedAt,
      },
      '[Article] Lookup finished'
    );
    this.events.emit('finished');
  }
}

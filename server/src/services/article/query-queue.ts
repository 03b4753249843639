/**
 * Query Queue
 * In-flight queries of one lookup, released strictly in submission order.
 *
 * Completions are recorded in place; only a completed front prefix is ever drained,
 * which turns arbitrary network completion order back into the order the caller asked for.
 */

import type { QueryId, Transport, TransportCompletion, TransportOutcome } from '../transport/transport.types.js';

export type QueryState = 'pending' | 'completed';

export interface Query {
  readonly id: QueryId;
  readonly word: string;
  /** 0 for caller words, parent depth + 1 for queries injected by a redirect. */
  readonly redirectDepth: number;
  state: QueryState;
  outcome?: TransportOutcome;
}

export interface CompletedQuery extends Query {
  state: 'completed';
  outcome: TransportOutcome;
}

export interface QueryQueueOptions {
  transport: Transport;
  buildUrl: (word: string) => string;
  onCompletion: (completion: TransportCompletion) => void;
}

function isCompleted(query: Query): query is CompletedQuery {
  return query.state === 'completed' && query.outcome !== undefined;
}

export class QueryQueue {
  private entries: Query[] = [];

  constructor(private readonly options: QueryQueueOptions) {}

  enqueue(word: string, redirectDepth = 0): QueryId {
    const query = this.submit(word, redirectDepth);
    this.entries.push(query);
    return query.id;
  }

  /** Insert ahead of everything still queued. Reserved for redirect policies. */
  prepend(word: string, redirectDepth: number): QueryId {
    const query = this.submit(word, redirectDepth);
    this.entries.unshift(query);
    return query.id;
  }

  /**
   * Record a transport outcome. Unknown ids (drained or cleared) are ignored.
   * @returns whether a pending entry was updated
   */
  markCompleted(queryId: QueryId, outcome: TransportOutcome): boolean {
    const query = this.entries.find(entry => entry.id === queryId);
    if (!query || query.state === 'completed') {
      return false;
    }
    query.state = 'completed';
    query.outcome = outcome;
    return true;
  }

  /**
   * Pop completed entries from the front, one at a time.
   * Each entry is popped right before it is yielded, so a prepend made while the
   * consumer handles it lands ahead of the rest and ends the drain.
   */
  *drainReady(): Generator<CompletedQuery, void, undefined> {
    while (this.entries.length > 0) {
      const front = this.entries[0];
      if (!isCompleted(front)) {
        return;
      }
      this.entries.shift();
      yield front;
    }
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  size(): number {
    return this.entries.length;
  }

  pendingIds(): QueryId[] {
    return this.entries.filter(entry => entry.state === 'pending').map(entry => entry.id);
  }

  /** Words in queue order (diagnostics and tests). */
  words(): string[] {
    return this.entries.map(entry => entry.word);
  }

  clear(): void {
    this.entries = [];
  }

  private submit(word: string, redirectDepth: number): Query {
    const url = this.options.buildUrl(word);
    const id = this.options.transport.submit(url, this.options.onCompletion);
    return { id, word, redirectDepth, state: 'pending' };
  }
}

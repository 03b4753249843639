/**
 * Suffix-preferred retry
 *
 * A caller word is first requested as `word + suffix`; when that page yields no usable
 * body the plain word is requested instead.
 */

import type { QueryId } from '../../transport/transport.types.js';
import type { Query } from '../query-queue.js';
import { ACCEPT, type PolicyInput, type PolicyVerdict, type RedirectPolicy } from './redirect-policy.js';

export class SuffixPreferredPolicy implements RedirectPolicy {
  readonly name = 'suffix-preferred';

  /** Speculative query id → word the caller actually asked for. */
  private readonly replacements = new Map<QueryId, string>();

  constructor(private readonly suffix: string) {}

  planQuery(word: string): string {
    if (this.suffix.length === 0 || word.endsWith(this.suffix)) {
      return word;
    }
    return `${word}${this.suffix}`;
  }

  onQueryAdded(queryId: QueryId, requestedWord: string, submittedWord: string): void {
    if (requestedWord !== submittedWord) {
      this.replacements.set(queryId, requestedWord);
    }
  }

  evaluate({ query, body }: PolicyInput): PolicyVerdict {
    const originalWord = this.replacements.get(query.id);
    if (originalWord === undefined || body !== null) {
      return ACCEPT;
    }
    return { kind: 'redirect', word: originalWord };
  }

  settle(query: Query): void {
    this.replacements.delete(query.id);
  }

  /** Speculative queries not yet settled. */
  getTrackedCount(): number {
    return this.replacements.size;
  }
}

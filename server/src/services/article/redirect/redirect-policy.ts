/**
 * Redirect policies
 * Strategies that look at a rewritten body and either accept it or replace it
 * with a new, higher-priority query.
 */

import type { QueryId } from '../../transport/transport.types.js';
import type { Query } from '../query-queue.js';

export type PolicyVerdict =
  | { kind: 'accept' }
  | { kind: 'redirect'; word: string };

export interface PolicyInput {
  query: Query;
  /** Rewritten body, or null when the query produced no usable body. */
  body: string | null;
}

export interface RedirectPolicy {
  readonly name: string;

  /** Word to submit in place of a caller-requested word. */
  planQuery?(word: string): string;

  /** Called for every caller-requested query once it has been submitted. */
  onQueryAdded?(queryId: QueryId, requestedWord: string, submittedWord: string): void;

  evaluate(input: PolicyInput): PolicyVerdict;

  /** Called on every policy once a verdict for `query` is reached, whoever decided it. */
  settle?(query: Query): void;
}

export interface ChainDecision {
  verdict: PolicyVerdict;
  decidedBy?: string;
}

export const ACCEPT: PolicyVerdict = { kind: 'accept' };

/** First redirect wins; every policy is settled afterwards. */
export function runPolicyChain(policies: readonly RedirectPolicy[], input: PolicyInput): ChainDecision {
  let decision: ChainDecision = { verdict: ACCEPT };

  for (const policy of policies) {
    const verdict = policy.evaluate(input);
    if (verdict.kind === 'redirect') {
      decision = { verdict, decidedBy: policy.name };
      break;
    }
  }

  for (const policy of policies) {
    policy.settle?.(input.query);
  }

  return decision;
}

/** Apply every policy's planQuery in chain order. */
export function planQueryWord(policies: readonly RedirectPolicy[], word: string): string {
  return policies.reduce((current, policy) => (policy.planQuery ? policy.planQuery(current) : current), word);
}

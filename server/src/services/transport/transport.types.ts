/**
 * Transport contract
 * The engine only needs "submit URL → eventually bytes + status" and a best-effort abort.
 */

/** Opaque handle for one submitted request. */
export type QueryId = number;

export interface TransportSuccess {
  kind: 'success';
  status: number;
  body: Uint8Array;
}

export interface TransportFailure {
  kind: 'failure';
  reason: string;
}

export type TransportOutcome = TransportSuccess | TransportFailure;

export interface TransportCompletion {
  queryId: QueryId;
  outcome: TransportOutcome;
}

/**
 * Receives the completion of one submitted request.
 * Each submit call gets its own handler; there is no broadcast.
 */
export type CompletionHandler = (completion: TransportCompletion) => void;

export interface Transport {
  /**
   * Submit a GET for `url`. The handler is invoked at most once, always
   * asynchronously (never from inside submit).
   */
  submit(url: string, onComplete: CompletionHandler): QueryId;

  /** Best effort. The handler of an aborted query may never run. */
  abort(queryId: QueryId): void;
}

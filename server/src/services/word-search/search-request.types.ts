import type { TransportSuccess } from '../transport/transport.types.js';

export interface MatchExtraction {
  matches: string[];
  error?: string;
}

export type MatchExtractor = (reply: TransportSuccess) => MatchExtraction;

/** A prefix search: ordered candidate words for a partially typed word. */
export interface SearchRequest {
  readonly word: string;
  matches(): string[];
  isFinished(): boolean;
  /** Last recorded error, or empty string. */
  errorMessage(): string;
  cancel(): void;
  whenFinished(): Promise<void>;
}

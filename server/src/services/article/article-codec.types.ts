import type { TransportSuccess } from '../transport/transport.types.js';

export interface ArticleExtraction {
  /** Raw article body, or null when the reply holds no article. */
  body: string | null;
  error?: string;
}

/**
 * What a source contributes to an article lookup: how to ask for a word,
 * how to pull the body out of a reply and how to rewrite it.
 */
export interface ArticleCodec {
  buildUrl(word: string): string;
  extractBody(reply: TransportSuccess): ArticleExtraction;
  rewrite(body: string): string;
}

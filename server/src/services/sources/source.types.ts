import type { Logger } from '../../lib/logger/structured-logger.js';
import type { ArticleFetchRequest } from '../article/article-fetch-request.js';
import type { AudioLinkRegistry } from '../audio/audio-link-registry.js';
import type { Transport } from '../transport/transport.types.js';
import type { SearchRequest } from '../word-search/search-request.types.js';

export type SourceKind = 'mediawiki' | 'forvo';

export interface SourceSummary {
  id: string;
  name: string;
  kind: SourceKind;
  languageCode: string | null;
  icon: string | null;
}

/** A remote definition service words can be looked up in. */
export interface DictionarySource {
  readonly id: string;
  readonly name: string;
  readonly kind: SourceKind;
  readonly languageCode: string | undefined;
  readonly icon: string | undefined;

  fetchArticle(word: string, alternates?: readonly string[]): ArticleFetchRequest;
  searchPrefix(word: string): SearchRequest;
}

export interface SourceLimits {
  maxWordLength: number;
  maxRedirectDepth: number;
  searchMaturityMs: number;
}

/** Shared services every source is built with. */
export interface SourceDependencies {
  transport: Transport;
  audioLinks: AudioLinkRegistry;
  limits: SourceLimits;
  /** Base URL of bundled icons (play button, flags). */
  assetBaseUrl: string;
  log?: Logger;
}

export function summarizeSource(source: DictionarySource): SourceSummary {
  return {
    id: source.id,
    name: source.name,
    kind: source.kind,
    languageCode: source.languageCode ?? null,
    icon: source.icon ?? null,
  };
}

export function playIconUrl(assetBaseUrl: string): string {
  return `${assetBaseUrl}/icons/playsound.png`;
}

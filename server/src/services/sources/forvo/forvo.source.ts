/**
 * Forvo pronunciation source
 * One source per configured language. Only the primary word is queried: the public API
 * is rate limited per key.
 */

import { createHash } from 'node:crypto';
import { ArticleFetchRequest } from '../../article/article-fetch-request.js';
import { InstantSearchRequest } from '../../word-search/instant-search-request.js';
import type { SearchRequest } from '../../word-search/search-request.types.js';
import type { DictionarySource, SourceDependencies } from '../source.types.js';
import { createForvoCodec, type ForvoRequestTarget } from './forvo-codec.js';

export interface ForvoSourceConfig {
  languageCode: string;
  apiKey: string;
  apiBase: string;
}

const ID_SEED = 'Forvo source version 1.0';

export function forvoSourceId(languageCode: string): string {
  return createHash('md5').update(ID_SEED).update(languageCode, 'utf8').digest('hex');
}

/** `en` -> `Forvo (En)` */
export function forvoSourceName(languageCode: string): string {
  const lower = languageCode.toLowerCase();
  return `Forvo (${lower.charAt(0).toUpperCase()}${lower.slice(1)})`;
}

/** Trimmed, non-blank codes in first-seen order. */
export function normalizeLanguageCodes(codes: readonly string[] | string): string[] {
  const list = typeof codes === 'string' ? codes.split(',') : codes;
  const seen = new Set<string>();
  for (const code of list) {
    const cleaned = code.trim().replace(/\s+/g, ' ');
    if (cleaned.length > 0) {
      seen.add(cleaned);
    }
  }
  return [...seen];
}

export class ForvoSource implements DictionarySource {
  readonly kind = 'forvo' as const;
  readonly id: string;
  readonly name: string;
  readonly languageCode: string;
  readonly icon = undefined;

  private readonly target: ForvoRequestTarget;

  constructor(config: ForvoSourceConfig, private readonly deps: SourceDependencies) {
    this.languageCode = config.languageCode;
    this.id = forvoSourceId(config.languageCode);
    this.name = forvoSourceName(config.languageCode);
    this.target = { apiBase: config.apiBase, apiKey: config.apiKey, languageCode: config.languageCode };
  }

  fetchArticle(word: string, alternates: readonly string[] = []): ArticleFetchRequest {
    const codec = createForvoCodec(this.target, word, {
      sourceId: this.id,
      audioLinks: this.deps.audioLinks,
      assetBaseUrl: this.deps.assetBaseUrl,
    });

    return new ArticleFetchRequest(word, alternates, {
      sourceId: this.id,
      transport: this.deps.transport,
      codec,
      queryAlternates: false,
      maxWordLength: this.deps.limits.maxWordLength,
      maxRedirectDepth: this.deps.limits.maxRedirectDepth,
      log: this.deps.log,
    });
  }

  /** No prefix API: the typed word is the only candidate. */
  searchPrefix(word: string): SearchRequest {
    return new InstantSearchRequest(word, [word]);
  }
}

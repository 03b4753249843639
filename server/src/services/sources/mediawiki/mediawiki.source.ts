/**
 * MediaWiki source
 * Articles via `action=parse`, prefix search via `list=allpages`.
 */

import { ArticleFetchRequest } from '../../article/article-fetch-request.js';
import type { ArticleCodec } from '../../article/article-codec.types.js';
import {
  DEFAULT_ARTICLE_PATH,
  describeServiceUrl,
  rewriteArticle,
  type RewriteContext,
} from '../../article/rewrite/rewrite-pipeline.js';
import { DebouncedSearchRequest } from '../../word-search/debounced-search-request.js';
import type { SearchRequest } from '../../word-search/search-request.types.js';
import { detectLanguageFromUrl, isRightToLeftLanguage } from '../language.js';
import { playIconUrl, type DictionarySource, type SourceDependencies } from '../source.types.js';
import { buildArticleUrl, buildPrefixUrl, extractArticleBody, extractPrefixMatches } from './mediawiki-codec.js';
import { getVariantProfile, resolveVariant, type MediaWikiVariant, type VariantProfile } from './mediawiki-variants.js';

export interface MediaWikiSourceConfig {
  id: string;
  name: string;
  /** Script path, e.g. `https://en.wikipedia.org/w`; may carry a variant marker. */
  url: string;
  icon?: string;
  articlePath?: string;
}

export class MediaWikiSource implements DictionarySource {
  readonly kind = 'mediawiki' as const;
  readonly id: string;
  readonly name: string;
  readonly icon: string | undefined;
  readonly url: string;
  readonly variant: MediaWikiVariant;
  readonly languageCode: string | undefined;

  private readonly profile: VariantProfile;
  private readonly rewriteContext: RewriteContext;

  constructor(config: MediaWikiSourceConfig, private readonly deps: SourceDependencies) {
    const resolved = resolveVariant(config.url);
    this.id = config.id;
    this.name = config.name;
    this.icon = config.icon;
    this.url = resolved.url.replace(/\/+$/, '');
    this.variant = resolved.variant;
    this.languageCode = detectLanguageFromUrl(this.url);
    this.profile = getVariantProfile(this.variant);

    const { origin, scheme } = describeServiceUrl(this.url);
    this.rewriteContext = {
      apiUrl: this.url,
      origin,
      scheme,
      sourceId: this.id,
      isRightToLeft: isRightToLeftLanguage(this.languageCode),
      articlePath: config.articlePath ?? DEFAULT_ARTICLE_PATH,
      audioLinks: deps.audioLinks,
      playIconUrl: playIconUrl(deps.assetBaseUrl),
      preprocess: this.profile.preprocess,
      log: deps.log,
    };
  }

  fetchArticle(word: string, alternates: readonly string[] = []): ArticleFetchRequest {
    const codec: ArticleCodec = {
      buildUrl: (queryWord) => buildArticleUrl(this.url, queryWord),
      extractBody: extractArticleBody,
      rewrite: (body) => rewriteArticle(body, this.rewriteContext),
    };

    return new ArticleFetchRequest(word, alternates, {
      sourceId: this.id,
      transport: this.deps.transport,
      codec,
      policies: this.profile.createPolicies(),
      maxWordLength: this.deps.limits.maxWordLength,
      maxRedirectDepth: this.deps.limits.maxRedirectDepth,
      log: this.deps.log,
    });
  }

  searchPrefix(word: string): SearchRequest {
    return new DebouncedSearchRequest(word, {
      sourceId: this.id,
      transport: this.deps.transport,
      url: buildPrefixUrl(this.url, word),
      extractMatches: extractPrefixMatches,
      maturityMs: this.deps.limits.searchMaturityMs,
      maxWordLength: this.deps.limits.maxWordLength,
      log: this.deps.log,
    });
  }
}

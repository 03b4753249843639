/**
 * Site-specific MediaWiki flavours, picked from the configured URL.
 */

import { FANDOM_STAGES, WOOKIEEPEDIA_STAGES } from '../../article/rewrite/fandom-stages.js';
import type { PreprocessStage } from '../../article/rewrite/rewrite-pipeline.js';
import { LinkDistinctionPolicy } from '../../article/redirect/link-distinction.policy.js';
import type { RedirectPolicy } from '../../article/redirect/redirect-policy.js';
import { SuffixPreferredPolicy } from '../../article/redirect/suffix-preferred.policy.js';

export type MediaWikiVariant = 'mediawiki' | 'fandom' | 'wookieepedia' | 'wookieepedia-legends';

export interface VariantProfile {
  variant: MediaWikiVariant;
  preprocess: readonly PreprocessStage[];
  /** Fresh policies for one lookup; they keep per-lookup bookkeeping. */
  createPolicies(): RedirectPolicy[];
}

export interface ResolvedVariant {
  variant: MediaWikiVariant;
  /** URL with any variant marker removed. */
  url: string;
}

const LEGENDS_MARKER = ' (Legends)';

/** The inactive Legends tab on a Canon article. */
export const LEGENDS_TAB_MARKER =
  'title="Click here for Wookieepedia&#39;s article on the Legends version of this subject."';

export const LEGENDS_SUFFIX = '/Legends';

const WOOKIEEPEDIA_HOSTS = ['/starwars.wikia.com', '/starwars.fandom.com'];
const FANDOM_DOMAINS = ['.wikia.com', '.fandom.com'];

export function resolveVariant(configuredUrl: string): ResolvedVariant {
  const url = configuredUrl.trim();

  if (url.endsWith(LEGENDS_MARKER)) {
    const chopped = url.slice(0, -LEGENDS_MARKER.length);
    if (WOOKIEEPEDIA_HOSTS.some(host => chopped.endsWith(host))) {
      return { variant: 'wookieepedia-legends', url: chopped };
    }
  }
  if (WOOKIEEPEDIA_HOSTS.some(host => url.endsWith(host))) {
    return { variant: 'wookieepedia', url };
  }
  if (FANDOM_DOMAINS.some(domain => url.endsWith(domain))) {
    return { variant: 'fandom', url };
  }
  return { variant: 'mediawiki', url };
}

export function getVariantProfile(variant: MediaWikiVariant): VariantProfile {
  switch (variant) {
    case 'mediawiki':
      return { variant, preprocess: [], createPolicies: () => [] };
    case 'fandom':
      return { variant, preprocess: FANDOM_STAGES, createPolicies: () => [] };
    case 'wookieepedia':
      return { variant, preprocess: WOOKIEEPEDIA_STAGES, createPolicies: () => [] };
    case 'wookieepedia-legends':
      return {
        variant,
        preprocess: WOOKIEEPEDIA_STAGES,
        createPolicies: () => [
          new LinkDistinctionPolicy(LEGENDS_TAB_MARKER),
          new SuffixPreferredPolicy(LEGENDS_SUFFIX),
        ],
      };
  }
}

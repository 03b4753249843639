/**
 * Article rewrite pipeline
 *
 * Turns the raw HTML of a MediaWiki `parse` reply into markup that works outside the
 * wiki: relative article links, absolute media URLs, play links for audio.
 * Each stage is a pure string transform and applying it twice equals applying it once.
 */

import { logger as rootLogger, type Logger } from '../../../lib/logger/structured-logger.js';
import type { AudioLinkRegistry } from '../../audio/audio-link-registry.js';

export interface RewriteContext {
  /** Script path of the service, e.g. `https://en.wikipedia.org/w`. */
  apiUrl: string;
  /** `https://en.wikipedia.org` (no trailing slash). */
  origin: string;
  /** `https` */
  scheme: string;
  sourceId: string;
  isRightToLeft: boolean;
  articlePath: string;
  audioLinks: AudioLinkRegistry;
  playIconUrl: string;
  preprocess?: readonly PreprocessStage[];
  log?: Logger;
}

export type PreprocessStage = (html: string, context: RewriteContext) => string;

export const DEFAULT_ARTICLE_PATH = '/wiki/';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Derive origin and scheme from a service script URL. */
export function describeServiceUrl(apiUrl: string): { origin: string; scheme: string } {
  const parsed = new URL(apiUrl);
  return { origin: parsed.origin, scheme: parsed.protocol.replace(/:$/, '') };
}

function fixRootRelativeUrl(url: string): string {
  if (url.includes('://')) {
    return url;
  }

  let fixed = url.replaceAll(':', '%3A');
  const anchorStart = fixed.indexOf('#', 1);
  if (anchorStart > 0) {
    const anchor = fixed
      .slice(anchorStart + 1)
      .replaceAll('_', '%5F')
      .replaceAll('#', '%23');
    fixed = `${fixed.slice(0, anchorStart)}?scrollto=${anchor}`;
  }
  return fixed;
}

/** Stage 1: escape `:` and turn in-page anchors into a `scrollto` parameter. */
export function normalizeLinkPaths(html: string, log: Logger = rootLogger): string {
  const linkPrefix = /<a\s+href="\//g;
  let result = '';
  let position = 0;

  for (let match = linkPrefix.exec(html); match; match = linkPrefix.exec(html)) {
    const urlStart = match.index + match[0].length;
    result += html.slice(position, urlStart);
    position = urlStart;

    const urlEnd = html.indexOf('"', urlStart);
    if (urlEnd < 0) {
      log.warn({ event: 'rewrite_unterminated_link', offset: urlStart }, '[Rewrite] Unterminated link in article');
      break;
    }

    result += fixRootRelativeUrl(html.slice(urlStart, urlEnd));
    position = urlEnd;
    linkPrefix.lastIndex = urlEnd;
  }

  if (position === 0) {
    return html;
  }
  return result + html.slice(position);
}

/** Stage 2: point `index.php?` links at the service host. */
export function absolutizeIndexLinks(html: string, origin: string): string {
  return html.replace(/<a\shref="(\/(?:\w*\/)*index\.php\?)/g, (_match, path: string) => `<a href="${origin}${path}`);
}

function playLink(href: string, iconUrl: string): string {
  return `<a href="${href}"><img src="${iconUrl}" border="0" align="absmiddle" alt="Play"/></a>`;
}

/** Stage 3: replace audio elements and commons `.ogg` links with registered play links. */
export function extractInlineAudio(html: string, context: RewriteContext): string {
  const { scheme, sourceId, audioLinks, playIconUrl } = context;
  const register = (url: string): string => audioLinks.register(`"${url}"`, sourceId);

  let result = html.replace(/<audio\s[\s\S]*?<\/audio>/gi, (element) => {
    const source = /<source\s+src="([^"]+)/i.exec(element);
    if (!source) {
      return element;
    }
    const url = source[1].startsWith('//') ? `${scheme}:${source[1]}` : source[1];
    return register(url) + playLink(url, playIconUrl);
  });

  result = result.replace(
    /<a\s+href="(\/\/upload\.wikimedia\.org\/wikipedia\/commons\/[^"'&]*\.ogg)/g,
    (_match, path: string) => `${register(`${scheme}:${path}`)}<a href="${scheme}:${path}`
  );

  return result.replace(
    /<button\s+[^>]*(upload\.wikimedia\.org\/wikipedia\/commons\/[^"'&]*\.ogg)[^>]*>\s*<[^<]*<\/button>/g,
    (_match, path: string) => {
      const url = `${scheme}://${path}`;
      return register(url) + playLink(url, playIconUrl);
    }
  );
}

/** Stage 4: give protocol-relative and root-relative `src` attributes a host. */
export function qualifyMediaUrls(html: string, scheme: string, origin: string): string {
  return html
    .replace(/\bsrc="\/\//g, `src="${scheme}://`)
    .replace(/\bsrc="\/(?!\/)/g, `src="${origin}/`);
}

/** Stage 5 */
export function stripArticlePath(html: string, articlePath: string = DEFAULT_ARTICLE_PATH): string {
  const pattern = new RegExp(`<a\\shref="${escapeRegExp(articlePath)}`, 'g');
  return html.replace(pattern, '<a href="');
}

/** Stage 6: article titles use spaces; only the leading relative part of a link is touched. */
export function underscoresToSpaces(html: string): string {
  return html.replace(/<a\s+href="[^/:">#]+/g, (link) => link.replaceAll('_', ' '));
}

/** Stage 7 */
export function rewriteFileLinks(html: string, apiUrl: string): string {
  return html.replace(/<a\s+href="([^:/"]*file%3A[^/"]+")/gi, (_match, target: string) => `<a href="${apiUrl}/index.php?title=${target}`);
}

export function wrapArticle(html: string, isRightToLeft: boolean): string {
  const open = isRightToLeft ? '<div class="mwiki" dir="rtl">' : '<div class="mwiki">';
  return `${open}${html}</div>`;
}

export function rewriteArticle(rawHtml: string, context: RewriteContext): string {
  let html = rawHtml;
  for (const stage of context.preprocess ?? []) {
    html = stage(html, context);
  }

  html = normalizeLinkPaths(html, context.log);
  html = absolutizeIndexLinks(html, context.origin);
  html = extractInlineAudio(html, context);
  html = qualifyMediaUrls(html, context.scheme, context.origin);
  html = stripArticlePath(html, context.articlePath);
  html = underscoresToSpaces(html);
  html = rewriteFileLinks(html, context.apiUrl);

  return wrapArticle(html, context.isRightToLeft);
}

/**
 * Fandom-hosted wiki quirks, applied before the core rewrite stages.
 */

import type { PreprocessStage, RewriteContext } from './rewrite-pipeline.js';

/** Lazy-loaded images only render through their `<noscript>` fallback. */
export function unwrapLazyImages(html: string): string {
  return html.replace(/<img\s[^>]+lzy lzyPlcHld[^>]+>\s*<noscript>\s*(<img\s[^<]+)<\/noscript>/g, '$1');
}

/**
 * Register vignette-hosted `.ogg` links as audio, dropping `/revision/latest` and `?cb=`.
 * Links already preceded by a registration script are left alone.
 */
export function registerVignetteAudio(html: string, context: RewriteContext): string {
  return html.replace(
    /(?<!<\/script>)<a href=("https:\/\/vignette\.wikia\.nocookie\.net\/[^"]+\.ogg)(?:\/revision\/latest)?(?:\?cb=\d+)?"/g,
    (_match, quotedUrl: string) => `${context.audioLinks.register(`${quotedUrl}"`, context.sourceId)}<a href=${quotedUrl}"`
  );
}

/** Scroll boxes keep their content visible: absolute heights on their lines are dropped. */
export function dropScrollboxHeights(html: string): string {
  return html.replace(/class="scrollbox"[^\n]*/g, (line) => line.replace(/(?<!-)height:\d+px;/g, ''));
}

/** The Canon/Legends indicator sits among the era icons, hidden by default. */
export function showEraIcons(html: string): string {
  return html.replace(/(id="title-eraicons" style="[^"]*)display:none;?/g, '$1');
}

export const FANDOM_STAGES: readonly PreprocessStage[] = [
  unwrapLazyImages,
  registerVignetteAudio,
  dropScrollboxHeights,
];

export const WOOKIEEPEDIA_STAGES: readonly PreprocessStage[] = [...FANDOM_STAGES, showEraIcons];

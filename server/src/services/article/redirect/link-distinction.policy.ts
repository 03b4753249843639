/**
 * Link-distinction redirect
 * A page carrying a known link marker (disambiguation or stub tab) is dropped in
 * favour of the article that link points to.
 */

import { ACCEPT, type PolicyInput, type PolicyVerdict, type RedirectPolicy } from './redirect-policy.js';

const RELATIVE_LINK = /^<a\s+href="([^"]+)"[\s\S]*$/;

function decodeLinkTarget(target: string): string {
  const withoutQuery = target.split('?')[0];
  try {
    return decodeURIComponent(withoutQuery);
  } catch {
    return withoutQuery;
  }
}

/**
 * @returns the word the link containing `marker` points to, or undefined when the
 * body has no such relative link
 */
export function findDistinguishedLink(body: string, marker: string): string | undefined {
  const markerPosition = body.indexOf(marker);
  if (markerPosition < 0) {
    return undefined;
  }

  const tagBoundary = Math.max(
    body.lastIndexOf('<', markerPosition),
    body.lastIndexOf('>', markerPosition)
  );
  if (tagBoundary < 0) {
    return undefined;
  }

  const match = RELATIVE_LINK.exec(body.slice(tagBoundary, markerPosition));
  if (!match) {
    return undefined;
  }

  const target = match[1];
  if (target.includes('://') || target.startsWith('/') || target.startsWith('#')) {
    return undefined;
  }

  const word = decodeLinkTarget(target).trim();
  return word.length > 0 ? word : undefined;
}

export class LinkDistinctionPolicy implements RedirectPolicy {
  readonly name = 'link-distinction';

  constructor(private readonly marker: string) {}

  evaluate({ body }: PolicyInput): PolicyVerdict {
    if (body === null || this.marker.length === 0) {
      return ACCEPT;
    }

    const word = findDistinguishedLink(body, this.marker);
    return word === undefined ? ACCEPT : { kind: 'redirect', word };
  }
}

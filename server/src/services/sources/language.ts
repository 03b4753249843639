const RIGHT_TO_LEFT_LANGUAGES = new Set(['ar', 'arc', 'ckb', 'dv', 'fa', 'he', 'ps', 'sd', 'ug', 'ur', 'yi']);

export function isRightToLeftLanguage(code: string | undefined): boolean {
  return code !== undefined && RIGHT_TO_LEFT_LANGUAGES.has(code.toLowerCase());
}

/**
 * Language of a wiki from its URL: the two letters before the first dot, when they
 * open the host (`https://de.wikipedia.org/w` -> `de`).
 */
export function detectLanguageFromUrl(url: string): string | undefined {
  const firstDot = url.indexOf('.');
  const opensHost = firstDot === 2 || (firstDot > 3 && url[firstDot - 3] === '/');
  if (!opensHost) {
    return undefined;
  }

  const code = url.slice(firstDot - 2, firstDot).toLowerCase();
  return /^[a-z]{2}$/.test(code) ? code : undefined;
}

/**
 * MediaWiki API URLs and reply extraction (format=xml).
 */

import { z } from 'zod';
import type { ArticleExtraction } from '../../article/article-codec.types.js';
import type { TransportSuccess } from '../../transport/transport.types.js';
import type { MatchExtraction } from '../../word-search/search-request.types.js';
import { ATTRIBUTE_PREFIX, TEXT_KEY, formatXmlParseError, parseXml } from '../../xml/xml-parser.js';

export const PREFIX_SEARCH_LIMIT = 40;

const REVID = `${ATTRIBUTE_PREFIX}revid` as const;
const TITLE = `${ATTRIBUTE_PREFIX}title` as const;

// Character data comes back bare, or under TEXT_KEY when the element has attributes
const textNodeSchema = z.union([
  z.string(),
  z.object({ [TEXT_KEY]: z.string().optional() }).transform(node => node[TEXT_KEY] ?? ''),
]);

const parseReplySchema = z.object({
  api: z.object({
    parse: z
      .object({
        [REVID]: z.string().optional(),
        text: textNodeSchema.optional(),
      })
      .optional(),
  }),
});

const pageEntrySchema = z.object({ [TITLE]: z.string() });

const allPagesReplySchema = z.object({
  api: z.object({
    query: z
      .object({
        // An empty <allpages/> parses to ''
        allpages: z.union([z.object({ p: z.array(pageEntrySchema).optional() }), z.literal('')]).optional(),
      })
      .optional(),
  }),
});

function encodeWord(word: string): string {
  return encodeURIComponent(word);
}

export function buildArticleUrl(apiUrl: string, word: string): string {
  return `${apiUrl}/api.php?action=parse&prop=text|revid&format=xml&redirects&page=${encodeWord(word)}`;
}

export function buildPrefixUrl(apiUrl: string, word: string): string {
  return `${apiUrl}/api.php?action=query&list=allpages&aplimit=${PREFIX_SEARCH_LIMIT}&format=xml&apfrom=${encodeWord(word)}`;
}

/** The page HTML from an `action=parse` reply, when the page exists. */
export function extractArticleBody(reply: TransportSuccess): ArticleExtraction {
  const parsed = parseXml(reply.body);
  if (!parsed.ok) {
    return { body: null, error: formatXmlParseError(parsed.error) };
  }

  const shaped = parseReplySchema.safeParse(parsed.document);
  if (!shaped.success) {
    return { body: null };
  }

  const page = shaped.data.api.parse;
  if (!page || page[REVID] === undefined || page[REVID] === '0' || page.text === undefined) {
    return { body: null };
  }
  return { body: page.text };
}

/** Page titles of an `list=allpages` reply, in reply order. */
export function extractPrefixMatches(reply: TransportSuccess): MatchExtraction {
  const parsed = parseXml(reply.body);
  if (!parsed.ok) {
    return { matches: [], error: formatXmlParseError(parsed.error) };
  }

  const shaped = allPagesReplySchema.safeParse(parsed.document);
  if (!shaped.success) {
    return { matches: [] };
  }

  const allPages = shaped.data.api.query?.allpages;
  if (allPages === undefined || allPages === '') {
    return { matches: [] };
  }
  return { matches: (allPages.p ?? []).map(entry => entry[TITLE]) };
}

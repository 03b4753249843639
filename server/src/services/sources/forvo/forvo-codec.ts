/**
 * Forvo pronunciation API: request URL and rendering of a `word-pronunciations` reply.
 */

import { encode } from 'html-entities';
import { z } from 'zod';
import type { ArticleCodec, ArticleExtraction } from '../../article/article-codec.types.js';
import type { AudioLinkRegistry } from '../../audio/audio-link-registry.js';
import type { TransportSuccess } from '../../transport/transport.types.js';
import { TEXT_KEY, formatXmlParseError, parseXml } from '../../xml/xml-parser.js';
import { countryNameToIso2 } from './country-codes.js';

const textSchema = z.union([
  z.string(),
  z.object({ [TEXT_KEY]: z.string().optional() }).transform(node => node[TEXT_KEY] ?? ''),
]);

const itemSchema = z.object({
  pathmp3: textSchema.optional(),
  username: textSchema.default(''),
  sex: textSchema.default(''),
  country: textSchema.default(''),
  addtime: textSchema.default(''),
  num_votes: textSchema.default('0'),
  num_positive_votes: textSchema.default('0'),
});

export type PronunciationItem = z.infer<typeof itemSchema>;

const replySchema = z.object({
  items: z.union([z.object({ item: z.array(itemSchema).default([]) }), z.literal('')]).optional(),
  errors: z.union([z.object({ error: z.array(textSchema).default([]) }), z.literal('')]).optional(),
});

export interface ForvoRequestTarget {
  apiBase: string;
  apiKey: string;
  languageCode: string;
}

export interface ForvoRenderContext {
  sourceId: string;
  audioLinks: AudioLinkRegistry;
  assetBaseUrl: string;
}

export function buildPronunciationsUrl({ apiBase, apiKey, languageCode }: ForvoRequestTarget, word: string): string {
  return `${apiBase}/key/${encodeURIComponent(apiKey)}/format/xml/action/word-pronunciations`
    + `/word/${encodeURIComponent(word)}/language/${encodeURIComponent(languageCode)}`;
}

function toCount(text: string): number {
  const value = Number.parseInt(text, 10);
  return Number.isNaN(value) ? 0 : value;
}

function normalizeAudioUrl(raw: string): string {
  try {
    return new URL(raw.trim()).href;
  } catch {
    return encodeURI(raw.trim());
  }
}

function renderVotes(item: PronunciationItem): string {
  const positive = toCount(item.num_positive_votes);
  const negative = toCount(item.num_votes) - positive;
  if (!positive && !negative) {
    return '';
  }

  let votes = ' ';
  if (positive) {
    votes += `<span class='forvo_positive_votes'>+${positive}</span>`;
  }
  if (negative) {
    if (positive) {
      votes += ' ';
    }
    votes += `<span class='forvo_negative_votes'>-${negative}</span>`;
  }
  return votes;
}

function renderItem(item: PronunciationItem, audioUrl: string, context: ForvoRenderContext): string {
  const literal = `"${audioUrl}"`;
  const isMale = item.sex.toLowerCase() !== 'f';
  const iso2 = countryNameToIso2(item.country);
  const flag = iso2 ? `<img src='${context.assetBaseUrl}/flags/${iso2}.png'/> ` : '';
  const profile = `https://forvo.com/user/${encodeURIComponent(item.username)}/`;

  return '<tr>'
    + context.audioLinks.register(literal, context.sourceId)
    + `<td><a href=${literal} title="${encode(`Added ${item.addtime}`)}">`
    + `<img src="${context.assetBaseUrl}/icons/playsound.png" border="0" alt="Play"/></a></td>`
    + `<td>by <a class='forvo_user' href='${profile}'>${encode(item.username)}</a> `
    + `<span class='forvo_location'>(${isMale ? 'Male' : 'Female'} from ${flag}${encode(item.country)})</span>`
    + renderVotes(item)
    + '</td></tr>';
}

export function renderPronunciations(word: string, items: readonly PronunciationItem[], context: ForvoRenderContext): string {
  let html = `<div class='forvo_headword'>${encode(word)}</div><table class="forvo_play">`;
  for (const item of items) {
    if (item.pathmp3 !== undefined && item.pathmp3.trim().length > 0) {
      html += renderItem(item, normalizeAudioUrl(item.pathmp3), context);
    }
  }
  return `${html}</table>`;
}

export function extractPronunciations(reply: TransportSuccess, word: string, context: ForvoRenderContext): ArticleExtraction {
  const parsed = parseXml(reply.body);
  if (!parsed.ok) {
    return { body: null, error: formatXmlParseError(parsed.error) };
  }

  const shaped = replySchema.safeParse(parsed.document);
  if (!shaped.success) {
    return { body: null, error: 'Unexpected reply from the pronunciation service' };
  }

  const { items, errors } = shaped.data;
  const found = items ? items.item : [];
  const body = found.length > 0 ? renderPronunciations(word, found, context) : null;
  const error = errors ? errors.error[0] : undefined;

  return error === undefined ? { body } : { body, error };
}

/** Codec for one lookup: the rendered headword is the requested word. */
export function createForvoCodec(target: ForvoRequestTarget, word: string, context: ForvoRenderContext): ArticleCodec {
  return {
    buildUrl: (queryWord) => buildPronunciationsUrl(target, queryWord),
    extractBody: (reply) => extractPronunciations(reply, word, context),
    rewrite: (body) => body,
  };
}

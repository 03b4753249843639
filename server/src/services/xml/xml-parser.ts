/**
 * XML parsing for service replies
 *
 * Validation runs first so malformed replies come back as a structured error
 * (message, line, column) instead of a half-built tree.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

export interface XmlParseError {
  message: string;
  line: number;
  column: number;
}

export type XmlParseResult =
  | { ok: true; document: unknown }
  | { ok: false; error: XmlParseError };

/** Attribute keys carry this prefix in the parsed tree (`@_revid`). */
export const ATTRIBUTE_PREFIX = '@_';

/** Key of an element's character data when it also has attributes. */
export const TEXT_KEY = '#text';

// Elements that may repeat; always parsed as arrays
const REPEATED_ELEMENTS = new Set(['p', 'item', 'error']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  processEntities: true,
  htmlEntities: false,
  isArray: (name) => REPEATED_ELEMENTS.has(name),
});

const decoder = new TextDecoder('utf-8');

export function formatXmlParseError(error: XmlParseError): string {
  return `XML parse error: ${error.message} at ${error.line},${error.column}`;
}

export function parseXml(input: Uint8Array | string): XmlParseResult {
  const text = typeof input === 'string' ? input : decoder.decode(input);

  if (text.trim().length === 0) {
    return { ok: false, error: { message: 'unexpected end of file', line: 1, column: 1 } };
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    return {
      ok: false,
      error: {
        message: validation.err.msg,
        line: validation.err.line,
        column: validation.err.col,
      },
    };
  }

  const document: unknown = parser.parse(text);
  return { ok: true, document };
}

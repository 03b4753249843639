import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { TransportSuccess } from '../../../transport/transport.types.js';
import { buildArticleUrl, buildPrefixUrl, extractArticleBody, extractPrefixMatches } from '../mediawiki-codec.js';

function reply(xml: string): TransportSuccess {
  return { kind: 'success', status: 200, body: new TextEncoder().encode(xml) };
}

describe('MediaWiki URLs', () => {
  it('builds the parse URL with an encoded page', () => {
    assert.strictEqual(
      buildArticleUrl('https://en.wikipedia.org/w', 'C++ (language)'),
      'https://en.wikipedia.org/w/api.php?action=parse&prop=text|revid&format=xml&redirects&page=C%2B%2B%20(language)'
    );
  });

  it('builds the allpages URL', () => {
    assert.strictEqual(
      buildPrefixUrl('https://en.wikipedia.org/w', 'cat'),
      'https://en.wikipedia.org/w/api.php?action=query&list=allpages&aplimit=40&format=xml&apfrom=cat'
    );
  });
});

describe('extractArticleBody', () => {
  it('returns the page html', () => {
    const xml = '<?xml version="1.0"?><api><parse title="Cat" pageid="6678" revid="1234">'
      + '<text xml:space="preserve">&lt;p&gt;The &lt;b&gt;cat&lt;/b&gt;&lt;/p&gt;</text></parse></api>';

    assert.deepStrictEqual(extractArticleBody(reply(xml)), { body: '<p>The <b>cat</b></p>' });
  });

  it('treats revid 0 and missing pages as no body', () => {
    const zero = '<api><parse title="X" revid="0"><text>&lt;p&gt;x&lt;/p&gt;</text></parse></api>';
    const missing = '<api><error code="missingtitle" info="The page you specified doesn\'t exist."/></api>';

    assert.deepStrictEqual(extractArticleBody(reply(zero)), { body: null });
    assert.deepStrictEqual(extractArticleBody(reply(missing)), { body: null });
  });

  it('reports malformed replies', () => {
    const result = extractArticleBody(reply('<api><parse>'));

    assert.strictEqual(result.body, null);
    assert.match(result.error ?? '', /^XML parse error: .+ at \d+,\d+$/);
  });
});

describe('extractPrefixMatches', () => {
  it('lists titles in reply order', () => {
    const xml = '<api><query><allpages>'
      + '<p pageid="1" ns="0" title="Cat"/><p pageid="2" ns="0" title="Cat&amp;Mouse"/><p pageid="3" ns="0" title="Catalonia"/>'
      + '</allpages></query></api>';

    assert.deepStrictEqual(extractPrefixMatches(reply(xml)), { matches: ['Cat', 'Cat&Mouse', 'Catalonia'] });
  });

  it('returns no matches for an empty list', () => {
    assert.deepStrictEqual(extractPrefixMatches(reply('<api><query><allpages/></query></api>')), { matches: [] });
    assert.deepStrictEqual(extractPrefixMatches(reply('<api/>')), { matches: [] });
  });

  it('reports malformed replies', () => {
    const result = extractPrefixMatches(reply('not xml'));

    assert.deepStrictEqual(result.matches, []);
    assert.match(result.error ?? '', /^XML parse error: /);
  });
});

/**
 * DebouncedSearchRequest: cancellation is parked until the request has matured.
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { DebouncedSearchRequest } from '../src/services/word-search/debounced-search-request.js';
import type { MatchExtractor } from '../src/services/word-search/search-request.types.js';
import { InstantSearchRequest } from '../src/services/word-search/instant-search-request.js';
import { FakeTransport } from './helpers/fake-transport.js';

const decoder = new TextDecoder();

/** Comma-separated matches; `ERR:` prefix carries an error. */
const commaMatches: MatchExtractor = (reply) => {
  const text = decoder.decode(reply.body);
  if (text.startsWith('ERR:')) {
    return { matches: [], error: text.slice(4) };
  }
  return { matches: text.length > 0 ? text.split(',') : [] };
};

describe('DebouncedSearchRequest', () => {
  let transport: FakeTransport;

  function search(word = 'ca', maxWordLength?: number): DebouncedSearchRequest {
    return new DebouncedSearchRequest(word, {
      sourceId: 'test-source',
      transport,
      url: `https://dict.test/prefix/${word}`,
      extractMatches: commaMatches,
      maturityMs: 200,
      maxWordLength,
    });
  }

  beforeEach(() => {
    transport = new FakeTransport();
    mock.timers.enable({ apis: ['setTimeout'] });
  });

  afterEach(() => {
    mock.timers.reset();
  });

  it('should submit the query immediately', () => {
    search();

    assert.deepStrictEqual(transport.urls(), ['https://dict.test/prefix/ca']);
  });

  it('should finish with the matches of the reply', async () => {
    const request = search();

    transport.succeed(transport.idAt(0), 'cat,catalog,cattle');
    await request.whenFinished();

    assert.deepStrictEqual(request.matches(), ['cat', 'catalog', 'cattle']);
    assert.strictEqual(request.errorMessage(), '');
  });

  it('should stop the maturity timer once finished', () => {
    const request = search();
    transport.succeed(transport.idAt(0), 'cat');

    mock.timers.tick(200);

    assert.strictEqual(request.isMatured(), false);
  });

  it('should not abort when cancelled before maturity', () => {
    const request = search();

    request.cancel();

    assert.deepStrictEqual(transport.abortedIds, []);
    assert.strictEqual(request.isFinished(), false);
  });

  it('should abort a parked cancellation at maturity', () => {
    const request = search();
    let finishes = 0;
    request.onFinished(() => finishes++);

    request.cancel();
    mock.timers.tick(199);
    assert.strictEqual(request.isFinished(), false);

    mock.timers.tick(1);

    assert.deepStrictEqual(transport.abortedIds, [transport.idAt(0)]);
    assert.strictEqual(request.isFinished(), true);
    assert.strictEqual(finishes, 1);
  });

  it('should ignore a reply that arrives while cancelling', () => {
    const request = search();

    request.cancel();
    transport.succeed(transport.idAt(0), 'cat');

    assert.strictEqual(request.isFinished(), false);
    assert.deepStrictEqual(request.matches(), []);

    mock.timers.tick(200);
    assert.strictEqual(request.isFinished(), true);
    assert.deepStrictEqual(request.matches(), []);
  });

  it('should abort at once when cancelled after maturity', () => {
    const request = search();
    mock.timers.tick(200);
    assert.strictEqual(request.isMatured(), true);

    request.cancel();

    assert.deepStrictEqual(transport.abortedIds, [transport.idAt(0)]);
    assert.strictEqual(request.isFinished(), true);
  });

  it('should keep a finished request as it is on cancel', () => {
    const request = search();
    transport.succeed(transport.idAt(0), 'cat');

    request.cancel();
    mock.timers.tick(200);

    assert.deepStrictEqual(transport.abortedIds, []);
    assert.deepStrictEqual(request.matches(), ['cat']);
  });

  it('should record transport failures and reply errors', () => {
    const failed = search();
    transport.fail(transport.idAt(0), 'HTTP 503');
    assert.strictEqual(failed.errorMessage(), 'HTTP 503');
    assert.strictEqual(failed.isFinished(), true);

    const refused = search('do');
    transport.succeed(transport.idAt(1), 'ERR:rate limited');
    assert.strictEqual(refused.errorMessage(), 'rate limited');
  });

  it('should finish oversized words without a query', () => {
    const request = search('catalogue', 4);

    assert.strictEqual(request.isFinished(), true);
    assert.strictEqual(transport.submitted.length, 0);
    assert.deepStrictEqual(request.matches(), []);
  });
});

describe('InstantSearchRequest', () => {
  it('should be finished with its fixed matches', async () => {
    const request = new InstantSearchRequest('cat', ['cat']);

    request.cancel();
    await request.whenFinished();

    assert.strictEqual(request.isFinished(), true);
    assert.deepStrictEqual(request.matches(), ['cat']);
    assert.strictEqual(request.errorMessage(), '');
  });
});

/**
 * FetchTransport over a mocked global fetch
 */

import { describe, it, afterEach, beforeEach, mock } from 'node:test';
import assert from 'node:assert';
import { createServer, type Server } from 'node:http';
import { FetchTransport } from '../src/services/transport/fetch-transport.js';
import type { TransportCompletion } from '../src/services/transport/transport.types.js';
import { describeUrlForLog } from '../src/utils/fetch-with-timeout.js';

const URL_UNDER_TEST = 'https://dict.test/w/api.php?page=cat';

function submitAndWait(transport: FetchTransport, url: string): Promise<TransportCompletion> {
  return new Promise((resolve) => {
    transport.submit(url, resolve);
  });
}

/** Adapts a reply factory to the global fetch signature so mock call arguments stay typed. */
function fakeFetch(reply: (init?: RequestInit) => Promise<Response>): typeof fetch {
  return (_input, init) => reply(init);
}

function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('FetchTransport', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should deliver the body and status of a successful reply', async () => {
    const fetchMock = mock.method(globalThis, 'fetch', fakeFetch(async () => new Response('<api/>', { status: 200 })));
    const transport = new FetchTransport({ timeoutMs: 1000, userAgent: 'lexicon-test' });

    const completion = await submitAndWait(transport, URL_UNDER_TEST);

    assert.strictEqual(completion.queryId, 1);
    assert.strictEqual(completion.outcome.kind, 'success');
    if (completion.outcome.kind === 'success') {
      assert.strictEqual(completion.outcome.status, 200);
      assert.strictEqual(new TextDecoder().decode(completion.outcome.body), '<api/>');
    }

    assert.strictEqual(fetchMock.mock.callCount(), 1);
    const [url, init] = fetchMock.mock.calls[0].arguments;
    assert.strictEqual(url, URL_UNDER_TEST);
    assert.deepStrictEqual(init?.headers, { 'User-Agent': 'lexicon-test' });
    assert.strictEqual(transport.getInFlightCount(), 0);
  });

  it('should turn an error status into a failure', async () => {
    mock.method(globalThis, 'fetch', fakeFetch(async () => new Response('gone', { status: 404, statusText: 'Not Found' })));
    const transport = new FetchTransport({ timeoutMs: 1000 });

    const completion = await submitAndWait(transport, URL_UNDER_TEST);

    assert.deepStrictEqual(completion.outcome, { kind: 'failure', reason: 'Upstream replied 404 Not Found' });
  });

  it('should turn network errors into a failure', async () => {
    mock.method(globalThis, 'fetch', fakeFetch(async () => {
      throw new TypeError('fetch failed');
    }));
    const transport = new FetchTransport({ timeoutMs: 1000 });

    const completion = await submitAndWait(transport, URL_UNDER_TEST);

    assert.strictEqual(completion.outcome.kind, 'failure');
    if (completion.outcome.kind === 'failure') {
      assert.match(completion.outcome.reason, /^dictionary_service network error after \d+ms \(dict\.test\)$/);
    }
  });

  it('should never complete an aborted query', async () => {
    mock.method(globalThis, 'fetch', fakeFetch((init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('The operation was aborted.', 'AbortError')));
      })
    ));
    const transport = new FetchTransport({ timeoutMs: 1000 });
    let completed = false;

    const queryId = transport.submit(URL_UNDER_TEST, () => {
      completed = true;
    });
    assert.strictEqual(transport.getInFlightCount(), 1);

    transport.abort(queryId);
    transport.abort(queryId);
    await nextMacrotask();
    await nextMacrotask();

    assert.strictEqual(completed, false);
    assert.strictEqual(transport.getInFlightCount(), 0);
  });
});

/** Resolves to false when the promise has not settled within the given time. */
function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    void promise.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('FetchTransport with a reply whose body stalls', () => {
  let server: Server;
  let baseUrl: string;
  let bodyStarted: Promise<void>;
  let socketClosed: Promise<void>;

  beforeEach(async () => {
    let markBodyStarted: () => void = () => undefined;
    let markSocketClosed: () => void = () => undefined;
    bodyStarted = new Promise((resolve) => {
      markBodyStarted = resolve;
    });
    socketClosed = new Promise((resolve) => {
      markSocketClosed = resolve;
    });

    server = createServer((req, res) => {
      req.socket.once('close', markSocketClosed);
      res.writeHead(200, { 'Content-Type': 'text/xml' });
      res.write('<api><parse>', () => markBodyStarted());
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}/w/api.php?page=cat`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should time out while reading the body', async () => {
    const transport = new FetchTransport({ timeoutMs: 200 });

    const completion = submitAndWait(transport, baseUrl);

    assert.strictEqual(await settlesWithin(completion, 2000), true);
    const { outcome } = await completion;
    assert.strictEqual(outcome.kind, 'failure');
    if (outcome.kind === 'failure') {
      assert.match(outcome.reason, /^dictionary_service timeout after \d+ms \(127\.0\.0\.1:\d+\)$/);
    }
    assert.strictEqual(transport.getInFlightCount(), 0);
  });

  it('should close the connection when aborted after the headers arrived', async () => {
    const transport = new FetchTransport({ timeoutMs: 10_000 });
    let completed = false;

    const queryId = transport.submit(baseUrl, () => {
      completed = true;
    });
    await bodyStarted;
    await delay(100);
    transport.abort(queryId);

    assert.strictEqual(await settlesWithin(socketClosed, 2000), true);
    assert.strictEqual(completed, false);
  });
});

describe('describeUrlForLog', () => {
  it('should mask keys embedded in the path', () => {
    assert.deepStrictEqual(
      describeUrlForLog('https://apifree.forvo.com/key/test-key/format/xml/action/word-pronunciations/word/cat'),
      { host: 'apifree.forvo.com', path: '/key/[REDACTED]/format/xml/action/word-pronunciations/word/cat' }
    );
    assert.deepStrictEqual(describeUrlForLog('not a url'), { host: 'invalid-url', path: '' });
  });
});

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { QueryQueue } from '../query-queue.js';
import type { TransportCompletion } from '../../transport/transport.types.js';
import { FakeTransport, failure, success } from '../../../../tests/helpers/fake-transport.js';

describe('QueryQueue', () => {
  let transport: FakeTransport;
  let queue: QueryQueue;
  let completions: TransportCompletion[];

  beforeEach(() => {
    transport = new FakeTransport();
    completions = [];
    queue = new QueryQueue({
      transport,
      buildUrl: (word) => `https://dict.test/${word}`,
      onCompletion: (completion) => completions.push(completion),
    });
  });

  it('submits on enqueue and keeps submission order', () => {
    queue.enqueue('alpha');
    queue.enqueue('beta');

    assert.deepStrictEqual(transport.urls(), ['https://dict.test/alpha', 'https://dict.test/beta']);
    assert.deepStrictEqual(queue.words(), ['alpha', 'beta']);
    assert.strictEqual(queue.size(), 2);
  });

  it('routes transport completions to the handler', () => {
    const id = queue.enqueue('alpha');
    transport.succeed(id, 'body');

    assert.strictEqual(completions.length, 1);
    assert.strictEqual(completions[0].queryId, id);
  });

  it('prepend puts the new query at the front', () => {
    queue.enqueue('alpha');
    const redirected = queue.prepend('gamma', 1);

    assert.deepStrictEqual(queue.words(), ['gamma', 'alpha']);
    assert.strictEqual(queue.pendingIds()[0], redirected);
  });

  it('drains nothing while the front is pending', () => {
    queue.enqueue('alpha');
    const second = queue.enqueue('beta');
    queue.markCompleted(second, success('b'));

    assert.deepStrictEqual([...queue.drainReady()], []);
    assert.strictEqual(queue.size(), 2);
  });

  it('drains the completed prefix front to back', () => {
    const first = queue.enqueue('alpha');
    const second = queue.enqueue('beta');
    queue.enqueue('gamma');

    queue.markCompleted(second, success('b'));
    queue.markCompleted(first, failure('down'));

    const drained = [...queue.drainReady()].map(query => query.word);
    assert.deepStrictEqual(drained, ['alpha', 'beta']);
    assert.deepStrictEqual(queue.words(), ['gamma']);
  });

  it('stops draining when a prepend lands during processing', () => {
    const first = queue.enqueue('alpha');
    const second = queue.enqueue('beta');
    queue.markCompleted(first, success('a'));
    queue.markCompleted(second, success('b'));

    const seen: string[] = [];
    for (const query of queue.drainReady()) {
      seen.push(query.word);
      if (query.word === 'alpha') {
        queue.prepend('alpha-target', 1);
      }
    }

    assert.deepStrictEqual(seen, ['alpha']);
    assert.deepStrictEqual(queue.words(), ['alpha-target', 'beta']);
  });

  it('ignores completions for unknown or already completed ids', () => {
    const id = queue.enqueue('alpha');

    assert.strictEqual(queue.markCompleted(9999, success('x')), false);
    assert.strictEqual(queue.markCompleted(id, success('a')), true);
    assert.strictEqual(queue.markCompleted(id, success('again')), false);

    Array.from(queue.drainReady());
    assert.strictEqual(queue.markCompleted(id, success('late')), false);
  });

  it('carries the redirect depth', () => {
    const id = queue.prepend('deep', 2);
    queue.markCompleted(id, success('d'));

    const [query] = [...queue.drainReady()];
    assert.strictEqual(query.redirectDepth, 2);
    assert.strictEqual(query.outcome.kind, 'success');
  });

  it('clear empties the queue and lists only pending ids before that', () => {
    const first = queue.enqueue('alpha');
    const second = queue.enqueue('beta');
    queue.markCompleted(second, success('b'));

    assert.deepStrictEqual(queue.pendingIds(), [first]);

    queue.clear();
    assert.strictEqual(queue.isEmpty(), true);
    assert.deepStrictEqual(queue.pendingIds(), []);
  });
});

import { describe, expect, it } from 'vitest';
import { decodeStored } from '../../src/services/cache.service';
import { canonicalJson, contentHash, generateSessionId } from '../../src/utils/crypto-helpers';
import { KeyedMutex } from '../../src/utils/keyed-mutex';
import { LRUCache } from '../../src/utils/lru-cache';
import { createClock } from '../support/clock';

describe('crypto helpers', () => {
  it('writes canonical JSON with sorted keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [{ z: 1, y: 2 }], c: '课' } })).toBe(
      '{"a":{"c":"课","d":[{"y":2,"z":1}]},"b":1}'
    );
  });

  it('hashes equal content equally regardless of key order', () => {
    expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
    expect(contentHash({ a: 1 })).not.toBe(contentHash({ a: 2 }));
    expect(contentHash('x')).toMatch(/^[0-9a-f]{40}$/);
  });

  it('generates prefixed random session ids', () => {
    const id = generateSessionId();
    expect(id).toMatch(/^S-[0-9a-f]{32}$/);
    expect(generateSessionId()).not.toBe(id);
  });
});

describe('KeyedMutex', () => {
  it('runs tasks for one key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const first = mutex.runExclusive('k', async () => {
      await gate;
      order.push('first');
    });
    const second = mutex.runExclusive('k', async () => {
      order.push('second');
    });
    const other = mutex.runExclusive('other', async () => {
      order.push('other');
    });

    await other;
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['other', 'first', 'second']);
    expect(mutex.pendingKeys).toBe(0);
  });

  it('keeps going after a failed task', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('k', () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
    expect(await mutex.runExclusive('k', async () => 'ok')).toBe('ok');
  });
});

describe('LRUCache', () => {
  it('evicts the least recently used entry at capacity', () => {
    const cache = new LRUCache<number>({ maxSize: 2 });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.get('b')).toBeNull();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
    cache.dispose();
  });

  it('expires entries by TTL', () => {
    const clock = createClock();
    const cache = new LRUCache<string>({ now: clock.now });
    cache.set('k', 'v', 10);

    clock.advanceSeconds(9);
    expect(cache.get('k')).toBe('v');
    clock.advanceSeconds(1);
    expect(cache.get('k')).toBeNull();
    cache.dispose();
  });
});

describe('decodeStored', () => {
  it('parses JSON and passes other text through', () => {
    expect(decodeStored('{"a":1}')).toEqual({ a: 1 });
    expect(decodeStored('{oops')).toBe('{oops');
    expect(decodeStored(null)).toBeNull();
  });
});

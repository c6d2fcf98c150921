/**
 * Unit tests for concurrency primitives
 * @module @tidewater/core/tests/unit/concurrency
 */

import { describe, it, expect } from 'vitest';

import { KeyedMutex } from '../../src/concurrency/keyed-mutex.js';
import { SingleFlight } from '../../src/concurrency/single-flight.js';
import { runWithConcurrency } from '../../src/concurrency/worker-pool.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedMutex', () => {
  it('serialises sections for the same key and overlaps different keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        events.push('a1-start');
        await delay(20);
        events.push('a1-end');
      }),
      mutex.runExclusive('a', async () => {
        events.push('a2-start');
      }),
      mutex.runExclusive('b', async () => {
        events.push('b-start');
      }),
    ]);

    expect(events).toEqual(['a1-start', 'b-start', 'a1-end', 'a2-start']);
    expect(mutex.size).toBe(0);
  });

  it('propagates errors without blocking later holders', async () => {
    const mutex = new KeyedMutex();

    const failed = mutex.runExclusive('k', () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('k', () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('reports whether a key is held', async () => {
    const mutex = new KeyedMutex();
    const held = mutex.runExclusive('k', () => delay(10));
    expect(mutex.isLocked('k')).toBe(true);
    await held;
    expect(mutex.isLocked('k')).toBe(false);
  });
});

describe('SingleFlight', () => {
  it('shares one in-flight call between concurrent callers', async () => {
    const flight = new SingleFlight<number>();
    let calls = 0;
    const build = async () => {
      calls += 1;
      await delay(10);
      return 42;
    };

    const results = await Promise.all(Array.from({ length: 50 }, () => flight.do('k', build)));

    expect(calls).toBe(1);
    expect(new Set(results)).toEqual(new Set([42]));
    expect(flight.size).toBe(0);
  });

  it('does not cache failures', async () => {
    const flight = new SingleFlight<string>();
    await expect(flight.do('k', () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
    await expect(flight.do('k', async () => 'second')).resolves.toBe('second');
  });

  it('keeps keys independent', async () => {
    const flight = new SingleFlight<string>();
    const [a, b] = await Promise.all([flight.do('a', async () => 'A'), flight.do('b', async () => 'B')]);
    expect([a, b]).toEqual(['A', 'B']);
  });
});

describe('runWithConcurrency', () => {
  it('bounds the number of workers in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (value) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
      return value * 10;
    });

    expect(peak).toBe(3);
    expect(results.map((r) => (r.status === 'fulfilled' ? r.value : null))).toEqual([10, 20, 30, 40, 50, 60, 70]);
  });

  it('attempts every value even when some fail', async () => {
    const results = await runWithConcurrency(['a', 'b', 'c'], 2, async (value) => {
      if (value === 'b') throw new Error('bad b');
      return value.toUpperCase();
    });

    expect(results[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(results[1]?.status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });

  it('returns an empty list for no work', async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

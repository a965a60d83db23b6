import { ErrorType, NotFoundError } from '@docqa/core';
import { KeyedMutex, mapWithConcurrency, settleWithConcurrency } from '../concurrency.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedMutex', () => {
  it('serializes operations on the same key', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const first = mutex.runExclusive('doc', async () => {
      events.push('first:start');
      await delay(20);
      events.push('first:end');
    });
    const second = mutex.runExclusive('doc', async () => {
      events.push('second:start');
      events.push('second:end');
    });

    expect(mutex.isLocked('doc')).toBe(true);
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
    expect(mutex.isLocked('doc')).toBe(false);
  });

  it('lets different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      mutex.runExclusive('b', async () => {
        events.push('b:start');
        events.push('b:end');
      }),
    ]);

    expect(events).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
  });

  it('releases the key when an operation throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('doc', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('doc', async () => 'next')).resolves.toBe('next');
  });
});

describe('mapWithConcurrency', () => {
  it('keeps input order and respects the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(ms);
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
  });

  it('returns an empty list for no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe('settleWithConcurrency', () => {
  it('captures failures next to successes', async () => {
    const results = await settleWithConcurrency(['a', 'missing', 'c'], 3, async (item) => {
      if (item === 'missing') {
        throw new NotFoundError('document', item);
      }
      return item.toUpperCase();
    });

    expect(results).toEqual([
      { ok: true, value: 'A' },
      {
        ok: false,
        error: expect.objectContaining({
          type: ErrorType.NOT_FOUND,
          message: 'document missing not found',
        }),
      },
      { ok: true, value: 'C' },
    ]);
  });
});

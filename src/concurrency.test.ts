import { describe, it, expect } from 'vitest';
import { mapWithConcurrency, sleep, withTimeout } from './concurrency.js';
import { TimeoutError } from './errors.js';

describe('sleep', () => {
  it('waits the given time', async () => {
    const started = Date.now();
    await sleep(20);
    expect(Date.now() - started).toBeGreaterThanOrEqual(18);
  });

  it('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 5);

    await sleep(10_000, controller.signal);

    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('resolves at once for an already aborted signal', async () => {
    await expect(sleep(10_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});

describe('withTimeout', () => {
  it('returns the task result when it finishes in time', async () => {
    await expect(withTimeout(1_000, async () => 'done')).resolves.toBe('done');
  });

  it('passes through task rejections', async () => {
    await expect(withTimeout(1_000, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
  });

  it('rejects with a TimeoutError and aborts the task signal', async () => {
    let taskSignal: AbortSignal | undefined;
    const pending = withTimeout(10, (signal) => {
      taskSignal = signal;
      return new Promise<string>(() => {});
    });

    const error = await pending.catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.timeoutMs).toBe(10);
    expect(taskSignal?.aborted).toBe(true);
    expect(taskSignal?.reason).toBe(error);
  });

  it('never times out without a bound', async () => {
    await expect(withTimeout(undefined, async (signal) => signal.aborted)).resolves.toBe(false);
  });
});

describe('mapWithConcurrency', () => {
  it('runs each item once with at most limit in flight', async () => {
    const items = Array.from({ length: 10 }, (_, i) => i);
    const seen: number[] = [];
    let inFlight = 0;
    let maxInFlight = 0;

    const results = await mapWithConcurrency(items, 2, async (item) => {
      seen.push(item);
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(2);
      inFlight--;
      return item * 10;
    });

    expect([...seen].sort((a, b) => a - b)).toEqual(items);
    expect(maxInFlight).toBe(2);
    expect(results).toEqual(items.map((i) => ({ status: 'fulfilled', value: i * 10 })));
  });

  it('keeps going after a rejection and reports it in place', async () => {
    const failure = new Error('item 1 failed');

    const results = await mapWithConcurrency(['a', 'b', 'c'], 2, async (item, index) => {
      if (index === 1) throw failure;
      return item.toUpperCase();
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 'A' },
      { status: 'rejected', reason: failure },
      { status: 'fulfilled', value: 'C' },
    ]);
  });

  it('returns an empty list for no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

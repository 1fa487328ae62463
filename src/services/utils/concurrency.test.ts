import { describe, expect, it } from 'vitest';
import { Semaphore, linkSignals, mapInParallel } from './concurrency';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapInParallel', () => {
  it('keeps input order and respects the limit', async () => {
    let running = 0;
    let peak = 0;
    const results = await mapInParallel([30, 5, 20, 1, 10], 2, async (ms, index) => {
      running++;
      peak = Math.max(peak, running);
      await delay(ms);
      running--;
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    expect(peak).toBe(2);
  });
});

describe('Semaphore', () => {
  it('hands permits out in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await Promise.all(
      ['a', 'b', 'c'].map((name) =>
        semaphore.use(async () => {
          order.push(`start ${name}`);
          await delay(2);
          order.push(`end ${name}`);
        })
      )
    );

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('releases the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.use(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(semaphore.use(async () => 'next')).resolves.toBe('next');
  });

  it('rejects sizes below one', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});

describe('linkSignals', () => {
  it('aborts when any source aborts', () => {
    const a = new AbortController();
    const b = new AbortController();
    const linked = linkSignals(a.signal, undefined, b.signal);

    expect(linked.signal.aborted).toBe(false);
    b.abort('stop');
    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe('stop');
  });

  it('stops listening after dispose', () => {
    const a = new AbortController();
    const linked = linkSignals(a.signal);
    linked.dispose();
    a.abort();
    expect(linked.signal.aborted).toBe(false);
  });
});

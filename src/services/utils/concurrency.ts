/**
 * Concurrency Utilities
 * Uses p-map for parallel mapping with custom Semaphore implementation
 */
import pMap from 'p-map';

/**
 * Map over items with limited concurrency.
 * Results come back in input order regardless of completion order.
 */
export async function mapInParallel<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  return pMap(items, fn, { concurrency, signal });
}

/**
 * Semaphore for controlling concurrent access to resources.
 * A Semaphore(1) is used as an exclusive lock.
 */
export class Semaphore {
  private tasks: (() => void)[] = [];
  private count: number;

  constructor(public max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${max}`);
    }
    this.count = max;
  }

  async acquire(): Promise<void> {
    if (this.count > 0) {
      this.count--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.tasks.push(resolve);
    });
  }

  release(): void {
    if (this.tasks.length > 0) {
      const next = this.tasks.shift();
      if (next) next();
    } else {
      this.count++;
    }
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Combine several abort signals into one that aborts when any of them does.
 * Returns a dispose function that detaches the listeners.
 */
export function linkSignals(...signals: (AbortSignal | undefined)[]): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const cleanups: (() => void)[] = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => cleanups.forEach((cleanup) => cleanup()),
  };
}

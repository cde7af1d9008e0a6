import { TimeoutError, abortError } from '../errors.js';

interface Waiter {
  grant: () => void;
  settled: boolean;
}

export interface AcquireOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * FIFO counting semaphore. Callers beyond `limit` wait in a queue instead of failing;
 * a waiter leaves the queue only when it is granted a slot, its timeout elapses
 * (TimeoutError) or its signal aborts (CancelledError).
 */
export class AsyncSemaphore {
  private active = 0;
  private queue: Waiter[] = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.queue.length;
  }

  async run<T>(task: () => Promise<T>, opts: AcquireOptions = {}): Promise<T> {
    await this.acquire(opts);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(opts: AcquireOptions): Promise<void> {
    if (opts.signal?.aborted) return Promise.reject(abortError(opts.signal));
    if (this.active < this.limit && this.queue.length === 0) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const signal = opts.signal;

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const leave = (error: Error) => {
        if (waiter.settled) return;
        waiter.settled = true;
        cleanup();
        this.queue = this.queue.filter(w => w !== waiter);
        reject(error);
      };
      const onAbort = () => {
        if (signal) leave(abortError(signal));
      };

      const waiter: Waiter = {
        settled: false,
        grant: () => {
          waiter.settled = true;
          cleanup();
          this.active++;
          resolve();
        },
      };

      this.queue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (opts.timeoutMs !== undefined) {
        timer = setTimeout(
          () => leave(new TimeoutError(`Timed out after ${opts.timeoutMs}ms waiting for a free slot`)),
          opts.timeoutMs,
        );
      }
    });
  }

  private release(): void {
    this.active--;
    const next = this.queue.shift();
    if (next) next.grant();
  }
}

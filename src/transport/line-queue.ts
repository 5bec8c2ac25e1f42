import { ReadTimeoutError } from '../protocol/errors.js';

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (err: Error) => void;
  cleanup: () => void;
}

/**
 * Async FIFO between a push-style producer (readline `line` events) and
 * pull-style consumers (`receiveLine`).
 * Blocks take when empty, with optional timeout and AbortSignal.
 * After close(), buffered items still drain, then every take rejects with the close error.
 */
export class LineQueue<T> {
  private queue: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private closedWith: Error | null = null;

  push(item: T): void {
    if (this.closedWith) return;

    // If someone is waiting, hand off directly
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(item);
      return;
    }

    this.queue.push(item);
  }

  async take(timeoutMs?: number, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();

    if (this.queue.length > 0) {
      const [item] = this.queue.splice(0, 1);
      return item;
    }
    if (this.closedWith) throw this.closedWith;

    return new Promise<T>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const onAbort = (): void => {
        this.remove(entry);
        entry.cleanup();
        reject(new Error('Aborted'));
      };

      const entry: Waiter<T> = {
        resolve,
        reject,
        cleanup: () => {
          if (timer) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.remove(entry);
          entry.cleanup();
          reject(new ReadTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiters.push(entry);
    });
  }

  /** Stop accepting items. Pending and future takes reject with `err` once the buffer is empty. */
  close(err: Error): void {
    if (this.closedWith) return;
    this.closedWith = err;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.cleanup();
      waiter.reject(err);
    }
  }

  get closed(): boolean {
    return this.closedWith !== null;
  }

  get size(): number {
    return this.queue.length;
  }

  get pending(): number {
    return this.waiters.length;
  }

  private remove(entry: Waiter<T>): void {
    const idx = this.waiters.indexOf(entry);
    if (idx !== -1) this.waiters.splice(idx, 1);
  }
}

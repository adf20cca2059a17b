import { CancelledError } from '../core/errors';

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

/**
 * Async FIFO between a transport's event listeners and `receive()`.
 *
 * Items queued before a failure are still handed out; after that every
 * `shift()` rejects with the failure.
 */
export class MessageQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private failure?: Error;

  public get size(): number {
    return this.items.length;
  }

  public get failed(): boolean {
    return this.failure !== undefined;
  }

  public push(item: T): void {
    if (this.failure) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Marks the queue as failed. Only the first failure is kept.
   */
  public fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.detach();
      waiter.reject(error);
    }
  }

  /**
   * Clears items and failure so the queue can serve a new session
   */
  public reset(): void {
    this.items = [];
    this.failure = undefined;
  }

  public shift(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Receive aborted'));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((entry) => entry !== waiter);
        reject(new CancelledError('Receive aborted'));
      };
      const waiter: Waiter<T> = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort)
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}

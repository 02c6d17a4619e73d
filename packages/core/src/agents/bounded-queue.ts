import { CancelledError, QueueClosedError } from '../errors';

type Taker<T> = {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
};

type Putter<T> = {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
};

/**
 * BoundedQueue - FIFO with a fixed capacity.
 *
 * `put` waits while the queue is full, `take` waits while it is empty.
 * After `close()` nothing new is accepted; items already queued can still be
 * taken or drained, and every waiter is rejected with QueueClosedError.
 */
export class BoundedQueue<T> {
  private readonly capacity: number;
  private items: T[] = [];
  private takers: Taker<T>[] = [];
  private putters: Putter<T>[] = [];
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  put(item: T, signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    const taker = this.takers.shift();
    if (taker) {
      taker.resolve(item);
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const putter: Putter<T> = { item, resolve, reject };
      this.putters.push(putter);
      this.cancelOnAbort(signal, this.putters, putter, reject);
    });
  }

  take(signal?: AbortSignal): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) {
      this.admitWaitingPutter();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    return new Promise<T>((resolve, reject) => {
      const taker: Taker<T> = { resolve, reject };
      this.takers.push(taker);
      this.cancelOnAbort(signal, this.takers, taker, reject);
    });
  }

  /**
   * Stop accepting items and reject everyone still waiting.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const taker of this.takers.splice(0)) {
      taker.reject(new QueueClosedError());
    }
    for (const putter of this.putters.splice(0)) {
      putter.reject(new QueueClosedError());
    }
  }

  /**
   * Remove and return every queued item.
   */
  drain(): T[] {
    const drained = this.items.splice(0);
    // Freed capacity goes to waiting producers unless the queue is closed
    while (!this.closed && this.putters.length > 0 && this.items.length < this.capacity) {
      this.admitWaitingPutter();
    }
    return drained;
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.items.length;
  }

  getStats(): { queued: number; waitingProducers: number; waitingConsumers: number; capacity: number } {
    return {
      queued: this.items.length,
      waitingProducers: this.putters.length,
      waitingConsumers: this.takers.length,
      capacity: this.capacity,
    };
  }

  private admitWaitingPutter(): void {
    const putter = this.putters.shift();
    if (putter) {
      this.items.push(putter.item);
      putter.resolve();
    }
  }

  private cancelOnAbort<W>(
    signal: AbortSignal | undefined,
    waiters: W[],
    waiter: W,
    reject: (error: Error) => void
  ): void {
    if (!signal) {
      return;
    }
    signal.addEventListener(
      'abort',
      () => {
        const index = waiters.indexOf(waiter);
        if (index !== -1) {
          waiters.splice(index, 1);
          reject(new CancelledError());
        }
      },
      { once: true }
    );
  }
}

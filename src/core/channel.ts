/**
 * Bounded single-consumer hand-off queue.
 *
 * Producers never block: `push` always stores the item and returns `false` once the
 * channel is at capacity, which is the producer's cue to pause its source until
 * the `onDrain` callback fires. Exactly one `take` may be pending at any time.
 */
export class Channel<T> {
  private items: T[] = [];
  private waiter: {
    resolve: (item: T | null) => void;
    reject: (error: Error) => void;
    cleanup: () => void;
  } | null = null;
  private failure: Error | null = null;
  private closed = false;

  constructor(
    private readonly capacity: number,
    private readonly onDrain?: () => void
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): boolean {
    if (this.closed || this.failure) return false;

    if (this.waiter) {
      const { resolve, cleanup } = this.waiter;
      this.waiter = null;
      cleanup();
      resolve(item);
      return true;
    }

    this.items.push(item);
    return this.items.length < this.capacity;
  }

  /**
   * Resolve with the next item, or `null` when the timeout elapses, the signal
   * aborts or the channel is closed. Rejects when the channel has failed.
   */
  take(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
    if (this.waiter) {
      return Promise.reject(new Error('Channel already has a pending reader'));
    }

    if (this.items.length > 0) {
      const wasFull = this.items.length >= this.capacity;
      const [item] = this.items.splice(0, 1);
      if (wasFull && this.items.length < this.capacity) this.onDrain?.();
      return Promise.resolve(item);
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed || signal?.aborted) return Promise.resolve(null);

    return new Promise<T | null>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        cleanup();
        resolve(null);
      };
      const timer = setTimeout(() => {
        this.waiter = null;
        cleanup();
        resolve(null);
      }, timeoutMs);
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = { resolve, reject, cleanup };
    });
  }

  /**
   * Remove and return everything currently buffered.
   */
  drain(): T[] {
    const wasFull = this.items.length >= this.capacity;
    const items = this.items;
    this.items = [];
    if (wasFull && items.length > 0) this.onDrain?.();
    return items;
  }

  /**
   * Buffered items stay readable; once they are gone every `take` rejects with `error`.
   */
  fail(error: Error) {
    if (this.failure || this.closed) return;
    this.failure = error;
    if (this.waiter) {
      const { reject, cleanup } = this.waiter;
      this.waiter = null;
      cleanup();
      reject(error);
    }
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const { resolve, cleanup } = this.waiter;
      this.waiter = null;
      cleanup();
      resolve(null);
    }
  }

  get size(): number {
    return this.items.length;
  }
}

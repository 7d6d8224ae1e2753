type Waiter = {
  grant: () => void;
  reject: (reason: unknown) => void;
};

export type Release = () => void;

/**
 * Counting semaphore with a FIFO wait queue. Permits are handed directly to
 * the next waiter on release, so a slot never sits free while someone waits.
 */
export class Semaphore {
  private available: number;
  private queue: Waiter[] = [];
  readonly capacity: number;

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.capacity = permits;
    this.available = permits;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /** Wait for a permit. Aborting the signal drops the waiter and rejects with its reason. */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) return Promise.reject(signal.reason);

    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        this.queue = this.queue.filter((w) => w !== waiter);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(this.releaser());
        },
        reject: (reason) => {
          signal?.removeEventListener("abort", onAbort);
          reject(reason);
        },
      };
      this.queue.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Reject every waiter; held permits are unaffected. */
  rejectWaiters(reason: unknown): void {
    const waiters = this.queue;
    this.queue = [];
    for (const w of waiters) w.reject(reason);
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next.grant();
      } else {
        this.available++;
      }
    };
  }
}

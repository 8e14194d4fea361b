/**
 * Raised when a queued task waits longer than the limiter allows.
 */
export class CapacityExceededError extends Error {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super(message);
    this.name = "CapacityExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ConcurrencyLimiterOptions = {
  maxConcurrent: number;
  /** Longest wait in the queue (ms). 0 waits forever */
  queueTimeoutMs?: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
};

/**
 * Caps how many pipeline runs execute at once; the rest wait in FIFO order.
 * Each run stays strictly sequential inside; this only bounds parallel runs.
 */
export class ConcurrencyLimiter {
  readonly maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(options: ConcurrencyLimiterOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new RangeError("maxConcurrent must be a positive integer");
    }
    this.maxConcurrent = options.maxConcurrent;
    this.queueTimeoutMs = options.queueTimeoutMs ?? 0;
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  get atCapacity(): boolean {
    return this.active >= this.maxConcurrent;
  }

  /**
   * @throws CapacityExceededError if the queue wait times out
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.atCapacity) {
      await this.acquire();
    } else {
      this.active++;
    }

    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * Waits for a slot. The releasing task hands its slot over directly, so
   * `active` never drops below capacity while someone is queued.
   */
  private acquire(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      if (this.queueTimeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx !== -1) this.waiters.splice(idx, 1);
          reject(new CapacityExceededError(`Queue wait exceeded ${this.queueTimeoutMs}ms`, this.queueTimeoutMs));
        }, this.queueTimeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.active--;
      return;
    }
    if (next.timer) clearTimeout(next.timer);
    next.resolve();
  }
}

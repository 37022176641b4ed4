export interface RateLimiterOptions {
  /** Ceiling on requests in flight at the same time. */
  maxConcurrent: number;
  /** Minimum gap between two request starts, shared by every caller. */
  minIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type ReleaseSlot = () => void;

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export const intervalFromRequestsPerSecond = (requestsPerSecond: number): number =>
  requestsPerSecond > 0 ? Math.ceil(1000 / requestsPerSecond) : 0;

/**
 * In-process limiter combining a counting semaphore with a spacing gate.
 *
 * Slots are handed to waiters in FIFO order on release, so a released slot
 * never becomes visible to a newcomer that jumps the queue. The next start
 * time is reserved synchronously inside `acquire`, which keeps concurrent
 * callers from claiming the same instant.
 */
export class RateLimiter {
  private readonly maxConcurrent: number;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly waiters: Array<() => void> = [];
  private active = 0;
  private nextStartAt = Number.NEGATIVE_INFINITY;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new RangeError(
        `maxConcurrent must be a positive integer, received ${options.maxConcurrent}`,
      );
    }

    this.maxConcurrent = options.maxConcurrent;
    this.minIntervalMs = Math.max(0, options.minIntervalMs ?? 0);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get inFlight(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<ReleaseSlot> {
    if (this.active < this.maxConcurrent) {
      this.active += 1;
    } else {
      // release() transfers its slot to us without decrementing `active`.
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    if (this.minIntervalMs > 0) {
      const now = this.now();
      const startAt = Math.max(now, this.nextStartAt);
      this.nextStartAt = startAt + this.minIntervalMs;
      if (startAt > now) {
        await this.sleep(startAt - now);
      }
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  async withSlot<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private release() {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.active -= 1;
  }
}

import pino from 'pino';

const log = pino({ name: 'rate-limiter' });

export interface RateLimiterOptions {
  /** Bucket size: at most this many grants in any `periodMs` window. */
  capacity: number;
  periodMs: number;
}

export interface RateLimiterStats {
  capacity: number;
  periodMs: number;
  tokens: number;
  queued: number;
  grantsInWindow: number;
}

interface Waiter {
  resolve: (granted: boolean) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Token bucket refilled continuously at capacity/period, serving waiters FIFO.
 *
 * A grant also needs fewer than `capacity` grants in the trailing period, so a full
 * bucket after an idle stretch cannot push a window past the upstream quota.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefillAt: number;
  private readonly refillPerMs: number;
  private readonly grants: number[] = [];
  private readonly waiters: Waiter[] = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: RateLimiterOptions) {
    if (options.capacity < 1) {
      throw new Error('Rate limiter capacity must be at least 1');
    }
    if (options.periodMs <= 0) {
      throw new Error('Rate limiter periodMs must be positive');
    }
    this.tokens = options.capacity;
    this.lastRefillAt = Date.now();
    this.refillPerMs = options.capacity / options.periodMs;
  }

  /**
   * Wait for a slot. Resolves `true` once granted, or `false` if `signal` aborts
   * while still queued (no slot is consumed in that case).
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);

    if (this.waiters.length === 0 && this.tryTake()) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = { resolve };

      if (signal) {
        waiter.signal = signal;
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          if (this.waiters.length === 0) this.clearTimer();
          resolve(false);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
      if (this.waiters.length > this.options.capacity) {
        log.debug({ queued: this.waiters.length }, 'Rate limiter queue growing');
      }
      this.schedule();
    });
  }

  stats(): RateLimiterStats {
    const now = Date.now();
    this.refill(now);
    this.pruneGrants(now);
    return {
      capacity: this.options.capacity,
      periodMs: this.options.periodMs,
      tokens: Math.floor(this.tokens * 100) / 100,
      queued: this.waiters.length,
      grantsInWindow: this.grants.length,
    };
  }

  private tryTake(): boolean {
    const now = Date.now();
    this.refill(now);
    this.pruneGrants(now);

    // Tolerate float drift from fractional refills
    if (this.tokens < 1 - 1e-9 || this.grants.length >= this.options.capacity) {
      return false;
    }

    this.tokens = Math.max(0, this.tokens - 1);
    this.grants.push(now);
    return true;
  }

  private refill(now: number): void {
    const elapsed = now - this.lastRefillAt;
    if (elapsed > 0) {
      this.tokens = Math.min(this.options.capacity, this.tokens + elapsed * this.refillPerMs);
      this.lastRefillAt = now;
    }
  }

  private pruneGrants(now: number): void {
    while (this.grants.length > 0 && now - this.grants[0] >= this.options.periodMs) {
      this.grants.shift();
    }
  }

  private msUntilNextSlot(): number {
    const now = Date.now();
    this.refill(now);
    this.pruneGrants(now);

    const tokenWait = this.tokens >= 1 - 1e-9 ? 0 : Math.ceil((1 - this.tokens) / this.refillPerMs);
    const windowWait =
      this.grants.length < this.options.capacity ? 0 : this.grants[0] + this.options.periodMs - now;

    return Math.max(1, tokenWait, windowWait);
  }

  private schedule(): void {
    if (this.timer || this.waiters.length === 0) return;
    this.timer = setTimeout(() => this.drain(), this.msUntilNextSlot());
  }

  private drain(): void {
    this.timer = null;

    while (this.waiters.length > 0 && this.tryTake()) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      waiter.resolve(true);
    }

    this.schedule();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

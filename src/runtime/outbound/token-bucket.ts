import { abortReason } from "../core/async";

export interface TokenBucketOptions {
  ratePerSecond: number;
  burst: number;
  now?: () => number;
}

type Waiter = {
  resolve: () => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

const WINDOW_MS = 1_000;

/**
 * FIFO token bucket. `acquire` waits for a token instead of failing, so a
 * burst above the ceiling is spread out over time.
 *
 * Grants are also logged over a sliding one-second window capped at
 * `floor(ratePerSecond)` (at least 1): a full bucket plus its refill can never
 * push a window past the configured rate.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  /** Grant times inside the current window, oldest first */
  private grants: number[] = [];
  private readonly windowCap: number;
  private pausedUntil = 0;
  private waiters: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private closedReason: Error | null = null;
  private readonly now: () => number;

  constructor(private readonly options: TokenBucketOptions) {
    if (options.ratePerSecond <= 0 || options.burst < 1) {
      throw new RangeError("Token bucket needs a positive rate and a burst of at least 1");
    }
    this.now = options.now ?? (() => Date.now());
    this.tokens = options.burst;
    this.lastRefill = this.now();
    this.windowCap = Math.max(1, Math.floor(options.ratePerSecond));
  }

  get queued(): number {
    return this.waiters.length;
  }

  tryTake(): boolean {
    this.refill();
    const now = this.now();
    if (this.waiters.length > 0 || !this.canGrant(now)) {
      return false;
    }
    this.take(now);
    return true;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (this.closedReason) {
      return Promise.reject(this.closedReason);
    }
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    if (this.tryTake()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter((item) => item !== waiter);
          reject(abortReason(signal));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
      this.schedule();
    });
  }

  /** Holds every token for `ms`, used when the platform still answers 429. */
  pause(ms: number): void {
    this.pausedUntil = Math.max(this.pausedUntil, this.now() + ms);
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.schedule();
  }

  close(reason: Error): void {
    this.closedReason = reason;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    for (const waiter of this.waiters.splice(0)) {
      this.detach(waiter);
      waiter.reject(reason);
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) {
      return;
    }
    this.tokens = Math.min(
      this.options.burst,
      this.tokens + (elapsed * this.options.ratePerSecond) / 1000,
    );
    this.lastRefill = now;
  }

  private schedule(): void {
    if (this.timer || this.waiters.length === 0) {
      return;
    }
    this.refill();
    const now = this.now();
    while (this.waiters.length > 0 && this.canGrant(now)) {
      const waiter = this.waiters.shift();
      if (!waiter) {
        break;
      }
      this.take(now);
      this.detach(waiter);
      waiter.resolve();
    }
    if (this.waiters.length === 0) {
      return;
    }
    const untilToken =
      this.tokens >= 1 ? 0 : Math.ceil(((1 - this.tokens) * 1000) / this.options.ratePerSecond);
    const oldest = this.grants[0];
    const untilWindow =
      this.grants.length >= this.windowCap && oldest !== undefined ? oldest + WINDOW_MS - now : 0;
    const wait = Math.max(1, untilToken, untilWindow, this.pausedUntil - now);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.schedule();
    }, wait);
  }

  private canGrant(now: number): boolean {
    this.trimWindow(now);
    return this.tokens >= 1 && this.grants.length < this.windowCap && now >= this.pausedUntil;
  }

  private take(now: number): void {
    this.tokens -= 1;
    this.grants.push(now);
  }

  private trimWindow(now: number): void {
    while (this.grants.length > 0 && (this.grants[0] ?? now) <= now - WINDOW_MS) {
      this.grants.shift();
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }
}

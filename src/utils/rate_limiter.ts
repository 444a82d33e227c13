import type { NextFunction, Request, Response } from "express";
import { sleep } from "./retry.js";
import { TooManyRequestsError } from "./errors.js";

export interface RateLimiterOptions {
  /** Requests admitted per window and key. */
  limit: number;
  windowMs: number;
  now?: () => number;
}

/**
 * Sliding-window request counter. Every key keeps the timestamps of the
 * requests it admitted during the last `windowMs`; a request is rejected
 * while that list holds `limit` entries.
 *
 * Acquisition is synchronous, so concurrent callers on the event loop never
 * observe a half-updated window.
 */
export class SlidingWindowRateLimiter {
  readonly limit: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly windows = new Map<string, number[]>();

  constructor({ limit, windowMs, now = Date.now }: RateLimiterOptions) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    if (windowMs <= 0) {
      throw new RangeError(`windowMs must be positive, got ${windowMs}`);
    }
    this.limit = limit;
    this.windowMs = windowMs;
    this.now = now;
  }

  tryAcquire(key = "global"): boolean {
    const now = this.now();
    const window = this.prune(key, now);

    if (window.length >= this.limit) return false;

    window.push(now);
    this.windows.set(key, window);
    return true;
  }

  /** Milliseconds until a slot frees up for `key`; 0 when one is free now. */
  retryAfterMs(key = "global"): number {
    const now = this.now();
    const window = this.prune(key, now);
    if (window.length < this.limit) return 0;
    return Math.max(0, window[0] + this.windowMs - now);
  }

  /** Requests admitted for `key` inside the current window. */
  count(key = "global"): number {
    return this.prune(key, this.now()).length;
  }

  async wait(key = "global"): Promise<void> {
    while (!this.tryAcquire(key)) {
      await sleep(Math.max(1, this.retryAfterMs(key)));
    }
  }

  reset(key?: string): void {
    if (key === undefined) this.windows.clear();
    else this.windows.delete(key);
  }

  private prune(key: string, now: number): number[] {
    const window = this.windows.get(key);
    if (!window) return [];

    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < window.length && window[expired] <= cutoff) expired++;
    if (expired > 0) window.splice(0, expired);

    if (window.length === 0) {
      this.windows.delete(key);
      return [];
    }
    return window;
  }
}

/**
 * Express middleware: once `keyOf(req, res)` has used up its window, forwards a
 * TooManyRequestsError carrying the wait in whole seconds.
 */
export const rateLimit = (
  limiter: SlidingWindowRateLimiter,
  keyOf: (req: Request, res: Response) => string
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyOf(req, res);
    if (limiter.tryAcquire(key)) return next();

    const retryAfter = Math.max(1, Math.ceil(limiter.retryAfterMs(key) / 1000));
    req.log?.warn({ key, retryAfter }, "Rate limit exceeded");
    return next(new TooManyRequestsError(retryAfter));
  };
};

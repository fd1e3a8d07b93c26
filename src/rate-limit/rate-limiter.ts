import { getConfig } from "../config/index.js";
import { InvalidParametersError, RateLimitExceededError } from "../errors/index.js";
import { getLogger } from "../logging/index.js";

const logger = getLogger("rate-limiter");

export interface RateLimiterOptions {
  maxCalls: number;
  windowMs: number;
  /** Longest a single caller may wait for a slot before being rejected. */
  maxWaitMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterState {
  windowStart: number | null;
  callsInWindow: number;
  maxCalls: number;
  windowMs: number;
  maxWaitMs: number;
  totalAdmitted: number;
  totalDelayed: number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Rolling-window admission control shared by every client of a process.
 * Admits at most `maxCalls` calls inside any `windowMs` interval. Waiting
 * callers are not served in arrival order.
 */
export class RateLimiter {
  private readonly maxCalls: number;
  private readonly windowMs: number;
  private readonly maxWaitMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private admitted: number[] = [];
  private totalAdmitted = 0;
  private totalDelayed = 0;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxCalls) || options.maxCalls < 1) {
      throw new InvalidParametersError("maxCalls", "must be a positive integer", options.maxCalls);
    }
    if (options.windowMs <= 0) {
      throw new InvalidParametersError("windowMs", "must be positive", options.windowMs);
    }
    if (options.maxWaitMs < 0) {
      throw new InvalidParametersError("maxWaitMs", "must not be negative", options.maxWaitMs);
    }
    this.maxCalls = options.maxCalls;
    this.windowMs = options.windowMs;
    this.maxWaitMs = options.maxWaitMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async acquire(label = "execute"): Promise<void> {
    const startedAt = this.now();
    let delayed = false;

    for (;;) {
      const now = this.now();
      this.prune(now);

      if (this.admitted.length < this.maxCalls) {
        this.admitted.push(now);
        this.totalAdmitted++;
        if (delayed) {
          logger.debug({ label, waitedMs: now - startedAt }, "Call admitted after waiting");
        }
        return;
      }

      const oldest = this.admitted[0] ?? now;
      const waitMs = Math.max(oldest + this.windowMs - now, 1);
      const waitedMs = now - startedAt;

      if (waitedMs + waitMs > this.maxWaitMs) {
        logger.warn(
          { label, waitedMs, waitMs, maxWaitMs: this.maxWaitMs },
          "Rate limit wait budget exhausted"
        );
        throw new RateLimitExceededError(this.maxCalls, this.windowMs, waitedMs, waitMs);
      }

      if (!delayed) {
        delayed = true;
        this.totalDelayed++;
        logger.debug(
          { label, waitMs, callsInWindow: this.admitted.length, maxCalls: this.maxCalls },
          "Rate limit reached, delaying call"
        );
      }

      await this.sleep(waitMs);
    }
  }

  getState(): RateLimiterState {
    this.prune(this.now());
    return {
      windowStart: this.admitted[0] ?? null,
      callsInWindow: this.admitted.length,
      maxCalls: this.maxCalls,
      windowMs: this.windowMs,
      maxWaitMs: this.maxWaitMs,
      totalAdmitted: this.totalAdmitted,
      totalDelayed: this.totalDelayed,
    };
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.admitted.length && (this.admitted[expired] ?? now) <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      this.admitted = this.admitted.slice(expired);
    }
  }
}

let limiterInstance: RateLimiter | null = null;

export function getRateLimiter(): RateLimiter {
  if (limiterInstance === null) {
    const { rateLimit } = getConfig();
    limiterInstance = new RateLimiter(rateLimit);
  }
  return limiterInstance;
}

export function resetRateLimiter(): void {
  limiterInstance = null;
}

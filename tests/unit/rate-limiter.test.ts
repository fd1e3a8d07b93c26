import { describe, it, expect, beforeEach } from "@jest/globals";
import { InvalidParametersError, RateLimitExceededError } from "../../src/errors/index.js";
import { RateLimiter } from "../../src/rate-limit/index.js";

describe("RateLimiter", () => {
  let now: number;
  let sleeps: number[];

  const createLimiter = (maxCalls: number, windowMs: number, maxWaitMs: number): RateLimiter =>
    new RateLimiter({
      maxCalls,
      windowMs,
      maxWaitMs,
      now: () => now,
      sleep: async (ms) => {
        sleeps.push(ms);
        now += ms;
      },
    });

  beforeEach(() => {
    now = 0;
    sleeps = [];
  });

  it("admits calls up to the quota without waiting", async () => {
    const limiter = createLimiter(3, 1000, 5000);

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(sleeps).toEqual([]);
    expect(limiter.getState()).toMatchObject({ callsInWindow: 3, windowStart: 0, totalAdmitted: 3 });
  });

  it("delays the call over quota until the oldest call leaves the window", async () => {
    const limiter = createLimiter(3, 1000, 5000);
    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    now = 400;
    await limiter.acquire();

    expect(sleeps).toEqual([600]);
    expect(now).toBe(1000);
    expect(limiter.getState()).toMatchObject({
      callsInWindow: 1,
      windowStart: 1000,
      totalAdmitted: 4,
      totalDelayed: 1,
    });
  });

  it("uses a rolling window rather than fixed buckets", async () => {
    const limiter = createLimiter(3, 1000, 5000);
    await limiter.acquire();
    now = 500;
    await limiter.acquire();
    now = 900;
    await limiter.acquire();

    now = 1000;
    await limiter.acquire();
    expect(sleeps).toEqual([]);

    await limiter.acquire();
    expect(sleeps).toEqual([500]);
    expect(now).toBe(1500);
  });

  it("rejects a call that would wait longer than the budget", async () => {
    const limiter = createLimiter(1, 1000, 500);
    await limiter.acquire();

    await expect(limiter.acquire()).rejects.toBeInstanceOf(RateLimitExceededError);
    expect(sleeps).toEqual([]);
    expect(limiter.getState().totalAdmitted).toBe(1);
  });

  it("refuses a quota below one", () => {
    expect(() => createLimiter(0, 1000, 1000)).toThrow(InvalidParametersError);
    expect(() => createLimiter(1.5, 1000, 1000)).toThrow("Invalid parameter 'maxCalls': must be a positive integer");
  });

  it("refuses an empty window or a negative wait budget", () => {
    expect(() => createLimiter(1, 0, 1000)).toThrow("Invalid parameter 'windowMs': must be positive");
    expect(() => createLimiter(1, 1000, -1)).toThrow("Invalid parameter 'maxWaitMs': must not be negative");
  });
});

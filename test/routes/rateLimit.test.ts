/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * rateLimit.test.ts: Tests for the per-client token bucket.
 */
import { describe, expect, it } from "vitest";
import { RateLimiter } from "../../src/routes/rateLimit.js";

describe("RateLimiter", () => {

  it("should allow the per-minute limit at once and then refuse", () => {

    const limiter = new RateLimiter(2, () => 0);

    expect(limiter.take("198.51.100.1")).toEqual({ allowed: true, remaining: 1, retryAfterMs: 0 });
    expect(limiter.take("198.51.100.1")).toEqual({ allowed: true, remaining: 0, retryAfterMs: 0 });
    expect(limiter.take("198.51.100.1")).toEqual({ allowed: false, remaining: 0, retryAfterMs: 30000 });
  });

  it("should keep a bucket per client", () => {

    const limiter = new RateLimiter(1, () => 0);

    expect(limiter.take("198.51.100.1").allowed).toBe(true);
    expect(limiter.take("198.51.100.1").allowed).toBe(false);
    expect(limiter.take("198.51.100.2")).toEqual({ allowed: true, remaining: 0, retryAfterMs: 0 });
  });

  it("should refill continuously up to the limit", () => {

    let now = 0;
    const limiter = new RateLimiter(2, () => now);

    limiter.take("198.51.100.1");
    limiter.take("198.51.100.1");

    now = 30000;

    expect(limiter.take("198.51.100.1")).toEqual({ allowed: true, remaining: 0, retryAfterMs: 0 });

    now = 1000000;

    expect(limiter.take("198.51.100.1")).toEqual({ allowed: true, remaining: 1, retryAfterMs: 0 });
  });
});

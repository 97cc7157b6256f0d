/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * rateLimit.ts: Per-client request rate limiting for StreamFetch.
 */
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { LOG } from "../utils/index.js";

/* Each client gets a token bucket per limited route group, holding up to the per-minute limit and refilling continuously at that rate. A request takes one token;
 * a client with an empty bucket is answered 429 with Retry-After set to the time until the next token. Clients are told apart by req.ip, which follows
 * X-Forwarded-For because the app trusts its proxy. Buckets live in memory, so limits are per process and reset on restart.
 */

// Buckets that have refilled completely are dropped once this many clients are tracked.
const MAX_TRACKED_CLIENTS = 10000;

export interface RateLimitDecision {

  allowed: boolean;

  // Whole tokens left after this request.
  remaining: number;

  // Time until the next token when the request was refused, otherwise zero.
  retryAfterMs: number;
}

interface Bucket {

  tokens: number;
  updatedAt: number;
}

export class RateLimiter {

  private readonly buckets: Map<string, Bucket>;
  private readonly capacity: number;
  private readonly now: () => number;

  // Tokens per millisecond.
  private readonly rate: number;

  constructor(perMinute: number, now: () => number = Date.now) {

    this.buckets = new Map();
    this.capacity = perMinute;
    this.now = now;
    this.rate = perMinute / 60000;
  }

  /**
   * Takes a token from a client's bucket.
   * @param key - The client.
   * @returns Whether the request may proceed.
   */
  take(key: string): RateLimitDecision {

    const now = this.now();
    const bucket = this.refill(this.buckets.get(key), now);

    if(!this.buckets.has(key) && (this.buckets.size >= MAX_TRACKED_CLIENTS)) {

      this.prune(now);
    }

    this.buckets.set(key, bucket);

    if(bucket.tokens < 1) {

      return { allowed: false, remaining: 0, retryAfterMs: Math.ceil((1 - bucket.tokens) / this.rate) };
    }

    bucket.tokens -= 1;

    return { allowed: true, remaining: Math.floor(bucket.tokens), retryAfterMs: 0 };
  }

  private refill(bucket: Bucket | undefined, now: number): Bucket {

    if(!bucket) {

      return { tokens: this.capacity, updatedAt: now };
    }

    return { tokens: Math.min(this.capacity, bucket.tokens + (Math.max(0, now - bucket.updatedAt) * this.rate)), updatedAt: now };
  }

  private prune(now: number): void {

    for(const [ key, bucket ] of this.buckets) {

      if(this.refill(bucket, now).tokens >= this.capacity) {

        this.buckets.delete(key);
      }
    }
  }
}

/**
 * Creates middleware limiting each client to a number of requests per minute.
 * @param group - Name of the limited route group, used in logs.
 * @param perMinute - Requests allowed per client per minute. Zero disables the limit.
 * @returns The middleware.
 */
export function rateLimit(group: string, perMinute: number): RequestHandler {

  if(perMinute <= 0) {

    return (_req: Request, _res: Response, next: NextFunction): void => {

      next();
    };
  }

  const limiter = new RateLimiter(perMinute);

  return (req: Request, res: Response, next: NextFunction): void => {

    const client = req.ip ?? "unknown";
    const decision = limiter.take(client);

    res.setHeader("X-RateLimit-Limit", String(perMinute));
    res.setHeader("X-RateLimit-Remaining", String(decision.remaining));

    if(decision.allowed) {

      next();

      return;
    }

    LOG.debug("http", "Refused a %s request from %s: over %s per minute.", group, client, perMinute);

    res.setHeader("Retry-After", String(Math.max(1, Math.ceil(decision.retryAfterMs / 1000))));
    res.status(429).json({ error: { kind: "RateLimited", message: [ "Too many requests. The limit is ", String(perMinute), " per minute." ].join(""),
      retryable: true } });
  };
}

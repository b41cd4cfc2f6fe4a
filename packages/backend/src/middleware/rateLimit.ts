import type { NextFunction, Request, RequestHandler, Response } from "express";

import { RateLimitError } from "../lib/errors.js";

export interface RateLimitOptions {
  maxRequests: number;
  windowMs: number;
  now?: () => number;
}

export interface RateLimitCheckResult {
  allowed: boolean;
  retryAfterMs: number;
}

/** Sliding window of request times per key. */
export class SlidingWindowLimiter {
  private readonly hits = new Map<string, number[]>();

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number
  ) {}

  check(key: string, now: number): RateLimitCheckResult {
    const recent = (this.hits.get(key) ?? []).filter((at) => now - at < this.windowMs);
    if (recent.length >= this.maxRequests) {
      this.hits.set(key, recent);
      return { allowed: false, retryAfterMs: this.windowMs - (now - recent[0]) };
    }
    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true, retryAfterMs: 0 };
  }
}

export function rateLimit({ maxRequests, windowMs, now = Date.now }: RateLimitOptions): RequestHandler {
  const limiter = new SlidingWindowLimiter(maxRequests, windowMs);
  return (req: Request, res: Response, next: NextFunction) => {
    const result = limiter.check(req.ip ?? "unknown", now());
    if (!result.allowed) {
      const retryAfter = Math.max(1, Math.ceil(result.retryAfterMs / 1000));
      res.setHeader("Retry-After", String(retryAfter));
      next(new RateLimitError(retryAfter));
      return;
    }
    next();
  };
}

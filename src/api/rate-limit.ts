/**
 * Per-client sliding-window rate limiting for the task endpoints.
 *
 * State lives in process memory, so limits apply per instance.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { apiError, rateLimitError } from '../domain/errors';

export interface RateLimitOptions {
  /** Requests allowed per client within the window. Default: 60 */
  maxRequests?: number;
  /** Default: 60_000 */
  windowMs?: number;
  now?: () => number;
  /** Client key; defaults to the remote address. */
  keyFor?: (req: Request) => string;
}

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterMs: number };

export class SlidingWindowLimiter {
  private readonly hits = new Map<string, number[]>();

  constructor(
    readonly maxRequests: number,
    readonly windowMs: number,
  ) {}

  /** Record a request from `key` at `at` unless it is over the limit. */
  hit(key: string, at: number): RateLimitDecision {
    const live = this.live(key, at);
    const oldest = live[0];
    if (live.length >= this.maxRequests && oldest !== undefined) {
      return { allowed: false, retryAfterMs: oldest + this.windowMs - at };
    }
    live.push(at);
    this.hits.set(key, live);
    return { allowed: true, remaining: this.maxRequests - live.length };
  }

  /** Forget clients with no request inside the window. */
  prune(at: number): void {
    for (const key of [...this.hits.keys()]) {
      const live = this.live(key, at);
      if (live.length === 0) {
        this.hits.delete(key);
      } else {
        this.hits.set(key, live);
      }
    }
  }

  get trackedClients(): number {
    return this.hits.size;
  }

  private live(key: string, at: number): number[] {
    const cutoff = at - this.windowMs;
    return (this.hits.get(key) ?? []).filter((t) => t > cutoff);
  }
}

/**
 * Middleware answering 429 with a typed error once a client is over the
 * limit. Sets RateLimit-Limit, RateLimit-Remaining and Retry-After.
 */
export function rateLimit(options: RateLimitOptions = {}): RequestHandler {
  const limiter = new SlidingWindowLimiter(options.maxRequests ?? 60, options.windowMs ?? 60_000);
  const now = options.now ?? Date.now;
  const keyFor = options.keyFor ?? ((req: Request) => req.ip ?? req.socket.remoteAddress ?? 'unknown');

  const pruneTimer = setInterval(() => limiter.prune(now()), limiter.windowMs);
  pruneTimer.unref();

  return (req: Request, res: Response, next: NextFunction) => {
    const decision = limiter.hit(keyFor(req), now());
    res.set('RateLimit-Limit', String(limiter.maxRequests));

    if (!decision.allowed) {
      res.set('RateLimit-Remaining', '0');
      res.set('Retry-After', String(Math.ceil(decision.retryAfterMs / 1000)));
      res.status(429).json(apiError(rateLimitError(decision.retryAfterMs)));
      return;
    }

    res.set('RateLimit-Remaining', String(decision.remaining));
    next();
  };
}

import { Response, NextFunction, RequestHandler } from 'express';
import { AuthenticatedRequest } from './auth';
import { config, RateLimitConfig } from '../config';
import { ApiError } from '../types/api';
import Logger from '../utils/logger';

interface RateLimitEntry {
  requests: number;
  resetTime: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number;
}

/** Fixed-window request counter per client id. */
export class RateLimiter {
  private clients = new Map<string, RateLimitEntry>();

  constructor(
    readonly maxRequests: number,
    readonly windowMs: number,
    cleanupIntervalMs: number
  ) {
    setInterval(() => this.cleanup(), cleanupIntervalMs).unref();
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [clientId, entry] of this.clients.entries()) {
      if (entry.resetTime < now) {
        this.clients.delete(clientId);
      }
    }
  }

  check(clientId: string, now = Date.now()): RateLimitResult {
    const entry = this.clients.get(clientId);

    if (!entry || entry.resetTime < now) {
      const resetTime = now + this.windowMs;
      this.clients.set(clientId, { requests: 1, resetTime });
      return { allowed: true, remaining: this.maxRequests - 1, resetTime };
    }

    if (entry.requests >= this.maxRequests) {
      return { allowed: false, remaining: 0, resetTime: entry.resetTime };
    }

    entry.requests++;
    return {
      allowed: true,
      remaining: this.maxRequests - entry.requests,
      resetTime: entry.resetTime
    };
  }
}

export function createRateLimit(settings: RateLimitConfig): RequestHandler {
  const limiter = new RateLimiter(settings.maxRequests, settings.windowMs, settings.cleanupIntervalMs);

  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const clientId = req.clientId || 'unknown';
    const result = limiter.check(clientId);

    res.set({
      'X-RateLimit-Limit': limiter.maxRequests.toString(),
      'X-RateLimit-Remaining': result.remaining.toString(),
      'X-RateLimit-Reset': Math.ceil(result.resetTime / 1000).toString()
    });

    if (!result.allowed) {
      Logger.logSecurityEvent('rate_limit_exceeded', { clientId, path: req.path });
      const error: ApiError = {
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: `Rate limit exceeded. Maximum ${limiter.maxRequests} requests per ${limiter.windowMs / 1000} seconds.`,
          details: {
            limit: limiter.maxRequests,
            remaining: 0,
            resetTime: new Date(result.resetTime).toISOString()
          },
          requestId: req.requestId ?? Logger.generateRequestId()
        }
      };
      res.status(429).json(error);
      return;
    }

    next();
  };
}

export const rateLimit = createRateLimit(config.rateLimit);

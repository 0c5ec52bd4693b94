/**
 * Rate Limit Middleware
 * Express middleware for rate limiting requests
 */

import { NextFunction, Request, Response } from 'express';
import { RateLimitConfig, RateLimitManager } from '../lib/rate-limit';

/**
 * Default key generator - uses IP address
 */
function defaultKeyGenerator(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const ip = forwarded
    ? Array.isArray(forwarded)
      ? forwarded[0]
      : forwarded.split(',')[0].trim()
    : req.socket.remoteAddress || 'unknown';
  return `ip:${ip}`;
}

/**
 * Create rate limit middleware; internal errors let the request through
 */
export function rateLimitMiddleware(config: RateLimitConfig, manager: RateLimitManager = new RateLimitManager()) {
  const keyGenerator = config.keyGenerator || defaultKeyGenerator;
  const standardHeaders = config.standardHeaders !== false;
  const legacyHeaders = config.legacyHeaders !== false;

  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const key = keyGenerator(req);
      const result = manager.checkLimit(key, config);
      const resetTimeSeconds = Math.ceil(result.resetTime / 1000);

      if (standardHeaders) {
        res.setHeader('RateLimit-Limit', config.maxRequests.toString());
        res.setHeader('RateLimit-Remaining', result.remaining.toString());
        res.setHeader('RateLimit-Reset', resetTimeSeconds.toString());
      }

      if (legacyHeaders) {
        res.setHeader('X-RateLimit-Limit', config.maxRequests.toString());
        res.setHeader('X-RateLimit-Remaining', result.remaining.toString());
        res.setHeader('X-RateLimit-Reset', resetTimeSeconds.toString());
      }

      if (!result.allowed) {
        const retryAfter = Math.max(0, Math.ceil((result.resetTime - Date.now()) / 1000));
        res.setHeader('Retry-After', retryAfter.toString());

        res.status(429).json({
          success: false,
          error: config.message || 'Too many requests, please try again later.',
          retryAfter,
          resetTime: result.resetTime,
        });
        return;
      }

      next();
    } catch (error) {
      console.error('Rate limit middleware error:', error);
      next();
    }
  };
}

/**
 * Rate Limit Manager
 * In-memory sliding window keyed by client
 */

import { RateLimitConfig, RateLimitResult, RateLimitStats } from './rate-limit.types';

const PRUNE_EVERY = 1000;

export class RateLimitManager {
  private windows = new Map<string, number[]>();
  private stats = {
    totalRequests: 0,
    blockedRequests: 0,
  };

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Count a request against `key`; rejected requests are not recorded
   */
  checkLimit(key: string, config: Pick<RateLimitConfig, 'windowMs' | 'maxRequests'>): RateLimitResult {
    this.stats.totalRequests++;
    if (this.stats.totalRequests % PRUNE_EVERY === 0) {
      this.prune(config.windowMs);
    }

    const now = this.now();
    const windowStart = now - config.windowMs;
    const timestamps = (this.windows.get(key) ?? []).filter((ts) => ts > windowStart);

    const allowed = timestamps.length < config.maxRequests;
    if (allowed) {
      timestamps.push(now);
    } else {
      this.stats.blockedRequests++;
    }
    this.windows.set(key, timestamps);

    const oldest = timestamps[0] ?? now;
    return {
      allowed,
      remaining: Math.max(0, config.maxRequests - timestamps.length),
      resetTime: oldest + config.windowMs,
      totalRequests: timestamps.length,
    };
  }

  /**
   * Drop keys whose whole window has expired
   */
  private prune(windowMs: number): void {
    const windowStart = this.now() - windowMs;
    for (const [key, timestamps] of this.windows.entries()) {
      if (timestamps.every((ts) => ts <= windowStart)) {
        this.windows.delete(key);
      }
    }
  }

  getStats(): RateLimitStats {
    return {
      totalRequests: this.stats.totalRequests,
      blockedRequests: this.stats.blockedRequests,
      activeKeys: this.windows.size,
    };
  }

  clear(): void {
    this.windows.clear();
    this.stats = { totalRequests: 0, blockedRequests: 0 };
  }
}

/**
 * Rate Limit Types
 */

import { Request } from 'express';

export interface RateLimitConfig {
  windowMs: number; // Sliding window length
  maxRequests: number; // Requests allowed per window and key
  keyGenerator?: (req: Request) => string;
  message?: string;
  standardHeaders?: boolean; // RateLimit-*
  legacyHeaders?: boolean; // X-RateLimit-*
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number; // Epoch ms when the oldest counted request leaves the window
  totalRequests: number;
}

export interface RateLimitStats {
  totalRequests: number;
  blockedRequests: number;
  activeKeys: number;
}

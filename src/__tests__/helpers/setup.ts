/**
 * Jest setup: deterministic environment before any module reads config/env
 */

process.env.NODE_ENV = 'test';
process.env.RATE_LIMIT_ENABLED = 'false';
process.env.LINK_CHECK_DELAY_MS = '0';
process.env.HEADLESS = 'true';
delete process.env.YOUTUBE_API_KEY;

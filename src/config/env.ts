import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Browser
  HEADLESS: process.env.HEADLESS !== 'false', // Default true
  BROWSER_EXECUTABLE_PATH: process.env.BROWSER_EXECUTABLE_PATH || undefined,
  PAGE_TIMEOUT_SECONDS: parseInt(process.env.PAGE_TIMEOUT_SECONDS || '30', 10),
  BROWSER_USER_AGENT:
    process.env.BROWSER_USER_AGENT ||
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',

  // HTTP link checks
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; WebAuditBot/1.0; +https://example.com/bot)',
  LINK_TIMEOUT_SECONDS: parseInt(process.env.LINK_TIMEOUT_SECONDS || '10', 10),
  LINK_CHECK_DELAY_MS: parseInt(process.env.LINK_CHECK_DELAY_MS || '500', 10), // Politeness delay between checks
  MAX_REDIRECTS: parseInt(process.env.MAX_REDIRECTS || '5', 10),

  // Crawler
  CRAWL_MAX_PAGES_LIMIT: parseInt(process.env.CRAWL_MAX_PAGES_LIMIT || '100', 10),

  // Lighthouse
  LIGHTHOUSE_PATH: process.env.LIGHTHOUSE_PATH || 'lighthouse',
  LIGHTHOUSE_TIMEOUT_SECONDS: parseInt(process.env.LIGHTHOUSE_TIMEOUT_SECONDS || '120', 10),

  // YouTube Data API
  YOUTUBE_API_KEY: process.env.YOUTUBE_API_KEY || undefined,
  YOUTUBE_API_BASE_URL: process.env.YOUTUBE_API_BASE_URL || 'https://www.googleapis.com/youtube/v3',

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
  RATE_LIMIT_MAX_REQUESTS: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10), // 100 requests per window
  RATE_LIMIT_ENABLED: process.env.RATE_LIMIT_ENABLED !== 'false', // Default true
} as const;

export default env;

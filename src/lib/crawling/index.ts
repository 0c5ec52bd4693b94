/**
 * Crawling System
 * Main export file for the site crawler and its URL utilities
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './link-discoverer';
export * from './crawling-queue';
export * from './crawling-statistics';
export * from './site-crawler';

/**
 * Crawling Types
 * Type definitions for the bounded breadth-first site crawler
 */

/**
 * Crawl options (tool arguments, already defaulted)
 */
export interface CrawlOptions {
  /**
   * Page budget; clamped to the configured ceiling
   */
  maxPages: number;

  /**
   * Run the browser without a window
   */
  headless: boolean;

  /**
   * Pause after each page load so deferred content can settle
   */
  waitTimeSeconds: number;

  /**
   * Per-page navigation and network-idle timeout
   */
  timeoutSeconds: number;
}

/**
 * Resource URLs by category, as written in the markup
 */
export interface PageResources {
  css: string[];
  js: string[];
  images: string[];
  media: string[];
}

export interface PageMetadata {
  description: string | null;
  keywords: string | null;
}

/**
 * One processed frontier entry; error pages carry empty collections
 */
export interface CrawledPage {
  url: string;
  title: string;
  status_code: number;
  links: string[];
  resources: PageResources;
  meta_data: PageMetadata;
  text_content: string;
  error: string | null;
}

export interface CrawlSummary {
  total_pages: number;
  total_links: number;
  total_resources: number;
  unique_domains: string[];
  crawl_time: number;
  errors: string[];
}

export interface SiteCrawlResult {
  summary: CrawlSummary;
  pages: CrawledPage[];
}

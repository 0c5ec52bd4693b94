/**
 * Crawling Statistics Tracker
 * Accumulates the crawl summary as pages complete
 */

import { roundTo } from '../utils/math';
import { CrawledPage, CrawlSummary } from './crawling.types';
import { countResources } from './link-discoverer';
import { getNetloc } from './url-normalizer';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pages: number = 0;
  private links: number = 0;
  private resources: number = 0;
  private domains: Set<string> = new Set();
  private errors: string[] = [];

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = this.now();
  }

  /**
   * Record a completed page; only successful pages contribute a domain
   */
  recordPage(page: CrawledPage): void {
    this.pages++;
    this.links += page.links.length;
    this.resources += countResources(page.resources);

    if (page.error === null) {
      const domain = getNetloc(page.url);
      if (domain) {
        this.domains.add(domain);
      }
    }
  }

  recordError(message: string): void {
    this.errors.push(message);
  }

  /**
   * Elapsed wall-clock seconds since the tracker was created
   */
  elapsedSeconds(): number {
    return (this.now() - this.startTime) / 1000;
  }

  getSummary(): CrawlSummary {
    return {
      total_pages: this.pages,
      total_links: this.links,
      total_resources: this.resources,
      unique_domains: Array.from(this.domains),
      crawl_time: roundTo(this.elapsedSeconds(), 2),
      errors: [...this.errors],
    };
  }
}

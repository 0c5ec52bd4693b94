/**
 * Site Crawler
 * Bounded breadth-first traversal of a single site through one reused browser tab
 */

import * as cheerio from 'cheerio';
import { env } from '../../config/env';
import { BrowserProvider, RenderedPage } from '../browser/browser.types';
import { errorMessage, fail, succeed, ToolResult } from '../tools/tool-result';
import { roundTo } from '../utils/math';
import { CrawlingQueue } from './crawling-queue';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { CrawledPage, CrawlOptions, SiteCrawlResult } from './crawling.types';
import { linkDiscoverer } from './link-discoverer';
import { INVALID_URL_MESSAGE, isValidHttpUrl, shouldCrawlUrl } from './url-normalizer';

export const DEFAULT_CRAWL_OPTIONS: CrawlOptions = {
  maxPages: 10,
  headless: true,
  waitTimeSeconds: 2,
  timeoutSeconds: 30,
};

const TEXT_CONTENT_LIMIT = 1000;

function errorPage(url: string, message: string): CrawledPage {
  return {
    url,
    title: 'Error',
    status_code: 0,
    links: [],
    resources: { css: [], js: [], images: [], media: [] },
    meta_data: { description: null, keywords: null },
    text_content: '',
    error: message,
  };
}

export class SiteCrawler {
  constructor(
    private readonly browser: BrowserProvider,
    private readonly maxPagesLimit: number = env.CRAWL_MAX_PAGES_LIMIT,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Crawl from `startUrl`, staying on its exact host, until the page budget
   * or the frontier runs out. Page failures are recorded, not thrown.
   */
  async crawl(startUrl: string, options: Partial<CrawlOptions> = {}): Promise<ToolResult<SiteCrawlResult>> {
    if (!isValidHttpUrl(startUrl)) {
      return fail(INVALID_URL_MESSAGE);
    }

    const resolved: CrawlOptions = {
      ...DEFAULT_CRAWL_OPTIONS,
      ...options,
    };
    resolved.maxPages = Math.min(resolved.maxPages, this.maxPagesLimit);

    const statistics = new CrawlingStatisticsTracker(this.now);

    try {
      const pages = await this.traverse(startUrl, resolved, statistics);
      return succeed({ summary: statistics.getSummary(), pages });
    } catch (error) {
      const message = errorMessage(error);
      console.error(`crawl_site: Crawl failed for ${startUrl}: ${message}`);
      return fail(`Crawl failed: ${message}`, {
        summary: {
          total_pages: 0,
          total_links: 0,
          total_resources: 0,
          unique_domains: [],
          crawl_time: roundTo(statistics.elapsedSeconds(), 2),
          errors: [message],
        },
        pages: [],
      });
    }
  }

  private async traverse(
    startUrl: string,
    options: CrawlOptions,
    statistics: CrawlingStatisticsTracker
  ): Promise<CrawledPage[]> {
    const timeoutMs = options.timeoutSeconds * 1000;
    const frontier = new CrawlingQueue([startUrl]);
    const visited = new Set<string>();
    const pages: CrawledPage[] = [];

    const session = await this.browser.launch({ headless: options.headless });
    try {
      const page = await session.newPage({ defaultTimeoutMs: timeoutMs });
      try {
        while (!frontier.isEmpty() && visited.size < options.maxPages) {
          const currentUrl = frontier.dequeue();
          if (currentUrl === null) break;
          if (visited.has(currentUrl)) continue;

          visited.add(currentUrl);
          console.log(`crawl_site: Crawling ${currentUrl}`);

          const result = await this.visit(page, currentUrl, options, statistics);
          pages.push(result);
          statistics.recordPage(result);

          for (const link of result.links) {
            if (shouldCrawlUrl(link, startUrl, visited, options.maxPages)) {
              frontier.enqueue(link);
            }
          }
        }
      } finally {
        await page.close();
      }
    } finally {
      await session.close();
    }

    return pages;
  }

  private async visit(
    page: RenderedPage,
    url: string,
    options: CrawlOptions,
    statistics: CrawlingStatisticsTracker
  ): Promise<CrawledPage> {
    const timeoutMs = options.timeoutSeconds * 1000;

    try {
      const status = await page.goto(url, { timeoutMs });
      await page.waitForNetworkIdle(timeoutMs);
      await page.settle(options.waitTimeSeconds * 1000);

      const title = (await page.title()) || 'No Title';
      const $ = cheerio.load(await page.content());

      let textContent = '';
      try {
        textContent = (await page.bodyText()).slice(0, TEXT_CONTENT_LIMIT);
      } catch (error) {
        console.warn(`crawl_site: No body text for ${url}: ${errorMessage(error)}`);
      }

      return {
        url,
        title,
        status_code: status ?? 0,
        links: linkDiscoverer.discoverLinks($, url),
        resources: linkDiscoverer.discoverResources($),
        meta_data: linkDiscoverer.discoverMetadata($),
        text_content: textContent,
        error: null,
      };
    } catch (error) {
      const message = errorMessage(error);
      const line = `Error crawling ${url}: ${message}`;
      console.error(`crawl_site: ${line}`);
      statistics.recordError(line);
      return errorPage(url, message);
    }
  }
}

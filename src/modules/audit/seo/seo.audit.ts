/**
 * SEO Audit Service
 * Page-level SEO checks: basic page facts, meta tag coverage, image alt text
 * and navigation timing, plus a combined quick audit
 */

import { env } from '../../../config/env';
import { BrowserProvider } from '../../../lib/browser';
import { normalizeUrl } from '../../../lib/crawling/url-normalizer';
import { errorMessage, fail, succeed, toWire, ToolResult } from '../../../lib/tools/tool-result';
import { roundTo } from '../../../lib/utils/math';
import { LoadedPage, withLoadedPage } from '../audit.utils';
import { buildSeoRecommendations, overallSeoScore } from './seo.scoring';
import {
  ImageAltReport,
  META_TAG_NAMES,
  META_TAG_SELECTORS,
  MetaTagName,
  MetaTagsReport,
  PageInfo,
  PagePerformanceReport,
  QuickSeoAuditReport,
  ResourceCounts,
  TimingMetrics,
} from './seo.types';

const LAZY_CONTENT_WAIT_MS = 2000;
const MISSING_ALT_SAMPLE = 10;

type Extractor<T> = (loaded: LoadedPage) => Promise<T>;

const ERROR_PREFIX = {
  pageInfo: 'Error analyzing',
  metaTags: 'Error checking meta tags for',
  images: 'Error checking images for',
  performance: 'Error checking performance for',
} as const;

type CheckResults = [
  ToolResult<PageInfo>,
  ToolResult<MetaTagsReport>,
  ToolResult<ImageAltReport>,
  ToolResult<PagePerformanceReport>,
];

function dataOrNull<T>(result: ToolResult<T>): T | null {
  return result.ok ? result.data : null;
}

export class SeoAuditService {
  constructor(
    private readonly browser: BrowserProvider,
    private readonly timeoutSeconds: number = env.PAGE_TIMEOUT_SECONDS
  ) {}

  // ==========================================================================
  // Single checks (one page load each)
  // ==========================================================================

  getPageInfo(url: string): Promise<ToolResult<PageInfo>> {
    return this.runCheck(url, ERROR_PREFIX.pageInfo, (loaded) => this.extractPageInfo(loaded));
  }

  checkMetaTags(url: string): Promise<ToolResult<MetaTagsReport>> {
    return this.runCheck(url, ERROR_PREFIX.metaTags, (loaded) => this.extractMetaTags(loaded));
  }

  getImagesWithoutAlt(url: string): Promise<ToolResult<ImageAltReport>> {
    return this.runCheck(url, ERROR_PREFIX.images, (loaded) => this.extractImageAlt(loaded));
  }

  checkPagePerformance(url: string): Promise<ToolResult<PagePerformanceReport>> {
    return this.runCheck(url, ERROR_PREFIX.performance, (loaded) => this.extractPerformance(loaded));
  }

  // ==========================================================================
  // Combined audit
  // ==========================================================================

  /**
   * Load the page once and run the four checks against it concurrently.
   * A failed check leaves its error in place and drops out of the score.
   */
  async quickSeoAudit(url: string): Promise<ToolResult<QuickSeoAuditReport>> {
    try {
      console.log(`quick_seo_audit: Auditing ${url}`);
      const [pageInfo, metaTags, images, performance] = await this.runAllChecks(url);

      const available = [
        dataOrNull(pageInfo),
        dataOrNull(metaTags),
        dataOrNull(images),
        dataOrNull(performance),
      ] as const;

      return succeed({
        url,
        overall_seo_score: overallSeoScore(...available),
        page_info: toWire(pageInfo),
        meta_tags: toWire(metaTags),
        images_audit: toWire(images),
        performance: toWire(performance),
        recommendations: buildSeoRecommendations(...available),
      });
    } catch (error) {
      return fail(`Error performing SEO audit for ${url}: ${errorMessage(error)}`);
    }
  }

  private async runAllChecks(url: string): Promise<CheckResults> {
    try {
      return await this.load(url, (loaded) =>
        Promise.all([
          this.attempt(url, ERROR_PREFIX.pageInfo, () => this.extractPageInfo(loaded)),
          this.attempt(url, ERROR_PREFIX.metaTags, () => this.extractMetaTags(loaded)),
          this.attempt(url, ERROR_PREFIX.images, () => this.extractImageAlt(loaded)),
          this.attempt(url, ERROR_PREFIX.performance, () => this.extractPerformance(loaded)),
        ])
      );
    } catch (error) {
      const message = errorMessage(error);
      console.error(`quick_seo_audit: Failed to load ${url}: ${message}`);
      return [
        fail(`${ERROR_PREFIX.pageInfo} ${url}: ${message}`),
        fail(`${ERROR_PREFIX.metaTags} ${url}: ${message}`),
        fail(`${ERROR_PREFIX.images} ${url}: ${message}`),
        fail(`${ERROR_PREFIX.performance} ${url}: ${message}`),
      ];
    }
  }

  // ==========================================================================
  // Page loading
  // ==========================================================================

  private load<T>(url: string, work: (loaded: LoadedPage) => Promise<T>): Promise<T> {
    return withLoadedPage(
      this.browser,
      url,
      { headless: true, timeoutMs: this.timeoutSeconds * 1000, settleMs: LAZY_CONTENT_WAIT_MS },
      work
    );
  }

  private runCheck<T>(url: string, prefix: string, extractor: Extractor<T>): Promise<ToolResult<T>> {
    return this.attempt(url, prefix, () => this.load(url, (loaded) => extractor(loaded)));
  }

  private async attempt<T>(url: string, prefix: string, run: () => Promise<T>): Promise<ToolResult<T>> {
    try {
      return succeed(await run());
    } catch (error) {
      return fail(`${prefix} ${url}: ${errorMessage(error)}`);
    }
  }

  // ==========================================================================
  // Extractors
  // ==========================================================================

  private async extractPageInfo({ url, status, page, $ }: LoadedPage): Promise<PageInfo> {
    const title = await page.title();
    const metaDescription = $('meta[name="description"]').first().attr('content') || '';

    const timing = await page.navigationTiming();
    const loadTime = timing ? timing.loadEventEnd - timing.fetchStart : null;

    return {
      url,
      status_code: status,
      title,
      title_length: title.length,
      meta_description: metaDescription,
      meta_description_length: metaDescription.length,
      h1_count: $('h1').length,
      h2_count: $('h2').length,
      image_count: $('img').length,
      link_count: $('a[href]').length,
      load_time_ms: loadTime ? Math.round(loadTime) : null,
    };
  }

  private async extractMetaTags({ url, $ }: LoadedPage): Promise<MetaTagsReport> {
    const has = (name: MetaTagName): boolean => $(META_TAG_SELECTORS[name]).length > 0;

    const metaTags: Record<MetaTagName, boolean> = {
      title: has('title'),
      meta_description: has('meta_description'),
      meta_keywords: has('meta_keywords'),
      og_title: has('og_title'),
      og_description: has('og_description'),
      og_image: has('og_image'),
      twitter_card: has('twitter_card'),
      canonical: has('canonical'),
      viewport: has('viewport'),
      charset: has('charset'),
      robots: has('robots'),
    };

    const presentCount = META_TAG_NAMES.filter((name) => metaTags[name]).length;

    return {
      url,
      meta_tags: metaTags,
      completeness_score: roundTo((presentCount / META_TAG_NAMES.length) * 100, 1),
      missing_tags: META_TAG_NAMES.filter((name) => !metaTags[name]),
    };
  }

  private async extractImageAlt({ url, $ }: LoadedPage): Promise<ImageAltReport> {
    const images = $('img')
      .toArray()
      .map((element) => {
        const alt = $(element).attr('alt') || '';
        return {
          src: normalizeUrl($(element).attr('src') || '', url),
          hasAlt: alt.trim() !== '',
        };
      });

    const withoutAlt = images.filter((image) => !image.hasAlt);
    const score = images.length > 0 ? ((images.length - withoutAlt.length) / images.length) * 100 : 100;

    return {
      url,
      total_images: images.length,
      images_without_alt: withoutAlt.length,
      accessibility_score: roundTo(score, 1),
      missing_alt_images: withoutAlt.slice(0, MISSING_ALT_SAMPLE).map((image) => image.src),
    };
  }

  private async extractPerformance({ url, status, page }: LoadedPage): Promise<PagePerformanceReport> {
    const [timing, paint, initiatorTypes] = await Promise.all([
      page.navigationTiming(),
      page.paintTiming(),
      page.resourceInitiatorTypes(),
    ]);

    let timingMetrics: TimingMetrics | null = null;
    if (timing) {
      timingMetrics = {
        dns_lookup: timing.domainLookupEnd - timing.domainLookupStart,
        tcp_connect: timing.connectEnd - timing.connectStart,
        request_time: timing.responseStart - timing.requestStart,
        response_time: timing.responseEnd - timing.responseStart,
        dom_loading: timing.domContentLoadedEventEnd - timing.domContentLoadedEventStart,
        total_load_time: timing.loadEventEnd - timing.fetchStart,
        first_paint: paint.firstPaint,
        first_contentful_paint: paint.firstContentfulPaint,
      };
    }

    return {
      url,
      timing_metrics: timingMetrics,
      resource_counts: countInitiators(initiatorTypes),
      status_code: status,
    };
  }
}

export function countInitiators(initiatorTypes: string[]): ResourceCounts {
  const counts: ResourceCounts = {
    scripts: 0,
    stylesheets: 0,
    images: 0,
    fonts: 0,
    other: 0,
    total_requests: initiatorTypes.length,
  };

  for (const type of initiatorTypes) {
    if (type === 'script') counts.scripts++;
    else if (type === 'css') counts.stylesheets++;
    else if (type === 'img') counts.images++;
    else if (type === 'font') counts.fonts++;
    else counts.other++;
  }

  return counts;
}

/**
 * Playwright Browser Provider
 * Chromium-backed implementation of the browser capability
 */

import { chromium, Browser, BrowserContext, Page } from 'playwright-core';
import { env } from '../../config/env';
import {
  BrowserLaunchOptions,
  BrowserProvider,
  BrowserSession,
  NavigationOptions,
  NavigationTiming,
  PageOptions,
  PaintTiming,
  RenderedPage,
  TextStyleSample,
} from './browser.types';

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--no-first-run',
];

// Elements sampled for color contrast, in document order
const TEXT_ELEMENT_SELECTOR = 'p, span, div, a, button, h1, h2, h3, h4, h5, h6, li';

class PlaywrightRenderedPage implements RenderedPage {
  constructor(
    private readonly page: Page,
    private readonly context: BrowserContext
  ) {}

  async goto(url: string, options: NavigationOptions): Promise<number | null> {
    const response = await this.page.goto(url, {
      timeout: options.timeoutMs,
      waitUntil: options.waitUntil,
    });
    return response ? response.status() : null;
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
  }

  async settle(ms: number): Promise<void> {
    if (ms > 0) {
      await this.page.waitForTimeout(ms);
    }
  }

  title(): Promise<string> {
    return this.page.title();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  bodyText(): Promise<string> {
    return this.page.innerText('body');
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error) {
      console.warn(`Selector "${selector}" not found within ${timeoutMs}ms:`, error instanceof Error ? error.message : error);
      return false;
    }
  }

  navigationTiming(): Promise<NavigationTiming | null> {
    return this.page.evaluate(() => {
      const entry = performance.getEntriesByType('navigation')[0];
      if (!(entry instanceof PerformanceNavigationTiming)) {
        return null;
      }
      return {
        fetchStart: entry.fetchStart,
        domainLookupStart: entry.domainLookupStart,
        domainLookupEnd: entry.domainLookupEnd,
        connectStart: entry.connectStart,
        connectEnd: entry.connectEnd,
        requestStart: entry.requestStart,
        responseStart: entry.responseStart,
        responseEnd: entry.responseEnd,
        domContentLoadedEventStart: entry.domContentLoadedEventStart,
        domContentLoadedEventEnd: entry.domContentLoadedEventEnd,
        loadEventEnd: entry.loadEventEnd,
      };
    });
  }

  paintTiming(): Promise<PaintTiming> {
    return this.page.evaluate(() => {
      const timing: { firstPaint: number | null; firstContentfulPaint: number | null } = {
        firstPaint: null,
        firstContentfulPaint: null,
      };
      performance.getEntriesByType('paint').forEach((entry) => {
        if (entry.name === 'first-paint') {
          timing.firstPaint = entry.startTime;
        } else if (entry.name === 'first-contentful-paint') {
          timing.firstContentfulPaint = entry.startTime;
        }
      });
      return timing;
    });
  }

  resourceInitiatorTypes(): Promise<string[]> {
    return this.page.evaluate(() =>
      performance
        .getEntriesByType('resource')
        .map((entry) => (entry instanceof PerformanceResourceTiming ? entry.initiatorType : 'other'))
    );
  }

  textStyleSamples(limit: number): Promise<TextStyleSample[]> {
    return this.page.evaluate(
      ({ selector, max }) => {
        const samples: Array<{ tagName: string; index: number; text: string; color: string; backgroundColor: string }> = [];
        document.querySelectorAll(selector).forEach((element, index) => {
          if (samples.length >= max) return;
          const text = (element.textContent || '').trim();
          if (text.length === 0) return;
          const style = window.getComputedStyle(element);
          if (!style.color || !style.backgroundColor || style.backgroundColor === 'rgba(0, 0, 0, 0)') return;
          samples.push({
            tagName: element.tagName.toLowerCase(),
            index,
            text,
            color: style.color,
            backgroundColor: style.backgroundColor,
          });
        });
        return samples;
      },
      { selector: TEXT_ELEMENT_SELECTOR, max: limit }
    );
  }

  async close(): Promise<void> {
    await this.page.close();
    await this.context.close();
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(private readonly browser: Browser) {}

  async newPage(options: PageOptions = {}): Promise<RenderedPage> {
    const context = await this.browser.newContext({
      userAgent: options.userAgent,
      viewport: options.viewport,
      extraHTTPHeaders: options.extraHeaders,
    });
    const page = await context.newPage();
    if (options.defaultTimeoutMs) {
      page.setDefaultTimeout(options.defaultTimeoutMs);
    }
    return new PlaywrightRenderedPage(page, context);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export class PlaywrightBrowserProvider implements BrowserProvider {
  constructor(private readonly executablePath: string | undefined = env.BROWSER_EXECUTABLE_PATH) {}

  async launch(options: BrowserLaunchOptions): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: options.headless,
      executablePath: this.executablePath,
      args: LAUNCH_ARGS,
    });
    return new PlaywrightSession(browser);
  }
}

export const browserProvider = new PlaywrightBrowserProvider();

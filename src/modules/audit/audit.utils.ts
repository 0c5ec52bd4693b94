/**
 * Audit Utilities
 * Page loading and bookkeeping shared by the browser-driven audits
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { BrowserProvider, loadPage, PageOptions, RenderedPage, withBrowserPage } from '../../lib/browser';
import { roundTo } from '../../lib/utils/math';

/**
 * A rendered page plus a parsed snapshot of its DOM
 */
export interface LoadedPage {
  url: string;
  status: number | null;
  page: RenderedPage;
  $: CheerioAPI;
}

export interface PageLoadOptions extends PageOptions {
  headless: boolean;
  timeoutMs: number;
  /** Extra pause after network idle for lazy content */
  settleMs?: number;
}

/**
 * Launch, navigate, wait for network idle and hand the loaded page to `work`
 */
export function withLoadedPage<T>(
  browser: BrowserProvider,
  url: string,
  options: PageLoadOptions,
  work: (loaded: LoadedPage) => Promise<T>
): Promise<T> {
  const { timeoutMs, settleMs = 0, ...sessionOptions } = options;

  return withBrowserPage(browser, { ...sessionOptions, defaultTimeoutMs: timeoutMs }, async (page) => {
    const status = await loadPage(page, url, timeoutMs);
    await page.settle(settleMs);

    const $ = cheerio.load(await page.content());
    return work({ url, status, page, $ });
  });
}

export function isLoadFailure(status: number | null): boolean {
  return status === null || status >= 400;
}

export function loadFailureMessage(status: number | null): string {
  return `Failed to load page. HTTP status: ${status ?? 'unknown'}`;
}

/**
 * Seconds since `startTime`, two decimals
 */
export function elapsedSeconds(startTime: number): number {
  return roundTo((Date.now() - startTime) / 1000, 2);
}

export function timestamp(): string {
  return new Date().toISOString();
}

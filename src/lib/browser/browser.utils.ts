/**
 * Browser Session Helpers
 */

import { BrowserProvider, PageOptions, RenderedPage } from './browser.types';

/**
 * Launch a session, open one page and always tear both down
 */
export async function withBrowserPage<T>(
  provider: BrowserProvider,
  options: { headless: boolean } & PageOptions,
  work: (page: RenderedPage) => Promise<T>
): Promise<T> {
  const { headless, ...pageOptions } = options;
  const session = await provider.launch({ headless });
  try {
    const page = await session.newPage(pageOptions);
    try {
      return await work(page);
    } finally {
      await page.close();
    }
  } finally {
    await session.close();
  }
}

/**
 * Navigate, then wait for network idle; returns the response status
 */
export async function loadPage(page: RenderedPage, url: string, timeoutMs: number): Promise<number | null> {
  const status = await page.goto(url, { timeoutMs });
  await page.waitForNetworkIdle(timeoutMs);
  return status;
}

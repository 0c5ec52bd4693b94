/**
 * External Links Audit Service
 */

import { BrowserProvider } from '../../../lib/browser';
import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { elapsedSeconds, isLoadFailure, loadFailureMessage, timestamp, withLoadedPage } from '../audit.utils';
import { analyzeExternalLinks } from './link-analysis';
import { LinkChecker } from './link-checker';
import { categorizeLinks } from './link-extractor';
import { ExternalLinksReport, LinkAuditOptions } from './links.types';

export class ExternalLinksAuditService {
  constructor(
    private readonly browser: BrowserProvider,
    private readonly checker: LinkChecker
  ) {}

  /**
   * Categorize the page's links, then probe the first `maxLinks` external ones in order
   */
  async audit(url: string, options: LinkAuditOptions): Promise<ToolResult<ExternalLinksReport>> {
    const startTime = Date.now();

    try {
      return await withLoadedPage(
        this.browser,
        url,
        { headless: options.headless, timeoutMs: options.timeoutSeconds * 1000 },
        async ({ status, page, $ }): Promise<ToolResult<ExternalLinksReport>> => {
          if (isLoadFailure(status)) {
            return fail(loadFailureMessage(status), {
              audit_info: { url, audit_time: elapsedSeconds(startTime) },
            });
          }

          console.log(`check_external_links: Extracting links from ${url}`);
          const links = categorizeLinks($, url);
          const toCheck = links.external_links.slice(0, options.maxLinks);
          console.log(
            `check_external_links: Found ${toCheck.length} external links to check (limited to ${options.maxLinks})`
          );

          const results = await this.checker.checkExternalLinks(toCheck, options.linkTimeoutSeconds);

          return succeed({
            links_summary: {
              total_links:
                links.internal_links.length +
                links.external_links.length +
                links.email_links.length +
                links.tel_links.length +
                links.other_links.length,
              internal_links: links.internal_links.length,
              external_links: links.external_links.length,
              external_links_checked: toCheck.length,
              email_links: links.email_links.length,
              tel_links: links.tel_links.length,
              other_links: links.other_links.length,
            },
            external_links_analysis: analyzeExternalLinks(results),
            link_results: results,
            audit_info: {
              url,
              audit_time: elapsedSeconds(startTime),
              page_title: await page.title(),
              timestamp: timestamp(),
              max_links_limit: options.maxLinks,
            },
          });
        }
      );
    } catch (error) {
      console.error(`check_external_links: Audit failed for ${url}: ${errorMessage(error)}`);
      return fail(`External links audit failed: ${errorMessage(error)}`, {
        audit_info: { url, audit_time: elapsedSeconds(startTime) },
      });
    }
  }
}

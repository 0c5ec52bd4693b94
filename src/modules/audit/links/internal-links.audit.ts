/**
 * Internal Linking Audit Service
 */

import { BrowserProvider } from '../../../lib/browser';
import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { elapsedSeconds, isLoadFailure, loadFailureMessage, timestamp, withLoadedPage } from '../audit.utils';
import { analyzeInternalLinking } from './link-analysis';
import { LinkChecker } from './link-checker';
import { extractInternalLinks } from './link-extractor';
import { InternalLinkingReport, LinkAuditOptions } from './links.types';

const CHECKS_PERFORMED = [
  'internal_link_extraction',
  'navigation_structure_analysis',
  'link_functionality_validation',
  'anchor_text_evaluation',
  'seo_scoring',
  'technical_health_assessment',
];

export class InternalLinksAuditService {
  constructor(
    private readonly browser: BrowserProvider,
    private readonly checker: LinkChecker
  ) {}

  async audit(url: string, options: LinkAuditOptions): Promise<ToolResult<InternalLinkingReport>> {
    const startTime = Date.now();

    try {
      return await withLoadedPage(
        this.browser,
        url,
        { headless: options.headless, timeoutMs: options.timeoutSeconds * 1000 },
        async ({ status, page, $ }): Promise<ToolResult<InternalLinkingReport>> => {
          if (isLoadFailure(status)) {
            return fail(loadFailureMessage(status), {
              audit_info: { url, audit_time: elapsedSeconds(startTime) },
            });
          }

          console.log(`check_internal_linking: Analyzing internal linking structure for ${url}`);
          const structure = extractInternalLinks($, url);
          const unique = structure.unique_internal_links;
          console.log(
            `check_internal_linking: Found ${unique.length} unique internal links to validate (limiting to ${options.maxLinks})`
          );

          const validation = await this.checker.validateInternalLinks(
            unique,
            url,
            options.linkTimeoutSeconds,
            options.maxLinks
          );

          return succeed({
            links_structure: structure,
            validation_results: validation,
            linking_analysis: analyzeInternalLinking(structure, validation),
            audit_info: {
              url,
              audit_time: elapsedSeconds(startTime),
              page_title: await page.title(),
              timestamp: timestamp(),
              max_links_limit: options.maxLinks,
              checks_performed: CHECKS_PERFORMED,
            },
          });
        }
      );
    } catch (error) {
      console.error(`check_internal_linking: Audit failed for ${url}: ${errorMessage(error)}`);
      return fail(`Internal linking check failed: ${errorMessage(error)}`, {
        audit_info: { url, audit_time: elapsedSeconds(startTime) },
      });
    }
  }
}

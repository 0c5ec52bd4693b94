/**
 * Schema Audit Service
 */

import { BrowserProvider } from '../../../lib/browser';
import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { elapsedSeconds, isLoadFailure, loadFailureMessage, timestamp, withLoadedPage } from '../audit.utils';
import { extractStructuredData, validateSchemaData } from './schema.extractors';
import { SchemaAuditReport } from './schema.types';

export interface SchemaAuditOptions {
  headless: boolean;
  timeoutSeconds: number;
}

export class SchemaAuditService {
  constructor(private readonly browser: BrowserProvider) {}

  /**
   * Extract JSON-LD, Microdata and RDFa from the rendered page and validate them together
   */
  async audit(url: string, options: SchemaAuditOptions): Promise<ToolResult<SchemaAuditReport>> {
    const startTime = Date.now();

    try {
      return await withLoadedPage(
        this.browser,
        url,
        { headless: options.headless, timeoutMs: options.timeoutSeconds * 1000 },
        async ({ status, page, $ }): Promise<ToolResult<SchemaAuditReport>> => {
          if (isLoadFailure(status)) {
            return fail(loadFailureMessage(status), {
              audit_info: { url, audit_time: elapsedSeconds(startTime) },
            });
          }

          console.log(`check_schema: Extracting structured data from ${url}`);
          const { jsonLd, microdata, rdfa } = extractStructuredData($);
          const allItems = [...jsonLd, ...microdata, ...rdfa];

          return succeed({
            validation: validateSchemaData(allItems),
            structured_data: {
              json_ld: jsonLd,
              microdata,
              rdfa,
            },
            audit_info: {
              url,
              audit_time: elapsedSeconds(startTime),
              page_title: await page.title(),
              timestamp: timestamp(),
              total_structured_items: allItems.length,
            },
          });
        }
      );
    } catch (error) {
      console.error(`check_schema: Audit failed for ${url}: ${errorMessage(error)}`);
      return fail(`Schema audit failed: ${errorMessage(error)}`, {
        audit_info: { url, audit_time: elapsedSeconds(startTime) },
      });
    }
  }
}

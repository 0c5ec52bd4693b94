/**
 * Accessibility Audit Service
 * Alt text, color contrast and ARIA labelling against WCAG AA
 */

import { BrowserProvider } from '../../../lib/browser';
import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { elapsedSeconds, isLoadFailure, loadFailureMessage, timestamp, withLoadedPage } from '../audit.utils';
import { checkAltText, checkAriaLabels, checkContrast, summarizeAccessibility } from './accessibility.checks';
import { AccessibilityReport } from './accessibility.types';

const CHECKS_PERFORMED = [
  'image_alt_text',
  'color_contrast',
  'aria_labels',
  'form_labeling',
  'heading_structure',
  'skip_links',
];

export interface AccessibilityAuditOptions {
  headless: boolean;
  timeoutSeconds: number;
}

export class AccessibilityAuditService {
  constructor(private readonly browser: BrowserProvider) {}

  async audit(url: string, options: AccessibilityAuditOptions): Promise<ToolResult<AccessibilityReport>> {
    const startTime = Date.now();

    try {
      return await withLoadedPage(
        this.browser,
        url,
        { headless: options.headless, timeoutMs: options.timeoutSeconds * 1000 },
        async ({ status, page, $ }): Promise<ToolResult<AccessibilityReport>> => {
          if (isLoadFailure(status)) {
            return fail(loadFailureMessage(status), {
              audit_info: { url, audit_time: elapsedSeconds(startTime) },
            });
          }

          console.log(`audit_accessibility: Running accessibility audit for ${url}`);
          const [altText, contrast, aria] = await Promise.all([
            checkAltText($),
            checkContrast(page),
            checkAriaLabels($),
          ]);

          return succeed({
            accessibility_summary: summarizeAccessibility(altText, contrast, aria),
            alt_text_audit: altText,
            contrast_audit: contrast,
            aria_audit: aria,
            audit_info: {
              url,
              audit_time: elapsedSeconds(startTime),
              page_title: await page.title(),
              timestamp: timestamp(),
              wcag_level: 'AA',
              checks_performed: CHECKS_PERFORMED,
            },
          });
        }
      );
    } catch (error) {
      console.error(`audit_accessibility: Audit failed for ${url}: ${errorMessage(error)}`);
      return fail(`Accessibility audit failed: ${errorMessage(error)}`, {
        audit_info: { url, audit_time: elapsedSeconds(startTime) },
      });
    }
  }
}

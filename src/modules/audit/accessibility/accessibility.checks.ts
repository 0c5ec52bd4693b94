/**
 * Accessibility Checks
 * Alt text and ARIA checks read the DOM snapshot; contrast reads computed styles
 */

import type { CheerioAPI } from 'cheerio';
import { RenderedPage } from '../../../lib/browser';
import { errorMessage } from '../../../lib/tools/tool-result';
import {
  AccessibilitySummary,
  AltTextAudit,
  AriaAudit,
  ContrastAudit,
  ContrastPass,
  ContrastViolation,
  Finding,
  Impact,
} from './accessibility.types';
import { contrastRatio, MIN_CONTRAST_RATIO } from './contrast';

const REDUNDANT_ALT_PHRASES = ['image of', 'picture of', 'photo of', 'graphic of'];
const MAX_ALT_LENGTH = 125;
const ALT_PREVIEW_LENGTH = 50;
const CONTRAST_SAMPLE_LIMIT = 20;
const CONTRAST_PASS_LIMIT = 10;
const SKIP_LINK_PHRASES = ['skip to', 'skip nav', 'skip content'];

// ============================================================================
// Image alt text
// ============================================================================

export function checkAltText($: CheerioAPI): AltTextAudit {
  const audit: AltTextAudit = {
    total_images: 0,
    images_with_alt: 0,
    images_without_alt: 0,
    images_with_empty_alt: 0,
    decorative_images: 0,
    violations: [],
    passes: [],
  };

  try {
    const images = $('img').toArray();
    audit.total_images = images.length;

    images.forEach((image, i) => {
      const element = `img[${i}]`;
      const src = $(image).attr('src') || 'unknown';
      const alt = $(image).attr('alt');

      if (alt === undefined) {
        audit.images_without_alt++;
        audit.violations.push({ type: 'missing_alt', element, src, description: 'Image missing alt attribute' });
        return;
      }

      if (alt.trim() === '') {
        audit.decorative_images++;
        audit.images_with_empty_alt++;
        audit.passes.push({ type: 'decorative', element, src, description: 'Decorative image with empty alt text' });
        return;
      }

      audit.images_with_alt++;
      const lower = alt.toLowerCase();
      if (REDUNDANT_ALT_PHRASES.some((phrase) => lower.includes(phrase))) {
        audit.violations.push({
          type: 'redundant_alt',
          element,
          src,
          alt,
          description: 'Alt text contains redundant phrases',
        });
      } else if (alt.length > MAX_ALT_LENGTH) {
        audit.violations.push({
          type: 'long_alt',
          element,
          src,
          alt: `${alt.slice(0, ALT_PREVIEW_LENGTH)}...`,
          description: 'Alt text is too long (over 125 characters)',
        });
      } else {
        audit.passes.push({
          type: 'good_alt',
          element,
          src,
          alt: alt.length > ALT_PREVIEW_LENGTH ? `${alt.slice(0, ALT_PREVIEW_LENGTH)}...` : alt,
          description: 'Image has appropriate alt text',
        });
      }
    });
  } catch (error) {
    audit.violations.push({ type: 'error', description: `Error checking alt text: ${errorMessage(error)}` });
  }

  return audit;
}

// ============================================================================
// Color contrast
// ============================================================================

export async function checkContrast(page: RenderedPage): Promise<ContrastAudit> {
  try {
    const samples = await page.textStyleSamples(CONTRAST_SAMPLE_LIMIT);
    const violations: ContrastViolation[] = [];
    const passes: ContrastPass[] = [];

    for (const sample of samples) {
      const ratio = contrastRatio(sample.color, sample.backgroundColor);
      const element = `${sample.tagName}[${sample.index}]`;

      if (ratio < MIN_CONTRAST_RATIO) {
        violations.push({
          id: 'color-contrast',
          impact: 'serious',
          description: 'Text must have sufficient color contrast',
          element,
          contrast: ratio.toFixed(2),
          text: sample.text.slice(0, 30),
        });
      } else {
        passes.push({ id: 'color-contrast', element, contrast: ratio.toFixed(2) });
      }
    }

    return {
      total_elements_checked: violations.length + passes.length,
      contrast_violations: violations.length,
      contrast_passes: passes.length,
      violations,
      passes: passes.slice(0, CONTRAST_PASS_LIMIT),
      error: null,
    };
  } catch (error) {
    return {
      total_elements_checked: 0,
      contrast_violations: 0,
      contrast_passes: 0,
      violations: [],
      passes: [],
      error: `Error checking contrast: ${errorMessage(error)}`,
    };
  }
}

// ============================================================================
// ARIA labels, headings and skip links
// ============================================================================

type CheerioNode = ReturnType<CheerioAPI>;

/**
 * The element's `type` as the DOM reports it
 */
function controlType(node: CheerioNode): string {
  if (node.is('input')) return (node.attr('type') || 'text').toLowerCase();
  if (node.is('button')) return (node.attr('type') || 'submit').toLowerCase();
  if (node.is('select')) return node.attr('multiple') === undefined ? 'select-one' : 'select-multiple';
  if (node.is('textarea')) return 'textarea';
  return (node.prop('tagName') || '').toLowerCase();
}

export function checkAriaLabels($: CheerioAPI): AriaAudit {
  const audit: AriaAudit = {
    total_interactive_elements: 0,
    elements_with_labels: 0,
    elements_without_labels: 0,
    violations: [],
    passes: [],
    warnings: [],
  };

  try {
    $('input, textarea, select, button').each((i, control) => {
      const node = $(control);
      const type = controlType(node);
      const element = `${type}[${i}]`;
      const id = node.attr('id');
      const elementId = id || `no-id-${i}`;

      audit.total_interactive_elements++;

      const ariaLabel = node.attr('aria-label');
      const ariaLabelledby = node.attr('aria-labelledby');
      const hasLabel = Boolean(id) && $('label').filter((_, label) => $(label).attr('for') === id).length > 0;
      const title = node.attr('title');

      let labelMethod: string | null = null;
      if (ariaLabel) labelMethod = 'aria-label';
      else if (ariaLabelledby) labelMethod = 'aria-labelledby';
      else if (hasLabel) labelMethod = 'label';
      else if (title) labelMethod = 'title';

      if (!labelMethod) {
        audit.elements_without_labels++;
        audit.violations.push({
          type: 'missing_label',
          element,
          element_id: elementId,
          description: `Interactive ${type} element lacks accessible name`,
        });
        return;
      }

      audit.elements_with_labels++;
      audit.passes.push({
        type: 'has_label',
        element,
        element_id: elementId,
        label_method: labelMethod,
        description: `Element properly labeled via ${labelMethod}`,
      });

      if (labelMethod === 'title') {
        audit.warnings.push({
          type: 'title_only',
          element,
          description: 'Element uses title attribute for labeling (not ideal)',
        });
      }
    });

    const headingCount = $('h1, h2, h3, h4, h5, h6').length;
    const h1Count = $('h1').length;
    if (headingCount === 0) {
      audit.violations.push({ type: 'no_headings', description: 'Page has no heading elements' });
    } else if (h1Count === 0) {
      audit.violations.push({ type: 'no_h1', description: 'Page should have exactly one h1 element' });
    } else if (h1Count > 1) {
      audit.violations.push({
        type: 'multiple_h1',
        description: `Page has ${h1Count} h1 elements, should have exactly one`,
      });
    } else {
      audit.passes.push({ type: 'h1_structure', description: 'Page has proper h1 structure' });
    }

    const hasSkipLink = $('a[href^="#"]')
      .toArray()
      .some((link) => {
        const text = $(link).text().toLowerCase();
        return SKIP_LINK_PHRASES.some((phrase) => text.includes(phrase));
      });

    if (hasSkipLink) {
      audit.passes.push({ type: 'skip_link', description: 'Page includes skip navigation link' });
    } else {
      audit.warnings.push({
        type: 'no_skip_link',
        description: 'Consider adding skip navigation link for keyboard users',
      });
    }
  } catch (error) {
    audit.violations.push({ type: 'error', description: `Error checking ARIA labels: ${errorMessage(error)}` });
  }

  return audit;
}

// ============================================================================
// Summary
// ============================================================================

export function summarizeAccessibility(
  alt: AltTextAudit,
  contrast: ContrastAudit,
  aria: AriaAudit
): AccessibilitySummary {
  const violations: Array<{ impact?: Impact }> = [...alt.violations, ...contrast.violations, ...aria.violations];
  const totalViolations = violations.length;
  const totalPasses = alt.passes.length + contrast.passes.length + aria.passes.length;

  const total = totalViolations + totalPasses;
  const score = total === 0 ? 0 : Math.floor((totalPasses / total) * 100);

  const bySeverity: Record<Impact, number> = { critical: 0, serious: 0, moderate: 0, minor: 0 };
  for (const violation of violations) {
    bySeverity[violation.impact ?? 'minor']++;
  }

  const recommendations: string[] = [];
  if (alt.images_without_alt > 0) {
    recommendations.push(`Add alt attributes to ${alt.images_without_alt} images without alt text`);
  }
  if (contrast.contrast_violations > 0) {
    recommendations.push(`Fix ${contrast.contrast_violations} color contrast issues`);
  }
  if (aria.elements_without_labels > 0) {
    recommendations.push(`Add accessible labels to ${aria.elements_without_labels} interactive elements`);
  }
  if (bySeverity.critical > 0) {
    recommendations.push(
      'Address critical accessibility violations first - they prevent users from accessing content'
    );
  }

  if (score >= 90) {
    recommendations.push('Excellent accessibility! Consider manual testing with screen readers for final validation');
  } else if (score >= 70) {
    recommendations.push('Good accessibility foundation. Focus on fixing remaining violations');
  } else if (score >= 50) {
    recommendations.push('Accessibility needs improvement. Prioritize critical and serious violations');
  } else {
    recommendations.push('Significant accessibility barriers present. Comprehensive remediation needed');
  }

  return {
    accessibility_score: score,
    total_violations: totalViolations,
    total_passes: totalPasses,
    violations_by_severity: bySeverity,
    recommendations,
  };
}

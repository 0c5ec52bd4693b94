/**
 * SEO Scoring
 * Fixed-threshold scores and recommendations for the quick SEO audit
 */

import { roundTo } from '../../../lib/utils/math';
import { ImageAltReport, MetaTagsReport, PageInfo, PagePerformanceReport } from './seo.types';

export function titleLengthScore(length: number): number {
  if (length >= 50 && length <= 60) return 100;
  if (length >= 30 && length <= 70) return 80;
  return 50;
}

export function descriptionLengthScore(length: number): number {
  if (length >= 150 && length <= 160) return 100;
  if (length >= 120 && length <= 180) return 80;
  return length > 0 ? 50 : 0;
}

export function loadTimeScore(loadTimeMs: number): number {
  if (loadTimeMs < 1000) return 100;
  if (loadTimeMs < 3000) return 80;
  if (loadTimeMs < 5000) return 60;
  return 40;
}

/**
 * Total load time when the page reported a non-zero one
 */
function loadTime(performance: PagePerformanceReport | null): number | null {
  const total = performance?.timing_metrics?.total_load_time;
  return total ? total : null;
}

/**
 * Mean of the sub-scores that could be computed, one decimal
 */
export function overallSeoScore(
  pageInfo: PageInfo | null,
  metaTags: MetaTagsReport | null,
  images: ImageAltReport | null,
  performance: PagePerformanceReport | null
): number {
  const scores: number[] = [];

  if (pageInfo) {
    scores.push(titleLengthScore(pageInfo.title_length));
    scores.push(descriptionLengthScore(pageInfo.meta_description_length));
  }
  if (metaTags) {
    scores.push(metaTags.completeness_score);
  }
  if (images) {
    scores.push(images.accessibility_score);
  }
  const total = loadTime(performance);
  if (total !== null) {
    scores.push(loadTimeScore(total));
  }

  if (scores.length === 0) return 0;
  return roundTo(scores.reduce((sum, score) => sum + score, 0) / scores.length, 1);
}

export function buildSeoRecommendations(
  pageInfo: PageInfo | null,
  metaTags: MetaTagsReport | null,
  images: ImageAltReport | null,
  performance: PagePerformanceReport | null
): string[] {
  const recommendations: string[] = [];

  if (pageInfo) {
    if (pageInfo.title_length < 30) {
      recommendations.push('Title is too short. Aim for 50-60 characters.');
    } else if (pageInfo.title_length > 70) {
      recommendations.push('Title is too long. Keep it under 60 characters.');
    }

    const descriptionLength = pageInfo.meta_description_length;
    if (descriptionLength === 0) {
      recommendations.push('Add a meta description (150-160 characters).');
    } else if (descriptionLength < 120) {
      recommendations.push('Meta description is too short. Aim for 150-160 characters.');
    } else if (descriptionLength > 180) {
      recommendations.push('Meta description is too long. Keep it under 160 characters.');
    }

    if (pageInfo.h1_count === 0) {
      recommendations.push('Add at least one H1 tag to the page.');
    } else if (pageInfo.h1_count > 1) {
      recommendations.push('Use only one H1 tag per page.');
    }
  }

  if (metaTags) {
    const missing = metaTags.missing_tags;
    if (missing.includes('og_title') || missing.includes('og_description')) {
      recommendations.push('Add Open Graph tags for better social media sharing.');
    }
    if (missing.includes('canonical')) {
      recommendations.push('Add canonical URL to avoid duplicate content issues.');
    }
    if (missing.includes('viewport')) {
      recommendations.push('Add viewport meta tag for mobile responsiveness.');
    }
    if (missing.includes('charset')) {
      recommendations.push('Add charset meta tag for proper encoding.');
    }
  }

  if (images && images.images_without_alt > 0) {
    recommendations.push(`Add alt text to ${images.images_without_alt} images for better accessibility.`);
  }

  const total = loadTime(performance);
  if (total !== null && total > 3000) {
    recommendations.push(
      `Page load time is ${(total / 1000).toFixed(1)}s. Optimize for faster loading (aim for under 3s).`
    );
  }

  return recommendations;
}

/**
 * Link Analysis
 * Summary statistics, scores and recommendations over link check results
 */

import { roundTo } from '../../../lib/utils/math';
import {
  ExternalLinkResult,
  ExternalLinksAnalysis,
  InternalLinkingAnalysis,
  InternalLinksStructure,
  InternalLinkValidation,
} from './links.types';

const GENERIC_ANCHORS = new Set(['click here', 'read more', 'here', 'more', 'link']);
const SHORT_ANCHORS = new Set(['home', 'about', 'contact']);

export function analyzeExternalLinks(results: ExternalLinkResult[]): ExternalLinksAnalysis {
  const analysis: ExternalLinksAnalysis = {
    total_checked: results.length,
    working_links: 0,
    broken_links: 0,
    timeout_links: 0,
    error_links: 0,
    redirected_links: 0,
    status_code_breakdown: {},
    broken_link_details: [],
    recommendations: [],
  };

  for (const result of results) {
    if (result.status === 'working') {
      analysis.working_links++;
    } else if (result.status === 'broken') {
      analysis.broken_links++;
      analysis.broken_link_details.push({
        url: result.url,
        status_code: result.status_code,
        error: result.error ?? '',
      });
    } else if (result.status === 'timeout') {
      analysis.timeout_links++;
    } else {
      analysis.error_links++;
    }

    if (result.redirect_count > 0) {
      analysis.redirected_links++;
    }

    if (result.status_code > 0) {
      const code = String(result.status_code);
      analysis.status_code_breakdown[code] = (analysis.status_code_breakdown[code] ?? 0) + 1;
    }
  }

  if (analysis.broken_links > 0) {
    analysis.recommendations.push(
      `Fix ${analysis.broken_links} broken external links to improve user experience and SEO.`
    );
  }
  if (analysis.timeout_links > 3) {
    analysis.recommendations.push(
      'Several links are timing out. Consider checking if these external sites are reliable.'
    );
  }
  if (analysis.redirected_links > analysis.total_checked * 0.3) {
    analysis.recommendations.push(
      'Many external links are redirecting. Consider updating to point directly to final destinations.'
    );
  }
  if (analysis.working_links === analysis.total_checked) {
    analysis.recommendations.push('All external links are working correctly!');
  }

  return analysis;
}

/**
 * Score internal linking out of 100: presence 20, variety 15, navigation 20,
 * breadcrumbs 5, broken links 25, redirects 5, response time 5, anchor text 5
 */
export function analyzeInternalLinking(
  structure: InternalLinksStructure,
  validation: InternalLinkValidation
): InternalLinkingAnalysis {
  const analysis: InternalLinkingAnalysis = {
    linking_score: 0,
    strengths: [],
    issues: [],
    recommendations: [],
    technical_health: {
      broken_link_percentage: 0,
      redirect_percentage: 0,
      average_response_time: 0,
    },
  };
  let score = 0;

  const totalLinks = structure.total_internal_links;
  const uniqueLinks = structure.unique_internal_links.length;

  if (totalLinks > 0) {
    score += 20;
    analysis.strengths.push(`Site has ${totalLinks} internal links`);
  } else {
    analysis.issues.push('No internal links found');
    analysis.recommendations.push('Add internal links to improve navigation and SEO');
  }

  if (uniqueLinks > 10) {
    score += 15;
    analysis.strengths.push(`Good link variety with ${uniqueLinks} unique internal destinations`);
  } else if (uniqueLinks > 5) {
    score += 10;
    analysis.recommendations.push('Consider adding more internal links to different pages');
  } else {
    analysis.issues.push('Limited internal linking structure');
    analysis.recommendations.push('Improve internal linking by connecting related content');
  }

  const navigation = structure.navigation_analysis;
  if (navigation.has_navigation) {
    score += 15;
    analysis.strengths.push('Site has proper navigation structure');

    const navLinks = navigation.navigation_links.length;
    if (navLinks >= 3 && navLinks <= 7) {
      score += 5;
      analysis.strengths.push(`Good navigation link count: ${navLinks}`);
    } else if (navLinks > 7) {
      analysis.recommendations.push('Consider simplifying navigation - too many nav links can overwhelm users');
    }
  } else {
    analysis.issues.push('No clear navigation structure detected');
    analysis.recommendations.push('Add proper navigation menu for better user experience');
  }

  if (navigation.breadcrumb_links.length > 0) {
    score += 5;
    analysis.strengths.push('Site includes breadcrumb navigation');
  }

  // Technical health
  const { broken_links: brokenLinks, total_checked: totalChecked } = validation.summary;

  if (totalChecked > 0) {
    const brokenPercentage = (brokenLinks / totalChecked) * 100;
    analysis.technical_health.broken_link_percentage = roundTo(brokenPercentage, 2);

    if (brokenPercentage === 0) {
      score += 25;
      analysis.strengths.push('All internal links are working correctly');
    } else if (brokenPercentage < 5) {
      score += 20;
      analysis.recommendations.push(`Fix ${brokenLinks} broken internal links`);
    } else if (brokenPercentage < 15) {
      score += 10;
      analysis.issues.push(`${brokenPercentage.toFixed(1)}% of internal links are broken`);
      analysis.recommendations.push('High number of broken links hurts user experience and SEO');
    } else {
      analysis.issues.push(`Critical: ${brokenPercentage.toFixed(1)}% of internal links are broken`);
      analysis.recommendations.push('Immediate action needed to fix broken internal links');
    }
  }

  const results = validation.validation_results;
  const redirects = results.filter((result) => result.redirect_count > 0).length;
  const timed = results.filter((result) => result.response_time > 0);

  if (totalChecked > 0) {
    const redirectPercentage = (redirects / totalChecked) * 100;
    analysis.technical_health.redirect_percentage = roundTo(redirectPercentage, 2);

    if (redirectPercentage < 10) {
      score += 5;
    } else {
      analysis.issues.push(`${redirectPercentage.toFixed(1)}% of links redirect - consider updating to final URLs`);
    }
  }

  if (timed.length > 0) {
    const averageResponseTime = timed.reduce((sum, result) => sum + result.response_time, 0) / timed.length;
    analysis.technical_health.average_response_time = roundTo(averageResponseTime, 3);

    if (averageResponseTime < 1) {
      score += 5;
      analysis.strengths.push('Internal links load quickly');
    } else if (averageResponseTime > 3) {
      analysis.issues.push('Internal links are slow to load');
    }
  }

  // Anchor text
  let descriptive = 0;
  let generic = 0;
  for (const detail of structure.link_details) {
    const text = detail.text.toLowerCase().trim();
    if (GENERIC_ANCHORS.has(text)) {
      generic++;
    } else if (text.length > 3 && !SHORT_ANCHORS.has(text)) {
      descriptive++;
    }
  }

  if (descriptive + generic > 0) {
    const descriptivePercentage = (descriptive / (descriptive + generic)) * 100;
    if (descriptivePercentage > 80) {
      score += 5;
      analysis.strengths.push('Most internal links have descriptive anchor text');
    } else if (descriptivePercentage < 50) {
      analysis.issues.push("Many links use generic anchor text like 'click here'");
      analysis.recommendations.push('Use descriptive anchor text for better SEO and accessibility');
    }
  }

  analysis.linking_score = Math.min(score, 100);

  if (analysis.linking_score >= 85) {
    analysis.recommendations.push('Excellent internal linking structure!');
  } else if (analysis.linking_score >= 70) {
    analysis.recommendations.push('Good internal linking with room for minor improvements');
  } else if (analysis.linking_score >= 50) {
    analysis.recommendations.push('Internal linking needs improvement for better SEO and user experience');
  } else {
    analysis.recommendations.push('Poor internal linking structure requires immediate attention');
  }

  return analysis;
}

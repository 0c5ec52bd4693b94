/**
 * robots.txt Analysis
 */

import { ParsedRobotsTxt, RobotsAnalysis } from './robots.types';

const PROTECTED_SECTIONS = ['/admin', '/wp-admin', '/private'];
const SEARCH_ENGINE_AGENTS = ['googlebot', 'bingbot', 'slurp', 'duckduckbot', 'facebookexternalhit'];
const HIGH_CRAWL_DELAY_SECONDS = 10;

export function analyzeRobotsTxt(parsed: ParsedRobotsTxt): RobotsAnalysis {
  const analysis: RobotsAnalysis = {
    summary: {
      total_user_agents: Object.keys(parsed.user_agents).length,
      total_sitemaps: parsed.sitemaps.length,
      has_crawl_delays: Object.keys(parsed.crawl_delay).length > 0,
      has_errors: parsed.errors.length > 0,
      has_warnings: parsed.warnings.length > 0,
      total_rules: parsed.total_rules,
    },
    recommendations: [],
    seo_impact: [],
    crawlability: {
      completely_blocked: false,
      partially_blocked: false,
      major_sections_blocked: [],
      allows_crawling: true,
    },
  };

  const wildcard = parsed.user_agents['*'];
  if (wildcard && wildcard.disallow.includes('/') && wildcard.allow.length === 0) {
    analysis.crawlability.completely_blocked = true;
    analysis.seo_impact.push('Site completely blocks all crawlers - will hurt SEO');
    analysis.recommendations.push('Consider allowing at least major search engines to crawl your site');
  }

  const blockedSections = Object.values(parsed.user_agents).flatMap((rules) =>
    rules.disallow.filter((path) => PROTECTED_SECTIONS.some((section) => path.toLowerCase().includes(section)))
  );
  analysis.crawlability.major_sections_blocked = blockedSections;
  if (blockedSections.length > 0) {
    analysis.recommendations.push('Good: Important admin/private sections are blocked from crawlers');
  }

  if (parsed.sitemaps.length === 0) {
    analysis.recommendations.push('Consider adding sitemap URL(s) to help search engines discover content');
    analysis.seo_impact.push('No sitemap specified - may slow content discovery');
  } else if (parsed.sitemaps.every((sitemap) => sitemap.startsWith('http://') || sitemap.startsWith('https://'))) {
    analysis.recommendations.push('Good: All sitemap URLs are properly formatted');
  } else {
    analysis.recommendations.push('Some sitemap URLs may be invalid - ensure they are absolute URLs');
  }

  const highDelays = Object.fromEntries(
    Object.entries(parsed.crawl_delay).filter(([, delay]) => delay > HIGH_CRAWL_DELAY_SECONDS)
  );
  if (Object.keys(highDelays).length > 0) {
    analysis.seo_impact.push(`High crawl delays detected: ${JSON.stringify(highDelays)}`);
    analysis.recommendations.push('Very high crawl delays may significantly slow indexing');
  }

  if (parsed.errors.length > 0) {
    analysis.recommendations.push(`Fix ${parsed.errors.length} syntax errors in robots.txt`);
    analysis.seo_impact.push('Syntax errors may cause rules to be ignored');
  }

  if (parsed.warnings.length > 0) {
    analysis.recommendations.push(`Review ${parsed.warnings.length} warnings in robots.txt`);
  }

  if (Object.keys(parsed.user_agents).some((agent) => SEARCH_ENGINE_AGENTS.includes(agent.toLowerCase()))) {
    analysis.recommendations.push('Good: Specific rules for major search engines detected');
  }

  if (analysis.crawlability.completely_blocked) {
    analysis.crawlability.allows_crawling = false;
  } else if (blockedSections.length > 0) {
    analysis.crawlability.partially_blocked = true;
  }

  return analysis;
}

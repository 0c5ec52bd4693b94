/**
 * robots.txt Analysis Tests
 */

import { analyzeRobotsTxt } from '../robots.analysis';
import { parseRobotsTxt } from '../robots.parser';

describe('analyzeRobotsTxt', () => {
  it('should flag a site that blocks every crawler', () => {
    const analysis = analyzeRobotsTxt(parseRobotsTxt('User-agent: *\nDisallow: /'));

    expect(analysis.crawlability).toEqual({
      completely_blocked: true,
      partially_blocked: false,
      major_sections_blocked: [],
      allows_crawling: false,
    });
    expect(analysis.seo_impact).toEqual([
      'Site completely blocks all crawlers - will hurt SEO',
      'No sitemap specified - may slow content discovery',
    ]);
    expect(analysis.recommendations).toEqual([
      'Consider allowing at least major search engines to crawl your site',
      'Consider adding sitemap URL(s) to help search engines discover content',
    ]);
  });

  it('should not call a site blocked when the wildcard group allows something', () => {
    const analysis = analyzeRobotsTxt(parseRobotsTxt('User-agent: *\nDisallow: /\nAllow: /blog'));
    expect(analysis.crawlability.completely_blocked).toBe(false);
    expect(analysis.crawlability.allows_crawling).toBe(true);
  });

  it('should credit blocked admin sections and search engine groups', () => {
    const analysis = analyzeRobotsTxt(
      parseRobotsTxt(
        [
          'User-agent: *',
          'Disallow: /wp-admin/',
          'Disallow: /cart',
          'User-agent: Bingbot',
          'Disallow: /Private',
          'Crawl-delay: 30',
          'Sitemap: https://shop.test/sitemap.xml',
        ].join('\n')
      )
    );

    expect(analysis.crawlability).toEqual({
      completely_blocked: false,
      partially_blocked: true,
      major_sections_blocked: ['/wp-admin/', '/Private'],
      allows_crawling: true,
    });
    expect(analysis.summary).toEqual({
      total_user_agents: 2,
      total_sitemaps: 1,
      has_crawl_delays: true,
      has_errors: false,
      has_warnings: false,
      total_rules: 7,
    });
    expect(analysis.recommendations).toEqual([
      'Good: Important admin/private sections are blocked from crawlers',
      'Good: All sitemap URLs are properly formatted',
      'Very high crawl delays may significantly slow indexing',
      'Good: Specific rules for major search engines detected',
    ]);
    expect(analysis.seo_impact).toEqual(['High crawl delays detected: {"Bingbot":30}']);
  });

  it('should ask to fix errors and review warnings', () => {
    const analysis = analyzeRobotsTxt(
      parseRobotsTxt('Disallow: /x\nUser-agent: *\nSitemap: /sitemap.xml\nFoo: bar')
    );

    expect(analysis.recommendations).toEqual([
      'Some sitemap URLs may be invalid - ensure they are absolute URLs',
      'Fix 1 syntax errors in robots.txt',
      'Review 2 warnings in robots.txt',
    ]);
    expect(analysis.seo_impact).toEqual(['Syntax errors may cause rules to be ignored']);
  });
});

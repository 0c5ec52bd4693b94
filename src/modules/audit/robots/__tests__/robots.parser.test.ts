/**
 * robots.txt Parser Tests
 */

import { parseRobotsTxt } from '../robots.parser';

describe('parseRobotsTxt', () => {
  it('should group rules under their user-agent', () => {
    const parsed = parseRobotsTxt(
      [
        '# shop crawling rules',
        'User-agent: *',
        'Disallow: /admin # staff only',
        'Allow: /admin/public',
        'Crawl-delay: 2.5',
        '',
        'User-agent: Googlebot',
        'Disallow:',
        'Sitemap: https://shop.test/sitemap.xml',
        'Host: shop.test',
      ].join('\n')
    );

    expect(parsed.user_agents).toEqual({
      '*': { allow: ['/admin/public'], disallow: ['/admin'], crawl_delay: 2.5 },
      Googlebot: { allow: [], disallow: [], crawl_delay: null },
    });
    expect(parsed.crawl_delay).toEqual({ '*': 2.5 });
    expect(parsed.sitemaps).toEqual(['https://shop.test/sitemap.xml']);
    expect(parsed.host).toBe('shop.test');
    expect(parsed.total_rules).toBe(7);
    expect(parsed.errors).toEqual([]);
    expect(parsed.warnings).toEqual([{ line: 8, content: 'Disallow:', warning: 'Empty value for directive' }]);
  });

  it('should report lines it cannot use', () => {
    const parsed = parseRobotsTxt(
      [
        'Disallow: /tmp',
        'Crawl-delay: 5',
        'this line has no colon',
        'User-agent: bot',
        'Crawl-delay: soon',
        'Sitemap: /sitemap.xml',
        'Noindex: /drafts',
      ].join('\n')
    );

    expect(parsed.errors).toEqual([
      { line: 1, content: 'Disallow: /tmp', error: 'Disallow directive without User-agent' },
      { line: 2, content: 'Crawl-delay: 5', error: 'Crawl-delay directive without User-agent' },
      { line: 3, content: 'this line has no colon', error: 'Invalid syntax: missing colon' },
      { line: 5, content: 'Crawl-delay: soon', error: 'Invalid crawl-delay value: must be a number' },
    ]);
    expect(parsed.warnings).toEqual([
      {
        line: 6,
        content: 'Sitemap: /sitemap.xml',
        warning: 'Sitemap URL should be absolute (include http/https)',
      },
      { line: 7, content: 'Noindex: /drafts', warning: 'Unknown directive: noindex' },
    ]);
    expect(parsed.sitemaps).toEqual(['/sitemap.xml']);
    expect(parsed.total_rules).toBe(2);
  });

  it('should name an empty user-agent the wildcard', () => {
    const parsed = parseRobotsTxt('User-agent:\nAllow: /');
    expect(parsed.user_agents).toEqual({ '*': { allow: ['/'], disallow: [], crawl_delay: null } });
  });

  it('should keep values that contain colons', () => {
    const parsed = parseRobotsTxt('Sitemap: https://shop.test:8443/sitemap.xml');
    expect(parsed.sitemaps).toEqual(['https://shop.test:8443/sitemap.xml']);
  });

  it('should tolerate CRLF line endings', () => {
    const parsed = parseRobotsTxt('User-agent: *\r\nDisallow: /cart\r\n');
    expect(parsed.user_agents['*'].disallow).toEqual(['/cart']);
  });

  it('should return an empty result for empty content', () => {
    expect(parseRobotsTxt('')).toEqual({
      user_agents: {},
      sitemaps: [],
      crawl_delay: {},
      host: null,
      total_rules: 0,
      warnings: [],
      errors: [],
    });
  });
});

/**
 * Link Extractor Tests
 */

import * as cheerio from 'cheerio';
import { categorizeLinks, extractInternalLinks } from '../link-extractor';
import { BLOG_POST_URL, blogPostHtml } from '../../../../__tests__/helpers/fixtures';

describe('Link extractor', () => {
  const $ = cheerio.load(blogPostHtml);

  describe('categorizeLinks', () => {
    it('should bucket and deduplicate links in page order', () => {
      expect(categorizeLinks($, BLOG_POST_URL)).toEqual({
        internal_links: [
          'https://blog.test/',
          'https://blog.test/archive',
          'https://blog.test/tags',
          'https://www.blog.test/about',
          'https://blog.test/posts',
          'https://blog.test/archive#2024',
          'https://blog.test/privacy',
        ],
        external_links: ['https://partner.test/offer', 'https://cdn.test/file.pdf'],
        email_links: ['mailto:editor@blog.test'],
        tel_links: ['tel:+100'],
        other_links: ['#comments', 'javascript:void(0)'],
      });
    });
  });

  describe('extractInternalLinks', () => {
    const structure = extractInternalLinks($, BLOG_POST_URL);

    it('should count internal links and keep unique destinations', () => {
      expect(structure.total_internal_links).toBe(7);
      expect(structure.unique_internal_links).toHaveLength(7);
      expect(structure.relative_links.map((link) => link.href)).toEqual([
        '/',
        '/archive',
        '/tags',
        '/posts',
        '/archive#2024',
        '/privacy',
      ]);
      expect(structure.absolute_internal_links.map((link) => link.href)).toEqual(['https://www.blog.test/about']);
      expect(structure.internal_links_with_anchors.map((link) => link.href)).toEqual(['/archive#2024']);
    });

    it('should record link context', () => {
      expect(structure.link_details[0]).toEqual({
        href: '/',
        text: 'Home',
        index: 0,
        parent_element: 'header',
        classes: '',
        type: 'relative',
        normalized_url: 'https://blog.test/',
      });
      expect(structure.anchor_links).toEqual([
        {
          href: '#comments',
          text: 'Comments',
          index: 8,
          parent_element: 'p',
          classes: '',
          type: 'anchor',
          normalized_url: '#comments',
        },
      ]);
      expect(structure.mailto_links.map((link) => link.type)).toEqual(['mailto']);
      expect(structure.tel_links.map((link) => link.type)).toEqual(['tel']);
    });

    it('should group navigation, breadcrumb and footer links', () => {
      const navigation = structure.navigation_analysis;

      expect(navigation.has_navigation).toBe(true);
      expect(navigation.navigation_links.map((link) => link.href)).toEqual([
        '/',
        '/archive',
        '/tags',
        'https://www.blog.test/about',
      ]);
      expect(navigation.breadcrumb_links.map((link) => link.href)).toEqual(['/posts']);
      expect(navigation.footer_links.map((link) => link.href)).toEqual(['/privacy']);
    });
  });
});

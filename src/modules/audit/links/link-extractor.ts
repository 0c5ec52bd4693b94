/**
 * Link Extractor
 * Categorizes a page's anchors relative to the audited site
 */

import type { CheerioAPI } from 'cheerio';
import { getNetloc, hostMatches } from '../../../lib/crawling';
import { CategorizedLinks, InternalLinksStructure, LinkDetail, LinkType } from './links.types';

/**
 * Resolve an href the way a browser would, remembering how it was written
 */
function resolveHref(href: string, baseUrl: string): { url: string; type: LinkType } | null {
  try {
    if (href.startsWith('http://') || href.startsWith('https://')) {
      return { url: href, type: 'absolute' };
    }
    if (href.startsWith('//')) {
      return { url: `${new URL(baseUrl).protocol}${href}`, type: 'protocol_relative' };
    }
    return { url: new URL(href, baseUrl).href, type: 'relative' };
  } catch {
    return null;
  }
}

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Bucket every `a[href]`; each bucket is deduplicated in first-seen order
 */
export function categorizeLinks($: CheerioAPI, baseUrl: string): CategorizedLinks {
  const baseHost = getNetloc(baseUrl);
  const links: CategorizedLinks = {
    internal_links: [],
    external_links: [],
    email_links: [],
    tel_links: [],
    other_links: [],
  };

  $('a[href]').each((_, element) => {
    const href = ($(element).attr('href') || '').trim();
    if (!href) return;

    if (href.startsWith('javascript:') || href.startsWith('data:') || href.startsWith('#')) {
      links.other_links.push(href);
      return;
    }
    if (href.startsWith('mailto:')) {
      links.email_links.push(href);
      return;
    }
    if (href.startsWith('tel:')) {
      links.tel_links.push(href);
      return;
    }

    const resolved = resolveHref(href, baseUrl);
    const host = resolved ? getNetloc(resolved.url) : '';
    if (!resolved || !host) {
      links.other_links.push(href);
      return;
    }

    if (hostMatches(host, baseHost, 'site')) {
      links.internal_links.push(resolved.url);
    } else {
      links.external_links.push(resolved.url);
    }
  });

  return {
    internal_links: dedupe(links.internal_links),
    external_links: dedupe(links.external_links),
    email_links: dedupe(links.email_links),
    tel_links: dedupe(links.tel_links),
    other_links: dedupe(links.other_links),
  };
}

/**
 * Internal link structure with per-link context (text, parent, classes)
 * and navigation, breadcrumb and footer grouping
 */
export function extractInternalLinks($: CheerioAPI, baseUrl: string): InternalLinksStructure {
  const baseHost = getNetloc(baseUrl);
  const structure: InternalLinksStructure = {
    total_internal_links: 0,
    unique_internal_links: [],
    internal_links_with_anchors: [],
    relative_links: [],
    absolute_internal_links: [],
    anchor_links: [],
    mailto_links: [],
    tel_links: [],
    link_details: [],
    navigation_analysis: {
      has_navigation: false,
      navigation_links: [],
      breadcrumb_links: [],
      footer_links: [],
    },
  };
  const seen = new Set<string>();

  $('a[href]').each((index, element) => {
    const node = $(element);
    const href = (node.attr('href') || '').trim();
    if (!href || href.startsWith('javascript:') || href.startsWith('data:')) return;

    const parent = element.parent;
    const detail: LinkDetail = {
      href,
      text: node.text().trim(),
      index,
      parent_element: parent && 'name' in parent ? parent.name : null,
      classes: node.attr('class') || '',
      type: 'anchor',
      normalized_url: null,
    };

    if (href.startsWith('mailto:')) {
      structure.mailto_links.push({ ...detail, type: 'mailto' });
      return;
    }
    if (href.startsWith('tel:')) {
      structure.tel_links.push({ ...detail, type: 'tel' });
      return;
    }
    if (href.startsWith('#')) {
      const anchor: LinkDetail = { ...detail, type: 'anchor', normalized_url: href };
      structure.anchor_links.push(anchor);
      structure.link_details.push(anchor);
      return;
    }

    const resolved = resolveHref(href, baseUrl);
    if (!resolved) return;

    const link: LinkDetail = { ...detail, type: resolved.type, normalized_url: resolved.url };
    if (link.type === 'relative') {
      structure.relative_links.push(link);
    }

    const host = getNetloc(resolved.url);
    if (!hostMatches(host, baseHost, 'site')) return;

    structure.total_internal_links++;
    if (!seen.has(resolved.url)) {
      seen.add(resolved.url);
      structure.unique_internal_links.push(resolved.url);
    }
    if (resolved.url.includes('#')) {
      structure.internal_links_with_anchors.push(link);
    }
    if (link.type === 'absolute') {
      structure.absolute_internal_links.push(link);
    }

    const classes = link.classes.toLowerCase();
    const navigation = structure.navigation_analysis;
    if (link.parent_element === 'nav' || link.parent_element === 'header' || classes.includes('nav')) {
      navigation.has_navigation = true;
      navigation.navigation_links.push(link);
    } else if (classes.includes('breadcrumb')) {
      navigation.breadcrumb_links.push(link);
    } else if (link.parent_element === 'footer' || classes.includes('footer')) {
      navigation.footer_links.push(link);
    }

    structure.link_details.push(link);
  });

  return structure;
}

/**
 * Link Discoverer
 * Link, resource and metadata discovery from rendered HTML
 */

import type { CheerioAPI } from 'cheerio';
import { PageMetadata, PageResources } from './crawling.types';
import { isValidHttpUrl, normalizeUrl } from './url-normalizer';

export class LinkDiscoverer {
  /**
   * All anchor targets, resolved against the page URL, valid http(s) only,
   * deduplicated in document order
   */
  discoverLinks($: CheerioAPI, pageUrl: string): string[] {
    const links = new Set<string>();

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href');
      if (!href) return;

      const absoluteUrl = normalizeUrl(href, pageUrl);
      if (absoluteUrl && isValidHttpUrl(absoluteUrl)) {
        links.add(absoluteUrl);
      }
    });

    return Array.from(links);
  }

  /**
   * Stylesheets, scripts, images and media sources, as written in the markup
   */
  discoverResources($: CheerioAPI): PageResources {
    const collect = (selector: string, attribute: string): string[] => {
      const values: string[] = [];
      $(selector).each((_, el) => {
        const value = $(el).attr(attribute);
        if (value) {
          values.push(value);
        }
      });
      return values;
    };

    return {
      css: collect("link[rel='stylesheet']", 'href'),
      js: collect('script[src]', 'src'),
      images: collect('img[src]', 'src'),
      media: collect('video[src], audio[src]', 'src'),
    };
  }

  discoverMetadata($: CheerioAPI): PageMetadata {
    const description = $('meta[name="description"]').first();
    const keywords = $('meta[name="keywords"]').first();

    return {
      description: description.length > 0 ? description.attr('content') ?? null : null,
      keywords: keywords.length > 0 ? keywords.attr('content') ?? null : null,
    };
  }
}

export function countResources(resources: PageResources): number {
  return resources.css.length + resources.js.length + resources.images.length + resources.media.length;
}

export const linkDiscoverer = new LinkDiscoverer();

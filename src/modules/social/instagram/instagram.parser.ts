/**
 * Instagram Page Parsing
 * Reads the public profile markup; counts come from the og:description
 * summary first and are overridden by the header stats list when present
 */

import type { CheerioAPI } from 'cheerio';
import { InstagramPost, ScrapedProfile } from './instagram.types';

export const INSTAGRAM_BASE_URL = 'https://www.instagram.com';

const PROFILE_URL_PATTERN = /instagram\.com\/([^/?]+)/;
const POST_ID_PATTERN = /\/p\/([^/]+)/;
const COUNT_SUFFIXES: Record<string, number> = { k: 1_000, m: 1_000_000, b: 1_000_000_000 };

/**
 * Accepts `name`, `@name` or a profile URL
 */
export function cleanUsername(input: string): string {
  let username = input.replace(/@/g, '').trim();
  if (username.includes('instagram.com')) {
    const match = PROFILE_URL_PATTERN.exec(username);
    if (match) {
      username = match[1];
    }
  }
  return username;
}

export function profileUrl(username: string): string {
  return `${INSTAGRAM_BASE_URL}/${username}/`;
}

/**
 * "12,345", "1.2K" or "3M" → number; 0 when there are no digits
 */
export function parseCount(text: string): number {
  const match = /(\d[\d,]*(?:\.\d+)?)\s*([KkMmBb])?/.exec(text);
  if (!match) {
    return 0;
  }
  const value = parseFloat(match[1].replace(/,/g, ''));
  const multiplier = match[2] ? COUNT_SUFFIXES[match[2].toLowerCase()] : 1;
  return Math.round(value * multiplier);
}

function countFromSummary(summary: string, label: string): number {
  const match = new RegExp(`(\\d[\\d,.]*[KkMmBb]?)\\s+${label}`).exec(summary);
  return match ? parseCount(match[1]) : 0;
}

export function isPrivateProfile($: CheerioAPI): boolean {
  return $('article h2').first().text().includes('private');
}

export function extractProfile($: CheerioAPI): ScrapedProfile {
  const summary = $('meta[property="og:description"]').attr('content') ?? '';
  let posts = countFromSummary(summary, 'Posts');
  let followers = countFromSummary(summary, 'Followers');
  let following = countFromSummary(summary, 'Following');

  const stats = $('header section ul li');
  if (stats.length >= 3) {
    posts = parseCount(stats.eq(0).text()) || posts;
    followers = parseCount(stats.eq(1).text()) || followers;
    following = parseCount(stats.eq(2).text()) || following;
  }

  return {
    posts,
    followers,
    following,
    profile_name: $('header section h2').first().text().trim(),
    bio: $('header section a + div').first().text().trim(),
    is_verified: $('header section svg[aria-label*="Verified"]').length > 0,
    is_private: isPrivateProfile($),
    profile_picture: $('header img').first().attr('src') ?? '',
  };
}

export function extractPosts($: CheerioAPI, pageUrl: string, limit: number): InstagramPost[] {
  return $('article a[href*="/p/"]')
    .toArray()
    .slice(0, limit)
    .map((link) => {
      const href = $(link).attr('href') ?? '';
      const postUrl = new URL(href, pageUrl).href;
      const image = $(link).find('img').first();
      return {
        post_id: POST_ID_PATTERN.exec(postUrl)?.[1] ?? '',
        post_url: postUrl,
        image_url: image.attr('src') ?? '',
        alt_text: image.attr('alt') ?? '',
        timestamp: null,
      };
    });
}

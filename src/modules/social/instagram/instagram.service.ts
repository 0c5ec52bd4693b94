/**
 * Instagram Service
 * Public profile scraping through the browser capability; no login or API
 */

import * as cheerio from 'cheerio';
import { env } from '../../../config/env';
import { BrowserProvider, RenderedPage } from '../../../lib/browser';
import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { roundTo } from '../../../lib/utils/math';
import { PageLoadOptions, withLoadedPage } from '../../audit/audit.utils';
import { cleanUsername, extractPosts, extractProfile, isPrivateProfile, profileUrl } from './instagram.parser';
import {
  bioOptimizationScore,
  extractHashtags,
  hashtagRecommendations,
  instagramRecommendations,
  postQualityScore,
  profileOptimizationScore,
  ratePostingFrequency,
} from './instagram.scoring';
import {
  EngagementReport,
  HashtagReport,
  InstagramPostsReport,
  InstagramProfile,
  ProfileComparison,
  ProfileLookupError,
  ScrapedProfile,
} from './instagram.types';

export const MAX_POSTS = 24;
export const MAX_COMPARED_PROFILES = 5;

const CONTENT_WAIT_MS = 3000;
const SELECTOR_TIMEOUT_MS = 10000;

const PAGE_OPTIONS: PageLoadOptions = {
  headless: true,
  timeoutMs: 30000,
  settleMs: CONTENT_WAIT_MS,
  userAgent: env.BROWSER_USER_AGENT,
  viewport: { width: 1920, height: 1080 },
  extraHeaders: {
    'Accept-Language': 'en-US,en;q=0.9',
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  },
};

export function toProfile(username: string, url: string, scraped: ScrapedProfile): InstagramProfile {
  const engagementRate =
    scraped.followers > 0 && scraped.posts > 0 ? roundTo((scraped.posts / scraped.followers) * 100, 3) : 0;

  return {
    username,
    url,
    profile_name: scraped.profile_name,
    bio: scraped.bio,
    posts_count: scraped.posts,
    followers_count: scraped.followers,
    following_count: scraped.following,
    is_verified: scraped.is_verified,
    is_private: scraped.is_private,
    profile_picture_url: scraped.profile_picture,
    follower_following_ratio: roundTo(scraped.followers / Math.max(scraped.following, 1), 2),
    estimated_engagement_rate: engagementRate,
  };
}

/**
 * First profile with the highest value; ties keep input order
 */
function highest(profiles: InstagramProfile[], value: (profile: InstagramProfile) => number): InstagramProfile {
  return profiles.reduce((best, profile) => (value(profile) > value(best) ? profile : best));
}

function average(profiles: InstagramProfile[], value: (profile: InstagramProfile) => number): number {
  return Math.round(profiles.reduce((sum, profile) => sum + value(profile), 0) / profiles.length);
}

async function renderedDom(page: RenderedPage) {
  return cheerio.load(await page.content());
}

export class InstagramService {
  constructor(private readonly browser: BrowserProvider) {}

  async getProfileInfo(username: string): Promise<ToolResult<InstagramProfile>> {
    try {
      const handle = cleanUsername(username);
      const url = profileUrl(handle);
      console.log(`get_profile_info: Fetching profile ${url}`);

      return await withLoadedPage(this.browser, url, PAGE_OPTIONS, async ({ status, page }) => {
        if (status === 404) {
          return fail<InstagramProfile>(`Profile not found: ${username}`);
        }

        if (!(await page.waitForSelector('header section', SELECTOR_TIMEOUT_MS))) {
          return fail<InstagramProfile>('Could not load profile data - profile might be private');
        }

        const scraped = extractProfile(await renderedDom(page));
        return succeed(toProfile(handle, url, scraped));
      });
    } catch (error) {
      console.error(`get_profile_info: ${errorMessage(error)}`);
      return fail(`Error getting profile info: ${errorMessage(error)}`);
    }
  }

  async getSocialPosts(username: string, limit = 12): Promise<ToolResult<InstagramPostsReport>> {
    try {
      const handle = cleanUsername(username);
      const url = profileUrl(handle);
      console.log(`get_social_posts: Fetching posts from ${url}`);

      return await withLoadedPage(this.browser, url, PAGE_OPTIONS, async ({ status, page, $ }) => {
        if (status === 404) {
          return fail<InstagramPostsReport>(`Profile not found: ${username}`);
        }

        if (isPrivateProfile($)) {
          return fail<InstagramPostsReport>('Profile is private - cannot access posts');
        }

        if (!(await page.waitForSelector('article a[href*="/p/"]', SELECTOR_TIMEOUT_MS))) {
          return fail<InstagramPostsReport>('Could not load posts - profile might have no posts');
        }

        const posts = extractPosts(await renderedDom(page), url, Math.min(limit, MAX_POSTS));
        return succeed({ username: handle, total_posts_found: posts.length, posts });
      });
    } catch (error) {
      console.error(`get_social_posts: ${errorMessage(error)}`);
      return fail(`Error getting posts: ${errorMessage(error)}`);
    }
  }

  async analyzeEngagementScore(username: string, sampleSize = 6): Promise<ToolResult<EngagementReport>> {
    try {
      const profileResult = await this.getProfileInfo(username);
      if (!profileResult.ok) {
        return profileResult;
      }
      const profile = profileResult.data;

      if (profile.is_private) {
        return fail('Cannot analyze engagement for private profiles');
      }
      if (profile.followers_count === 0) {
        return fail('Cannot calculate engagement rate - no followers data');
      }

      const postsResult = await this.getSocialPosts(username, sampleSize);
      if (!postsResult.ok) {
        return postsResult;
      }
      if (postsResult.data.posts.length === 0) {
        return fail('No posts found to analyze');
      }

      const postAnalysis = postsResult.data.posts.slice(0, sampleSize).map((post) => ({
        post_id: post.post_id,
        post_url: post.post_url,
        estimated_quality_score: postQualityScore(post.alt_text),
        has_alt_text: post.alt_text.length > 0,
        alt_text_length: post.alt_text.length,
      }));
      const totalQuality = postAnalysis.reduce((sum, post) => sum + post.estimated_quality_score, 0);

      return succeed({
        username: profile.username,
        followers_count: profile.followers_count,
        posts_analyzed: postAnalysis.length,
        avg_estimated_quality_score: roundTo(totalQuality / postAnalysis.length, 2),
        follower_to_posts_ratio: roundTo(profile.followers_count / Math.max(profile.posts_count, 1), 2),
        posting_frequency_rating: ratePostingFrequency(profile.posts_count),
        profile_optimization_score: profileOptimizationScore(profile),
        post_analysis: postAnalysis,
        recommendations: instagramRecommendations(profile, postAnalysis),
      });
    } catch (error) {
      console.error(`analyze_engagement_score: ${errorMessage(error)}`);
      return fail(`Error analyzing engagement: ${errorMessage(error)}`);
    }
  }

  async getHashtagAnalysis(username: string): Promise<ToolResult<HashtagReport>> {
    try {
      const profileResult = await this.getProfileInfo(username);
      if (!profileResult.ok) {
        return profileResult;
      }
      const profile = profileResult.data;
      const hashtags = extractHashtags(profile.bio);
      const brandTag = `#${profile.username.toLowerCase()}`;

      return succeed({
        username: profile.username,
        bio_hashtags: hashtags,
        bio_hashtag_count: hashtags.length,
        has_branded_hashtag_in_bio: hashtags.some((tag) => tag.toLowerCase().includes(brandTag)),
        bio_optimization_score: bioOptimizationScore(profile.bio, hashtags),
        recommendations: hashtagRecommendations(hashtags, profile),
      });
    } catch (error) {
      return fail(`Error analyzing hashtags: ${errorMessage(error)}`);
    }
  }

  async compareProfiles(usernames: string[]): Promise<ToolResult<ProfileComparison>> {
    try {
      if (usernames.length > MAX_COMPARED_PROFILES) {
        return fail('Maximum 5 profiles can be compared at once');
      }

      const results = await Promise.all(usernames.map((username) => this.getProfileInfo(username)));

      const profiles: InstagramProfile[] = [];
      const errors: ProfileLookupError[] = [];
      results.forEach((result, i) => {
        if (result.ok) {
          profiles.push(result.data);
        } else {
          errors.push({ username: usernames[i], error: result.failure.error });
        }
      });

      if (profiles.length === 0) {
        return fail('No valid profiles found', { individual_errors: errors });
      }

      return succeed({
        profiles_compared: profiles.length,
        profiles,
        comparison_metrics: {
          highest_followers: highest(profiles, (p) => p.followers_count),
          most_posts: highest(profiles, (p) => p.posts_count),
          best_follower_ratio: highest(profiles, (p) => p.follower_following_ratio),
          most_verified: profiles.filter((p) => p.is_verified).length,
          private_accounts: profiles.filter((p) => p.is_private).length,
        },
        ranking_by_followers: [...profiles].sort((a, b) => b.followers_count - a.followers_count),
        avg_metrics: {
          avg_followers: average(profiles, (p) => p.followers_count),
          avg_posts: average(profiles, (p) => p.posts_count),
          avg_following: average(profiles, (p) => p.following_count),
        },
        errors,
      });
    } catch (error) {
      return fail(`Error comparing profiles: ${errorMessage(error)}`);
    }
  }
}

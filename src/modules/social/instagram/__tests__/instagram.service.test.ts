/**
 * Instagram Service Tests
 */

import { InstagramService } from '../instagram.service';
import { FakeBrowserProvider } from '../../../../__tests__/helpers/mocks';
import {
  COFFEE_BIO,
  COFFEE_URL,
  coffeeProfileHtml,
  HIDDEN_URL,
  hiddenProfileHtml,
  TEA_URL,
  teaProfileHtml,
} from './instagram.fixtures';

describe('InstagramService', () => {
  let browser: FakeBrowserProvider;
  let service: InstagramService;

  beforeEach(() => {
    browser = new FakeBrowserProvider({
      [COFFEE_URL]: { html: coffeeProfileHtml },
      [TEA_URL]: { html: teaProfileHtml },
      [HIDDEN_URL]: { html: hiddenProfileHtml },
      'https://www.instagram.com/gone/': { html: '<html></html>', status: 404 },
      'https://www.instagram.com/login.wall/': { html: '<p>Log in to see photos</p>' },
    });
    service = new InstagramService(browser);
  });

  describe('getProfileInfo', () => {
    it('should return the profile with derived ratios', async () => {
      const result = await service.getProfileInfo('@coffee.lab');

      expect(result).toEqual({
        ok: true,
        data: {
          username: 'coffee.lab',
          url: COFFEE_URL,
          profile_name: 'Coffee Lab',
          bio: COFFEE_BIO,
          posts_count: 96,
          followers_count: 2450,
          following_count: 180,
          is_verified: true,
          is_private: false,
          profile_picture_url: 'https://cdn.test/avatar.jpg',
          follower_following_ratio: 13.61,
          estimated_engagement_rate: 3.918,
        },
      });
    });

    it('should load the page like a desktop browser', async () => {
      await service.getProfileInfo('coffee.lab');

      expect(browser.launches).toEqual([{ headless: true }]);
      expect(browser.pageOptions[0]).toMatchObject({
        viewport: { width: 1920, height: 1080 },
        extraHeaders: { 'Accept-Language': 'en-US,en;q=0.9' },
        defaultTimeoutMs: 30000,
      });
      expect(browser.settleCalls).toEqual([3000]);
    });

    it('should report a missing profile', async () => {
      const result = await service.getProfileInfo('gone');
      expect(result).toEqual({ ok: false, failure: { error: 'Profile not found: gone' } });
    });

    it('should report a page without a profile header', async () => {
      const result = await service.getProfileInfo('login.wall');
      expect(result).toEqual({
        ok: false,
        failure: { error: 'Could not load profile data - profile might be private' },
      });
    });
  });

  describe('getSocialPosts', () => {
    it('should list the grid posts', async () => {
      const result = await service.getSocialPosts('coffee.lab');
      if (!result.ok) throw new Error(result.failure.error);

      expect(result.data.username).toBe('coffee.lab');
      expect(result.data.total_posts_found).toBe(3);
      expect(result.data.posts.map((post) => post.post_id)).toEqual(['ABC123', 'DEF456', 'GHI789']);
    });

    it('should refuse private profiles', async () => {
      const result = await service.getSocialPosts('hidden.account');
      expect(result).toEqual({ ok: false, failure: { error: 'Profile is private - cannot access posts' } });
    });

    it('should report a profile without posts', async () => {
      const result = await service.getSocialPosts('tea.house');
      expect(result).toEqual({
        ok: false,
        failure: { error: 'Could not load posts - profile might have no posts' },
      });
    });
  });

  describe('analyzeEngagementScore', () => {
    it('should combine profile and post heuristics', async () => {
      const result = await service.analyzeEngagementScore('coffee.lab');
      if (!result.ok) throw new Error(result.failure.error);

      expect(result.data).toMatchObject({
        username: 'coffee.lab',
        followers_count: 2450,
        posts_analyzed: 3,
        avg_estimated_quality_score: 1.67,
        follower_to_posts_ratio: 25.52,
        posting_frequency_rating: 'Low',
        profile_optimization_score: 95,
        recommendations: ['Focus on higher quality content and add descriptive alt text to posts.'],
      });
      expect(result.data.post_analysis[0]).toEqual({
        post_id: 'ABC123',
        post_url: 'https://www.instagram.com/p/ABC123/',
        estimated_quality_score: 3,
        has_alt_text: true,
        alt_text_length: 29,
      });
      expect(browser.visitedUrls()).toEqual([COFFEE_URL, COFFEE_URL]);
    });

    it('should refuse private profiles', async () => {
      const result = await service.analyzeEngagementScore('hidden.account');
      expect(result).toEqual({ ok: false, failure: { error: 'Cannot analyze engagement for private profiles' } });
    });

    it('should pass profile errors through', async () => {
      const result = await service.analyzeEngagementScore('gone');
      expect(result).toEqual({ ok: false, failure: { error: 'Profile not found: gone' } });
    });
  });

  describe('getHashtagAnalysis', () => {
    it('should analyze the hashtags in the bio', async () => {
      const result = await service.getHashtagAnalysis('coffee.lab');

      expect(result).toEqual({
        ok: true,
        data: {
          username: 'coffee.lab',
          bio_hashtags: ['#coffeelab', '#specialtycoffee'],
          bio_hashtag_count: 2,
          has_branded_hashtag_in_bio: false,
          bio_optimization_score: 75,
          recommendations: ['Consider creating and using a branded hashtag in your bio.'],
        },
      });
    });
  });

  describe('compareProfiles', () => {
    it('should rank profiles and keep lookup errors', async () => {
      const result = await service.compareProfiles(['coffee.lab', '@tea.house', 'missing.user']);
      if (!result.ok) throw new Error(result.failure.error);

      const { comparison_metrics: metrics } = result.data;
      expect(result.data.profiles_compared).toBe(2);
      expect(metrics.highest_followers.username).toBe('tea.house');
      expect(metrics.most_posts.username).toBe('tea.house');
      expect(metrics.best_follower_ratio.username).toBe('coffee.lab');
      expect(metrics.most_verified).toBe(1);
      expect(metrics.private_accounts).toBe(0);
      expect(result.data.ranking_by_followers.map((p) => p.username)).toEqual(['tea.house', 'coffee.lab']);
      expect(result.data.avg_metrics).toEqual({ avg_followers: 3775, avg_posts: 648, avg_following: 1090 });
      expect(result.data.errors).toEqual([
        {
          username: 'missing.user',
          error: 'Error getting profile info: net::ERR_NAME_NOT_RESOLVED at https://www.instagram.com/missing.user/',
        },
      ]);
    });

    it('should fail when no profile could be read', async () => {
      const result = await service.compareProfiles(['gone']);

      expect(result).toEqual({
        ok: false,
        failure: {
          error: 'No valid profiles found',
          context: { individual_errors: [{ username: 'gone', error: 'Profile not found: gone' }] },
        },
      });
    });

    it('should compare at most five profiles', async () => {
      const result = await service.compareProfiles(['a', 'b', 'c', 'd', 'e', 'f']);

      expect(result).toEqual({ ok: false, failure: { error: 'Maximum 5 profiles can be compared at once' } });
      expect(browser.launches).toEqual([]);
    });
  });
});

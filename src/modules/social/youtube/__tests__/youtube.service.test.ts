import { YouTubeClient } from '../youtube.client';
import { YouTubeService } from '../youtube.service';
import {
  BREW_ID,
  createYouTubeApi,
  FakeYouTubeApi,
  KETTLE_ID,
  LATTE_ID,
  NOW,
  POUR_OVER_ID,
  UNKNOWN_ID,
} from './youtube.fixtures';

const BASE_URL = 'https://yt.test/v3';

describe('YouTubeService', () => {
  let api: FakeYouTubeApi;
  let service: YouTubeService;

  beforeEach(() => {
    api = createYouTubeApi();
    service = new YouTubeService(new YouTubeClient('test-key', api, BASE_URL), () => NOW);
  });

  describe('getChannelStats', () => {
    it('summarizes a channel looked up by id', async () => {
      const result = await service.getChannelStats(BREW_ID);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.data).toEqual({
        channel_id: BREW_ID,
        title: 'Brew Guides',
        description: `${'x'.repeat(500)}...`,
        created_date: '2024-03-01',
        days_active: 730,
        country: 'NZ',
        subscriber_count: 12000,
        video_count: 146,
        view_count: 876000,
        avg_views_per_video: 6000,
        uploads_per_month: 6,
        custom_url: 'Not set',
        thumbnail_url: 'https://img.test/brew-high.jpg',
        hidden_subscriber_count: false,
      });
      expect(api.calls('channels')[0].get('part')).toBe('snippet,statistics,brandingSettings,status');
      expect(api.calls('channels')[0].get('key')).toBe('test-key');
    });

    it('falls back to the legacy username', async () => {
      const result = await service.getChannelStats('https://www.youtube.com/user/kettlecorner');

      expect(api.calls('channels').map((params) => [params.get('id'), params.get('forUsername')])).toEqual([
        ['kettlecorner', null],
        [null, 'kettlecorner'],
      ]);
      expect(result.ok && result.data).toMatchObject({
        channel_id: KETTLE_ID,
        days_active: 365,
        country: 'Not specified',
        avg_views_per_video: 2000,
        uploads_per_month: 30,
        thumbnail_url: '',
        hidden_subscriber_count: true,
      });
    });

    it('reports unknown channels', async () => {
      const result = await service.getChannelStats(UNKNOWN_ID);

      expect(result).toEqual({ ok: false, failure: { error: `Channel not found: ${UNKNOWN_ID}` } });
    });

    it('reports API errors', async () => {
      const failing = new FakeYouTubeApi({ channels: () => ({ status: 403, body: 'quota exceeded' }) });
      const quotaService = new YouTubeService(new YouTubeClient('test-key', failing, BASE_URL), () => NOW);

      const result = await quotaService.getChannelStats(BREW_ID);

      expect(result).toEqual({
        ok: false,
        failure: { error: 'Error getting channel stats: YouTube API error 403: quota exceeded' },
      });
      expect(failing.calls('channels')).toHaveLength(2);
    });
  });

  describe('getRecentVideos', () => {
    it('lists the newest uploads', async () => {
      const result = await service.getRecentVideos(BREW_ID, 80);

      const search = api.calls('search')[0];
      expect(search.get('maxResults')).toBe('50');
      expect(search.get('order')).toBe('date');
      expect(result).toEqual({
        ok: true,
        data: {
          channel_id: BREW_ID,
          total_results: 2,
          videos: [
            {
              video_id: POUR_OVER_ID,
              title: 'How to Brew Pour Over Coffee at Home: 5 Steps for a Better Cup',
              description: `${'d'.repeat(200)}...`,
              published_at: '2026-02-20T09:00:00Z',
              thumbnail_url: 'https://img.test/pour-medium.jpg',
            },
            {
              video_id: LATTE_ID,
              title: 'quick latte art',
              description: 'Latte practice.',
              published_at: '2026-02-25T18:30:00Z',
              thumbnail_url: '',
            },
          ],
        },
      });
    });

    it('reports unknown channels before searching', async () => {
      const result = await service.getRecentVideos(UNKNOWN_ID);

      expect(result).toEqual({ ok: false, failure: { error: `Channel not found: ${UNKNOWN_ID}` } });
      expect(api.calls('search')).toHaveLength(0);
    });
  });

  describe('evaluateVideoMetadata', () => {
    it('analyzes a video from its watch URL', async () => {
      const result = await service.evaluateVideoMetadata(`https://www.youtube.com/watch?v=${POUR_OVER_ID}&t=30`);

      expect(result).toEqual({
        ok: true,
        data: {
          video_id: POUR_OVER_ID,
          title: 'How to Brew Pour Over Coffee at Home: 5 Steps for a Better Cup',
          title_analysis: { length: 62, optimal_length: true, has_keywords: true, has_numbers: true, has_caps: true },
          description_analysis: {
            length: 217,
            optimal_length: true,
            has_links: true,
            has_timestamps: true,
            has_hashtags: true,
          },
          tags: ['coffee', 'pour over', 'v60', 'brewing', 'home barista', 'tutorial'],
          tag_count: 6,
          category_id: '26',
          duration: '08:15',
          duration_seconds: 495,
          published_at: '2026-02-20T09:00:00Z',
          view_count: 10000,
          like_count: 450,
          comment_count: 60,
          engagement_rate: 5.1,
          thumbnail_url: 'https://img.test/pour-maxres.jpg',
          is_live: false,
        },
      });
    });

    it('falls back to the high thumbnail and a null category', async () => {
      const result = await service.evaluateVideoMetadata(LATTE_ID);

      expect(result.ok && result.data).toMatchObject({
        category_id: null,
        tags: [],
        duration: '00:45',
        engagement_rate: 0.75,
        thumbnail_url: 'https://img.test/latte-high.jpg',
      });
    });

    it('reports missing videos', async () => {
      const result = await service.evaluateVideoMetadata('missing0000');

      expect(result).toEqual({ ok: false, failure: { error: 'Video not found: missing0000' } });
    });
  });

  describe('analyzeChannelPerformance', () => {
    it('aggregates videos published in the period', async () => {
      const result = await service.analyzeChannelPerformance(BREW_ID, 14);

      expect(api.calls('search')[0].get('publishedAfter')).toBe('2026-02-15T00:00:00.000Z');
      expect(api.calls('videos')[0].get('id')).toBe('vidAAAAAAA1,vidAAAAAAA2');
      expect(result).toEqual({
        ok: true,
        data: {
          channel_id: BREW_ID,
          period_days: 14,
          videos_published: 2,
          avg_upload_frequency_per_week: 1,
          total_views: 240000,
          total_likes: 8500,
          total_comments: 1500,
          avg_views_per_video: 120000,
          avg_likes_per_video: 4250,
          avg_comments_per_video: 750,
          avg_engagement_rate: 4.167,
          performance_rating: 'Excellent',
          message: null,
        },
      });
    });

    it('returns an empty report when nothing was published', async () => {
      const result = await service.analyzeChannelPerformance(KETTLE_ID);

      expect(result.ok && result.data).toMatchObject({
        channel_id: KETTLE_ID,
        period_days: 30,
        videos_published: 0,
        avg_upload_frequency_per_week: 0,
        performance_rating: null,
        message: 'No videos found in the specified period',
      });
      expect(api.calls('videos')).toHaveLength(0);
    });
  });

  describe('getVideoSeoScore', () => {
    it('gives a fully optimized video the maximum score', async () => {
      const result = await service.getVideoSeoScore(POUR_OVER_ID);

      expect(result).toEqual({
        ok: true,
        data: {
          video_id: POUR_OVER_ID,
          title: 'How to Brew Pour Over Coffee at Home: 5 Steps for a Better Cup',
          seo_score: 100,
          score_breakdown: {
            title_score: 25,
            description_score: 20,
            tags_score: 15,
            engagement_score: 20,
            duration_score: 10,
            thumbnail_score: 10,
          },
          recommendations: [],
          max_possible_score: 100,
          achieved_score: 100,
        },
      });
    });

    it('recommends fixes for a weak video', async () => {
      const result = await service.getVideoSeoScore(LATTE_ID);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.data.seo_score).toBe(17);
      expect(result.data.score_breakdown).toEqual({
        title_score: 0,
        description_score: 0,
        tags_score: 0,
        engagement_score: 5,
        duration_score: 2,
        thumbnail_score: 10,
      });
      expect(result.data.recommendations).toEqual([
        'Optimize title length to 60-70 characters for better visibility.',
        "Include relevant keywords like 'how to', 'tutorial', 'review' in title.",
        'Consider adding numbers to title for higher click-through rates.',
        'Expand description to at least 200 characters for better SEO.',
        'Add timestamps to improve user experience and retention.',
        'Include relevant links in description (social media, website, related videos).',
        'Add more tags (currently 0, aim for 5-10 relevant tags).',
        'Improve engagement by asking questions, adding call-to-actions, and encouraging comments.',
        'Consider longer content (5-10 minutes) for better algorithm performance.',
      ]);
    });

    it('passes metadata failures through', async () => {
      const result = await service.getVideoSeoScore('missing0000');

      expect(result).toEqual({ ok: false, failure: { error: 'Video not found: missing0000' } });
    });
  });

  describe('compareChannels', () => {
    it('ranks the channels that resolved', async () => {
      const result = await service.compareChannels([BREW_ID, 'https://www.youtube.com/user/kettlecorner', UNKNOWN_ID]);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const { comparison_metrics: metrics } = result.data;
      expect(result.data.channels_compared).toBe(2);
      expect(metrics.highest_subscribers.channel_id).toBe(KETTLE_ID);
      expect(metrics.most_videos.channel_id).toBe(KETTLE_ID);
      expect(metrics.highest_total_views.channel_id).toBe(BREW_ID);
      expect(metrics.best_avg_views.channel_id).toBe(BREW_ID);
      expect(metrics.most_active.channel_id).toBe(KETTLE_ID);
      expect(result.data.ranking_by_subscribers.map((c) => c.channel_id)).toEqual([KETTLE_ID, BREW_ID]);
      expect(result.data.errors).toEqual([{ channel: UNKNOWN_ID, error: `Channel not found: ${UNKNOWN_ID}` }]);
    });

    it('limits the number of channels', async () => {
      const result = await service.compareChannels(['a', 'b', 'c', 'd', 'e', 'f']);

      expect(result).toEqual({ ok: false, failure: { error: 'Maximum 5 channels can be compared at once' } });
      expect(api.requests).toHaveLength(0);
    });

    it('fails when no channel resolves', async () => {
      const result = await service.compareChannels([UNKNOWN_ID]);

      expect(result).toEqual({
        ok: false,
        failure: {
          error: 'No valid channels found',
          context: { individual_errors: [{ channel: UNKNOWN_ID, error: `Channel not found: ${UNKNOWN_ID}` }] },
        },
      });
    });
  });
});

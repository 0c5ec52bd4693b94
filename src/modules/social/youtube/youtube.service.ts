/**
 * YouTube Service
 * Channel and video audits over the Data API v3
 */

import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { roundTo } from '../../../lib/utils/math';
import { QueryParams, YouTubeClient } from './youtube.client';
import {
  analyzeDescription,
  analyzeTitle,
  extractChannelId,
  extractVideoId,
  parseCount,
  parseDuration,
  truncate,
} from './youtube.parser';
import { channelIdListSchema, channelListSchema, searchListSchema, videoListSchema, videoStatsListSchema } from './youtube.schemas';
import { ratePerformance, scoreVideo, SEO_MAX_SCORE, totalScore, videoRecommendations } from './youtube.scoring';
import {
  ChannelComparison,
  ChannelLookupError,
  ChannelPerformanceReport,
  ChannelStats,
  RecentVideosReport,
  VideoMetadata,
  VideoSeoReport,
} from './youtube.types';

export const MAX_SEARCH_RESULTS = 50;
export const MAX_COMPARED_CHANNELS = 5;

const DAY_MS = 24 * 60 * 60 * 1000;
const CHANNEL_PARTS = 'snippet,statistics,brandingSettings,status';

function highest(channels: ChannelStats[], value: (channel: ChannelStats) => number): ChannelStats {
  return channels.reduce((best, channel) => (value(channel) > value(best) ? channel : best));
}

export class YouTubeService {
  constructor(
    private readonly client: YouTubeClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Look a channel up by id first, then as a legacy username
   */
  private async lookupChannel<T extends { items: unknown[] }>(
    identifier: string,
    fetch: (params: QueryParams) => Promise<T>
  ): Promise<T> {
    try {
      const byId = await fetch({ id: identifier });
      if (byId.items.length > 0) {
        return byId;
      }
    } catch (error) {
      console.warn(`youtube: Channel id lookup failed for ${identifier}: ${errorMessage(error)}`);
    }
    return fetch({ forUsername: identifier });
  }

  private async resolveChannelId(channelInput: string): Promise<string | null> {
    const identifier = extractChannelId(channelInput);
    const data = await this.lookupChannel(identifier, (params) =>
      this.client.request('channels', { part: 'id', ...params }, channelIdListSchema)
    );
    return data.items[0]?.id ?? null;
  }

  async getChannelStats(channelInput: string): Promise<ToolResult<ChannelStats>> {
    try {
      const identifier = extractChannelId(channelInput);
      console.log(`get_channel_stats: Looking up ${identifier}`);

      const data = await this.lookupChannel(identifier, (params) =>
        this.client.request('channels', { part: CHANNEL_PARTS, ...params }, channelListSchema)
      );
      const channel = data.items[0];
      if (!channel) {
        return fail(`Channel not found: ${channelInput}`);
      }

      const { snippet, statistics } = channel;
      const created = new Date(snippet.publishedAt);
      const daysActive = Math.floor((this.now().getTime() - created.getTime()) / DAY_MS);
      const videoCount = parseCount(statistics.videoCount);
      const viewCount = parseCount(statistics.viewCount);

      return succeed({
        channel_id: channel.id,
        title: snippet.title,
        description: truncate(snippet.description, 500),
        created_date: created.toISOString().slice(0, 10),
        days_active: daysActive,
        country: snippet.country ?? 'Not specified',
        subscriber_count: parseCount(statistics.subscriberCount),
        video_count: videoCount,
        view_count: viewCount,
        avg_views_per_video: Math.round(viewCount / Math.max(videoCount, 1)),
        uploads_per_month: roundTo((videoCount / Math.max(daysActive, 1)) * 30, 1),
        custom_url: snippet.customUrl ?? 'Not set',
        thumbnail_url: snippet.thumbnails.high?.url ?? '',
        hidden_subscriber_count: statistics.hiddenSubscriberCount ?? false,
      });
    } catch (error) {
      console.error(`get_channel_stats: ${errorMessage(error)}`);
      return fail(`Error getting channel stats: ${errorMessage(error)}`);
    }
  }

  async getRecentVideos(channelInput: string, maxResults = 10): Promise<ToolResult<RecentVideosReport>> {
    try {
      const channelId = await this.resolveChannelId(channelInput);
      if (!channelId) {
        return fail(`Channel not found: ${channelInput}`);
      }

      const search = await this.client.request(
        'search',
        {
          part: 'id,snippet',
          channelId,
          type: 'video',
          order: 'date',
          maxResults: Math.min(maxResults, MAX_SEARCH_RESULTS),
        },
        searchListSchema
      );

      const videos = search.items.map((item) => ({
        video_id: item.id.videoId,
        title: item.snippet.title,
        description: truncate(item.snippet.description, 200),
        published_at: item.snippet.publishedAt,
        thumbnail_url: item.snippet.thumbnails.medium?.url ?? '',
      }));

      return succeed({ channel_id: channelId, total_results: videos.length, videos });
    } catch (error) {
      console.error(`get_recent_videos: ${errorMessage(error)}`);
      return fail(`Error getting recent videos: ${errorMessage(error)}`);
    }
  }

  async evaluateVideoMetadata(videoInput: string): Promise<ToolResult<VideoMetadata>> {
    try {
      const videoId = extractVideoId(videoInput);
      const data = await this.client.request(
        'videos',
        { part: 'snippet,statistics,contentDetails,status', id: videoId },
        videoListSchema
      );
      const video = data.items[0];
      if (!video) {
        return fail(`Video not found: ${videoInput}`);
      }

      const { snippet, statistics, contentDetails } = video;
      const duration = parseDuration(contentDetails.duration ?? 'PT0S');
      const views = parseCount(statistics.viewCount);
      const likes = parseCount(statistics.likeCount);
      const comments = parseCount(statistics.commentCount);
      const thumbnail = snippet.thumbnails.maxres ?? snippet.thumbnails.high;

      return succeed({
        video_id: videoId,
        title: snippet.title,
        title_analysis: analyzeTitle(snippet.title),
        description_analysis: analyzeDescription(snippet.description),
        tags: snippet.tags,
        tag_count: snippet.tags.length,
        category_id: snippet.categoryId ?? null,
        duration: duration.formatted,
        duration_seconds: duration.seconds,
        published_at: snippet.publishedAt,
        view_count: views,
        like_count: likes,
        comment_count: comments,
        engagement_rate: roundTo(((likes + comments) / Math.max(views, 1)) * 100, 3),
        thumbnail_url: thumbnail?.url ?? '',
        is_live: contentDetails.duration === 'PT0S' || contentDetails.duration === 'P0D',
      });
    } catch (error) {
      console.error(`evaluate_video_metadata: ${errorMessage(error)}`);
      return fail(`Error evaluating video metadata: ${errorMessage(error)}`);
    }
  }

  async analyzeChannelPerformance(channelInput: string, daysBack = 30): Promise<ToolResult<ChannelPerformanceReport>> {
    try {
      const channelId = await this.resolveChannelId(channelInput);
      if (!channelId) {
        return fail(`Channel not found: ${channelInput}`);
      }

      const publishedAfter = new Date(this.now().getTime() - daysBack * DAY_MS).toISOString();
      const search = await this.client.request(
        'search',
        {
          part: 'id,snippet',
          channelId,
          type: 'video',
          order: 'date',
          maxResults: MAX_SEARCH_RESULTS,
          publishedAfter,
        },
        searchListSchema
      );

      const empty: ChannelPerformanceReport = {
        channel_id: channelId,
        period_days: daysBack,
        videos_published: 0,
        avg_upload_frequency_per_week: 0,
        total_views: 0,
        total_likes: 0,
        total_comments: 0,
        avg_views_per_video: 0,
        avg_likes_per_video: 0,
        avg_comments_per_video: 0,
        avg_engagement_rate: 0,
        performance_rating: null,
        message: 'No videos found in the specified period',
      };
      if (search.items.length === 0) {
        return succeed(empty);
      }

      const stats = await this.client.request(
        'videos',
        { part: 'statistics,contentDetails', id: search.items.map((item) => item.id.videoId).join(',') },
        videoStatsListSchema
      );

      const videoCount = stats.items.length;
      let totalViews = 0;
      let totalLikes = 0;
      let totalComments = 0;
      for (const { statistics } of stats.items) {
        totalViews += parseCount(statistics.viewCount);
        totalLikes += parseCount(statistics.likeCount);
        totalComments += parseCount(statistics.commentCount);
      }

      const perVideo = (total: number) => (videoCount > 0 ? total / videoCount : 0);
      const avgViews = perVideo(totalViews);
      const avgEngagement = ((totalLikes + totalComments) / Math.max(totalViews, 1)) * 100;
      const uploadsPerWeek = (videoCount * 7) / daysBack;

      return succeed({
        ...empty,
        videos_published: videoCount,
        avg_upload_frequency_per_week: roundTo(uploadsPerWeek, 1),
        total_views: totalViews,
        total_likes: totalLikes,
        total_comments: totalComments,
        avg_views_per_video: Math.round(avgViews),
        avg_likes_per_video: Math.round(perVideo(totalLikes)),
        avg_comments_per_video: Math.round(perVideo(totalComments)),
        avg_engagement_rate: roundTo(avgEngagement, 3),
        performance_rating: ratePerformance(avgViews, avgEngagement, uploadsPerWeek),
        message: null,
      });
    } catch (error) {
      console.error(`analyze_channel_performance: ${errorMessage(error)}`);
      return fail(`Error analyzing channel performance: ${errorMessage(error)}`);
    }
  }

  async getVideoSeoScore(videoInput: string): Promise<ToolResult<VideoSeoReport>> {
    try {
      const metadata = await this.evaluateVideoMetadata(videoInput);
      if (!metadata.ok) {
        return metadata;
      }
      const video = metadata.data;
      const breakdown = scoreVideo(video);
      const achieved = totalScore(breakdown);

      return succeed({
        video_id: video.video_id,
        title: video.title,
        seo_score: roundTo((achieved / SEO_MAX_SCORE) * 100, 1),
        score_breakdown: breakdown,
        recommendations: videoRecommendations(video, breakdown),
        max_possible_score: SEO_MAX_SCORE,
        achieved_score: achieved,
      });
    } catch (error) {
      return fail(`Error calculating SEO score: ${errorMessage(error)}`);
    }
  }

  async compareChannels(channelInputs: string[]): Promise<ToolResult<ChannelComparison>> {
    try {
      if (channelInputs.length > MAX_COMPARED_CHANNELS) {
        return fail('Maximum 5 channels can be compared at once');
      }

      const results = await Promise.all(channelInputs.map((channel) => this.getChannelStats(channel)));

      const channels: ChannelStats[] = [];
      const errors: ChannelLookupError[] = [];
      results.forEach((result, i) => {
        if (result.ok) {
          channels.push(result.data);
        } else {
          errors.push({ channel: channelInputs[i], error: result.failure.error });
        }
      });

      if (channels.length === 0) {
        return fail('No valid channels found', { individual_errors: errors });
      }

      return succeed({
        channels_compared: channels.length,
        channels,
        comparison_metrics: {
          highest_subscribers: highest(channels, (c) => c.subscriber_count),
          most_videos: highest(channels, (c) => c.video_count),
          highest_total_views: highest(channels, (c) => c.view_count),
          best_avg_views: highest(channels, (c) => c.avg_views_per_video),
          most_active: highest(channels, (c) => c.uploads_per_month),
        },
        ranking_by_subscribers: [...channels].sort((a, b) => b.subscriber_count - a.subscriber_count),
        errors,
      });
    } catch (error) {
      return fail(`Error comparing channels: ${errorMessage(error)}`);
    }
  }
}

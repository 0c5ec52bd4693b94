/**
 * YouTube Tool Types
 */

export interface ChannelStats {
  channel_id: string;
  title: string;
  description: string;
  created_date: string;
  days_active: number;
  country: string;
  subscriber_count: number;
  video_count: number;
  view_count: number;
  avg_views_per_video: number;
  uploads_per_month: number;
  custom_url: string;
  thumbnail_url: string;
  hidden_subscriber_count: boolean;
}

export interface RecentVideo {
  video_id: string;
  title: string;
  description: string;
  published_at: string;
  thumbnail_url: string;
}

export interface RecentVideosReport {
  channel_id: string;
  total_results: number;
  videos: RecentVideo[];
}

export interface TitleAnalysis {
  length: number;
  optimal_length: boolean;
  has_keywords: boolean;
  has_numbers: boolean;
  has_caps: boolean;
}

export interface DescriptionAnalysis {
  length: number;
  optimal_length: boolean;
  has_links: boolean;
  has_timestamps: boolean;
  has_hashtags: boolean;
}

export interface VideoMetadata {
  video_id: string;
  title: string;
  title_analysis: TitleAnalysis;
  description_analysis: DescriptionAnalysis;
  tags: string[];
  tag_count: number;
  category_id: string | null;
  duration: string;
  duration_seconds: number;
  published_at: string;
  view_count: number;
  like_count: number;
  comment_count: number;
  engagement_rate: number;
  thumbnail_url: string;
  is_live: boolean;
}

export type PerformanceRating = 'Excellent' | 'Good' | 'Average' | 'Needs Improvement';

/**
 * An empty period keeps the same shape: zero totals, a null rating and a message
 */
export interface ChannelPerformanceReport {
  channel_id: string;
  period_days: number;
  videos_published: number;
  avg_upload_frequency_per_week: number;
  total_views: number;
  total_likes: number;
  total_comments: number;
  avg_views_per_video: number;
  avg_likes_per_video: number;
  avg_comments_per_video: number;
  avg_engagement_rate: number;
  performance_rating: PerformanceRating | null;
  message: string | null;
}

export interface SeoScoreBreakdown {
  title_score: number;
  description_score: number;
  tags_score: number;
  engagement_score: number;
  duration_score: number;
  thumbnail_score: number;
}

export interface VideoSeoReport {
  video_id: string;
  title: string;
  seo_score: number;
  score_breakdown: SeoScoreBreakdown;
  recommendations: string[];
  max_possible_score: number;
  achieved_score: number;
}

export interface ChannelLookupError {
  channel: string;
  error: string;
}

export interface ChannelComparison {
  channels_compared: number;
  channels: ChannelStats[];
  comparison_metrics: {
    highest_subscribers: ChannelStats;
    most_videos: ChannelStats;
    highest_total_views: ChannelStats;
    best_avg_views: ChannelStats;
    most_active: ChannelStats;
  };
  ranking_by_subscribers: ChannelStats[];
  errors: ChannelLookupError[];
}

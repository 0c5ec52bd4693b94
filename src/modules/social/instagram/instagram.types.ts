/**
 * Instagram Types
 */

/** Facts scraped from a public profile page */
export interface ScrapedProfile {
  posts: number;
  followers: number;
  following: number;
  profile_name: string;
  bio: string;
  is_verified: boolean;
  is_private: boolean;
  profile_picture: string;
}

export interface InstagramProfile {
  username: string;
  url: string;
  profile_name: string;
  bio: string;
  posts_count: number;
  followers_count: number;
  following_count: number;
  is_verified: boolean;
  is_private: boolean;
  profile_picture_url: string;
  follower_following_ratio: number;
  estimated_engagement_rate: number;
}

export interface InstagramPost {
  post_id: string;
  post_url: string;
  image_url: string;
  alt_text: string;
  /** Not shown in the profile grid */
  timestamp: null;
}

export interface InstagramPostsReport {
  username: string;
  total_posts_found: number;
  posts: InstagramPost[];
}

export interface PostQuality {
  post_id: string;
  post_url: string;
  estimated_quality_score: number;
  has_alt_text: boolean;
  alt_text_length: number;
}

export type PostingFrequencyRating = 'Very High' | 'High' | 'Moderate' | 'Low' | 'Very Low';

export interface EngagementReport {
  username: string;
  followers_count: number;
  posts_analyzed: number;
  avg_estimated_quality_score: number;
  follower_to_posts_ratio: number;
  posting_frequency_rating: PostingFrequencyRating;
  profile_optimization_score: number;
  post_analysis: PostQuality[];
  recommendations: string[];
}

export interface HashtagReport {
  username: string;
  bio_hashtags: string[];
  bio_hashtag_count: number;
  has_branded_hashtag_in_bio: boolean;
  bio_optimization_score: number;
  recommendations: string[];
}

export interface ProfileLookupError {
  username: string;
  error: string;
}

export interface ProfileComparison {
  profiles_compared: number;
  profiles: InstagramProfile[];
  comparison_metrics: {
    highest_followers: InstagramProfile;
    most_posts: InstagramProfile;
    best_follower_ratio: InstagramProfile;
    most_verified: number;
    private_accounts: number;
  };
  ranking_by_followers: InstagramProfile[];
  avg_metrics: {
    avg_followers: number;
    avg_posts: number;
    avg_following: number;
  };
  errors: ProfileLookupError[];
}

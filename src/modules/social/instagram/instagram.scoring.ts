/**
 * Instagram Heuristics
 */

import { InstagramProfile, PostingFrequencyRating, PostQuality } from './instagram.types';

const HASHTAG_PATTERN = /#\w+/g;

export function extractHashtags(text: string): string[] {
  return text.match(HASHTAG_PATTERN) ?? [];
}

export function ratePostingFrequency(postsCount: number): PostingFrequencyRating {
  if (postsCount >= 1000) return 'Very High';
  if (postsCount >= 500) return 'High';
  if (postsCount >= 100) return 'Moderate';
  if (postsCount >= 50) return 'Low';
  return 'Very Low';
}

/**
 * Picture 10, bio 10 (+10 when detailed), verified 15, post count up to 20,
 * follower ratio up to 20, display name 15
 */
export function profileOptimizationScore(profile: InstagramProfile): number {
  let score = 0;

  if (profile.profile_picture_url) score += 10;

  if (profile.bio) {
    score += 10;
    if (profile.bio.length > 50) score += 10;
  }

  if (profile.is_verified) score += 15;

  const posts = profile.posts_count;
  if (posts >= 100) score += 20;
  else if (posts >= 50) score += 15;
  else if (posts >= 20) score += 10;
  else if (posts >= 5) score += 5;

  const ratio = profile.follower_following_ratio;
  if (ratio >= 10) score += 20;
  else if (ratio >= 5) score += 15;
  else if (ratio >= 2) score += 10;
  else if (ratio >= 1) score += 5;

  if (profile.profile_name) score += 15;

  return Math.min(score, 100);
}

export function bioOptimizationScore(bio: string, hashtags: string[]): number {
  if (!bio) {
    return 0;
  }

  let score = bio.length >= 50 && bio.length <= 150 ? 30 : 15;
  const lower = bio.toLowerCase();

  if (hashtags.length > 0) score += 25;
  if (['link', 'bio', '.com', 'www'].some((pattern) => lower.includes(pattern))) score += 25;
  if (['email', '@', 'contact', 'dm'].some((pattern) => lower.includes(pattern))) score += 20;

  return Math.min(score, 100);
}

/**
 * Alt text suggests a curated post; a photographer credit more so
 */
export function postQualityScore(altText: string): number {
  let score = 0;
  if (altText) score += 2;
  if (altText.toLowerCase().includes('photo by')) score += 1;
  return score;
}

export function instagramRecommendations(profile: InstagramProfile, posts: PostQuality[]): string[] {
  const recommendations: string[] = [];

  if (!profile.profile_picture_url) {
    recommendations.push('Add a profile picture to improve recognition and trust.');
  }

  if (!profile.bio) {
    recommendations.push('Add a bio to tell visitors about yourself or your brand.');
  } else if (profile.bio.length < 50) {
    recommendations.push('Expand your bio with more details about what you do.');
  }

  if (profile.posts_count < 20) {
    recommendations.push('Post more content regularly to keep your audience engaged.');
  }

  if (profile.follower_following_ratio < 0.5) {
    recommendations.push('Consider following fewer accounts to improve your follower-to-following ratio.');
  }

  if (posts.length > 0) {
    const averageQuality = posts.reduce((sum, post) => sum + post.estimated_quality_score, 0) / posts.length;
    if (averageQuality < 2) {
      recommendations.push('Focus on higher quality content and add descriptive alt text to posts.');
    }
  }

  if (profile.followers_count > 1000 && profile.posts_count > 0) {
    if (profile.posts_count / profile.followers_count < 0.01) {
      recommendations.push('Increase posting frequency to maintain audience engagement.');
    }
  }

  return recommendations;
}

export function hashtagRecommendations(hashtags: string[], profile: InstagramProfile): string[] {
  const recommendations: string[] = [];

  if (hashtags.length === 0) {
    recommendations.push('Add relevant hashtags to your bio to improve discoverability.');
  } else if (hashtags.length > 5) {
    recommendations.push('Consider reducing bio hashtags to 3-5 most relevant ones.');
  }

  const username = profile.username.toLowerCase();
  const hasBranded = hashtags.some((tag) => tag.toLowerCase().includes(username));
  if (!hasBranded && profile.followers_count > 1000) {
    recommendations.push('Consider creating and using a branded hashtag in your bio.');
  }

  return recommendations;
}

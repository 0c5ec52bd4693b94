/**
 * Channel rating and video SEO scoring
 */

import { PerformanceRating, SeoScoreBreakdown, VideoMetadata } from './youtube.types';

export const SEO_MAX_SCORE = 100;

export function ratePerformance(avgViews: number, engagementRate: number, uploadsPerWeek: number): PerformanceRating {
  let score = 0;

  if (avgViews >= 100000) score += 3;
  else if (avgViews >= 10000) score += 2;
  else if (avgViews >= 1000) score += 1;

  if (engagementRate >= 3) score += 3;
  else if (engagementRate >= 1) score += 2;
  else if (engagementRate >= 0.5) score += 1;

  if (uploadsPerWeek >= 2) score += 2;
  else if (uploadsPerWeek >= 1) score += 1;

  if (score >= 7) return 'Excellent';
  if (score >= 5) return 'Good';
  if (score >= 3) return 'Average';
  return 'Needs Improvement';
}

function tagsScore(tagCount: number): number {
  if (tagCount >= 5) return 15;
  if (tagCount >= 3) return 10;
  if (tagCount >= 1) return 5;
  return 0;
}

function engagementScore(rate: number): number {
  if (rate >= 5) return 20;
  if (rate >= 2) return 15;
  if (rate >= 1) return 10;
  if (rate >= 0.5) return 5;
  return 0;
}

// 5-10 minutes scores best
function durationScore(seconds: number): number {
  if (seconds >= 300 && seconds <= 600) return 10;
  if (seconds >= 180 && seconds <= 900) return 8;
  if (seconds >= 60 && seconds <= 1200) return 5;
  return 2;
}

export function scoreVideo(video: VideoMetadata): SeoScoreBreakdown {
  const title = video.title_analysis;
  const description = video.description_analysis;

  return {
    title_score:
      (title.optimal_length ? 10 : 0) + (title.has_keywords ? 8 : 0) + (title.has_numbers ? 4 : 0) + (title.has_caps ? 3 : 0),
    description_score:
      (description.optimal_length ? 8 : 0) +
      (description.has_links ? 4 : 0) +
      (description.has_timestamps ? 4 : 0) +
      (description.has_hashtags ? 4 : 0),
    tags_score: tagsScore(video.tag_count),
    engagement_score: engagementScore(video.engagement_rate),
    duration_score: durationScore(video.duration_seconds),
    thumbnail_score: video.thumbnail_url ? 10 : 0,
  };
}

export function totalScore(breakdown: SeoScoreBreakdown): number {
  return (
    breakdown.title_score +
    breakdown.description_score +
    breakdown.tags_score +
    breakdown.engagement_score +
    breakdown.duration_score +
    breakdown.thumbnail_score
  );
}

export function videoRecommendations(video: VideoMetadata, breakdown: SeoScoreBreakdown): string[] {
  const recommendations: string[] = [];

  if (breakdown.title_score < 20) {
    const title = video.title_analysis;
    if (!title.optimal_length) {
      recommendations.push('Optimize title length to 60-70 characters for better visibility.');
    }
    if (!title.has_keywords) {
      recommendations.push("Include relevant keywords like 'how to', 'tutorial', 'review' in title.");
    }
    if (!title.has_numbers) {
      recommendations.push('Consider adding numbers to title for higher click-through rates.');
    }
  }

  if (breakdown.description_score < 15) {
    const description = video.description_analysis;
    if (!description.optimal_length) {
      recommendations.push('Expand description to at least 200 characters for better SEO.');
    }
    if (!description.has_timestamps) {
      recommendations.push('Add timestamps to improve user experience and retention.');
    }
    if (!description.has_links) {
      recommendations.push('Include relevant links in description (social media, website, related videos).');
    }
  }

  if (breakdown.tags_score < 10) {
    recommendations.push(`Add more tags (currently ${video.tag_count}, aim for 5-10 relevant tags).`);
  }

  if (breakdown.engagement_score < 15) {
    recommendations.push('Improve engagement by asking questions, adding call-to-actions, and encouraging comments.');
  }

  if (breakdown.duration_score < 8) {
    if (video.duration_seconds < 180) {
      recommendations.push('Consider longer content (5-10 minutes) for better algorithm performance.');
    } else if (video.duration_seconds > 1200) {
      recommendations.push('Consider shorter, more focused content for better retention.');
    }
  }

  return recommendations;
}

/**
 * Speed Audit Types
 */

export type MetricRating = 'good' | 'needs_improvement' | 'poor';

export interface TimedMetric {
  value_seconds: number;
  score: number;
  rating: MetricRating;
}

export interface SpeedMetrics {
  first_contentful_paint: TimedMetric;
  largest_contentful_paint: TimedMetric;
  time_to_interactive: TimedMetric;
  speed_index: TimedMetric;
  total_blocking_time: { value_ms: number; score: number; rating: MetricRating };
  cumulative_layout_shift: { value: number; score: number; rating: MetricRating };
}

export interface SpeedAuditInfo {
  url: string;
  audit_time: number;
  lighthouse_version: string;
  user_agent: string;
  timestamp: string;
}

export interface SpeedAuditReport {
  overall_score: number;
  metrics: SpeedMetrics;
  audit_info: SpeedAuditInfo;
}

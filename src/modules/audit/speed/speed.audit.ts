/**
 * Speed Audit Service
 * Lighthouse performance category reduced to the core web vitals
 */

import { env } from '../../../config/env';
import { LighthouseReport, LighthouseRunError, LighthouseRunner } from '../../../lib/lighthouse/lighthouse.types';
import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { roundTo } from '../../../lib/utils/math';
import { elapsedSeconds, timestamp } from '../audit.utils';
import { MetricRating, SpeedAuditReport, SpeedMetrics, TimedMetric } from './speed.types';

export function metricRating(score: number): MetricRating {
  if (score >= 0.9) return 'good';
  if (score >= 0.5) return 'needs_improvement';
  return 'poor';
}

function auditValues(report: LighthouseReport, id: string): { value: number; score: number } {
  const audit = report.audits[id];
  return {
    value: audit?.numericValue ?? 0,
    score: audit?.score ?? 0,
  };
}

function secondsMetric(report: LighthouseReport, id: string): TimedMetric {
  const { value, score } = auditValues(report, id);
  return { value_seconds: roundTo(value / 1000, 2), score, rating: metricRating(score) };
}

export function extractSpeedMetrics(report: LighthouseReport): SpeedMetrics {
  const blocking = auditValues(report, 'total-blocking-time');
  const layoutShift = auditValues(report, 'cumulative-layout-shift');

  return {
    first_contentful_paint: secondsMetric(report, 'first-contentful-paint'),
    largest_contentful_paint: secondsMetric(report, 'largest-contentful-paint'),
    time_to_interactive: secondsMetric(report, 'interactive'),
    speed_index: secondsMetric(report, 'speed-index'),
    total_blocking_time: {
      value_ms: roundTo(blocking.value, 2),
      score: blocking.score,
      rating: metricRating(blocking.score),
    },
    cumulative_layout_shift: {
      value: roundTo(layoutShift.value, 3),
      score: layoutShift.score,
      rating: metricRating(layoutShift.score),
    },
  };
}

export class SpeedAuditService {
  constructor(private readonly lighthouse: LighthouseRunner) {}

  /**
   * Run the performance category; the CLI is assumed present
   * (checked by the tool's preconditions)
   */
  async audit(url: string, timeoutSeconds: number = env.LIGHTHOUSE_TIMEOUT_SECONDS): Promise<ToolResult<SpeedAuditReport>> {
    const startTime = Date.now();
    console.log(`audit_speed: Running Lighthouse for ${url}`);

    let report: LighthouseReport;
    try {
      report = await this.lighthouse.run(url, {
        categories: ['performance'],
        timeoutMs: timeoutSeconds * 1000,
      });
    } catch (error) {
      console.error(`audit_speed: ${errorMessage(error)}`);
      if (error instanceof LighthouseRunError) {
        return fail(error.message, {
          audit_info: { url, audit_time: elapsedSeconds(startTime), lighthouse_version: 'unknown' },
        });
      }
      return fail(`Speed audit failed: ${errorMessage(error)}`, {
        audit_info: { url, audit_time: elapsedSeconds(startTime) },
      });
    }

    const score = report.categories.performance?.score ?? 0;

    return succeed({
      overall_score: Math.floor(score * 100),
      metrics: extractSpeedMetrics(report),
      audit_info: {
        url,
        audit_time: elapsedSeconds(startTime),
        lighthouse_version: report.environment.lighthouseVersion ?? report.lighthouseVersion ?? 'unknown',
        user_agent: report.environment.networkUserAgent ?? 'unknown',
        timestamp: timestamp(),
      },
    });
  }
}

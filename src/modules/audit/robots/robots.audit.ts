/**
 * robots.txt Audit Service
 */

import { env } from '../../../config/env';
import { HttpErrorKind, HttpRequestError } from '../../../lib/http/http.errors';
import { HttpClient } from '../../../lib/http/http.types';
import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { elapsedSeconds, timestamp } from '../audit.utils';
import { analyzeRobotsTxt } from './robots.analysis';
import { emptyRobotsTxt, parseRobotsTxt } from './robots.parser';
import { RobotsAuditReport, RobotsFetchResult } from './robots.types';

const CHECKS_PERFORMED = [
  'accessibility_check',
  'syntax_validation',
  'user_agent_rules',
  'sitemap_detection',
  'crawl_delay_analysis',
  'seo_impact_assessment',
];

export function robotsTxtUrl(siteUrl: string): string {
  const { protocol, host } = new URL(siteUrl);
  return `${protocol}//${host}/robots.txt`;
}

function fetchErrorMessage(error: unknown): string {
  if (!(error instanceof HttpRequestError)) {
    return `Unexpected error: ${errorMessage(error)}`;
  }
  switch (error.kind) {
    case HttpErrorKind.TIMEOUT:
      return 'Request timed out';
    case HttpErrorKind.CONNECTION:
    case HttpErrorKind.SSL:
      return 'Could not connect to the server';
    default:
      return `Request failed: ${error.message}`;
  }
}

export class RobotsAuditService {
  constructor(private readonly http: HttpClient) {}

  async fetchRobotsTxt(siteUrl: string, timeoutSeconds: number): Promise<RobotsFetchResult> {
    const url = robotsTxtUrl(siteUrl);

    try {
      const response = await this.http.get(url, { timeoutMs: timeoutSeconds * 1000 });
      const content = response.status === 200 ? response.body ?? '' : null;

      return {
        success: true,
        url,
        status_code: response.status,
        content,
        response_time: response.elapsedMs / 1000,
        content_type: response.headers['content-type'] ?? '',
        content_length: content === null ? 0 : content.length,
        error: null,
      };
    } catch (error) {
      return {
        success: false,
        url,
        status_code: 0,
        content: null,
        response_time: 0,
        content_type: '',
        content_length: 0,
        error: fetchErrorMessage(error),
      };
    }
  }

  async audit(url: string, timeoutSeconds: number = env.LINK_TIMEOUT_SECONDS): Promise<ToolResult<RobotsAuditReport>> {
    const startTime = Date.now();

    try {
      console.log(`check_robots_txt: Checking robots.txt for ${url}`);
      const fetched = await this.fetchRobotsTxt(url, timeoutSeconds);
      const found = fetched.success && fetched.status_code === 200;

      let rawContent: string | null = null;
      let parsed = emptyRobotsTxt();
      if (found && fetched.content) {
        rawContent = fetched.content;
        parsed = parseRobotsTxt(rawContent);
      }

      const analysis = analyzeRobotsTxt(parsed);
      if (!fetched.success) {
        analysis.seo_impact.push(`robots.txt inaccessible: ${fetched.error ?? 'Unknown error'}`);
        analysis.recommendations.push('Ensure robots.txt is accessible at the domain root');
      } else if (fetched.status_code === 404) {
        analysis.seo_impact.push('No robots.txt found - search engines will crawl all accessible content');
        analysis.recommendations.push('Consider creating a robots.txt file to control crawler behavior');
      }

      return succeed({
        robots_txt_status: {
          found,
          accessible: fetched.success,
          status_code: fetched.status_code,
          response_time: fetched.response_time,
          content_length: fetched.content_length,
          content_type: fetched.content_type,
          url: fetched.url,
          error: fetched.error,
        },
        parsed_content: parsed,
        analysis,
        raw_content: rawContent,
        audit_info: {
          url,
          robots_txt_url: fetched.url,
          audit_time: elapsedSeconds(startTime),
          timestamp: timestamp(),
          checks_performed: CHECKS_PERFORMED,
        },
      });
    } catch (error) {
      console.error(`check_robots_txt: Check failed for ${url}: ${errorMessage(error)}`);
      return fail(`robots.txt check failed: ${errorMessage(error)}`, {
        audit_info: { url, audit_time: elapsedSeconds(startTime) },
      });
    }
  }
}

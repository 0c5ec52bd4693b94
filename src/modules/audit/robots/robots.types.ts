/**
 * robots.txt Audit Types
 */

export interface UserAgentRules {
  allow: string[];
  disallow: string[];
  crawl_delay: number | null;
}

export interface RobotsLineError {
  line: number;
  content: string;
  error: string;
}

export interface RobotsLineWarning {
  line: number;
  content: string;
  warning: string;
}

export interface ParsedRobotsTxt {
  user_agents: Record<string, UserAgentRules>;
  sitemaps: string[];
  crawl_delay: Record<string, number>;
  host: string | null;
  total_rules: number;
  warnings: RobotsLineWarning[];
  errors: RobotsLineError[];
}

export interface RobotsAnalysis {
  summary: {
    total_user_agents: number;
    total_sitemaps: number;
    has_crawl_delays: boolean;
    has_errors: boolean;
    has_warnings: boolean;
    total_rules: number;
  };
  recommendations: string[];
  seo_impact: string[];
  crawlability: {
    completely_blocked: boolean;
    partially_blocked: boolean;
    major_sections_blocked: string[];
    allows_crawling: boolean;
  };
}

export interface RobotsFetchResult {
  success: boolean;
  url: string;
  status_code: number;
  content: string | null;
  response_time: number;
  content_type: string;
  content_length: number;
  error: string | null;
}

export interface RobotsTxtStatus {
  found: boolean;
  accessible: boolean;
  status_code: number;
  /** Seconds */
  response_time: number;
  content_length: number;
  content_type: string;
  url: string;
  error: string | null;
}

export interface RobotsAuditReport {
  robots_txt_status: RobotsTxtStatus;
  parsed_content: ParsedRobotsTxt;
  analysis: RobotsAnalysis;
  raw_content: string | null;
  audit_info: {
    url: string;
    robots_txt_url: string;
    audit_time: number;
    timestamp: string;
    checks_performed: string[];
  };
}

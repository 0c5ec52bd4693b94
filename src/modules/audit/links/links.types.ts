/**
 * Link Audit Types
 */

// ============================================================================
// Extraction
// ============================================================================

export interface CategorizedLinks {
  internal_links: string[];
  external_links: string[];
  email_links: string[];
  tel_links: string[];
  other_links: string[];
}

export type LinkType = 'anchor' | 'mailto' | 'tel' | 'relative' | 'absolute' | 'protocol_relative';

export interface LinkDetail {
  href: string;
  text: string;
  /** Position among the page's `a[href]` elements */
  index: number;
  parent_element: string | null;
  classes: string;
  type: LinkType;
  normalized_url: string | null;
}

export interface NavigationAnalysis {
  has_navigation: boolean;
  navigation_links: LinkDetail[];
  breadcrumb_links: LinkDetail[];
  footer_links: LinkDetail[];
}

export interface InternalLinksStructure {
  total_internal_links: number;
  unique_internal_links: string[];
  internal_links_with_anchors: LinkDetail[];
  relative_links: LinkDetail[];
  absolute_internal_links: LinkDetail[];
  anchor_links: LinkDetail[];
  mailto_links: LinkDetail[];
  tel_links: LinkDetail[];
  link_details: LinkDetail[];
  navigation_analysis: NavigationAnalysis;
}

// ============================================================================
// Status checks
// ============================================================================

export type ExternalLinkStatus =
  | 'working'
  | 'broken'
  | 'timeout'
  | 'connection_error'
  | 'ssl_error'
  | 'too_many_redirects'
  | 'error';

export interface ExternalLinkResult {
  url: string;
  status: ExternalLinkStatus;
  status_code: number;
  final_url: string | null;
  /** Seconds */
  response_time: number | null;
  content_type: string | null;
  redirect_count: number;
  error: string | null;
}

export type InternalLinkStatus =
  | 'working'
  | 'broken'
  | 'anchor_link'
  | 'timeout'
  | 'connection_error'
  | 'request_error'
  | 'error';

export interface InternalLinkResult {
  url: string;
  status: InternalLinkStatus;
  status_code: number;
  /** Seconds; the timeout itself for timed-out requests */
  response_time: number;
  final_url: string | null;
  redirect_count: number;
  content_type: string | null;
  description: string | null;
}

export interface InternalLinkValidation {
  validation_results: InternalLinkResult[];
  summary: {
    total_checked: number;
    working_links: number;
    broken_links: number;
    error_links: number;
    total_available: number;
    check_limited: boolean;
  };
}

// ============================================================================
// Analysis
// ============================================================================

export interface ExternalLinksAnalysis {
  total_checked: number;
  working_links: number;
  broken_links: number;
  timeout_links: number;
  error_links: number;
  redirected_links: number;
  status_code_breakdown: Record<string, number>;
  broken_link_details: Array<{ url: string; status_code: number; error: string }>;
  recommendations: string[];
}

export interface InternalLinkingAnalysis {
  linking_score: number;
  strengths: string[];
  issues: string[];
  recommendations: string[];
  technical_health: {
    broken_link_percentage: number;
    redirect_percentage: number;
    average_response_time: number;
  };
}

// ============================================================================
// Reports
// ============================================================================

export interface LinkAuditOptions {
  headless: boolean;
  timeoutSeconds: number;
  linkTimeoutSeconds: number;
  maxLinks: number;
}

export interface ExternalLinksReport {
  links_summary: {
    total_links: number;
    internal_links: number;
    external_links: number;
    external_links_checked: number;
    email_links: number;
    tel_links: number;
    other_links: number;
  };
  external_links_analysis: ExternalLinksAnalysis;
  link_results: ExternalLinkResult[];
  audit_info: {
    url: string;
    audit_time: number;
    page_title: string;
    timestamp: string;
    max_links_limit: number;
  };
}

export interface InternalLinkingReport {
  links_structure: InternalLinksStructure;
  validation_results: InternalLinkValidation;
  linking_analysis: InternalLinkingAnalysis;
  audit_info: {
    url: string;
    audit_time: number;
    page_title: string;
    timestamp: string;
    max_links_limit: number;
    checks_performed: string[];
  };
}

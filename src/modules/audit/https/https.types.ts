/**
 * HTTPS Audit Types
 */

export interface HttpsStatus {
  https_available: boolean;
  http_redirects_to_https: boolean;
  https_status_code: number;
  http_status_code: number;
  /** Seconds */
  https_response_time: number;
  http_response_time: number;
  https_error: string | null;
  http_error: string | null;
  final_https_url: string | null;
  final_http_url: string | null;
  /** URLs that answered the HTTPS request with a redirect */
  redirect_chain: string[];
}

export interface CertificateInfo {
  subject: Record<string, string>;
  issuer: Record<string, string>;
  serial_number: string | null;
  not_before: string;
  not_after: string;
  subject_alt_names: string[];
  days_until_expiry: number | null;
}

export interface SecurityDetails {
  protocol: string | null;
  cipher: {
    name: string;
    bits: number | null;
  } | null;
}

export interface SslCertificateReport {
  valid: boolean;
  certificate_info: CertificateInfo | null;
  validation_errors: string[];
  warnings: string[];
  security_details: SecurityDetails | null;
  /** Set when no certificate could be read */
  error: string | null;
}

export interface HttpsSecurityAnalysis {
  security_score: number;
  security_issues: string[];
  recommendations: string[];
  compliance: {
    has_https: boolean;
    forces_https: boolean;
    valid_certificate: boolean;
    modern_tls: boolean;
  };
}

export interface HttpsAuditReport {
  https_status: HttpsStatus;
  ssl_certificate: SslCertificateReport;
  security_analysis: HttpsSecurityAnalysis;
  audit_info: {
    url: string;
    domain: string;
    audit_time: number;
    timestamp: string;
    checks_performed: string[];
  };
}

/**
 * HTTPS Security Scoring
 */

import { HttpsSecurityAnalysis, HttpsStatus, SslCertificateReport } from './https.types';

const MODERN_PROTOCOLS = ['TLSv1.2', 'TLSv1.3'];
const LEGACY_TLS_PROTOCOLS = ['TLSv1.1', 'TLSv1'];

export function analyzeHttpsSecurity(status: HttpsStatus, certificate: SslCertificateReport): HttpsSecurityAnalysis {
  const analysis: HttpsSecurityAnalysis = {
    security_score: 0,
    security_issues: [],
    recommendations: [],
    compliance: {
      has_https: false,
      forces_https: false,
      valid_certificate: false,
      modern_tls: false,
    },
  };
  let score = 0;

  if (status.https_available) {
    analysis.compliance.has_https = true;
    score += 25;
    analysis.recommendations.push('Good: HTTPS is available');
  } else {
    analysis.security_issues.push('HTTPS is not available');
    analysis.recommendations.push('Critical: Enable HTTPS for secure connections');
  }

  if (status.http_redirects_to_https) {
    analysis.compliance.forces_https = true;
    score += 25;
    analysis.recommendations.push('Good: HTTP traffic is redirected to HTTPS');
  } else {
    analysis.security_issues.push('HTTP does not redirect to HTTPS');
    analysis.recommendations.push('Important: Configure HTTP to HTTPS redirect');
  }

  if (certificate.valid) {
    analysis.compliance.valid_certificate = true;
    score += 30;
    analysis.recommendations.push('Good: SSL certificate is valid');

    const days = certificate.certificate_info?.days_until_expiry ?? 0;
    if (days < 30) {
      analysis.security_issues.push(`SSL certificate expires in ${days} days`);
    }
  } else {
    analysis.security_issues.push('SSL certificate is invalid');
    analysis.recommendations.push('Critical: Fix SSL certificate issues');
    for (const error of certificate.validation_errors) {
      analysis.security_issues.push(`Certificate error: ${error}`);
    }
  }

  const protocol = certificate.security_details?.protocol ?? '';
  if (MODERN_PROTOCOLS.includes(protocol)) {
    analysis.compliance.modern_tls = true;
    score += 20;
    analysis.recommendations.push(`Good: Using modern TLS protocol (${protocol})`);
  } else if (LEGACY_TLS_PROTOCOLS.includes(protocol)) {
    analysis.security_issues.push(`Using deprecated TLS protocol: ${protocol}`);
    analysis.recommendations.push('Update to TLS 1.2 or 1.3 for better security');
    score += 10;
  } else {
    analysis.security_issues.push(`Unknown or insecure protocol: ${protocol}`);
    analysis.recommendations.push('Ensure modern TLS protocol is being used');
  }

  for (const warning of certificate.warnings) {
    analysis.security_issues.push(`SSL Warning: ${warning}`);
  }

  analysis.security_score = Math.min(score, 100);

  if (analysis.security_score >= 90) {
    analysis.recommendations.push('Excellent HTTPS security configuration!');
  } else if (analysis.security_score >= 75) {
    analysis.recommendations.push('Good HTTPS security with minor improvements needed');
  } else if (analysis.security_score >= 50) {
    analysis.recommendations.push('HTTPS security needs improvement - address critical issues');
  } else {
    analysis.recommendations.push('Poor HTTPS security - immediate attention required');
  }

  return analysis;
}

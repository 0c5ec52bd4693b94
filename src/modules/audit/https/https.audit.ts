/**
 * HTTPS Audit Service
 * HTTPS availability, HTTP→HTTPS redirect and the certificate on port 443
 */

import { env } from '../../../config/env';
import { HttpErrorKind, HttpRequestError } from '../../../lib/http/http.errors';
import { HttpClient } from '../../../lib/http/http.types';
import { CertificateInspector } from '../../../lib/tls/tls.types';
import { errorMessage, fail, succeed, ToolResult } from '../../../lib/tools/tool-result';
import { elapsedSeconds, timestamp } from '../audit.utils';
import { certificateFailure, evaluateCertificate } from './certificate';
import { analyzeHttpsSecurity } from './https.analysis';
import { HttpsAuditReport, HttpsStatus, SslCertificateReport } from './https.types';

const HTTPS_PORT = 443;

const CHECKS_PERFORMED = [
  'https_availability',
  'http_to_https_redirect',
  'ssl_certificate_validation',
  'certificate_expiry_check',
  'domain_name_validation',
  'tls_protocol_analysis',
  'cipher_strength_evaluation',
  'security_best_practices',
];

/**
 * `sslLabel` prefixes TLS failures; the plain HTTP probe files them under connection errors
 */
function requestErrorMessage(error: unknown, sslLabel: string): string {
  if (!(error instanceof HttpRequestError)) {
    return `Request failed: ${errorMessage(error)}`;
  }
  switch (error.kind) {
    case HttpErrorKind.SSL:
      return `${sslLabel}: ${error.message}`;
    case HttpErrorKind.CONNECTION:
      return `Connection Error: ${error.message}`;
    case HttpErrorKind.TIMEOUT:
      return 'Request timed out';
    default:
      return `Request failed: ${error.message}`;
  }
}

export class HttpsAuditService {
  constructor(
    private readonly http: HttpClient,
    private readonly certificates: CertificateInspector,
    private readonly now: () => Date = () => new Date()
  ) {}

  async checkHttpsStatus(url: string, timeoutSeconds: number): Promise<HttpsStatus> {
    const { host, pathname } = new URL(url);
    const options = { timeoutMs: timeoutSeconds * 1000, readBody: false };

    const status: HttpsStatus = {
      https_available: false,
      http_redirects_to_https: false,
      https_status_code: 0,
      http_status_code: 0,
      https_response_time: 0,
      http_response_time: 0,
      https_error: null,
      http_error: null,
      final_https_url: null,
      final_http_url: null,
      redirect_chain: [],
    };

    const [httpsOutcome, httpOutcome] = await Promise.allSettled([
      this.http.get(`https://${host}${pathname}`, options),
      this.http.get(`http://${host}${pathname}`, options),
    ]);

    if (httpsOutcome.status === 'fulfilled') {
      const response = httpsOutcome.value;
      status.https_available = true;
      status.https_status_code = response.status;
      status.https_response_time = response.elapsedMs / 1000;
      status.final_https_url = response.finalUrl;
      status.redirect_chain = response.redirectChain.map((hop) => hop.url);
    } else {
      status.https_error = requestErrorMessage(httpsOutcome.reason, 'SSL Error');
    }

    if (httpOutcome.status === 'fulfilled') {
      const response = httpOutcome.value;
      status.http_status_code = response.status;
      status.http_response_time = response.elapsedMs / 1000;
      status.final_http_url = response.finalUrl;
      status.http_redirects_to_https = response.finalUrl.startsWith('https://');
    } else {
      status.http_error = requestErrorMessage(httpOutcome.reason, 'Connection Error');
    }

    return status;
  }

  async checkCertificate(hostname: string, timeoutSeconds: number): Promise<SslCertificateReport> {
    try {
      const report = await this.certificates.inspect(hostname, HTTPS_PORT, timeoutSeconds * 1000);
      return evaluateCertificate(report, hostname, this.now());
    } catch (error) {
      return certificateFailure(error);
    }
  }

  async audit(url: string, timeoutSeconds: number = env.LINK_TIMEOUT_SECONDS): Promise<ToolResult<HttpsAuditReport>> {
    const startTime = Date.now();

    try {
      const { host, hostname } = new URL(url);
      console.log(`check_https_usage: Checking HTTPS security for ${url}`);

      const [httpsStatus, certificate] = await Promise.all([
        this.checkHttpsStatus(url, timeoutSeconds),
        this.checkCertificate(hostname, timeoutSeconds),
      ]);

      return succeed({
        https_status: httpsStatus,
        ssl_certificate: certificate,
        security_analysis: analyzeHttpsSecurity(httpsStatus, certificate),
        audit_info: {
          url,
          domain: host,
          audit_time: elapsedSeconds(startTime),
          timestamp: timestamp(),
          checks_performed: CHECKS_PERFORMED,
        },
      });
    } catch (error) {
      console.error(`check_https_usage: Check failed for ${url}: ${errorMessage(error)}`);
      return fail(`HTTPS security check failed: ${errorMessage(error)}`, {
        audit_info: { url, audit_time: elapsedSeconds(startTime) },
      });
    }
  }
}

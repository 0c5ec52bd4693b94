/**
 * Certificate Evaluation
 * Turns a peer certificate report into validation errors and warnings
 */

import { CertificateInspectionError, PeerCertificateReport, TlsErrorKind } from '../../../lib/tls/tls.types';
import { errorMessage } from '../../../lib/tools/tool-result';
import { CertificateInfo, SslCertificateReport } from './https.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEPRECATED_PROTOCOLS = ['TLSv1', 'TLSv1.1', 'SSLv2', 'SSLv3'];
const MIN_CIPHER_BITS = 128;

/** Verification errors already reported through the date and name checks */
const COVERED_AUTHORIZATION_ERRORS = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

export function parseCertificateDate(value: string): Date | null {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function nameMatches(name: string, domain: string): boolean {
  if (name === domain || name === `*.${domain}`) {
    return true;
  }
  return name.startsWith('*.') && domain.endsWith(name.slice(1));
}

/**
 * Common name or any DNS SAN covers the host; `www.` hosts also accept
 * a certificate for the bare domain
 */
export function certificateMatchesDomain(commonName: string, altNames: string[], domain: string): boolean {
  const names = [commonName, ...altNames].filter(Boolean);
  if (names.some((name) => nameMatches(name, domain))) {
    return true;
  }
  if (domain.startsWith('www.')) {
    const bare = domain.slice(4);
    return names.some((name) => name === bare || name === `*.${bare}`);
  }
  return false;
}

export function evaluateCertificate(report: PeerCertificateReport, domain: string, now: Date): SslCertificateReport {
  const info: CertificateInfo = {
    subject: report.subject,
    issuer: report.issuer,
    serial_number: report.serialNumber,
    not_before: report.validFrom,
    not_after: report.validTo,
    subject_alt_names: report.subjectAltNames,
    days_until_expiry: null,
  };
  const result: SslCertificateReport = {
    valid: false,
    certificate_info: info,
    validation_errors: [],
    warnings: [],
    security_details: {
      protocol: report.protocol,
      cipher: report.cipherName ? { name: report.cipherName, bits: report.cipherBits } : null,
    },
    error: null,
  };

  const notBefore = parseCertificateDate(report.validFrom);
  const notAfter = parseCertificateDate(report.validTo);

  if (!notBefore || !notAfter) {
    const invalid = notBefore ? report.validTo : report.validFrom;
    result.validation_errors.push(`Could not parse certificate dates: invalid date '${invalid}'`);
  } else if (now < notBefore) {
    result.validation_errors.push('Certificate is not yet valid');
  } else if (now > notAfter) {
    result.validation_errors.push('Certificate has expired');
  } else {
    const days = Math.floor((notAfter.getTime() - now.getTime()) / DAY_MS);
    info.days_until_expiry = days;

    if (days < 30) {
      result.warnings.push(`Certificate expires in ${days} days`);
    } else if (days < 90) {
      result.warnings.push(`Certificate expires in ${days} days - consider renewal planning`);
    }
  }

  const commonName = report.subject.CN ?? '';
  if (!certificateMatchesDomain(commonName, report.subjectAltNames, domain)) {
    result.validation_errors.push(`Certificate domain mismatch: cert for '${commonName}', requested '${domain}'`);
  }

  if (report.authorizationError && !COVERED_AUTHORIZATION_ERRORS.has(report.authorizationError)) {
    result.validation_errors.push(`Certificate verification failed: ${report.authorizationError}`);
  }

  if (report.cipherBits !== null && report.cipherBits < MIN_CIPHER_BITS) {
    result.warnings.push(`Weak cipher strength: ${report.cipherBits} bits`);
  }

  if (report.protocol && DEPRECATED_PROTOCOLS.includes(report.protocol)) {
    result.warnings.push(`Deprecated protocol in use: ${report.protocol}`);
  }

  result.valid = result.validation_errors.length === 0;
  return result;
}

/**
 * Report for a host whose certificate could not be read at all
 */
export function certificateFailure(error: unknown): SslCertificateReport {
  const failed = (message: string, validationErrors: string[] = []): SslCertificateReport => ({
    valid: false,
    certificate_info: null,
    validation_errors: validationErrors,
    warnings: [],
    security_details: null,
    error: message,
  });

  if (!(error instanceof CertificateInspectionError)) {
    return failed(`Certificate check failed: ${errorMessage(error)}`);
  }

  switch (error.kind) {
    case TlsErrorKind.TIMEOUT:
      return failed('Connection timed out');
    case TlsErrorKind.DNS:
      return failed(`DNS resolution failed: ${error.message}`);
    case TlsErrorKind.REFUSED:
      return failed('Connection refused - port may be closed');
    case TlsErrorKind.SSL:
      return failed(`SSL Error: ${error.message}`, [error.message]);
    default:
      return failed(`Certificate check failed: ${error.message}`);
  }
}

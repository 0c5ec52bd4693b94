/**
 * Certificate Evaluation Tests
 */

import { CertificateInspectionError, PeerCertificateReport, TlsErrorKind } from '../../../../lib/tls/tls.types';
import { certificateFailure, certificateMatchesDomain, evaluateCertificate } from '../certificate';

const NOW = new Date('2026-03-01T00:00:00Z');

function certificate(overrides: Partial<PeerCertificateReport> = {}): PeerCertificateReport {
  return {
    subject: { CN: 'shop.test' },
    issuer: { CN: 'Test CA', O: 'Test Authority' },
    serialNumber: '0A1B2C',
    validFrom: 'Jan 10 00:00:00 2026 GMT',
    validTo: 'Jun 15 12:00:00 2026 GMT',
    subjectAltNames: ['shop.test', 'www.shop.test'],
    protocol: 'TLSv1.3',
    cipherName: 'TLS_AES_256_GCM_SHA384',
    cipherBits: 256,
    authorizationError: null,
    ...overrides,
  };
}

describe('certificateMatchesDomain', () => {
  it('should match the common name or a SAN exactly', () => {
    expect(certificateMatchesDomain('shop.test', [], 'shop.test')).toBe(true);
    expect(certificateMatchesDomain('other.test', ['api.shop.test'], 'api.shop.test')).toBe(true);
  });

  it('should match one wildcard label', () => {
    expect(certificateMatchesDomain('*.shop.test', [], 'api.shop.test')).toBe(true);
    expect(certificateMatchesDomain('shop.test', ['*.shop.test'], 'api.shop.test')).toBe(true);
    expect(certificateMatchesDomain('*.shop.test', [], 'evilshop.test')).toBe(false);
  });

  it('should accept the bare domain certificate for a www host', () => {
    expect(certificateMatchesDomain('shop.test', [], 'www.shop.test')).toBe(true);
  });

  it('should reject an unrelated certificate', () => {
    expect(certificateMatchesDomain('cdn.test', ['static.cdn.test'], 'shop.test')).toBe(false);
  });
});

describe('evaluateCertificate', () => {
  it('should accept a current certificate for the host', () => {
    const result = evaluateCertificate(certificate(), 'shop.test', NOW);

    expect(result).toEqual({
      valid: true,
      certificate_info: {
        subject: { CN: 'shop.test' },
        issuer: { CN: 'Test CA', O: 'Test Authority' },
        serial_number: '0A1B2C',
        not_before: 'Jan 10 00:00:00 2026 GMT',
        not_after: 'Jun 15 12:00:00 2026 GMT',
        subject_alt_names: ['shop.test', 'www.shop.test'],
        days_until_expiry: 106,
      },
      validation_errors: [],
      warnings: [],
      security_details: {
        protocol: 'TLSv1.3',
        cipher: { name: 'TLS_AES_256_GCM_SHA384', bits: 256 },
      },
      error: null,
    });
  });

  it('should warn about an upcoming expiry', () => {
    expect(evaluateCertificate(certificate({ validTo: 'Mar 20 00:00:00 2026 GMT' }), 'shop.test', NOW).warnings).toEqual([
      'Certificate expires in 19 days',
    ]);
    expect(evaluateCertificate(certificate({ validTo: 'Apr 30 00:00:00 2026 GMT' }), 'shop.test', NOW).warnings).toEqual([
      'Certificate expires in 60 days - consider renewal planning',
    ]);
  });

  it('should reject expired and not yet valid certificates', () => {
    const expired = evaluateCertificate(certificate({ validTo: 'Feb 01 00:00:00 2026 GMT' }), 'shop.test', NOW);
    expect(expired.valid).toBe(false);
    expect(expired.validation_errors).toEqual(['Certificate has expired']);
    expect(expired.certificate_info?.days_until_expiry).toBeNull();

    const early = evaluateCertificate(certificate({ validFrom: 'Apr 01 00:00:00 2026 GMT' }), 'shop.test', NOW);
    expect(early.validation_errors).toEqual(['Certificate is not yet valid']);
  });

  it('should report unreadable dates', () => {
    const result = evaluateCertificate(certificate({ validTo: 'sometime' }), 'shop.test', NOW);
    expect(result.validation_errors).toEqual(["Could not parse certificate dates: invalid date 'sometime'"]);
  });

  it('should report a name mismatch and an untrusted chain', () => {
    const result = evaluateCertificate(
      certificate({ authorizationError: 'DEPTH_ZERO_SELF_SIGNED_CERT' }),
      'blog.test',
      NOW
    );

    expect(result.valid).toBe(false);
    expect(result.validation_errors).toEqual([
      "Certificate domain mismatch: cert for 'shop.test', requested 'blog.test'",
      'Certificate verification failed: DEPTH_ZERO_SELF_SIGNED_CERT',
    ]);
  });

  it('should not repeat an expiry the dates already report', () => {
    const result = evaluateCertificate(
      certificate({ validTo: 'Feb 01 00:00:00 2026 GMT', authorizationError: 'CERT_HAS_EXPIRED' }),
      'shop.test',
      NOW
    );
    expect(result.validation_errors).toEqual(['Certificate has expired']);
  });

  it('should warn about weak ciphers and deprecated protocols', () => {
    const result = evaluateCertificate(
      certificate({ protocol: 'TLSv1', cipherName: 'DES-CBC-SHA', cipherBits: 56 }),
      'shop.test',
      NOW
    );

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Weak cipher strength: 56 bits', 'Deprecated protocol in use: TLSv1']);
  });
});

describe('certificateFailure', () => {
  it('should describe each inspection failure', () => {
    expect(certificateFailure(new CertificateInspectionError(TlsErrorKind.TIMEOUT, 'Connection timed out')).error).toBe(
      'Connection timed out'
    );
    expect(
      certificateFailure(new CertificateInspectionError(TlsErrorKind.DNS, 'getaddrinfo ENOTFOUND shop.test')).error
    ).toBe('DNS resolution failed: getaddrinfo ENOTFOUND shop.test');
    expect(certificateFailure(new CertificateInspectionError(TlsErrorKind.REFUSED, 'connect ECONNREFUSED')).error).toBe(
      'Connection refused - port may be closed'
    );
    expect(certificateFailure(new Error('socket hang up')).error).toBe('Certificate check failed: socket hang up');
  });

  it('should keep the TLS error as a validation error', () => {
    expect(certificateFailure(new CertificateInspectionError(TlsErrorKind.SSL, 'wrong version number'))).toEqual({
      valid: false,
      certificate_info: null,
      validation_errors: ['wrong version number'],
      warnings: [],
      security_details: null,
      error: 'SSL Error: wrong version number',
    });
  });
});

/**
 * TLS Inspection Types
 */

export interface PeerCertificateReport {
  subject: Record<string, string>;
  issuer: Record<string, string>;
  serialNumber: string | null;
  validFrom: string;
  validTo: string;
  subjectAltNames: string[];
  protocol: string | null;
  cipherName: string | null;
  cipherBits: number | null;
  /** Chain verification failure reported by the TLS stack, if any */
  authorizationError: string | null;
}

export enum TlsErrorKind {
  TIMEOUT = 'timeout',
  DNS = 'dns',
  REFUSED = 'refused',
  SSL = 'ssl',
  UNKNOWN = 'unknown',
}

export class CertificateInspectionError extends Error {
  constructor(
    public readonly kind: TlsErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'CertificateInspectionError';
  }
}

export interface CertificateInspector {
  inspect(host: string, port: number, timeoutMs: number): Promise<PeerCertificateReport>;
}

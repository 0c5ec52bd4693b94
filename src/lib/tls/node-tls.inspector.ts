/**
 * Node TLS Certificate Inspector
 * Opens a TLS connection and reports the peer certificate without
 * rejecting untrusted chains, so invalid certificates can still be described
 */

import * as tls from 'tls';
import { errorCode } from '../http/http.errors';
import { CertificateInspectionError, CertificateInspector, PeerCertificateReport, TlsErrorKind } from './tls.types';

/**
 * Parse Node's `subjectaltname` string ("DNS:a.com, DNS:b.com, IP Address:1.2.3.4")
 */
export function parseSubjectAltNames(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.startsWith('DNS:'))
    .map((entry) => entry.slice(4));
}

/**
 * Symmetric key size implied by an OpenSSL/IANA cipher name
 */
export function inferCipherBits(cipherName: string | null): number | null {
  if (!cipherName) return null;
  const name = cipherName.toUpperCase();
  if (name.includes('CHACHA20') || name.includes('AES_256') || name.includes('AES256')) return 256;
  if (name.includes('AES_128') || name.includes('AES128') || name.includes('RC4')) return 128;
  if (name.includes('3DES') || name.includes('DES-CBC3') || name.includes('DES_EDE')) return 112;
  if (name.includes('DES')) return 56;
  return null;
}

function flattenNames(names: object | undefined): Record<string, string> {
  const flattened: Record<string, string> = {};
  if (!names) return flattened;
  for (const [key, value] of Object.entries(names)) {
    flattened[key] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flattened;
}

function toInspectionError(error: Error): CertificateInspectionError {
  const code = errorCode(error);
  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return new CertificateInspectionError(TlsErrorKind.DNS, error.message);
  }
  if (code === 'ECONNREFUSED') {
    return new CertificateInspectionError(TlsErrorKind.REFUSED, error.message);
  }
  if (code === 'ETIMEDOUT') {
    return new CertificateInspectionError(TlsErrorKind.TIMEOUT, error.message);
  }
  if ((code && (code.startsWith('ERR_SSL') || code === 'EPROTO')) || /ssl|tls/i.test(error.message)) {
    return new CertificateInspectionError(TlsErrorKind.SSL, error.message);
  }
  return new CertificateInspectionError(TlsErrorKind.UNKNOWN, error.message);
}

export class NodeTlsInspector implements CertificateInspector {
  inspect(host: string, port: number, timeoutMs: number): Promise<PeerCertificateReport> {
    return new Promise((resolve, reject) => {
      const socket = tls.connect({
        host,
        port,
        servername: host,
        rejectUnauthorized: false,
        timeout: timeoutMs,
      });

      socket.once('secureConnect', () => {
        const certificate = socket.getPeerCertificate();
        if (!certificate || Object.keys(certificate).length === 0) {
          socket.destroy();
          reject(new CertificateInspectionError(TlsErrorKind.UNKNOWN, 'No certificate information available'));
          return;
        }

        const cipher = socket.getCipher();
        const authorizationError = socket.authorizationError;
        resolve({
          subject: flattenNames(certificate.subject),
          issuer: flattenNames(certificate.issuer),
          serialNumber: certificate.serialNumber || null,
          validFrom: certificate.valid_from,
          validTo: certificate.valid_to,
          subjectAltNames: parseSubjectAltNames(certificate.subjectaltname),
          protocol: socket.getProtocol(),
          cipherName: cipher ? cipher.name : null,
          cipherBits: inferCipherBits(cipher ? cipher.name : null),
          authorizationError: authorizationError ? String(authorizationError) : null,
        });
        socket.end();
      });

      socket.once('timeout', () => {
        socket.destroy();
        reject(new CertificateInspectionError(TlsErrorKind.TIMEOUT, 'Connection timed out'));
      });

      socket.once('error', (error) => {
        socket.destroy();
        reject(toInspectionError(error));
      });
    });
  }
}

export const certificateInspector = new NodeTlsInspector();

/**
 * HTTP Error Classification
 * Maps low-level network failures onto the kinds the audits report
 */

export enum HttpErrorKind {
  TIMEOUT = 'timeout',
  CONNECTION = 'connection',
  SSL = 'ssl',
  TOO_MANY_REDIRECTS = 'too_many_redirects',
  INVALID_URL = 'invalid_url',
  UNKNOWN = 'unknown',
}

export class HttpRequestError extends Error {
  constructor(
    public readonly kind: HttpErrorKind,
    message: string,
    public readonly url: string
  ) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const SSL_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'ERR_SSL_WRONG_VERSION_NUMBER',
  'EPROTO',
]);

/**
 * Read the `code` of an error or of its `cause` (fetch wraps socket errors)
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error) {
    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }
    if (error.cause !== undefined) {
      return errorCode(error.cause);
    }
  }
  return undefined;
}

/**
 * Most specific message available: the cause's message when fetch wrapped it
 */
export function rootMessage(error: unknown): string {
  if (error instanceof Error) {
    if (error.cause instanceof Error) {
      return rootMessage(error.cause);
    }
    return error.message;
  }
  return String(error);
}

/**
 * Classify a network error by code, falling back to message inspection
 */
export function classifyNetworkError(error: unknown): HttpErrorKind {
  if (error instanceof HttpRequestError) {
    return error.kind;
  }

  const code = errorCode(error);
  if (code) {
    if (TIMEOUT_CODES.has(code)) return HttpErrorKind.TIMEOUT;
    if (CONNECTION_CODES.has(code)) return HttpErrorKind.CONNECTION;
    if (SSL_CODES.has(code)) return HttpErrorKind.SSL;
  }

  const message = rootMessage(error).toLowerCase();

  if (message.includes('timeout') || message.includes('timed out') || message.includes('aborted')) {
    return HttpErrorKind.TIMEOUT;
  }

  if (message.includes('certificate') || message.includes('ssl') || message.includes('tls')) {
    return HttpErrorKind.SSL;
  }

  if (
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('getaddrinfo') ||
    message.includes('socket') ||
    message.includes('network')
  ) {
    return HttpErrorKind.CONNECTION;
  }

  if (message.includes('invalid url')) {
    return HttpErrorKind.INVALID_URL;
  }

  return HttpErrorKind.UNKNOWN;
}

/**
 * Wrap anything thrown by a request into an HttpRequestError
 */
export function toHttpRequestError(error: unknown, url: string): HttpRequestError {
  if (error instanceof HttpRequestError) {
    return error;
  }
  return new HttpRequestError(classifyNetworkError(error), rootMessage(error), url);
}

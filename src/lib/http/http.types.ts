/**
 * HTTP Client Types
 */

export interface RedirectHop {
  url: string;
  statusCode: number;
}

export interface HttpRequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  maxRedirects?: number;
  readBody?: boolean;
}

export interface HttpResponse {
  requestedUrl: string;
  finalUrl: string;
  status: number;
  headers: Record<string, string>;
  body: string | null;
  redirectChain: RedirectHop[];
  elapsedMs: number;
}

/**
 * Minimal GET-only client; redirects are followed by the client itself
 * so the chain can be reported
 */
export interface HttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * Fetch HTTP Client
 * GET requests over the global fetch with a shared deadline and
 * manual redirect following
 */

import { env } from '../../config/env';
import { HttpErrorKind, HttpRequestError, toHttpRequestError } from './http.errors';
import { HttpClient, HttpRequestOptions, HttpResponse, RedirectHop } from './http.types';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function collectHeaders(headers: Headers): Record<string, string> {
  const collected: Record<string, string> = {};
  headers.forEach((value, key) => {
    collected[key] = value;
  });
  return collected;
}

export class FetchHttpClient implements HttpClient {
  constructor(
    private readonly userAgent: string = env.USER_AGENT,
    private readonly defaultMaxRedirects: number = env.MAX_REDIRECTS
  ) {}

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const maxRedirects = options.maxRedirects ?? this.defaultMaxRedirects;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
    const startTime = Date.now();
    const redirectChain: RedirectHop[] = [];
    let currentUrl = url;

    try {
      for (;;) {
        const response = await fetch(currentUrl, {
          method: 'GET',
          headers: {
            'User-Agent': this.userAgent,
            ...options.headers,
          },
          redirect: 'manual',
          signal: controller.signal,
        });

        const location = response.headers.get('location');
        if (REDIRECT_STATUSES.has(response.status) && location) {
          await response.body?.cancel();
          if (redirectChain.length >= maxRedirects) {
            throw new HttpRequestError(
              HttpErrorKind.TOO_MANY_REDIRECTS,
              `Exceeded ${maxRedirects} redirects`,
              url
            );
          }
          redirectChain.push({ url: currentUrl, statusCode: response.status });
          currentUrl = new URL(location, currentUrl).href;
          continue;
        }

        let body: string | null = null;
        if (options.readBody === false) {
          await response.body?.cancel();
        } else {
          body = await response.text();
        }

        return {
          requestedUrl: url,
          finalUrl: currentUrl,
          status: response.status,
          headers: collectHeaders(response.headers),
          body,
          redirectChain,
          elapsedMs: Date.now() - startTime,
        };
      }
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HttpRequestError(HttpErrorKind.TIMEOUT, `Request timed out after ${options.timeoutMs}ms`, url);
      }
      throw toHttpRequestError(error, url);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export const httpClient = new FetchHttpClient();

/**
 * Link Checker Tests
 */

import { LinkChecker, toExternalLinkResult, toInternalLinkResult } from '../link-checker';
import { HttpErrorKind, HttpRequestError } from '../../../../lib/http/http.errors';
import { createFakeSleep, FakeHttpClient } from '../../../../__tests__/helpers/mocks';

const URL_A = 'https://partner.test/a';

function httpError(kind: HttpErrorKind, message: string): { error: HttpRequestError } {
  return { error: new HttpRequestError(kind, message, URL_A) };
}

describe('LinkChecker', () => {
  describe('toExternalLinkResult', () => {
    it('should describe a redirected response', () => {
      const result = toExternalLinkResult(URL_A, {
        response: {
          requestedUrl: URL_A,
          finalUrl: 'https://partner.test/b',
          status: 200,
          headers: { 'content-type': 'text/html' },
          body: null,
          redirectChain: [{ url: URL_A, statusCode: 301 }],
          elapsedMs: 250,
        },
      });

      expect(result).toEqual({
        url: URL_A,
        status: 'working',
        status_code: 200,
        final_url: 'https://partner.test/b',
        response_time: 0.25,
        content_type: 'text/html',
        redirect_count: 1,
        error: null,
      });
    });

    it.each([
      [HttpErrorKind.TIMEOUT, 'timeout', 'Request timed out'],
      [HttpErrorKind.CONNECTION, 'connection_error', 'Could not connect to the server'],
      [HttpErrorKind.SSL, 'ssl_error', 'SSL certificate error'],
      [HttpErrorKind.TOO_MANY_REDIRECTS, 'too_many_redirects', 'Too many redirects'],
      [HttpErrorKind.UNKNOWN, 'error', 'Request failed: boom'],
    ])('should map %s errors', (kind, status, error) => {
      const result = toExternalLinkResult(URL_A, httpError(kind, 'boom'));

      expect(result.status).toBe(status);
      expect(result.error).toBe(error);
      expect(result.status_code).toBe(0);
    });

    it('should report errors from outside the client as unexpected', () => {
      expect(toExternalLinkResult(URL_A, { error: new Error('bad state') }).error).toBe('Unexpected error: bad state');
    });
  });

  describe('toInternalLinkResult', () => {
    it('should describe a broken response', () => {
      const result = toInternalLinkResult(
        URL_A,
        {
          response: {
            requestedUrl: URL_A,
            finalUrl: URL_A,
            status: 404,
            headers: {},
            body: null,
            redirectChain: [],
            elapsedMs: 80,
          },
        },
        10
      );

      expect(result).toEqual({
        url: URL_A,
        status: 'broken',
        status_code: 404,
        response_time: 0.08,
        final_url: null,
        redirect_count: 0,
        content_type: '',
        description: 'HTTP 404 error',
      });
    });

    it('should charge the timeout as the response time', () => {
      const result = toInternalLinkResult(URL_A, httpError(HttpErrorKind.TIMEOUT, 'slow'), 10);

      expect(result.status).toBe('timeout');
      expect(result.response_time).toBe(10);
      expect(result.description).toBe('Request timed out');
    });

    it('should keep the client message for connection and other request errors', () => {
      expect(toInternalLinkResult(URL_A, httpError(HttpErrorKind.CONNECTION, 'refused'), 10).description).toBe(
        'Connection error: refused'
      );
      expect(toInternalLinkResult(URL_A, httpError(HttpErrorKind.SSL, 'bad cert'), 10)).toMatchObject({
        status: 'request_error',
        description: 'Request error: bad cert',
      });
    });
  });

  describe('checkExternalLinks', () => {
    it('should check links in order with a delay between requests', async () => {
      const http = new FakeHttpClient({
        'https://partner.test/a': { status: 200 },
        'https://partner.test/b': { status: 500 },
        'https://partner.test/c': { status: 200 },
      });
      const { sleep, calls } = createFakeSleep();
      const checker = new LinkChecker(http, sleep, 500);

      const results = await checker.checkExternalLinks(
        ['https://partner.test/a', 'https://partner.test/b', 'https://partner.test/c'],
        5
      );

      expect(results.map((result) => result.status)).toEqual(['working', 'broken', 'working']);
      expect(calls).toEqual([500, 500]);
      expect(http.requests[0].options).toEqual({ timeoutMs: 5000, headers: undefined, readBody: false });
    });
  });

  describe('validateInternalLinks', () => {
    it('should limit the check and send the page as referer', async () => {
      const http = new FakeHttpClient({
        'https://blog.test/a': { status: 200 },
        'https://blog.test/b': { status: 404 },
      });
      const checker = new LinkChecker(http, createFakeSleep().sleep, 0);

      const validation = await checker.validateInternalLinks(
        ['https://blog.test/a', 'https://blog.test/b', 'https://blog.test/c'],
        'https://blog.test/',
        10,
        2
      );

      expect(validation.summary).toEqual({
        total_checked: 2,
        working_links: 1,
        broken_links: 1,
        error_links: 0,
        total_available: 3,
        check_limited: true,
      });
      expect(http.requests[0].options.headers).toEqual({ Referer: 'https://blog.test/' });
    });

    it('should count anchors as working without a request', async () => {
      const http = new FakeHttpClient();
      const checker = new LinkChecker(http, createFakeSleep().sleep, 0);

      const validation = await checker.validateInternalLinks(['#top'], 'https://blog.test/', 10, 100);

      expect(validation.validation_results[0]).toMatchObject({
        status: 'anchor_link',
        status_code: 200,
        description: 'Same-page anchor link',
      });
      expect(validation.summary.working_links).toBe(1);
      expect(http.requests).toEqual([]);
    });
  });
});

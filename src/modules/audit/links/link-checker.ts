/**
 * Link Checker
 * Sequential HTTP status probes with a politeness delay between requests
 */

import { env } from '../../../config/env';
import { HttpErrorKind, HttpRequestError } from '../../../lib/http/http.errors';
import { HttpClient, HttpResponse } from '../../../lib/http/http.types';
import { errorMessage } from '../../../lib/tools/tool-result';
import { sleep as defaultSleep, Sleep } from '../../../lib/utils/async';
import { ExternalLinkResult, InternalLinkResult, InternalLinkValidation } from './links.types';

type ProbeOutcome = { response: HttpResponse } | { error: unknown };

function responseFacts(url: string, response: HttpResponse) {
  return {
    status_code: response.status,
    final_url: response.finalUrl !== url ? response.finalUrl : null,
    response_time: response.elapsedMs / 1000,
    content_type: response.headers['content-type'] ?? '',
    redirect_count: response.redirectChain.length,
  };
}

export function toExternalLinkResult(url: string, outcome: ProbeOutcome): ExternalLinkResult {
  if ('response' in outcome) {
    const facts = responseFacts(url, outcome.response);
    return {
      url,
      status: facts.status_code < 400 ? 'working' : 'broken',
      ...facts,
      error: null,
    };
  }

  const failed = (status: ExternalLinkResult['status'], error: string): ExternalLinkResult => ({
    url,
    status,
    status_code: 0,
    final_url: null,
    response_time: null,
    content_type: null,
    redirect_count: 0,
    error,
  });

  const { error } = outcome;
  if (!(error instanceof HttpRequestError)) {
    return failed('error', `Unexpected error: ${errorMessage(error)}`);
  }

  switch (error.kind) {
    case HttpErrorKind.TIMEOUT:
      return failed('timeout', 'Request timed out');
    case HttpErrorKind.CONNECTION:
      return failed('connection_error', 'Could not connect to the server');
    case HttpErrorKind.SSL:
      return failed('ssl_error', 'SSL certificate error');
    case HttpErrorKind.TOO_MANY_REDIRECTS:
      return failed('too_many_redirects', 'Too many redirects');
    default:
      return failed('error', `Request failed: ${error.message}`);
  }
}

export function toInternalLinkResult(url: string, outcome: ProbeOutcome, timeoutSeconds: number): InternalLinkResult {
  if ('response' in outcome) {
    const facts = responseFacts(url, outcome.response);
    const working = facts.status_code < 400;
    return {
      url,
      status: working ? 'working' : 'broken',
      ...facts,
      description: working ? null : `HTTP ${facts.status_code} error`,
    };
  }

  const failed = (
    status: InternalLinkResult['status'],
    description: string,
    responseTime: number = 0
  ): InternalLinkResult => ({
    url,
    status,
    status_code: 0,
    response_time: responseTime,
    final_url: null,
    redirect_count: 0,
    content_type: null,
    description,
  });

  const { error } = outcome;
  if (!(error instanceof HttpRequestError)) {
    return failed('error', `Unexpected error: ${errorMessage(error)}`);
  }

  switch (error.kind) {
    case HttpErrorKind.TIMEOUT:
      return failed('timeout', 'Request timed out', timeoutSeconds);
    case HttpErrorKind.CONNECTION:
      return failed('connection_error', `Connection error: ${error.message}`);
    default:
      return failed('request_error', `Request error: ${error.message}`);
  }
}

export class LinkChecker {
  constructor(
    private readonly http: HttpClient,
    private readonly sleep: Sleep = defaultSleep,
    private readonly delayMs: number = env.LINK_CHECK_DELAY_MS
  ) {}

  private async probe(url: string, timeoutSeconds: number, headers?: Record<string, string>): Promise<ProbeOutcome> {
    try {
      const response = await this.http.get(url, {
        timeoutMs: timeoutSeconds * 1000,
        headers,
        readBody: false,
      });
      return { response };
    } catch (error) {
      return { error };
    }
  }

  /**
   * Probe each URL in order, pausing between requests (not after the last)
   */
  private async probeAll<T>(
    urls: string[],
    subject: string,
    check: (url: string) => Promise<T>
  ): Promise<T[]> {
    const results: T[] = [];

    for (let i = 0; i < urls.length; i++) {
      console.log(`${subject}: Checking link ${i + 1}/${urls.length}: ${urls[i]}`);
      results.push(await check(urls[i]));

      if (i < urls.length - 1 && this.delayMs > 0) {
        await this.sleep(this.delayMs);
      }
    }

    return results;
  }

  async checkExternalLinks(urls: string[], timeoutSeconds: number): Promise<ExternalLinkResult[]> {
    return this.probeAll(urls, 'check_external_links', async (url) =>
      toExternalLinkResult(url, await this.probe(url, timeoutSeconds))
    );
  }

  /**
   * Validate the first `maxLinks` internal URLs, sending the page as Referer
   */
  async validateInternalLinks(
    urls: string[],
    baseUrl: string,
    timeoutSeconds: number,
    maxLinks: number
  ): Promise<InternalLinkValidation> {
    const toCheck = urls.slice(0, maxLinks);

    const results = await this.probeAll(toCheck, 'check_internal_linking', async (url): Promise<InternalLinkResult> => {
      if (url.startsWith('#')) {
        return {
          url,
          status: 'anchor_link',
          status_code: 200,
          response_time: 0,
          final_url: null,
          redirect_count: 0,
          content_type: null,
          description: 'Same-page anchor link',
        };
      }
      return toInternalLinkResult(url, await this.probe(url, timeoutSeconds, { Referer: baseUrl }), timeoutSeconds);
    });

    return {
      validation_results: results,
      summary: {
        total_checked: results.length,
        working_links: results.filter((r) => r.status === 'working' || r.status === 'anchor_link').length,
        broken_links: results.filter((r) => r.status === 'broken').length,
        error_links: results.filter((r) => r.status !== 'working' && r.status !== 'anchor_link' && r.status !== 'broken')
          .length,
        total_available: urls.length,
        check_limited: urls.length > maxLinks,
      },
    };
  }
}

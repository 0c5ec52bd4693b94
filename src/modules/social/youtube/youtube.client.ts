/**
 * YouTube Data API Client
 * Key-authenticated GETs through the shared HTTP client
 */

import { z } from 'zod';
import { env } from '../../../config/env';
import { HttpClient } from '../../../lib/http/http.types';

const REQUEST_TIMEOUT_MS = 30000;

export type QueryParams = Record<string, string | number>;

export class YouTubeApiError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

export class YouTubeClient {
  constructor(
    private readonly apiKey: string,
    private readonly http: HttpClient,
    private readonly baseUrl: string = env.YOUTUBE_API_BASE_URL
  ) {}

  buildUrl(endpoint: string, params: QueryParams): string {
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      query.set(key, String(value));
    }
    query.set('key', this.apiKey);
    return `${this.baseUrl}/${endpoint}?${query.toString()}`;
  }

  async request<S extends z.ZodTypeAny>(endpoint: string, params: QueryParams, schema: S): Promise<z.output<S>> {
    const response = await this.http.get(this.buildUrl(endpoint, params), { timeoutMs: REQUEST_TIMEOUT_MS });
    const body = response.body ?? '';

    if (response.status !== 200) {
      throw new YouTubeApiError(`YouTube API error ${response.status}: ${body}`, response.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new YouTubeApiError('YouTube API returned invalid JSON', response.status);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new YouTubeApiError(`Unexpected YouTube API response: ${issues}`, response.status);
    }
    return parsed.data;
  }
}

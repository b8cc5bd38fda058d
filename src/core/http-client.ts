/**
 * HTTP Client
 *
 * Thin wrapper over native fetch(): query-string building, per-request
 * timeout, JSON decoding and typed errors. One call is one request; retry
 * policy lives with the callers.
 *
 * @module http-client
 */

import { Agent, setGlobalDispatcher } from 'undici';
import { logger, startSpan } from '../utils/logger';
import { config } from '../config/env';
import { AppError, ErrorCode, HttpError, redactUrl } from '../utils/errors';

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpClientOptions {
  url: string;
  method?: 'GET' | 'POST';
  query?: QueryParams;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
}

export interface HttpClientResponse {
  url: string;
  status: number;
  body: string;
  durationMs: number;
}

export function buildUrl(base: string, query: QueryParams = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}

/**
 * Turn off certificate verification for every request made by this process.
 * Only used when the configuration asks for it.
 */
export function disableTlsVerification(): void {
  logger.warn('SSL verification is disabled. This is insecure.');
  setGlobalDispatcher(new Agent({ connect: { rejectUnauthorized: false } }));
}

export class HttpClient {
  private readonly defaultTimeout: number;
  private readonly userAgent: string;

  constructor(timeout?: number, userAgent?: string) {
    this.defaultTimeout = timeout || config.http.timeoutMs;
    this.userAgent = userAgent || config.http.userAgent;
  }

  /**
   * Make one HTTP request. Resolves only for 2xx responses.
   *
   * @throws HttpError for any other status
   * @throws AppError(TIMEOUT) when the timeout elapses
   */
  async request(options: HttpClientOptions): Promise<HttpClientResponse> {
    const span = startSpan('http-client-request');
    const startTime = Date.now();

    const {
      method = 'GET',
      headers = {},
      body,
      timeout = this.defaultTimeout
    } = options;
    const url = buildUrl(options.url, options.query);
    const safeUrl = redactUrl(url);

    logger.debug('HTTP request starting', { url: safeUrl, method });

    try {
      const response = await fetch(url, {
        method,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json',
          ...headers
        },
        body,
        signal: AbortSignal.timeout(timeout)
      });

      const responseBody = await response.text();
      const durationMs = Date.now() - startTime;

      span.end({ status: response.status, durationMs });

      if (!response.ok) {
        throw new HttpError(response.status, url, responseBody);
      }

      logger.debug('HTTP request complete', {
        url: safeUrl,
        status: response.status,
        durationMs,
        bodyLength: responseBody.length
      });

      return { url, status: response.status, body: responseBody, durationMs };
    } catch (error) {
      const durationMs = Date.now() - startTime;

      if (error instanceof HttpError) {
        throw error;
      }

      if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        span.end({ error: 'timeout', durationMs });
        throw new AppError(ErrorCode.TIMEOUT, `Request timeout after ${timeout}ms: ${safeUrl}`);
      }

      span.end({ error: error instanceof Error ? error.message : 'unknown', durationMs });
      throw error;
    }
  }

  /**
   * Request and decode a JSON body
   *
   * @throws AppError(HTTP_ERROR) when the body is not JSON
   */
  async requestJson(options: HttpClientOptions): Promise<unknown> {
    const response = await this.request(options);
    try {
      return JSON.parse(response.body);
    } catch {
      throw new AppError(
        ErrorCode.HTTP_ERROR,
        `Invalid JSON in response from ${redactUrl(response.url)}: ${response.body.slice(0, 200)}`
      );
    }
  }

  async getJson(url: string, query?: QueryParams): Promise<unknown> {
    return this.requestJson({ url, method: 'GET', query });
  }

  async post(url: string, query?: QueryParams, body?: string): Promise<HttpClientResponse> {
    return this.request({ url, method: 'POST', query, body });
  }
}

/**
 * API Client
 *
 * Offset/limit pagination over the list endpoints. Every HTTP call goes
 * through the shared request limiter and is retried on its own; a page
 * sequence is never restarted as a whole.
 *
 * @module api-client
 */

import { z } from 'zod';
import { logger } from '../utils/logger';
import { config } from '../config/env';
import { HttpError } from '../utils/errors';
import { withRetry } from '../utils/retry';
import { Semaphore } from '../utils/semaphore';
import { HttpClient, QueryParams } from './http-client';
import { Page, RawRecord, isJsonObject } from './types';

export interface DateBound {
  field: string;
  operator: 'gte' | 'lte';
  value: string;
}

export interface PageRequest {
  /** API path relative to the API root, without `.json` */
  path: string;
  offset: number;
  limit: number;
  filters?: DateBound[];
  fields?: string[];
}

export interface PageResult extends Page {
  /** False when the endpoint rejected the filters and the page was fetched without them */
  filtered: boolean;
}

export interface ApiClientOptions {
  apiUrl: string;
  token: string;
  requestLimiter: Semaphore;
  httpClient?: HttpClient;
  pageLimit?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const listResponseSchema = z.object({
  result: z
    .object({
      total: z.coerce.number().int().nonnegative().optional(),
      data: z.array(z.unknown()).default([])
    })
    .nullable()
    .optional()
});

/**
 * Encode date bounds as query parameters.
 *
 * One bound uses the flat `filter[field|operator|value]` triplet; two or more
 * use the indexed `filter[filters][i][...]` array joined with AND.
 */
export function buildFilterParams(filters: DateBound[] = []): QueryParams {
  if (filters.length === 0) {
    return {};
  }

  if (filters.length === 1) {
    const [only] = filters;
    return {
      'filter[field]': only.field,
      'filter[operator]': only.operator,
      'filter[value]': only.value
    };
  }

  const params: QueryParams = { 'filter[logic]': 'and' };
  filters.forEach((filter, index) => {
    params[`filter[filters][${index}][field]`] = filter.field;
    params[`filter[filters][${index}][operator]`] = filter.operator;
    params[`filter[filters][${index}][value]`] = filter.value;
  });
  return params;
}

export function buildDateBounds(field: string | undefined, from?: string, to?: string): DateBound[] {
  if (!field) {
    return [];
  }

  const bounds: DateBound[] = [];
  if (from) {
    bounds.push({ field, operator: 'gte', value: from });
  }
  if (to) {
    bounds.push({ field, operator: 'lte', value: to });
  }
  return bounds;
}

/**
 * Client errors an endpoint answers with when it does not support filtering.
 * Auth, missing resource and throttling responses mean something else.
 */
export function isFilterRejection(error: unknown): boolean {
  return error instanceof HttpError
    && error.isClientError
    && ![401, 403, 404, 429].includes(error.status);
}

function pageOffsets(total: number, limit: number, start: number): number[] {
  const offsets: number[] = [];
  for (let offset = start; offset < total; offset += limit) {
    offsets.push(offset);
  }
  return offsets;
}

export class ApiClient {
  private readonly apiUrl: string;
  private readonly token: string;
  private readonly requestLimiter: Semaphore;
  private readonly httpClient: HttpClient;
  readonly pageLimit: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: ApiClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.requestLimiter = options.requestLimiter;
    this.httpClient = options.httpClient ?? new HttpClient();
    this.pageLimit = options.pageLimit ?? config.http.pageLimit;
    this.maxAttempts = options.maxAttempts ?? config.retry.maxAttempts;
    this.baseDelayMs = options.baseDelayMs ?? config.retry.baseDelayMs;
    this.sleep = options.sleep;
  }

  resolveUrl(path: string): string {
    const cleaned = path.replace(/^\/+/, '').replace(/\.json$/, '');
    return `${this.apiUrl}/${cleaned}.json`;
  }

  /**
   * Fetch one page. A client error on a filtered request is answered with a
   * single retry of the same page without any filter parameters.
   */
  async fetchPage(request: PageRequest): Promise<PageResult> {
    const filters = request.filters ?? [];

    try {
      const page = await this.requestPage(request, filters);
      return { ...page, filtered: filters.length > 0 };
    } catch (error) {
      if (filters.length === 0 || !isFilterRejection(error)) {
        throw error;
      }

      logger.warn('Endpoint rejected filters, retrying without them', {
        path: request.path,
        offset: request.offset,
        error: error instanceof Error ? error.message : String(error)
      });

      const page = await this.requestPage(request, []);
      return { ...page, filtered: false };
    }
  }

  /**
   * Page through a collection. The first page (offset 0) fixes the total;
   * the remaining offsets are requested concurrently, bounded only by the
   * request limiter. `onPage` sees pages in arrival order.
   *
   * @returns the total reported by the first page
   */
  async forEachPage(
    request: Omit<PageRequest, 'offset' | 'limit'>,
    onPage: (records: RawRecord[], offset: number) => Promise<void> | void
  ): Promise<number> {
    const limit = this.pageLimit;
    const first = await this.fetchPage({ ...request, offset: 0, limit });
    const total = first.total;

    logger.info('Paginating endpoint', {
      path: request.path,
      total,
      pages: Math.ceil(total / limit),
      filtered: first.filtered
    });

    await onPage(first.records, 0);

    // keep the rest of the sequence consistent with the first page
    const rest = { ...request, filters: first.filtered ? request.filters : [] };

    const settled = await Promise.allSettled(
      pageOffsets(total, limit, limit).map(async (offset) => {
        const page = await this.fetchPage({ ...rest, offset, limit });
        await onPage(page.records, offset);
      })
    );

    const failure = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }

    return total;
  }

  /**
   * Fetch every child record under one parent identifier, one page at a time
   */
  async fetchChildRecords(
    parentPath: string,
    parentId: string,
    childPath: string,
    fields: string[] = []
  ): Promise<RawRecord[]> {
    const path = `${parentPath.replace(/\.json$/, '')}/${encodeURIComponent(parentId)}/${childPath}`;
    const limit = this.pageLimit;

    const first = await this.fetchPage({ path, offset: 0, limit, fields });
    const records = [...first.records];

    for (const offset of pageOffsets(first.total, limit, limit)) {
      const page = await this.fetchPage({ path, offset, limit, fields });
      records.push(...page.records);
    }

    return records;
  }

  private async requestPage(request: PageRequest, filters: DateBound[]): Promise<Page> {
    const query: QueryParams = {
      accessToken: this.token,
      skip: request.offset,
      take: request.limit,
      fields: request.fields && request.fields.length > 0 ? request.fields.join(',') : undefined,
      ...buildFilterParams(filters)
    };
    const url = this.resolveUrl(request.path);

    const body = await withRetry(
      () => this.requestLimiter.use(() => this.httpClient.getJson(url, query)),
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.baseDelayMs,
        sleep: this.sleep,
        label: `${request.path}@${request.offset}`
      }
    );

    return this.parsePage(body, request);
  }

  private parsePage(body: unknown, request: PageRequest): Page {
    const parsed = listResponseSchema.safeParse(body);
    if (!parsed.success || !parsed.data.result) {
      logger.warn('Response has no result object', { path: request.path, offset: request.offset });
      return { records: [], total: 0 };
    }

    const records = parsed.data.result.data.filter(isJsonObject);
    if (records.length > request.limit) {
      logger.warn('Page larger than requested limit', {
        path: request.path,
        limit: request.limit,
        received: records.length
      });
    }

    return {
      records,
      total: parsed.data.result.total ?? request.offset + records.length
    };
  }
}

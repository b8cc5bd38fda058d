import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpClient, buildUrl } from '../core/http-client';
import { AppError, ErrorCode, HttpError, redactUrl } from '../utils/errors';

vi.mock('../utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/logger')>();
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const originalFetch = global.fetch;

afterEach(() => {
  global.fetch = originalFetch;
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('buildUrl', () => {
  it('appends defined query values and skips undefined ones', () => {
    expect(buildUrl('https://crm.test/api/v6/users.json', { skip: 0, take: 10, fields: undefined })).toBe(
      'https://crm.test/api/v6/users.json?skip=0&take=10'
    );
  });

  it('encodes bracketed filter keys', () => {
    expect(buildUrl('https://crm.test/x.json', { 'filter[field]': 'time' })).toBe(
      'https://crm.test/x.json?filter%5Bfield%5D=time'
    );
  });
});

describe('redactUrl', () => {
  it('masks credentials in query strings', () => {
    expect(redactUrl('https://crm.test/x.json?accessToken=test-token&skip=0')).toBe(
      'https://crm.test/x.json?accessToken=***&skip=0'
    );
  });
});

describe('HttpClient', () => {
  const client = new HttpClient(5000, 'TestAgent/1.0');

  it('returns the body of a successful response', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response('{"ok":true}'));
    global.fetch = fetchMock;

    await expect(client.getJson('https://crm.test/x.json', { take: 1 })).resolves.toEqual({ ok: true });

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe('GET');
    expect(init?.headers).toMatchObject({ 'User-Agent': 'TestAgent/1.0', Accept: 'application/json' });
  });

  it('throws HttpError with the status for non-2xx responses', async () => {
    global.fetch = async () => new Response('server exploded', { status: 502 });

    const error = await client.request({ url: 'https://crm.test/x.json', query: { accessToken: 'test-token' } }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({
      status: 502,
      message: 'HTTP 502 for https://crm.test/x.json?accessToken=***: server exploded',
    });
  });

  it('maps timeouts to a TIMEOUT error', async () => {
    global.fetch = async () => {
      throw Object.assign(new Error('aborted'), { name: 'TimeoutError' });
    };

    await expect(client.request({ url: 'https://crm.test/x.json', timeout: 10 })).rejects.toMatchObject({
      code: ErrorCode.TIMEOUT,
      message: 'Request timeout after 10ms: https://crm.test/x.json',
    });
  });

  it('rejects a body that is not JSON', async () => {
    global.fetch = async () => new Response('<html>');

    const error = await client.getJson('https://crm.test/x.json').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      code: ErrorCode.HTTP_ERROR,
      message: 'Invalid JSON in response from https://crm.test/x.json: <html>',
    });
  });

  it('passes network failures through unchanged', async () => {
    const failure = new TypeError('fetch failed');
    global.fetch = async () => {
      throw failure;
    };

    await expect(client.request({ url: 'https://crm.test/x.json' })).rejects.toBe(failure);
  });
});

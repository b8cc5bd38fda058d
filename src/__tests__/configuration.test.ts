import { describe, it, expect } from 'vitest';
import { loadConfiguration, parseConfiguration, serverNameFromUrl } from '../config/configuration';
import { AppError, ErrorCode } from '../utils/errors';

const parameters = (overrides: Record<string, unknown> = {}) => ({
  connection: {
    url: 'https://acme.crm.test/',
    username: 'extractor',
    '#password': 'test-secret',
  },
  data_selection: {
    date_from: '7 days ago',
    date_to: 'today',
    endpoints: ['users', { endpoint: 'contacts', fields: ['name', 'title'] }, 'users'],
  },
  ...overrides,
});

describe('parseConfiguration', () => {
  it('accepts the wrapped form and applies defaults', () => {
    const parsed = parseConfiguration({ parameters: parameters() });

    expect(parsed).toEqual({
      connection: {
        url: 'https://acme.crm.test',
        username: 'extractor',
        password: 'test-secret',
        verifySsl: true,
      },
      dataSelection: {
        dateFrom: '7 days ago',
        dateTo: 'today',
        endpoints: ['users', 'contacts'],
        fields: { contacts: ['name', 'title'] },
      },
      destination: {
        incremental: false,
        batchSize: 1000,
        maxConcurrentRequests: 10,
        maxConcurrentEndpoints: 3,
      },
      debug: false,
    });
  });

  it('accepts the bare parameters object', () => {
    const parsed = parseConfiguration(
      parameters({ destination: { incremental: true, batch_size: 50, max_concurrent_requests: 2 }, debug: true })
    );

    expect(parsed.destination).toEqual({
      incremental: true,
      batchSize: 50,
      maxConcurrentRequests: 2,
      maxConcurrentEndpoints: 3,
    });
    expect(parsed.debug).toBe(true);
  });

  it('rejects a non-positive batch size', () => {
    expect(() => parseConfiguration(parameters({ destination: { batch_size: 0 } }))).toThrow(
      'Validation error in configuration: destination.batch_size: Batch size must be a positive integer.'
    );
  });

  it('reports missing credentials as a configuration error', () => {
    const input = parameters();
    const { '#password': _password, ...connection } = input.connection;

    let caught: unknown;
    try {
      parseConfiguration({ ...input, connection });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({ code: ErrorCode.CONFIGURATION_ERROR });
  });

  it('requires at least one endpoint', () => {
    expect(() =>
      parseConfiguration(parameters({ data_selection: { date_from: 'today', date_to: 'now', endpoints: [] } }))
    ).toThrow('data_selection.endpoints: at least one endpoint is required');
  });
});

describe('loadConfiguration', () => {
  it('fails with a configuration error for a missing file', async () => {
    await expect(loadConfiguration('/nonexistent/config.json')).rejects.toMatchObject({
      code: ErrorCode.CONFIGURATION_ERROR,
    });
  });
});

describe('serverNameFromUrl', () => {
  it('takes the first host label', () => {
    expect(serverNameFromUrl('https://acme.crm.test')).toBe('acme');
    expect(serverNameFromUrl('http://localhost:8080')).toBe('localhost');
  });
});

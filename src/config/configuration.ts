/**
 * Run configuration
 *
 * Validates the JSON configuration handed to the extractor (either the bare
 * parameters object or one wrapped in `{ "parameters": ... }`) and turns it
 * into the camelCase shape the rest of the code consumes.
 *
 * @module config/configuration
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { AppError, ErrorCode, errorMessage, fromZodError } from '../utils/errors';

export const DEFAULT_BATCH_SIZE = 1000;
export const DEFAULT_MAX_CONCURRENT_REQUESTS = 10;
export const DEFAULT_MAX_CONCURRENT_ENDPOINTS = 3;

const endpointSelectionSchema = z.union([
  z.string().min(1),
  z.object({
    endpoint: z.string().min(1),
    fields: z.array(z.string().min(1)).default([])
  })
]);

const parametersSchema = z.object({
  connection: z.object({
    url: z.string().url(),
    username: z.string().min(1),
    '#password': z.string().min(1),
    verify_ssl: z.boolean().default(true)
  }),
  data_selection: z.object({
    date_from: z.string().min(1),
    date_to: z.string().min(1),
    endpoints: z.array(endpointSelectionSchema).min(1, 'at least one endpoint is required')
  }),
  destination: z
    .object({
      incremental: z.boolean().default(false),
      batch_size: z.number().int().positive('Batch size must be a positive integer.').default(DEFAULT_BATCH_SIZE),
      max_concurrent_requests: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT_REQUESTS),
      max_concurrent_endpoints: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT_ENDPOINTS)
    })
    .default({}),
  debug: z.boolean().default(false)
});

export interface RunConfiguration {
  connection: {
    url: string;
    username: string;
    password: string;
    verifySsl: boolean;
  };
  dataSelection: {
    dateFrom: string;
    dateTo: string;
    endpoints: string[];
    /** Explicit field lists keyed by endpoint name; absent means all fields */
    fields: Record<string, string[]>;
  };
  destination: {
    incremental: boolean;
    batchSize: number;
    maxConcurrentRequests: number;
    maxConcurrentEndpoints: number;
  };
  debug: boolean;
}

function unwrapParameters(input: unknown): unknown {
  if (input !== null && typeof input === 'object' && 'parameters' in input) {
    return input.parameters;
  }
  return input;
}

export function parseConfiguration(input: unknown, source = 'configuration'): RunConfiguration {
  const result = parametersSchema.safeParse(unwrapParameters(input));
  if (!result.success) {
    throw fromZodError(result.error, source);
  }

  const params = result.data;
  const endpoints: string[] = [];
  const fields: Record<string, string[]> = {};

  for (const selection of params.data_selection.endpoints) {
    if (typeof selection === 'string') {
      endpoints.push(selection);
      continue;
    }
    endpoints.push(selection.endpoint);
    if (selection.fields.length > 0) {
      fields[selection.endpoint] = selection.fields;
    }
  }

  return {
    connection: {
      url: params.connection.url.replace(/\/+$/, ''),
      username: params.connection.username,
      password: params.connection['#password'],
      verifySsl: params.connection.verify_ssl
    },
    dataSelection: {
      dateFrom: params.data_selection.date_from,
      dateTo: params.data_selection.date_to,
      endpoints: [...new Set(endpoints)],
      fields
    },
    destination: {
      incremental: params.destination.incremental,
      batchSize: params.destination.batch_size,
      maxConcurrentRequests: params.destination.max_concurrent_requests,
      maxConcurrentEndpoints: params.destination.max_concurrent_endpoints
    },
    debug: params.debug
  };
}

export async function loadConfiguration(configPath: string): Promise<RunConfiguration> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw new AppError(
      ErrorCode.CONFIGURATION_ERROR,
      `Cannot read configuration file ${configPath}: ${errorMessage(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new AppError(
      ErrorCode.CONFIGURATION_ERROR,
      `Configuration file ${configPath} is not valid JSON: ${errorMessage(error)}`
    );
  }

  return parseConfiguration(parsed, configPath);
}

/**
 * Short server name used to prefix output tables and identifiers,
 * e.g. `https://acme.example.com` → `acme`
 */
export function serverNameFromUrl(url: string): string {
  const hostname = new URL(url).hostname;
  return hostname.split('.')[0] || hostname;
}

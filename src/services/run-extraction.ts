/**
 * Entry points behind the CLI: wire configuration, authentication, limiters,
 * sink and state together for one run.
 *
 * Data directory layout:
 *   <dataDir>/config.json        run configuration (unless given explicitly)
 *   <dataDir>/in/state.json      state of the previous run
 *   <dataDir>/out/tables/        output tables and manifests
 *   <dataDir>/out/state.json     state for the next run
 *
 * @module services/run-extraction
 */

import path from 'path';
import { generateRunId, logger, runWithContext, setLogLevel } from '../utils/logger';
import { AppError, ErrorCode } from '../utils/errors';
import { Semaphore } from '../utils/semaphore';
import { config } from '../config/env';
import { RunConfiguration, loadConfiguration, serverNameFromUrl } from '../config/configuration';
import {
  EndpointDefinitions,
  loadEndpointDefinitions,
  withConfiguredFields
} from '../config/endpoint-definitions';
import { resolveApiDate } from '../config/relative-date';
import { ApiClient } from '../core/api-client';
import { authenticate } from '../core/authenticator';
import { HttpClient, disableTlsVerification } from '../core/http-client';
import { RunContext } from '../core/run-context';
import { CsvTableSink } from './csv-table-sink';
import { ExtractionOutcome, Extractor } from './extractor';
import { discoverFields } from './field-discovery';
import { StateStore } from './state-store';

export const API_PATH = 'api/v6';

export interface RunOptions {
  dataDir: string;
  configPath?: string;
  definitionsPath?: string;
  /** Reference time for relative date expressions */
  now?: Date;
  httpClient?: HttpClient;
}

export interface RunSummary {
  runId: string;
  server: string;
  dateFrom: string;
  dateTo: string;
  outcomes: ExtractionOutcome[];
  invalidIdentifiers: number;
  durationMs: number;
}

interface Session {
  configuration: RunConfiguration;
  definitions: EndpointDefinitions;
  api: ApiClient;
  server: string;
}

export function dataPaths(dataDir: string) {
  return {
    config: path.join(dataDir, 'config.json'),
    inState: path.join(dataDir, 'in', 'state.json'),
    outState: path.join(dataDir, 'out', 'state.json'),
    tables: path.join(dataDir, 'out', 'tables')
  };
}

/**
 * Resolve and order the configured date bounds
 */
export function resolveDateRange(configuration: RunConfiguration, now: Date = new Date()): { dateFrom: string; dateTo: string } {
  const dateFrom = resolveApiDate(configuration.dataSelection.dateFrom, now);
  const dateTo = resolveApiDate(configuration.dataSelection.dateTo, now);

  // same fixed-width format, so string order is time order
  if (dateFrom > dateTo) {
    throw new AppError(
      ErrorCode.CONFIGURATION_ERROR,
      `date_from (${dateFrom}) is after date_to (${dateTo})`
    );
  }

  return { dateFrom, dateTo };
}

async function openSession(options: RunOptions): Promise<Session> {
  const paths = dataPaths(options.dataDir);
  const configuration = await loadConfiguration(options.configPath ?? paths.config);

  if (configuration.debug) {
    setLogLevel('debug');
  }
  if (!configuration.connection.verifySsl) {
    disableTlsVerification();
  }

  const definitions = withConfiguredFields(
    await loadEndpointDefinitions(options.definitionsPath ?? config.paths.definitionsPath),
    configuration.dataSelection.fields
  );

  const apiUrl = `${configuration.connection.url}/${API_PATH}`;
  const token = await authenticate(
    {
      apiUrl,
      username: configuration.connection.username,
      password: configuration.connection.password
    },
    options.httpClient
  );

  const api = new ApiClient({
    apiUrl,
    token,
    requestLimiter: new Semaphore(configuration.destination.maxConcurrentRequests),
    httpClient: options.httpClient
  });

  return {
    configuration,
    definitions,
    api,
    server: serverNameFromUrl(configuration.connection.url)
  };
}

export async function runExtraction(options: RunOptions): Promise<RunSummary> {
  const runId = generateRunId();

  return runWithContext({ runId }, async () => {
    const startTime = Date.now();
    const paths = dataPaths(options.dataDir);
    const { configuration, definitions, api, server } = await openSession(options);
    const { dateFrom, dateTo } = resolveDateRange(configuration, options.now);

    logger.info('Starting extraction', {
      server,
      dateFrom,
      dateTo,
      endpoints: configuration.dataSelection.endpoints,
      incremental: configuration.destination.incremental,
      batchSize: configuration.destination.batchSize
    });

    const context = new RunContext({
      runId,
      server,
      identitySource: definitions.identitySource,
      identityAliasPrefix: definitions.identityAliasPrefix
    });
    const sink = new CsvTableSink(paths.tables);
    const state = await StateStore.load(paths.inState);

    const extractor = new Extractor({
      api,
      definitions,
      sink,
      identifiers: sink,
      state,
      context,
      dateFrom,
      dateTo,
      incremental: configuration.destination.incremental,
      batchSize: configuration.destination.batchSize,
      maxConcurrentEndpoints: configuration.destination.maxConcurrentEndpoints
    });

    const outcomes = await extractor.extractAll(configuration.dataSelection.endpoints);
    await state.save(paths.outState);

    const summary: RunSummary = {
      runId,
      server,
      dateFrom,
      dateTo,
      outcomes,
      invalidIdentifiers: context.invalidIdentifierCount,
      durationMs: Date.now() - startTime
    };

    logger.info('Extraction finished', {
      endpoints: outcomes.length,
      rows: outcomes.reduce((sum, outcome) => sum + outcome.rowsWritten, 0),
      invalidIdentifiers: summary.invalidIdentifiers,
      durationMs: summary.durationMs
    });

    return summary;
  });
}

/**
 * Field names per configured endpoint, from one sample record each
 */
export async function listFields(options: RunOptions): Promise<Record<string, string[]>> {
  const { configuration, definitions, api } = await openSession(options);
  return discoverFields(api, definitions, configuration.dataSelection.endpoints);
}

export { runExtraction, listFields, resolveDateRange, dataPaths } from './services/run-extraction';
export type { RunOptions, RunSummary } from './services/run-extraction';
export { Extractor, resolveEndpoints } from './services/extractor';
export type { ExtractionOutcome, ExtractorOptions } from './services/extractor';
export { CsvTableSink } from './services/csv-table-sink';
export { StateStore } from './services/state-store';
export { TableWriter } from './services/table-writer';
export type { TableSink } from './services/table-writer';
export { discoverFields } from './services/field-discovery';

export { ApiClient, buildFilterParams, buildDateBounds } from './core/api-client';
export type { DateBound, PageRequest, PageResult } from './core/api-client';
export { authenticate } from './core/authenticator';
export { HttpClient } from './core/http-client';
export { DependentTableResolver, normalizeParentIds } from './core/dependent-resolver';
export type { IdentifierSource } from './core/dependent-resolver';
export { RecordTransformer } from './core/transformer';
export { RunContext } from './core/run-context';
export { PhaseScheduler, PhaseFailedError, planPhases } from './core/scheduler';
export { normalizeColumnName } from './core/column-name';
export type { RawRecord, TransformedRow, Page } from './core/types';

export { parseConfiguration, loadConfiguration } from './config/configuration';
export type { RunConfiguration } from './config/configuration';
export { parseEndpointDefinitions, loadEndpointDefinitions } from './config/endpoint-definitions';
export type { EndpointSpec, EndpointDefinitions } from './config/endpoint-definitions';

export { AppError, ErrorCode, HttpError } from './utils/errors';
export { withRetry } from './utils/retry';
export { Semaphore } from './utils/semaphore';

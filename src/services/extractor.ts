/**
 * Extractor
 *
 * Orchestrates one extraction run: resolves the requested endpoints against
 * the definitions, plans the two phases and runs every endpoint task through
 * the scheduler. Each task streams pages (or per-parent child collections)
 * through the transformer into a table writer.
 *
 * @module services/extractor
 */

import { logger, runWithContext, startSpan } from '../utils/logger';
import { AppError, ErrorCode, errorMessage } from '../utils/errors';
import { Semaphore } from '../utils/semaphore';
import type { EndpointDefinitions, EndpointSpec } from '../config/endpoint-definitions';
import { ApiClient, buildDateBounds } from '../core/api-client';
import { DependentTableResolver, IdentifierSource } from '../core/dependent-resolver';
import { RunContext } from '../core/run-context';
import { PhaseScheduler, planPhases } from '../core/scheduler';
import { RecordTransformer } from '../core/transformer';
import type { RawRecord, TransformedRow } from '../core/types';
import { StateStore } from './state-store';
import { TableSink, TableWriter } from './table-writer';

export interface ExtractionOutcome {
  endpoint: string;
  tableName: string;
  rowsWritten: number;
  success: boolean;
  error?: string;
  /** Only for the identity source: identifiers of records rejected for missing keys */
  invalidIdentifiers?: string[];
  /** Only for dependent endpoints */
  parentIds?: number;
  failedParentIds?: number;
}

export interface ExtractorOptions {
  api: ApiClient;
  definitions: EndpointDefinitions;
  sink: TableSink;
  identifiers: IdentifierSource;
  state: StateStore;
  context: RunContext;
  /** API-formatted lower date bound */
  dateFrom?: string;
  /** API-formatted upper date bound */
  dateTo?: string;
  incremental: boolean;
  batchSize: number;
  maxConcurrentEndpoints: number;
}

/**
 * Keep the known endpoints of a request and pull in every ancestor of a
 * requested dependent. Ancestors come before their descendants.
 */
export function resolveEndpoints(requested: string[], definitions: EndpointDefinitions): string[] {
  const resolved: string[] = [];
  const included = new Set<string>();

  const include = (name: string, requestedBy?: string): void => {
    if (included.has(name)) {
      return;
    }
    const spec = definitions.endpoints.get(name);
    if (!spec) {
      return;
    }
    included.add(name);
    if (spec.parentTable) {
      include(spec.parentTable, name);
    }
    if (requestedBy) {
      logger.info('Including parent endpoint', { endpoint: name, requiredBy: requestedBy });
    }
    resolved.push(name);
  };

  for (const name of requested) {
    if (!definitions.endpoints.has(name)) {
      logger.warn('Unknown endpoint skipped', { endpoint: name });
      continue;
    }
    include(name);
  }

  if (resolved.length === 0) {
    throw new AppError(
      ErrorCode.CONFIGURATION_ERROR,
      `None of the requested endpoints are defined: ${requested.join(', ')}`
    );
  }

  return resolved;
}

export class Extractor {
  private readonly scheduler: PhaseScheduler<ExtractionOutcome>;
  private readonly resolver: DependentTableResolver;

  constructor(private readonly options: ExtractorOptions) {
    this.scheduler = new PhaseScheduler(new Semaphore(options.maxConcurrentEndpoints));
    this.resolver = new DependentTableResolver(options.api, options.identifiers, options.context);
  }

  /**
   * Extract every requested endpoint (plus required parents).
   * Throws after the failing phase has settled if any endpoint failed.
   */
  async extractAll(requested: string[]): Promise<ExtractionOutcome[]> {
    const { definitions, context } = this.options;
    const endpoints = resolveEndpoints(requested, definitions);
    const parentOf = (name: string): string | undefined => definitions.endpoints.get(name)?.parentTable;
    const plan = planPhases(endpoints, parentOf, definitions.identitySource);

    logger.info('Extraction planned', {
      runId: context.runId,
      phase1: plan.phase1,
      phase2: plan.phase2
    });

    const span = startSpan('extraction');
    const results = await this.scheduler.run(plan, parentOf, (name) =>
      runWithContext({ runId: context.runId, endpoint: name }, () => this.runEndpoint(name))
    );

    const outcomes = endpoints
      .map((name) => results.get(name))
      .filter((outcome): outcome is ExtractionOutcome => outcome !== undefined);

    span.end({
      endpoints: outcomes.length,
      rows: outcomes.reduce((sum, outcome) => sum + outcome.rowsWritten, 0)
    });

    return outcomes;
  }

  /**
   * Extract one endpoint; its parent (if any) must already be written and finalized
   */
  async extractEndpoint(name: string): Promise<ExtractionOutcome> {
    const spec = this.specFor(name);
    if (spec.parentTable) {
      return this.extractDependent(spec, this.specFor(spec.parentTable));
    }
    return this.extractIndependent(spec);
  }

  private async runEndpoint(name: string): Promise<ExtractionOutcome> {
    try {
      return await this.extractEndpoint(name);
    } catch (error) {
      logger.error('Endpoint extraction failed', { endpoint: name, error: errorMessage(error) });
      throw error;
    }
  }

  private async extractIndependent(spec: EndpointSpec): Promise<ExtractionOutcome> {
    const { api, context, dateFrom, dateTo } = this.options;
    const isIdentitySource = context.isIdentitySource(spec.name);
    const transformer = new RecordTransformer(spec, { rejectMissingKeys: isIdentitySource });
    const writer = this.createWriter(spec);
    const invalidIdentifiers: string[] = [];

    logger.info('Extracting endpoint', { endpoint: spec.name, dateFilterField: spec.dateFilterField });

    const total = await api.forEachPage(
      {
        path: spec.endpoint,
        filters: buildDateBounds(spec.dateFilterField, dateFrom, dateTo),
        fields: spec.fields
      },
      async (records) => {
        const result = transformer.transformRecords(records);
        if (isIdentitySource && result.invalidIdentifiers.length > 0) {
          invalidIdentifiers.push(...result.invalidIdentifiers);
          context.addInvalidIdentifiers(result.invalidIdentifiers);
        }
        await writer.push(result.rows);
      }
    );

    const rowsWritten = await writer.close();
    this.reportRows(spec, rowsWritten, { total });

    if (isIdentitySource && invalidIdentifiers.length > 0) {
      logger.warn('Identity source records rejected', {
        endpoint: spec.name,
        count: invalidIdentifiers.length
      });
    }

    return {
      endpoint: spec.name,
      tableName: context.tableName(spec.name),
      rowsWritten,
      success: true,
      ...(isIdentitySource ? { invalidIdentifiers } : {})
    };
  }

  private async extractDependent(spec: EndpointSpec, parent: EndpointSpec): Promise<ExtractionOutcome> {
    const transformer = new RecordTransformer(spec);
    const writer = this.createWriter(spec);

    logger.info('Extracting dependent endpoint', { endpoint: spec.name, parent: parent.name });

    const stats = await this.resolver.extract(parent, spec, async (records: RawRecord[]) => {
      await writer.push(transformer.transformRecords(records).rows);
    });

    const rowsWritten = await writer.close();
    this.reportRows(spec, rowsWritten, { parentIds: stats.parentIds, failedParentIds: stats.failed });

    return {
      endpoint: spec.name,
      tableName: this.options.context.tableName(spec.name),
      rowsWritten,
      success: true,
      parentIds: stats.parentIds,
      failedParentIds: stats.failed
    };
  }

  private createWriter(spec: EndpointSpec): TableWriter {
    const { sink, state, context, incremental, batchSize } = this.options;

    return new TableWriter(sink, {
      tableName: context.tableName(spec.name),
      primaryKey: spec.primaryKeys,
      incremental,
      batchSize,
      resolveColumns: (firstRow: TransformedRow) => state.columnsFor(spec.name, Object.keys(firstRow))
    });
  }

  private reportRows(spec: EndpointSpec, rowsWritten: number, meta: Record<string, unknown>): void {
    if (rowsWritten === 0) {
      logger.warn('No data found for endpoint', { endpoint: spec.name, ...meta });
      return;
    }
    logger.info('Endpoint extracted', { endpoint: spec.name, rowsWritten, ...meta });
  }

  private specFor(name: string): EndpointSpec {
    const spec = this.options.definitions.endpoints.get(name);
    if (!spec) {
      throw new AppError(ErrorCode.CONFIGURATION_ERROR, `Unknown endpoint: ${name}`);
    }
    return spec;
  }
}

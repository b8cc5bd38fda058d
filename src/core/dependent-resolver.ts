/**
 * Dependent Table Resolver
 *
 * Child endpoints are fetched once per parent identifier. The identifiers
 * come from whatever the sink stored for the parent table, so they are
 * normalized back to the form the API expects before use.
 *
 * @module dependent-resolver
 */

import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import type { EndpointSpec } from '../config/endpoint-definitions';
import type { ApiClient } from './api-client';
import type { RunContext } from './run-context';
import type { RawRecord } from './types';

export interface IdentifierSource {
  /** Non-empty values of one column of a finished table, in stored order */
  readColumnValues(tableName: string, columnName: string): Promise<string[]>;
}

export interface DependentExtractionStats {
  parentIds: number;
  succeeded: number;
  failed: number;
}

/**
 * Prefixes that may precede an identifier of `parentTable`, most specific first
 */
export function tablePrefixes(parentTable: string, context: RunContext): string[] {
  const prefixes = [`${parentTable}_`];

  if (context.isIdentitySource(parentTable) && context.identityAliasPrefix) {
    prefixes.push(context.identityAliasPrefix);
  }

  if (parentTable.endsWith('ies')) {
    prefixes.push(`${parentTable.slice(0, -3)}y_`);
  } else if (parentTable.endsWith('s')) {
    prefixes.push(`${parentTable.slice(0, -1)}_`);
  }

  return [...new Set(prefixes)];
}

function stripPrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

/**
 * Strip the run prefix, drop identity-source identifiers known to be invalid,
 * then strip the first matching table prefix.
 */
export function normalizeParentIds(parentIds: string[], parentTable: string, context: RunContext): string[] {
  const serverPrefix = `${context.server}_`;
  const checkInvalid = context.isIdentitySource(parentTable) && context.invalidIdentifierCount > 0;
  const prefixes = tablePrefixes(parentTable, context);

  const cleaned: string[] = [];
  let filteredOut = 0;

  for (const raw of parentIds) {
    const withoutServer = stripPrefix(raw, serverPrefix);

    if (checkInvalid && (context.isInvalidIdentifier(raw) || context.isInvalidIdentifier(withoutServer))) {
      filteredOut += 1;
      continue;
    }

    const prefix = prefixes.find((candidate) => withoutServer.startsWith(candidate));
    cleaned.push(prefix ? withoutServer.slice(prefix.length) : withoutServer);
  }

  if (filteredOut > 0) {
    logger.info('Filtered out invalid parent identifiers', { parentTable, filteredOut });
  }

  logger.debug('Normalized parent identifiers', {
    parentTable,
    count: cleaned.length,
    sample: cleaned.slice(0, 3)
  });

  return cleaned;
}

export class DependentTableResolver {
  constructor(
    private readonly api: ApiClient,
    private readonly identifiers: IdentifierSource,
    private readonly context: RunContext
  ) {}

  async resolveParentIds(parent: EndpointSpec, child: EndpointSpec): Promise<string[]> {
    const raw = await this.identifiers.readColumnValues(
      this.context.tableName(parent.name),
      child.parentIdField
    );

    logger.debug('Read parent identifiers', {
      parentTable: parent.name,
      column: child.parentIdField,
      count: raw.length
    });

    return normalizeParentIds(raw, parent.name, this.context);
  }

  /**
   * Fetch the child collection for every parent identifier in turn. A failed
   * identifier is logged and skipped; errors raised by `onRecords` propagate.
   */
  async extract(
    parent: EndpointSpec,
    child: EndpointSpec,
    onRecords: (records: RawRecord[], parentId: string) => Promise<void>
  ): Promise<DependentExtractionStats> {
    const parentIds = await this.resolveParentIds(parent, child);
    const stats: DependentExtractionStats = { parentIds: parentIds.length, succeeded: 0, failed: 0 };

    if (parentIds.length === 0) {
      logger.warn('No parent identifiers for dependent table', {
        table: child.name,
        parentTable: parent.name
      });
      return stats;
    }

    for (const parentId of parentIds) {
      let records: RawRecord[];
      try {
        records = await this.api.fetchChildRecords(parent.endpoint, parentId, child.childEndpoint, child.fields);
      } catch (error) {
        stats.failed += 1;
        logger.warn('Failed to fetch dependent records, skipping parent', {
          table: child.name,
          parentTable: parent.name,
          parentId,
          error: errorMessage(error)
        });
        continue;
      }

      stats.succeeded += 1;
      if (records.length > 0) {
        await onRecords(records, parentId);
      }
    }

    return stats;
  }
}

/**
 * Record Transformer
 *
 * Turns one raw API record into zero or more flat rows. The steps run in a
 * fixed order, per record:
 *
 *   1. flatten nested objects (`parent_child`, two levels deep)
 *   2. strip HTML tags from strings; blank strings become null
 *   3. explode list columns (cross product over the configured columns)
 *   4. explode list-of-object columns into `<column>_<key>` columns
 *   5. normalize column names
 *   6. synthesize `id` from the primary and secondary key fields
 *
 * @module transformer
 */

import { logger } from '../utils/logger';
import type { EndpointSpec } from '../config/endpoint-definitions';
import { normalizeRowKeys } from './column-name';
import { CellValue, JsonObject, JsonValue, RawRecord, TransformedRow, isJsonObject } from './types';

export type TransformSpec = Pick<
  EndpointSpec,
  'name' | 'primaryKeys' | 'secondaryKeys' | 'listColumns' | 'listOfDictsColumns' | 'identifierField'
>;

export interface TransformOptions {
  /** Drop records missing any key field and report their identifier instead */
  rejectMissingKeys?: boolean;
}

export interface TransformBatchResult {
  rows: TransformedRow[];
  /** Raw identifiers of rejected records */
  invalidIdentifiers: string[];
}

export const MAX_FLATTEN_DEPTH = 2;

const HTML_TAG = /<.*?>/g;

export function flattenRecord(
  record: JsonObject,
  maxDepth: number = MAX_FLATTEN_DEPTH,
  parentKey = '',
  depth = 0
): JsonObject {
  const items: JsonObject = {};

  for (const [key, value] of Object.entries(record)) {
    const newKey = parentKey ? `${parentKey}_${key}` : key;

    if (isJsonObject(value) && depth < maxDepth) {
      Object.assign(items, flattenRecord(value, maxDepth, newKey, depth + 1));
    } else {
      items[newKey] = value;
    }
  }

  return items;
}

export function cleanValue(value: JsonValue): JsonValue {
  if (typeof value !== 'string') {
    return value;
  }

  const cleaned = value.replace(HTML_TAG, '');
  return cleaned.trim() === '' ? null : cleaned;
}

export function cleanRecord(record: JsonObject): JsonObject {
  const cleaned: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    cleaned[key] = cleanValue(value);
  }
  return cleaned;
}

function withoutColumn(row: JsonObject, column: string): JsonObject {
  const { [column]: _removed, ...rest } = row;
  return rest;
}

export function explodeLists(
  record: JsonObject,
  listColumns: readonly string[],
  listOfDictsColumns: readonly string[]
): JsonObject[] {
  let rows: JsonObject[] = [record];

  for (const column of listColumns) {
    const value = record[column];
    if (!Array.isArray(value) || value.length === 0) {
      continue;
    }

    rows = rows.flatMap((row) => value.map((item) => ({ ...row, [column]: item })));
  }

  for (const column of listOfDictsColumns) {
    const value = record[column];
    if (!Array.isArray(value)) {
      continue;
    }

    if (value.length === 0) {
      rows = rows.map((row) => withoutColumn(row, column));
      continue;
    }

    rows = rows.flatMap((row) => {
      const base = withoutColumn(row, column);
      return value.map((item) => {
        const exploded: JsonObject = { ...base };
        if (isJsonObject(item)) {
          for (const [key, nested] of Object.entries(item)) {
            exploded[`${column}_${key}`] = nested;
          }
        }
        return exploded;
      });
    });
  }

  return rows;
}

function keyPart(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

export function synthesizeId(row: Record<string, CellValue>, keys: readonly string[]): string {
  const parts: string[] = [];
  for (const key of keys) {
    const part = keyPart(row[key]);
    if (part !== null) {
      parts.push(part);
    }
  }
  return parts.join('_');
}

export class RecordTransformer {
  private readonly keyColumns: string[];

  constructor(
    private readonly spec: TransformSpec,
    private readonly options: TransformOptions = {}
  ) {
    this.keyColumns = [...spec.primaryKeys, ...spec.secondaryKeys];
  }

  /**
   * Transform a page of records, collecting the identifiers of rejected ones
   */
  transformRecords(records: RawRecord[]): TransformBatchResult {
    const rows: TransformedRow[] = [];
    const invalidIdentifiers: string[] = [];

    for (const record of records) {
      const cleaned = this.prepare(record);
      if (cleaned === null) {
        const identifier = this.rawIdentifier(record);
        if (identifier !== null) {
          invalidIdentifiers.push(identifier);
        }
        logger.warn('Record rejected: missing key fields', {
          table: this.spec.name,
          identifier,
          keys: this.keyColumns
        });
        continue;
      }

      for (const row of this.rowsFrom(cleaned)) {
        rows.push(row);
      }
    }

    logger.debug('Transformed records', {
      table: this.spec.name,
      records: records.length,
      rows: rows.length,
      rejected: invalidIdentifiers.length
    });

    return { rows, invalidIdentifiers };
  }

  /**
   * Flattened and cleaned record, or null when it fails the key check
   */
  private prepare(record: RawRecord): JsonObject | null {
    const cleaned = cleanRecord(flattenRecord(record));
    if (this.options.rejectMissingKeys && !this.hasKeyFields(cleaned)) {
      return null;
    }
    return cleaned;
  }

  private *rowsFrom(cleaned: JsonObject): Generator<TransformedRow> {
    for (const row of explodeLists(cleaned, this.spec.listColumns, this.spec.listOfDictsColumns)) {
      const sanitized = normalizeRowKeys(row);
      const id = synthesizeId(sanitized, this.keyColumns);
      // the synthesized key replaces any `id` the API sent
      const { id: _apiId, ...columns } = sanitized;
      yield { id, ...columns };
    }
  }

  private hasKeyFields(cleaned: JsonObject): boolean {
    const sanitized = normalizeRowKeys(cleaned);
    return this.keyColumns.every((key) => keyPart(sanitized[key]) !== null);
  }

  // falls back to the API's own `id` when the identifier field is the missing key
  private rawIdentifier(record: RawRecord): string | null {
    return keyPart(cleanValue(record[this.spec.identifierField] ?? null)) ?? keyPart(cleanValue(record.id ?? null));
  }
}

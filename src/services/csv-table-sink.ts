/**
 * CSV Table Sink
 *
 * Writes each output table to `<tablesDir>/<table>.csv`: the header on the
 * first write, rows appended after that. `finalize` drops a manifest next to
 * the file. Finished tables can be read back column-wise, which is how
 * dependent endpoints find their parent identifiers.
 *
 * @module services/csv-table-sink
 */

import { appendFile, mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { parse as csvParse } from 'csv-parse/sync';
import { stringify as csvStringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { AppError, ErrorCode, errorMessage } from '../utils/errors';
import type { CellValue, TransformedRow } from '../core/types';
import type { IdentifierSource } from '../core/dependent-resolver';
import type { TableSink } from './table-writer';

export interface TableManifest {
  columns: string[];
  primary_key: string[];
  incremental: boolean;
}

interface OpenTable {
  filePath: string;
  columns: string[];
  primaryKey: string[];
  incremental: boolean;
}

const csvRowsSchema = z.array(z.record(z.string(), z.string()));

export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export class CsvTableSink implements TableSink, IdentifierSource {
  private readonly tables = new Map<string, OpenTable>();

  constructor(private readonly tablesDir: string) {}

  tablePath(tableName: string): string {
    return path.join(this.tablesDir, `${tableName}.csv`);
  }

  async writeRows(
    tableName: string,
    rows: TransformedRow[],
    columns: string[],
    primaryKey: string[],
    incremental: boolean
  ): Promise<void> {
    let table = this.tables.get(tableName);

    try {
      if (!table) {
        table = { filePath: this.tablePath(tableName), columns, primaryKey, incremental };
        this.tables.set(tableName, table);
        await mkdir(this.tablesDir, { recursive: true });
        await writeFile(table.filePath, csvStringify([table.columns]), 'utf-8');
      }

      const header = table.columns;
      const records = rows.map((row) => header.map((column) => formatCell(row[column])));
      await appendFile(table.filePath, csvStringify(records), 'utf-8');
    } catch (error) {
      throw new AppError(
        ErrorCode.SINK_ERROR,
        `Failed to write table ${tableName}: ${errorMessage(error)}`,
        { tableName }
      );
    }
  }

  async finalize(tableName: string): Promise<void> {
    const table = this.tables.get(tableName);
    if (!table) {
      logger.warn('Finalize called for a table that was never written', { table: tableName });
      return;
    }

    const manifest: TableManifest = {
      columns: table.columns,
      primary_key: table.primaryKey,
      incremental: table.incremental
    };

    try {
      await writeFile(`${table.filePath}.manifest`, JSON.stringify(manifest, null, 2), 'utf-8');
    } catch (error) {
      throw new AppError(
        ErrorCode.SINK_ERROR,
        `Failed to write manifest for ${tableName}: ${errorMessage(error)}`,
        { tableName }
      );
    }

    logger.info('Table finalized', { table: tableName, columns: table.columns.length });
  }

  async readColumnValues(tableName: string, columnName: string): Promise<string[]> {
    const filePath = this.tablePath(tableName);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      logger.warn('Parent table not found', { table: tableName, error: errorMessage(error) });
      return [];
    }

    const parsed = csvRowsSchema.safeParse(
      csvParse(content, {
        columns: true,
        skip_empty_lines: true,
        relax_column_count: true
      })
    );
    if (!parsed.success) {
      throw new AppError(ErrorCode.SINK_ERROR, `Unreadable table ${tableName}`, { filePath });
    }

    const values: string[] = [];
    for (const row of parsed.data) {
      const value = row[columnName];
      if (value !== undefined && value !== '') {
        values.push(value);
      }
    }

    if (parsed.data.length > 0 && !(columnName in parsed.data[0])) {
      logger.warn('Column not present in table', { table: tableName, column: columnName });
    }

    return values;
  }
}

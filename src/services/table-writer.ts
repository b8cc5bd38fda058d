/**
 * Buffers transformed rows for one output table and hands them to the sink
 * in batches. Writes for a table are chained so concurrent page handlers
 * never interleave inside the sink.
 */

import { logger } from '../utils/logger';
import type { TransformedRow } from '../core/types';

export interface TableSink {
  writeRows(
    tableName: string,
    rows: TransformedRow[],
    columns: string[],
    primaryKey: string[],
    incremental: boolean
  ): Promise<void>;
  /** Called once per table, after its last write */
  finalize(tableName: string): Promise<void>;
}

export interface TableWriterOptions {
  tableName: string;
  primaryKey: string[];
  incremental: boolean;
  batchSize: number;
  /** Column order for the table, decided from the first row written */
  resolveColumns: (firstRow: TransformedRow) => string[];
}

export class TableWriter {
  private buffer: TransformedRow[] = [];
  private columns?: string[];
  private chain: Promise<void> = Promise.resolve();
  private written = 0;
  private closed = false;

  constructor(
    private readonly sink: TableSink,
    private readonly options: TableWriterOptions
  ) {}

  get rowsWritten(): number {
    return this.written;
  }

  async push(rows: TransformedRow[]): Promise<void> {
    if (this.closed) {
      throw new Error(`Table writer for ${this.options.tableName} is already closed`);
    }

    this.buffer.push(...rows);
    while (this.buffer.length >= this.options.batchSize) {
      this.enqueue(this.buffer.splice(0, this.options.batchSize));
    }
    await this.chain;
  }

  /**
   * Flush what is left and finalize the table if anything was written
   *
   * @returns rows written in total
   */
  async close(): Promise<number> {
    this.closed = true;
    if (this.buffer.length > 0) {
      this.enqueue(this.buffer.splice(0));
    }
    await this.chain;

    if (this.written > 0) {
      await this.sink.finalize(this.options.tableName);
    }
    return this.written;
  }

  private enqueue(batch: TransformedRow[]): void {
    const columns = this.columns ?? this.options.resolveColumns(batch[0]);
    this.columns = columns;

    this.chain = this.chain.then(async () => {
      await this.sink.writeRows(
        this.options.tableName,
        batch,
        columns,
        this.options.primaryKey,
        this.options.incremental
      );
      this.written += batch.length;
      logger.debug('Batch written', {
        table: this.options.tableName,
        rows: batch.length,
        total: this.written
      });
    });
  }
}

/**
 * Run state persisted between runs: the column order of every table written so
 * far and when it was last extracted. Read from `<dataDir>/in/state.json`,
 * written to `<dataDir>/out/state.json`.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { AppError, ErrorCode, errorMessage } from '../utils/errors';

const tableStateSchema = z.object({
  columns: z.array(z.string()),
  last_updated: z.string()
});

const runStateSchema = z.object({
  schema: z.record(z.string(), tableStateSchema).default({}),
  last_updated: z.string().optional()
});

export type RunState = z.infer<typeof runStateSchema>;

export class StateStore {
  private constructor(
    private state: RunState,
    private readonly now: () => Date
  ) {}

  static empty(now: () => Date = () => new Date()): StateStore {
    return new StateStore({ schema: {} }, now);
  }

  /**
   * Load the previous state; a missing or unreadable file starts from scratch
   */
  static async load(filePath: string, now: () => Date = () => new Date()): Promise<StateStore> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch {
      logger.debug('No previous state found', { filePath });
      return StateStore.empty(now);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn('State file is not valid JSON, ignoring it', { filePath, error: errorMessage(error) });
      return StateStore.empty(now);
    }

    const parsed = runStateSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('State file has an unexpected shape, ignoring it', { filePath });
      return StateStore.empty(now);
    }

    logger.info('Loaded previous state', {
      tables: Object.keys(parsed.data.schema).length,
      lastUpdated: parsed.data.last_updated
    });
    return new StateStore(parsed.data, now);
  }

  get lastUpdated(): string | undefined {
    return this.state.last_updated;
  }

  storedColumns(endpoint: string): string[] | undefined {
    return this.state.schema[endpoint]?.columns;
  }

  /**
   * Column order for a table: previously stored columns first, then any new
   * columns in the order observed. The result is recorded for the next run.
   */
  columnsFor(endpoint: string, observed: string[]): string[] {
    const stored = this.storedColumns(endpoint) ?? [];
    const known = new Set(stored);
    const columns = [...stored, ...observed.filter((column) => !known.has(column))];

    this.state.schema[endpoint] = {
      columns,
      last_updated: this.now().toISOString()
    };
    return columns;
  }

  toJSON(): RunState {
    return this.state;
  }

  async save(filePath: string): Promise<void> {
    this.state.last_updated = this.now().toISOString();

    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, JSON.stringify(this.state, null, 2), 'utf-8');
    } catch (error) {
      throw new AppError(ErrorCode.SINK_ERROR, `Failed to write state to ${filePath}: ${errorMessage(error)}`);
    }

    logger.debug('State saved', { filePath });
  }
}

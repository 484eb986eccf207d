import Database from 'better-sqlite3';
import { ExecutionError } from '../types';
import type { QueryRow, RelationalStore } from '../types';

export interface SQLiteProductStoreConfig {
  /**
   * Path to the SQLite database file holding the `product` table
   */
  path: string;
}

/**
 * Read-only product store over a SQLite file.
 * Every query opens its own connection and closes it before returning.
 */
export class SQLiteProductStore implements RelationalStore {
  private config: SQLiteProductStoreConfig;

  constructor(config: SQLiteProductStoreConfig | string) {
    this.config = typeof config === 'string' ? { path: config } : config;
  }

  get path(): string {
    return this.config.path;
  }

  async query(sql: string): Promise<QueryRow[]> {
    let db: Database.Database;
    try {
      db = new Database(this.config.path, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new ExecutionError(describe(error), error);
    }

    try {
      const statement = db.prepare(sql);
      if (!statement.reader) {
        throw new ExecutionError('statement does not return rows');
      }
      return statement.all().filter(isRow);
    } catch (error) {
      if (error instanceof ExecutionError) {
        throw error;
      }
      throw new ExecutionError(describe(error), error);
    } finally {
      db.close();
    }
  }
}

function isRow(value: unknown): value is QueryRow {
  return typeof value === 'object' && value !== null;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

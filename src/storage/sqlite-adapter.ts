/**
 * SQLite Adapter - thin interface over better-sqlite3
 *
 * The rest of the storage layer only sees SqliteDatabase / SqliteStatement,
 * so tests can open ':memory:' databases through the same path.
 */

import Database from 'better-sqlite3';
import { StorageError } from '../errors.js';

export interface SqliteRunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

export interface SqliteStatement {
  run(...params: unknown[]): SqliteRunResult;
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

export interface SqliteDatabase {
  exec(sql: string): void;
  prepare(sql: string): SqliteStatement;
  /** Run `fn` inside BEGIN/COMMIT; rolls back if it throws */
  transaction<T>(fn: () => T): T;
  pragma(pragma: string): unknown;
  close(): void;
}

/**
 * Open a SQLite database at `dbPath` (or ':memory:').
 */
export function createDatabase(dbPath: string): SqliteDatabase {
  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new StorageError(`Cannot open database at ${dbPath}`, { cause: error });
  }

  return {
    exec(sql: string): void {
      db.exec(sql);
    },

    prepare(sql: string): SqliteStatement {
      const stmt = db.prepare(sql);
      return {
        run(...params: unknown[]) {
          const result = stmt.run(...params);
          return {
            changes: result.changes,
            lastInsertRowid: result.lastInsertRowid,
          };
        },
        get(...params: unknown[]) {
          return stmt.get(...params);
        },
        all(...params: unknown[]) {
          return stmt.all(...params);
        },
      };
    },

    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },

    pragma(pragma: string): unknown {
      return db.pragma(pragma, { simple: true });
    },

    close(): void {
      db.close();
    },
  };
}

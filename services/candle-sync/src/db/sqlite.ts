import sqlite3 from 'sqlite3';
import type { Database, RunResult } from 'sqlite3';

export type SqlValue = string | number | null;

/** Promise face over the callback driver. One connection, statements run in call order. */
export class SqliteDatabase {
  private constructor(
    private readonly db: Database,
    readonly filename: string,
  ) {}

  static open(filename: string): Promise<SqliteDatabase> {
    return new Promise((resolve, reject) => {
      const db: Database = new sqlite3.Database(filename, (err) => {
        if (err) reject(err);
        else resolve(new SqliteDatabase(db, filename));
      });
    });
  }

  exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (err) => (err ? reject(err) : resolve()));
    });
  }

  /** Resolves with the number of rows changed. */
  run(sql: string, params: SqlValue[] = []): Promise<number> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: RunResult, err: Error | null) {
        if (err) reject(err);
        else resolve(this.changes);
      });
    });
  }

  get(sql: string, params: SqlValue[] = []): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: unknown) => (err ? reject(err) : resolve(row)));
    });
  }

  /** BEGIN … COMMIT around `fn`; any rejection rolls the whole unit back. */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    await this.exec('BEGIN IMMEDIATE');
    try {
      const result = await fn();
      await this.exec('COMMIT');
      return result;
    } catch (e) {
      await this.exec('ROLLBACK');
      throw e;
    }
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

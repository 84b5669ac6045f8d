import Database from 'better-sqlite3';
import { StorageError, errorMessage } from '../errors';
import type { ExecuteResult, StorageHandle } from '../contracts/itemStorage';
import type { SqlParam } from '../types';
import { StoreLock } from './lock';

/**
 * Implements `StorageHandle` on a single better-sqlite3 connection.
 * better-sqlite3 is synchronous, but every call still goes through `StoreLock`
 * so that statements keep one total order once callers start awaiting.
 */
export class SqliteHandle implements StorageHandle {
  private readonly lock = new StoreLock();

  constructor(private readonly db: Database.Database) {}

  get path(): string {
    return this.db.name;
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    return this.lock.runExclusive(() =>
      this.guard(sql, () => {
        const res = this.db.prepare(sql).run(...params);
        return { changes: res.changes, lastInsertId: Number(res.lastInsertRowid) };
      }),
    );
  }

  async query(sql: string, params: SqlParam[] = []): Promise<unknown[]> {
    return this.lock.runExclusive(() => this.guard(sql, () => this.db.prepare(sql).all(...params)));
  }

  // reads the schema table so an unreadable or foreign file fails here, not on first use
  async ping(): Promise<void> {
    await this.query('SELECT count(*) AS tables FROM sqlite_master');
  }

  async close(): Promise<void> {
    await this.lock.runExclusive(() => {
      if (this.db.open) this.db.close();
    });
  }

  private guard<T>(sql: string, run: () => T): T {
    try {
      return run();
    } catch (err) {
      throw new StorageError(`${errorMessage(err)} (${firstLine(sql)})`, err);
    }
  }
}

function firstLine(sql: string) {
  return sql.trim().split('\n')[0] ?? '';
}

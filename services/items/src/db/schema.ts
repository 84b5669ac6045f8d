import Database from 'better-sqlite3';
import { StartupError, errorMessage } from '../errors';
import type { StorageHandle } from '../contracts/itemStorage';
import { SqliteHandle } from './handle';

export const ITEMS_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE
  )`;

/** Anything with a pino-style `info(obj, msg)`; the entry point passes its logger. */
export interface StartupLog {
  info(obj: object, msg: string): void;
}

export type OpenStoreResult =
  | { ok: true; handle: SqliteHandle }
  | { ok: false; error: StartupError };

/** Idempotent: safe against a store that already has the table. */
export async function ensureItemsTable(handle: StorageHandle): Promise<void> {
  await handle.execute(ITEMS_TABLE_DDL);
}

/**
 * Opens the SQLite file, checks it answers, and ensures the `items` table.
 * Never exits the process; the entry point decides what a failure means.
 */
export async function openStore(dbPath: string, log?: StartupLog): Promise<OpenStoreResult> {
  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (err) {
    return { ok: false, error: new StartupError('open', `Failed to open database: ${errorMessage(err)}`, err) };
  }

  const handle = new SqliteHandle(db);

  try {
    await handle.ping();
  } catch (err) {
    await handle.close();
    return { ok: false, error: new StartupError('ping', `Failed to connect to database: ${errorMessage(err)}`, err) };
  }
  log?.info({ dbPath }, 'Connected to SQLite database');

  try {
    await ensureItemsTable(handle);
  } catch (err) {
    await handle.close();
    return { ok: false, error: new StartupError('schema', `Failed to create table: ${errorMessage(err)}`, err) };
  }
  log?.info({ table: 'items' }, 'Table ensured to exist');

  return { ok: true, handle };
}

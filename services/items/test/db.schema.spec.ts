import Database from 'better-sqlite3';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { StorageHandle } from '../src/contracts/itemStorage';
import { SqliteHandle } from '../src/db/handle';
import { ITEMS_TABLE_DDL, ensureItemsTable, openStore, type StartupLog } from '../src/db/schema';
import { StartupError } from '../src/errors';

describe('openStore', () => {
  const dirs: string[] = [];

  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  function tempDbPath() {
    const dir = mkdtempSync(join(tmpdir(), 'items-store-'));
    dirs.push(dir);
    return join(dir, 'api.db');
  }

  it('creates the items table on a fresh store', async () => {
    const opened = await openStore(':memory:');
    if (!opened.ok) throw opened.error;

    const tables = await opened.handle.query("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'items'");
    expect(tables).toEqual([{ name: 'items' }]);
    await opened.handle.close();
  });

  it('reopens an initialized file without touching its rows', async () => {
    const dbPath = tempDbPath();

    const first = await openStore(dbPath);
    if (!first.ok) throw first.error;
    await first.handle.execute('INSERT INTO items (name) VALUES (?)', ['kept']);
    await first.handle.close();

    const second = await openStore(dbPath);
    if (!second.ok) throw second.error;
    await expect(second.handle.query('SELECT id, name FROM items')).resolves.toEqual([{ id: 1, name: 'kept' }]);
    await second.handle.close();
  });

  it('returns an open failure instead of throwing', async () => {
    const opened = await openStore(join(tmpdir(), 'items-missing-dir', 'nested', 'api.db'));

    expect(opened.ok).toBe(false);
    if (opened.ok) return;
    expect(opened.error).toBeInstanceOf(StartupError);
    expect(opened.error.stage).toBe('open');
    expect(opened.error.message).toMatch(/^Failed to open database: /);
  });

  it('fails the ping stage on a file that is not a database and closes it', async () => {
    const dbPath = tempDbPath();
    writeFileSync(dbPath, 'plain text, not a sqlite file\n'.repeat(40));
    const closeSpy = vi.spyOn(SqliteHandle.prototype, 'close');
    const info = vi.fn();

    const opened = await openStore(dbPath, { info });

    expect(opened.ok).toBe(false);
    if (opened.ok) return;
    expect(opened.error.stage).toBe('ping');
    expect(opened.error.message).toMatch(/^Failed to connect to database: file is not a database/);
    expect(closeSpy).toHaveBeenCalledTimes(1);
    expect(info).not.toHaveBeenCalled();
  });

  it('fails the schema stage when the table name is taken and closes the store', async () => {
    const dbPath = tempDbPath();
    const seed = new Database(dbPath);
    seed.exec('CREATE TABLE other (x TEXT); CREATE INDEX items ON other (x);');
    seed.close();
    const closeSpy = vi.spyOn(SqliteHandle.prototype, 'close');

    const opened = await openStore(dbPath);

    expect(opened.ok).toBe(false);
    if (opened.ok) return;
    expect(opened.error.stage).toBe('schema');
    expect(opened.error.message).toMatch(/^Failed to create table: there is already an index named items/);
    expect(closeSpy).toHaveBeenCalledTimes(1);
  });

  it('logs the connection right after the ping, before the table step', async () => {
    const info = vi.fn();
    const log: StartupLog = { info };

    const opened = await openStore(':memory:', log);
    if (!opened.ok) throw opened.error;

    expect(info.mock.calls).toEqual([
      [{ dbPath: ':memory:' }, 'Connected to SQLite database'],
      [{ table: 'items' }, 'Table ensured to exist'],
    ]);
    await opened.handle.close();
  });
});

describe('ensureItemsTable', () => {
  it('issues the create-if-absent statement once per call', async () => {
    const execute = vi.fn(async () => ({ changes: 0, lastInsertId: 0 }));
    const handle: StorageHandle = {
      execute,
      query: async () => [],
      ping: async () => undefined,
      close: async () => undefined,
    };

    await ensureItemsTable(handle);
    await ensureItemsTable(handle);

    expect(execute).toHaveBeenCalledTimes(2);
    expect(execute).toHaveBeenCalledWith(ITEMS_TABLE_DDL);
    expect(ITEMS_TABLE_DDL).toContain('CREATE TABLE IF NOT EXISTS items');
  });
});

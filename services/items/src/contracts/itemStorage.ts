import type { Item, ItemId, ItemInput, SqlParam } from '../types';

/** Outcome of a write statement. */
export interface ExecuteResult {
  changes: number;
  lastInsertId: number;
}

/**
 * Single connection to the embedded store.
 * Implementations run at most one statement at a time, reads included.
 */
export interface StorageHandle {
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
  query(sql: string, params?: SqlParam[]): Promise<unknown[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

/** Item operations the HTTP routes depend on; each maps to one statement. */
export interface ItemStorage {
  list(): Promise<Item[]>;
  get(id: ItemId): Promise<Item | null>;
  create(input: ItemInput): Promise<Item>;
  /** Replaces the name of an existing item; `null` when no row has that id. */
  update(id: ItemId, input: ItemInput): Promise<Item | null>;
  delete(id: ItemId): Promise<boolean>;
  ping(): Promise<void>;
}

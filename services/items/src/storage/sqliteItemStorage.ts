import { z } from 'zod';
import type { ItemStorage, StorageHandle } from '../contracts/itemStorage';
import type { Item, ItemId, ItemInput } from '../types';

const itemRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

const itemRowsSchema = z.array(itemRowSchema);

/**
 * Implements `ItemStorage` with one SQL statement per operation.
 * Rows are checked against the item shape before they leave this layer.
 */
export class SqliteItemStorage implements ItemStorage {
  constructor(private readonly handle: StorageHandle) {}

  async list(): Promise<Item[]> {
    const rows = await this.handle.query('SELECT id, name FROM items ORDER BY id');
    return itemRowsSchema.parse(rows);
  }

  async get(id: ItemId): Promise<Item | null> {
    const [row] = itemRowsSchema.parse(await this.handle.query('SELECT id, name FROM items WHERE id = ?', [id]));
    return row ?? null;
  }

  async create(input: ItemInput): Promise<Item> {
    const res = await this.handle.execute('INSERT INTO items (name) VALUES (?)', [input.name]);
    return { id: res.lastInsertId, name: input.name };
  }

  async update(id: ItemId, input: ItemInput): Promise<Item | null> {
    const res = await this.handle.execute('UPDATE items SET name = ? WHERE id = ?', [input.name, id]);
    if (res.changes === 0) return null;
    return { id, name: input.name };
  }

  async delete(id: ItemId): Promise<boolean> {
    const res = await this.handle.execute('DELETE FROM items WHERE id = ?', [id]);
    return res.changes > 0;
  }

  async ping(): Promise<void> {
    await this.handle.ping();
  }
}

import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { ItemStorage } from '../contracts/itemStorage';

// ---------- Schemas ----------
const idParamsSchema = z.object({
  id: z
    .string()
    .regex(/^[+-]?\d+$/)
    .transform((v) => Number(v))
    .refine((v) => Number.isSafeInteger(v)),
});

// Decoded like a typed struct: absent or null fields take their zero value,
// a wrong type is rejected. A client-sent id is accepted but never used.
const itemBodySchema = z.preprocess(
  (v) => (v === null ? {} : v),
  z.object({
    id: z.number().int().nullish(),
    name: z
      .string()
      .nullish()
      .transform((v) => v ?? ''),
  }),
);

const INVALID_ID = 'Invalid item ID';
const INVALID_BODY = 'Invalid request body';
const NOT_FOUND = 'Item not found';

// ---------- Helper ----------
export function sendText(reply: FastifyReply, statusCode: number, message: string) {
  return reply.code(statusCode).type('text/plain; charset=utf-8').send(message);
}

// ---------- Routes ----------
export async function registerItemRoutes(app: FastifyInstance, storage: ItemStorage) {
  // List
  app.get('/items', async (req, reply) => {
    try {
      return reply.send(await storage.list());
    } catch (err) {
      req.log.error({ err }, 'Error querying items');
      return sendText(reply, 500, 'Failed to retrieve items');
    }
  });

  // Read
  app.get('/items/:id', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return sendText(reply, 400, INVALID_ID);

    try {
      const item = await storage.get(params.data.id);
      if (!item) return sendText(reply, 404, NOT_FOUND);
      return reply.send(item);
    } catch (err) {
      req.log.error({ err }, 'Error querying item by ID');
      return sendText(reply, 500, 'Failed to retrieve item');
    }
  });

  // Create
  app.post('/items', async (req, reply) => {
    const body = itemBodySchema.safeParse(req.body);
    if (!body.success) return sendText(reply, 400, INVALID_BODY);

    try {
      const item = await storage.create({ name: body.data.name });
      return reply.code(201).send(item);
    } catch (err) {
      // uniqueness violations land here too; there is no separate conflict status
      req.log.error({ err }, 'Error inserting item');
      return sendText(reply, 500, 'Failed to create item');
    }
  });

  // Update (whole record; the id comes from the path)
  app.put('/items/:id', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return sendText(reply, 400, INVALID_ID);
    const body = itemBodySchema.safeParse(req.body);
    if (!body.success) return sendText(reply, 400, INVALID_BODY);

    try {
      const item = await storage.update(params.data.id, { name: body.data.name });
      if (!item) return sendText(reply, 404, NOT_FOUND);
      return reply.send(item);
    } catch (err) {
      req.log.error({ err }, 'Error updating item');
      return sendText(reply, 500, 'Failed to update item');
    }
  });

  // Delete
  app.delete('/items/:id', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return sendText(reply, 400, INVALID_ID);

    try {
      const deleted = await storage.delete(params.data.id);
      if (!deleted) return sendText(reply, 404, NOT_FOUND);
      return reply.code(204).send();
    } catch (err) {
      req.log.error({ err }, 'Error deleting item');
      return sendText(reply, 500, 'Failed to delete item');
    }
  });
}

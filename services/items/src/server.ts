import Fastify, { type FastifyServerOptions } from 'fastify';
import type { ItemStorage } from './contracts/itemStorage';
import { registerItemRoutes, sendText } from './routes/items';

export interface BuildAppOptions {
  storage: ItemStorage;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp({ storage, logger = false }: BuildAppOptions) {
  const app = Fastify({ logger });

  // bodies are read as JSON whatever their content type (form, text/plain, none)
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, app.getDefaultJsonParser('ignore', 'ignore'));

  // body parser failures (malformed or empty JSON) arrive here before any route runs
  app.setErrorHandler((err, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode === 400) return sendText(reply, 400, 'Invalid request body');
    if (statusCode > 400 && statusCode < 500) return sendText(reply, statusCode, err.message);
    req.log.error({ err }, 'Unhandled request error');
    return sendText(reply, 500, 'Internal Server Error');
  });

  app.get('/health', async (req) => {
    try {
      await storage.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      req.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  await registerItemRoutes(app, storage);
  return app;
}

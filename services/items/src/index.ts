import pino from 'pino';
import { config } from './config';
import { openStore } from './db/schema';
import { buildApp } from './server';
import { SqliteItemStorage } from './storage/sqliteItemStorage';

/**
 * Main entrypoint for the items service.
 * Opens the SQLite store (aborting if it cannot be reached), registers routes, and listens.
 */
async function main() {
  // one pino instance for startup and for Fastify, so store logs land before routes exist
  const log = pino({ level: config.logLevel });

  const opened = await openStore(config.dbPath, log);
  if (!opened.ok) {
    log.fatal({ err: opened.error, stage: opened.error.stage }, 'Store startup failed');
    process.exit(1);
  }
  const { handle } = opened;

  const app = await buildApp({ storage: new SqliteItemStorage(handle), logger: log });

  // --- Shutdown ---
  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down');
    app
      .close()
      .then(() => handle.close())
      .then(() => process.exit(0))
      .catch((err) => {
        app.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Items server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    await handle.close();
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting items service:', err);
  process.exit(1);
});

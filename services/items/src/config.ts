import 'dotenv/config';

const DEFAULT_DB_PATH = 'api.db';

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  // SQLite file; ':memory:' keeps everything in process
  dbPath: process.env.DB_PATH || DEFAULT_DB_PATH,
  logLevel: process.env.LOG_LEVEL || 'info',
};

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import * as schema from './schema.js';
import { config } from '../config.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('database');

export type AppDatabase = BetterSQLite3Database<typeof schema>;

let sqlite: Database.Database | null = null;

/** Opens a connection and applies the schema. `:memory:` gives a throwaway database. */
export function openDatabase(url: string): { db: AppDatabase; sqlite: Database.Database } {
  if (url !== ':memory:') {
    mkdirSync(dirname(url), { recursive: true });
  }

  const connection = new Database(url);
  if (url !== ':memory:') {
    connection.pragma('journal_mode = WAL');
  }
  connection.exec(schema.SCHEMA_DDL);

  return { db: drizzle(connection, { schema }), sqlite: connection };
}

export function initializeDatabase(url: string = config.database.url): AppDatabase {
  logger.info('Initializing database', { url });

  const opened = openDatabase(url);
  sqlite = opened.sqlite;

  logger.info('Database initialized');
  return opened.db;
}

export function closeDatabase(): void {
  if (sqlite) {
    logger.info('Closing database connection');
    sqlite.close();
    sqlite = null;
  }
}

export { schema };
export * from './schema.js';

// services/database.ts
import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { logger } from '../utils/logger';
import { InfrastructureError } from '../utils/errors';

export const MEMORY_DATABASE = ':memory:';
const BUSY_TIMEOUT_MS = 5000;

const CREATE_ACTIVITIES_TABLE = `
  CREATE TABLE IF NOT EXISTS activities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    description TEXT,
    schedule TEXT,
    max_participants INTEGER,
    participants TEXT NOT NULL DEFAULT '[]'
  )
`;

/**
 * Opens (or creates) the SQLite database and makes sure the activities
 * table exists. `:memory:` gives a private in-process database.
 */
export function openDatabase(dbPath: string): Database.Database {
  let db: Database.Database;
  try {
    if (dbPath !== MEMORY_DATABASE) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    db = new Database(dbPath);
  } catch (error) {
    throw new InfrastructureError(`Failed to open database at ${dbPath}`, error);
  }

  if (dbPath !== MEMORY_DATABASE) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

  ensureSchema(db);
  logger.info(`Database opened at ${dbPath}.`);
  return db;
}

function ensureSchema(db: Database.Database): void {
  try {
    db.exec(CREATE_ACTIVITIES_TABLE);
  } catch (error) {
    throw new InfrastructureError('Failed to create activities table', error);
  }
}

export function closeDatabase(db: Database.Database): void {
  if (!db.open) return;
  try {
    db.close();
    logger.info('Database connection closed.');
  } catch (error) {
    logger.warn('Error while closing database connection:', error);
  }
}

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { info } from 'firebase-functions/logger';
import { getConfig } from '../config.js';
import { Migrator } from './migrator.js';
import { migrations } from './migrations/index.js';

let db: Database.Database | null = null;
let testDb: Database.Database | null = null;

/**
 * Open a database, enable foreign keys and bring the schema up to date.
 * File databases use WAL; `:memory:` is left in its default journal mode.
 */
export function openDatabase(path: string): Database.Database {
  const inMemory = path === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const database = new Database(path);
  database.pragma('foreign_keys = ON');
  if (!inMemory) {
    database.pragma('journal_mode = WAL');
  }

  const applied = new Migrator(database, migrations).up();
  info('Database ready', { path, migrationsApplied: applied });
  return database;
}

export function initializeDatabase(): Database.Database {
  if (!db) {
    db = openDatabase(getConfig().databasePath);
  }
  return db;
}

/**
 * The database repositories and services should use. A test database,
 * when set, takes precedence.
 */
export function getDatabase(): Database.Database {
  if (testDb) {
    return testDb;
  }
  return initializeDatabase();
}

export function setTestDatabase(database: Database.Database | null): void {
  testDb = database;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 3,
  name: 'create_custom_options',

  up(db: Database): void {
    db.exec(`
      CREATE TABLE custom_options (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        option_type TEXT NOT NULL,
        value TEXT NOT NULL,
        label TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (user_id, option_type, value)
      );
    `);
  },

  down(db: Database): void {
    db.exec('DROP TABLE IF EXISTS custom_options');
  },
};

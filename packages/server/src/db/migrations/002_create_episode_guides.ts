import type { Database } from 'better-sqlite3';
import type { Migration } from '../migrator.js';

export const migration: Migration = {
  version: 2,
  name: 'create_episode_guides',

  up(db: Database): void {
    db.exec(`
      CREATE TABLE episode_guide_templates (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        podcast_id INTEGER NOT NULL REFERENCES podcasts(id) ON DELETE CASCADE,
        name TEXT NOT NULL,
        description TEXT,
        intro_static_content TEXT,
        outro_static_content TEXT,
        default_sections TEXT NOT NULL DEFAULT '[]',
        default_poll_1 TEXT,
        default_poll_2 TEXT,
        is_default INTEGER NOT NULL DEFAULT 0,
        created_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX idx_templates_podcast ON episode_guide_templates(podcast_id);

      CREATE TABLE episode_guides (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        podcast_id INTEGER NOT NULL REFERENCES podcasts(id) ON DELETE CASCADE,
        template_id INTEGER REFERENCES episode_guide_templates(id) ON DELETE SET NULL,
        title TEXT NOT NULL,
        episode_number INTEGER,
        scheduled_date TEXT,
        status TEXT NOT NULL DEFAULT 'draft'
          CHECK (status IN ('draft', 'recording', 'completed')),
        recording_started_at TEXT,
        recording_ended_at TEXT,
        total_duration_seconds INTEGER,
        notes TEXT,
        previous_poll TEXT,
        previous_poll_link TEXT,
        new_poll TEXT,
        new_poll_link TEXT,
        intro_static_content TEXT,
        outro_static_content TEXT,
        custom_sections TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX idx_episode_guides_podcast ON episode_guides(podcast_id, created_at DESC);
      CREATE INDEX idx_episode_guides_number ON episode_guides(podcast_id, episode_number);

      -- No unique index on position: range shifts pass through duplicate
      -- positions inside a transaction.
      CREATE TABLE episode_guide_items (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guide_id INTEGER NOT NULL REFERENCES episode_guides(id) ON DELETE CASCADE,
        section TEXT NOT NULL,
        title TEXT NOT NULL,
        links TEXT NOT NULL DEFAULT '[]',
        notes TEXT,
        position INTEGER NOT NULL CHECK (position >= 0),
        timestamp_seconds INTEGER,
        discussed INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX idx_items_guide_section_position
        ON episode_guide_items(guide_id, section, position);
    `);
  },

  down(db: Database): void {
    db.exec(`
      DROP TABLE IF EXISTS episode_guide_items;
      DROP TABLE IF EXISTS episode_guides;
      DROP TABLE IF EXISTS episode_guide_templates;
    `);
  },
};

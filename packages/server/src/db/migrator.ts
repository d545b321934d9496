import type { Database } from 'better-sqlite3';
import { info } from 'firebase-functions/logger';

export interface Migration {
  version: number;
  name: string;
  up(db: Database): void;
  down(db: Database): void;
}

/**
 * Applies numbered migrations in order and records each one in the
 * `migrations` table. Every migration runs in its own transaction.
 */
export class Migrator {
  private db: Database;
  private migrations: Migration[];

  constructor(db: Database, migrations: Migration[]) {
    this.db = db;
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      )
    `);
  }

  getAppliedVersions(): number[] {
    this.ensureMigrationsTable();
    const versions: unknown[] = this.db
      .prepare('SELECT version FROM migrations ORDER BY version')
      .pluck()
      .all();
    return versions.filter((version): version is number => typeof version === 'number');
  }

  /**
   * Apply every pending migration. Returns how many were applied.
   */
  up(): number {
    const applied = new Set(this.getAppliedVersions());
    const pending = this.migrations.filter((migration) => !applied.has(migration.version));

    for (const migration of pending) {
      const apply = this.db.transaction(() => {
        migration.up(this.db);
        this.db
          .prepare('INSERT INTO migrations (version, name, applied_at) VALUES (?, ?, ?)')
          .run(migration.version, migration.name, new Date().toISOString());
      });
      apply();
      info('Applied migration', { version: migration.version, name: migration.name });
    }

    return pending.length;
  }

  /**
   * Roll back the most recent migration. Returns false when nothing is applied.
   */
  down(): boolean {
    const applied = this.getAppliedVersions();
    const latest = applied[applied.length - 1];
    if (latest === undefined) {
      return false;
    }

    const migration = this.migrations.find((candidate) => candidate.version === latest);
    if (!migration) {
      throw new Error(`Migration ${latest} is applied but not known to this build`);
    }

    const revert = this.db.transaction(() => {
      migration.down(this.db);
      this.db.prepare('DELETE FROM migrations WHERE version = ?').run(migration.version);
    });
    revert();
    return true;
  }
}

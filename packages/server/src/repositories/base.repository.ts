import type { Database } from 'better-sqlite3';
import { isRecord } from './row-guards.js';

export type SqlValue = string | number | null;

export abstract class BaseRepository<T extends { id: number }, UpdateDTO extends object> {
  protected db: Database;
  protected abstract readonly tableName: string;
  /** Columns `update` may write. Keys outside this list are ignored. */
  protected abstract readonly updatableColumns: readonly string[];
  protected includeTimestampOnUpdate = true;

  constructor(db: Database) {
    this.db = db;
  }

  protected abstract parseRow(data: Record<string, unknown>): T | null;

  findById(id: number): T | null {
    const row = this.db.prepare(`SELECT * FROM ${this.tableName} WHERE id = ?`).get(id);
    return this.rowToEntity(row);
  }

  update(id: number, data: UpdateDTO): T | null {
    const existing = this.findById(id);
    if (!existing) {
      return null;
    }

    const updates = this.buildUpdatePayload(data);

    if (Object.keys(updates).length === 0) {
      return existing;
    }

    if (this.includeTimestampOnUpdate) {
      updates['updated_at'] = this.updateTimestamp();
    }

    const assignments = Object.keys(updates)
      .map((column) => `${column} = @${column}`)
      .join(', ');
    this.db
      .prepare(`UPDATE ${this.tableName} SET ${assignments} WHERE id = @id`)
      .run({ ...updates, id });

    return this.findById(id);
  }

  protected buildUpdatePayload(data: UpdateDTO): Record<string, SqlValue> {
    const updates: Record<string, SqlValue> = {};
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined && this.updatableColumns.includes(key)) {
        updates[key] = this.toColumnValue(value);
      }
    }
    return updates;
  }

  /**
   * Booleans become 0/1 and arrays or objects are stored as JSON text.
   */
  protected toColumnValue(value: unknown): SqlValue {
    if (value === null || typeof value === 'string' || typeof value === 'number') {
      return value;
    }
    if (typeof value === 'boolean') {
      return value ? 1 : 0;
    }
    return JSON.stringify(value);
  }

  delete(id: number): boolean {
    const result = this.db.prepare(`DELETE FROM ${this.tableName} WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  protected updateTimestamp(): string {
    return new Date().toISOString();
  }

  protected createTimestamps(): { created_at: string; updated_at: string } {
    const now = new Date().toISOString();
    return { created_at: now, updated_at: now };
  }

  protected rowToEntity(row: unknown): T | null {
    if (!isRecord(row)) {
      return null;
    }
    return this.parseRow(row);
  }

  protected rowsToEntities(rows: unknown[]): T[] {
    return rows
      .map((row) => this.rowToEntity(row))
      .filter((entity): entity is T => entity !== null);
  }
}

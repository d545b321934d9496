import type { Database } from 'better-sqlite3';
import type { CustomOption } from '@showdesk/shared';
import { BaseRepository } from './base.repository.js';
import { readNumber, readString } from './row-guards.js';

export interface CreateCustomOptionDTO {
  user_id: number;
  option_type: string;
  value: string;
  label: string;
}

export class CustomOptionRepository extends BaseRepository<CustomOption, Record<string, never>> {
  protected readonly tableName = 'custom_options';
  protected readonly updatableColumns: readonly string[] = [];
  protected override includeTimestampOnUpdate = false;

  constructor(db: Database) {
    super(db);
  }

  create(data: CreateCustomOptionDTO): CustomOption {
    const createdAt = new Date().toISOString();
    const result = this.db
      .prepare(
        `INSERT INTO custom_options (user_id, option_type, value, label, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(data.user_id, data.option_type, data.value, data.label, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      ...data,
      created_at: createdAt,
    };
  }

  findOwned(userId: number, id: number): CustomOption | null {
    const row = this.db
      .prepare('SELECT * FROM custom_options WHERE user_id = ? AND id = ?')
      .get(userId, id);
    return this.rowToEntity(row);
  }

  findByUser(userId: number): CustomOption[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM custom_options WHERE user_id = ?
         ORDER BY option_type, label COLLATE NOCASE, id`
      )
      .all(userId);
    return this.rowsToEntities(rows);
  }

  findByUserAndType(userId: number, optionType: string): CustomOption[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM custom_options WHERE user_id = ? AND option_type = ?
         ORDER BY label COLLATE NOCASE, id`
      )
      .all(userId, optionType);
    return this.rowsToEntities(rows);
  }

  protected parseRow(data: Record<string, unknown>): CustomOption | null {
    const id = readNumber(data, 'id');
    const userId = readNumber(data, 'user_id');
    const optionType = readString(data, 'option_type');
    const value = readString(data, 'value');
    const label = readString(data, 'label');
    const createdAt = readString(data, 'created_at');

    if (
      id === null ||
      userId === null ||
      optionType === null ||
      value === null ||
      label === null ||
      createdAt === null
    ) {
      return null;
    }

    return {
      id,
      user_id: userId,
      option_type: optionType,
      value,
      label,
      created_at: createdAt,
    };
  }
}

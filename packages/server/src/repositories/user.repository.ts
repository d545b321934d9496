import type { Database } from 'better-sqlite3';
import type { User } from '@showdesk/shared';
import { BaseRepository } from './base.repository.js';
import { readNumber, readString } from './row-guards.js';

export interface CreateUserDTO {
  email: string;
  name: string;
  api_token_hash: string;
}

export class UserRepository extends BaseRepository<User, Record<string, never>> {
  protected readonly tableName = 'users';
  protected readonly updatableColumns: readonly string[] = [];
  protected override includeTimestampOnUpdate = false;

  constructor(db: Database) {
    super(db);
  }

  create(data: CreateUserDTO): User {
    const createdAt = new Date().toISOString();
    const result = this.db
      .prepare(
        `INSERT INTO users (email, name, api_token_hash, created_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(data.email.toLowerCase(), data.name, data.api_token_hash, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      email: data.email.toLowerCase(),
      name: data.name,
      created_at: createdAt,
    };
  }

  findByEmail(email: string): User | null {
    const row = this.db
      .prepare('SELECT * FROM users WHERE email = ?')
      .get(email.toLowerCase());
    return this.rowToEntity(row);
  }

  findByTokenHash(tokenHash: string): User | null {
    const row = this.db
      .prepare('SELECT * FROM users WHERE api_token_hash = ?')
      .get(tokenHash);
    return this.rowToEntity(row);
  }

  protected parseRow(data: Record<string, unknown>): User | null {
    const id = readNumber(data, 'id');
    const email = readString(data, 'email');
    const name = readString(data, 'name');
    const createdAt = readString(data, 'created_at');

    if (id === null || email === null || name === null || createdAt === null) {
      return null;
    }

    return { id, email, name, created_at: createdAt };
  }
}

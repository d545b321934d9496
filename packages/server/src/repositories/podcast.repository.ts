import type { Database } from 'better-sqlite3';
import type { Podcast, PodcastRole, PodcastWithRole } from '@showdesk/shared';
import { BaseRepository } from './base.repository.js';
import {
  isRecord,
  readEnum,
  readFlag,
  readNullableNumber,
  readNullableString,
  readNumber,
  readString,
} from './row-guards.js';

export interface CreatePodcastDTO {
  name: string;
  slug: string;
  description: string | null;
  created_by: number;
}

export interface UpdatePodcastDTO {
  name?: string;
  slug?: string;
  description?: string | null;
  is_active?: boolean;
}

const ROLES: readonly PodcastRole[] = ['admin', 'contributor'];

export class PodcastRepository extends BaseRepository<Podcast, UpdatePodcastDTO> {
  protected readonly tableName = 'podcasts';
  protected readonly updatableColumns: readonly string[] = [
    'name',
    'slug',
    'description',
    'is_active',
  ];

  constructor(db: Database) {
    super(db);
  }

  create(data: CreatePodcastDTO): Podcast {
    const timestamps = this.createTimestamps();
    const result = this.db
      .prepare(
        `INSERT INTO podcasts (name, slug, description, is_active, created_by, created_at, updated_at)
         VALUES (?, ?, ?, 1, ?, ?, ?)`
      )
      .run(
        data.name,
        data.slug,
        data.description,
        data.created_by,
        timestamps.created_at,
        timestamps.updated_at
      );

    return {
      id: Number(result.lastInsertRowid),
      name: data.name,
      slug: data.slug,
      description: data.description,
      is_active: true,
      created_by: data.created_by,
      ...timestamps,
    };
  }

  slugExists(slug: string, excludeId?: number): boolean {
    const row = this.db
      .prepare('SELECT 1 FROM podcasts WHERE slug = ? AND id != ?')
      .get(slug, excludeId ?? 0);
    return row !== undefined;
  }

  /**
   * Active podcasts the user belongs to, by name, with the user's role.
   */
  findForUser(userId: number): PodcastWithRole[] {
    const rows = this.db
      .prepare(
        `SELECT p.*, m.role AS member_role
         FROM podcasts p
         JOIN podcast_members m ON m.podcast_id = p.id
         WHERE m.user_id = ? AND p.is_active = 1
         ORDER BY p.name COLLATE NOCASE, p.id`
      )
      .all(userId);

    const podcasts: PodcastWithRole[] = [];
    for (const row of rows) {
      if (!isRecord(row)) {
        continue;
      }
      const podcast = this.parseRow(row);
      const role = readEnum(row, 'member_role', ROLES);
      if (podcast && role) {
        podcasts.push({ ...podcast, role });
      }
    }
    return podcasts;
  }

  protected parseRow(data: Record<string, unknown>): Podcast | null {
    const id = readNumber(data, 'id');
    const name = readString(data, 'name');
    const slug = readString(data, 'slug');
    const description = readNullableString(data, 'description');
    const isActive = readFlag(data, 'is_active');
    const createdBy = readNullableNumber(data, 'created_by');
    const createdAt = readString(data, 'created_at');
    const updatedAt = readString(data, 'updated_at');

    if (
      id === null ||
      name === null ||
      slug === null ||
      description === undefined ||
      isActive === null ||
      createdBy === undefined ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }

    return {
      id,
      name,
      slug,
      description,
      is_active: isActive,
      created_by: createdBy,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }
}

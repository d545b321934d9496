import type { Database } from 'better-sqlite3';
import type { PodcastMember, PodcastMemberWithUser, PodcastRole } from '@showdesk/shared';
import { BaseRepository } from './base.repository.js';
import {
  isRecord,
  readEnum,
  readNullableNumber,
  readNumber,
  readString,
} from './row-guards.js';

export interface CreatePodcastMemberDTO {
  podcast_id: number;
  user_id: number;
  role: PodcastRole;
  added_by: number | null;
}

export interface UpdatePodcastMemberDTO {
  role?: PodcastRole;
}

const ROLES: readonly PodcastRole[] = ['admin', 'contributor'];

export class PodcastMemberRepository extends BaseRepository<PodcastMember, UpdatePodcastMemberDTO> {
  protected readonly tableName = 'podcast_members';
  protected readonly updatableColumns: readonly string[] = ['role'];
  protected override includeTimestampOnUpdate = false;

  constructor(db: Database) {
    super(db);
  }

  create(data: CreatePodcastMemberDTO): PodcastMember {
    const createdAt = new Date().toISOString();
    const result = this.db
      .prepare(
        `INSERT INTO podcast_members (podcast_id, user_id, role, added_by, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(data.podcast_id, data.user_id, data.role, data.added_by, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      ...data,
      created_at: createdAt,
    };
  }

  findMembership(podcastId: number, userId: number): PodcastMember | null {
    const row = this.db
      .prepare('SELECT * FROM podcast_members WHERE podcast_id = ? AND user_id = ?')
      .get(podcastId, userId);
    return this.rowToEntity(row);
  }

  findByPodcast(podcastId: number): PodcastMemberWithUser[] {
    const rows = this.db
      .prepare(
        `SELECT m.*, u.email AS user_email, u.name AS user_name
         FROM podcast_members m
         JOIN users u ON u.id = m.user_id
         WHERE m.podcast_id = ?
         ORDER BY m.role, u.name COLLATE NOCASE, m.id`
      )
      .all(podcastId);

    const members: PodcastMemberWithUser[] = [];
    for (const row of rows) {
      if (!isRecord(row)) {
        continue;
      }
      const member = this.parseRow(row);
      const email = readString(row, 'user_email');
      const name = readString(row, 'user_name');
      if (member && email !== null && name !== null) {
        members.push({ ...member, email, name });
      }
    }
    return members;
  }

  countAdmins(podcastId: number): number {
    const count: unknown = this.db
      .prepare("SELECT COUNT(*) FROM podcast_members WHERE podcast_id = ? AND role = 'admin'")
      .pluck()
      .get(podcastId);
    return typeof count === 'number' ? count : 0;
  }

  protected parseRow(data: Record<string, unknown>): PodcastMember | null {
    const id = readNumber(data, 'id');
    const podcastId = readNumber(data, 'podcast_id');
    const userId = readNumber(data, 'user_id');
    const role = readEnum(data, 'role', ROLES);
    const addedBy = readNullableNumber(data, 'added_by');
    const createdAt = readString(data, 'created_at');

    if (
      id === null ||
      podcastId === null ||
      userId === null ||
      role === null ||
      addedBy === undefined ||
      createdAt === null
    ) {
      return null;
    }

    return {
      id,
      podcast_id: podcastId,
      user_id: userId,
      role,
      added_by: addedBy,
      created_at: createdAt,
    };
  }
}

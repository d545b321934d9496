import type { Database } from 'better-sqlite3';
import type { EpisodeGuideItem } from '@showdesk/shared';
import { BaseRepository, type SqlValue } from './base.repository.js';
import {
  isRecord,
  readFlag,
  readJsonStringArray,
  readNullableNumber,
  readNullableString,
  readNumber,
  readString,
} from './row-guards.js';

export interface CreateEpisodeGuideItemDTO {
  guide_id: number;
  section: string;
  title: string;
  links: string[];
  notes: string | null;
  position: number;
}

export interface UpdateEpisodeGuideItemDTO {
  title?: string;
  links?: string[];
  notes?: string | null;
  discussed?: boolean;
  timestamp_seconds?: number | null;
}

/**
 * Item storage. Position maintenance lives in the positioning service;
 * the shift methods here are the single range UPDATEs it composes.
 */
export class EpisodeGuideItemRepository extends BaseRepository<
  EpisodeGuideItem,
  UpdateEpisodeGuideItemDTO
> {
  protected readonly tableName = 'episode_guide_items';
  protected readonly updatableColumns: readonly string[] = [
    'title',
    'links',
    'notes',
    'discussed',
    'timestamp_seconds',
  ];

  constructor(db: Database) {
    super(db);
  }

  create(data: CreateEpisodeGuideItemDTO): EpisodeGuideItem {
    const timestamps = this.createTimestamps();
    const result = this.db
      .prepare(
        `INSERT INTO episode_guide_items (
           guide_id, section, title, links, notes, position, discussed, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, 0, ?, ?)`
      )
      .run(
        data.guide_id,
        data.section,
        data.title,
        JSON.stringify(data.links),
        data.notes,
        data.position,
        timestamps.created_at,
        timestamps.updated_at
      );

    return {
      id: Number(result.lastInsertRowid),
      ...data,
      timestamp_seconds: null,
      discussed: false,
      ...timestamps,
    };
  }

  findInGuide(guideId: number, id: number): EpisodeGuideItem | null {
    const row = this.db
      .prepare('SELECT * FROM episode_guide_items WHERE guide_id = ? AND id = ?')
      .get(guideId, id);
    return this.rowToEntity(row);
  }

  findByGuide(guideId: number): EpisodeGuideItem[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM episode_guide_items
         WHERE guide_id = ?
         ORDER BY section, position, id`
      )
      .all(guideId);
    return this.rowsToEntities(rows);
  }

  findBySection(guideId: number, section: string): EpisodeGuideItem[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM episode_guide_items
         WHERE guide_id = ? AND section = ?
         ORDER BY position, id`
      )
      .all(guideId, section);
    return this.rowsToEntities(rows);
  }

  countInSection(guideId: number, section: string): number {
    const count: unknown = this.db
      .prepare('SELECT COUNT(*) FROM episode_guide_items WHERE guide_id = ? AND section = ?')
      .pluck()
      .get(guideId, section);
    return typeof count === 'number' ? count : 0;
  }

  /**
   * Highest position in the section, or -1 when it is empty.
   */
  maxPosition(guideId: number, section: string): number {
    const max: unknown = this.db
      .prepare(
        'SELECT MAX(position) FROM episode_guide_items WHERE guide_id = ? AND section = ?'
      )
      .pluck()
      .get(guideId, section);
    return typeof max === 'number' ? max : -1;
  }

  /**
   * Item counts per section key, for sections that have items.
   */
  countBySection(guideId: number): Map<string, number> {
    const rows = this.db
      .prepare(
        `SELECT section, COUNT(*) AS item_count FROM episode_guide_items
         WHERE guide_id = ? GROUP BY section`
      )
      .all(guideId);

    const counts = new Map<string, number>();
    for (const row of rows) {
      if (!isRecord(row)) {
        continue;
      }
      const section = readString(row, 'section');
      const count = readNumber(row, 'item_count');
      if (section !== null && count !== null) {
        counts.set(section, count);
      }
    }
    return counts;
  }

  /** position > `after` moves down by one. */
  decrementAfter(guideId: number, section: string, after: number): number {
    return this.db
      .prepare(
        `UPDATE episode_guide_items SET position = position - 1, updated_at = ?
         WHERE guide_id = ? AND section = ? AND position > ?`
      )
      .run(this.updateTimestamp(), guideId, section, after).changes;
  }

  /** position >= `from` moves up by one. */
  incrementFrom(guideId: number, section: string, from: number): number {
    return this.db
      .prepare(
        `UPDATE episode_guide_items SET position = position + 1, updated_at = ?
         WHERE guide_id = ? AND section = ? AND position >= ?`
      )
      .run(this.updateTimestamp(), guideId, section, from).changes;
  }

  /** lower < position <= upper moves down by one. */
  decrementRange(guideId: number, section: string, lower: number, upper: number): number {
    return this.db
      .prepare(
        `UPDATE episode_guide_items SET position = position - 1, updated_at = ?
         WHERE guide_id = ? AND section = ? AND position > ? AND position <= ?`
      )
      .run(this.updateTimestamp(), guideId, section, lower, upper).changes;
  }

  /** lower <= position < upper moves up by one. */
  incrementRange(guideId: number, section: string, lower: number, upper: number): number {
    return this.db
      .prepare(
        `UPDATE episode_guide_items SET position = position + 1, updated_at = ?
         WHERE guide_id = ? AND section = ? AND position >= ? AND position < ?`
      )
      .run(this.updateTimestamp(), guideId, section, lower, upper).changes;
  }

  place(id: number, section: string, position: number): void {
    this.db
      .prepare(
        `UPDATE episode_guide_items SET section = ?, position = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(section, position, this.updateTimestamp(), id);
  }

  /** Positions 0..n-1 in `orderedIds` order, written by a single UPDATE. */
  setPositions(guideId: number, section: string, orderedIds: readonly number[]): number {
    if (orderedIds.length === 0) {
      return 0;
    }
    const cases = orderedIds.map(() => 'WHEN ? THEN ?').join(' ');
    const idList = orderedIds.map(() => '?').join(', ');
    const params: SqlValue[] = [
      ...orderedIds.flatMap((id, index) => [id, index]),
      this.updateTimestamp(),
      guideId,
      section,
      ...orderedIds,
    ];
    return this.db
      .prepare(
        `UPDATE episode_guide_items SET position = CASE id ${cases} END, updated_at = ?
         WHERE guide_id = ? AND section = ? AND id IN (${idList})`
      )
      .run(...params).changes;
  }

  clearRecordingMarks(guideId: number): number {
    return this.db
      .prepare(
        `UPDATE episode_guide_items
         SET timestamp_seconds = NULL, discussed = 0, updated_at = ?
         WHERE guide_id = ?`
      )
      .run(this.updateTimestamp(), guideId).changes;
  }

  /**
   * Copy every item of one guide into another, keeping section and position.
   * Timestamps and discussed flags start cleared.
   */
  copyToGuide(sourceGuideId: number, targetGuideId: number): number {
    const now = this.updateTimestamp();
    return this.db
      .prepare(
        `INSERT INTO episode_guide_items (
           guide_id, section, title, links, notes, position, timestamp_seconds, discussed,
           created_at, updated_at
         )
         SELECT ?, section, title, links, notes, position, NULL, 0, ?, ?
         FROM episode_guide_items
         WHERE guide_id = ?
         ORDER BY section, position, id`
      )
      .run(targetGuideId, now, now, sourceGuideId).changes;
  }

  protected parseRow(data: Record<string, unknown>): EpisodeGuideItem | null {
    const id = readNumber(data, 'id');
    const guideId = readNumber(data, 'guide_id');
    const section = readString(data, 'section');
    const title = readString(data, 'title');
    const links = readJsonStringArray(data, 'links');
    const notes = readNullableString(data, 'notes');
    const position = readNumber(data, 'position');
    const timestampSeconds = readNullableNumber(data, 'timestamp_seconds');
    const discussed = readFlag(data, 'discussed');
    const createdAt = readString(data, 'created_at');
    const updatedAt = readString(data, 'updated_at');

    if (
      id === null ||
      guideId === null ||
      section === null ||
      title === null ||
      links === null ||
      links === undefined ||
      notes === undefined ||
      position === null ||
      timestampSeconds === undefined ||
      discussed === null ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }

    return {
      id,
      guide_id: guideId,
      section,
      title,
      links,
      notes,
      position,
      timestamp_seconds: timestampSeconds,
      discussed,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }
}

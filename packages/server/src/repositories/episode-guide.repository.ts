import type { Database } from 'better-sqlite3';
import type {
  EpisodeGuide,
  EpisodeGuideStats,
  EpisodeGuideStatus,
  SectionDefinition,
} from '@showdesk/shared';
import { BaseRepository, type SqlValue } from './base.repository.js';
import {
  isRecord,
  readEnum,
  readJsonStringArray,
  readNullableNumber,
  readNullableString,
  readNumber,
  readSectionList,
  readString,
} from './row-guards.js';

export interface CreateEpisodeGuideDTO {
  podcast_id: number;
  template_id: number | null;
  title: string;
  episode_number: number | null;
  scheduled_date: string | null;
  notes: string | null;
  previous_poll: string | null;
  previous_poll_link: string | null;
  new_poll: string | null;
  new_poll_link: string | null;
  intro_static_content: string[] | null;
  outro_static_content: string[] | null;
  custom_sections: SectionDefinition[];
}

export type UpdateEpisodeGuideDTO = Partial<
  Omit<CreateEpisodeGuideDTO, 'podcast_id'> & {
    status: EpisodeGuideStatus;
    recording_started_at: string | null;
    recording_ended_at: string | null;
    total_duration_seconds: number | null;
  }
>;

export interface EpisodeGuideFilter {
  status?: EpisodeGuideStatus | undefined;
  search?: string | undefined;
}

export interface EpisodeGuideWithItemCount {
  guide: EpisodeGuide;
  itemCount: number;
}

const STATUSES: readonly EpisodeGuideStatus[] = ['draft', 'recording', 'completed'];

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (match) => `\\${match}`);
}

export class EpisodeGuideRepository extends BaseRepository<EpisodeGuide, UpdateEpisodeGuideDTO> {
  protected readonly tableName = 'episode_guides';
  protected readonly updatableColumns: readonly string[] = [
    'template_id',
    'title',
    'episode_number',
    'scheduled_date',
    'status',
    'recording_started_at',
    'recording_ended_at',
    'total_duration_seconds',
    'notes',
    'previous_poll',
    'previous_poll_link',
    'new_poll',
    'new_poll_link',
    'intro_static_content',
    'outro_static_content',
    'custom_sections',
  ];

  constructor(db: Database) {
    super(db);
  }

  create(data: CreateEpisodeGuideDTO): EpisodeGuide {
    const timestamps = this.createTimestamps();
    const result = this.db
      .prepare(
        `INSERT INTO episode_guides (
           podcast_id, template_id, title, episode_number, scheduled_date, status,
           notes, previous_poll, previous_poll_link, new_poll, new_poll_link,
           intro_static_content, outro_static_content, custom_sections,
           created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, 'draft', ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        data.podcast_id,
        data.template_id,
        data.title,
        data.episode_number,
        data.scheduled_date,
        data.notes,
        data.previous_poll,
        data.previous_poll_link,
        data.new_poll,
        data.new_poll_link,
        this.toColumnValue(data.intro_static_content),
        this.toColumnValue(data.outro_static_content),
        JSON.stringify(data.custom_sections),
        timestamps.created_at,
        timestamps.updated_at
      );

    return {
      id: Number(result.lastInsertRowid),
      ...data,
      status: 'draft',
      recording_started_at: null,
      recording_ended_at: null,
      total_duration_seconds: null,
      ...timestamps,
    };
  }

  findInPodcast(podcastId: number, id: number): EpisodeGuide | null {
    const row = this.db
      .prepare('SELECT * FROM episode_guides WHERE podcast_id = ? AND id = ?')
      .get(podcastId, id);
    return this.rowToEntity(row);
  }

  findByEpisodeNumber(podcastId: number, episodeNumber: number): EpisodeGuide | null {
    const row = this.db
      .prepare(
        `SELECT * FROM episode_guides
         WHERE podcast_id = ? AND episode_number = ?
         ORDER BY created_at DESC, id DESC LIMIT 1`
      )
      .get(podcastId, episodeNumber);
    return this.rowToEntity(row);
  }

  findByTemplate(templateId: number): EpisodeGuide[] {
    const rows = this.db
      .prepare('SELECT * FROM episode_guides WHERE template_id = ? ORDER BY id')
      .all(templateId);
    return this.rowsToEntities(rows);
  }

  private buildFilter(
    podcastId: number,
    filter: EpisodeGuideFilter
  ): { where: string; params: SqlValue[] } {
    const clauses = ['g.podcast_id = ?'];
    const params: SqlValue[] = [podcastId];

    if (filter.status) {
      clauses.push('g.status = ?');
      params.push(filter.status);
    }

    if (filter.search) {
      const pattern = `%${escapeLike(filter.search)}%`;
      clauses.push(`(
        g.title LIKE ? ESCAPE '\\' OR g.notes LIKE ? ESCAPE '\\'
        OR g.previous_poll LIKE ? ESCAPE '\\' OR g.new_poll LIKE ? ESCAPE '\\'
        OR EXISTS (
          SELECT 1 FROM episode_guide_items i
          WHERE i.guide_id = g.id
            AND (i.title LIKE ? ESCAPE '\\' OR i.notes LIKE ? ESCAPE '\\' OR i.links LIKE ? ESCAPE '\\')
        )
      )`);
      params.push(pattern, pattern, pattern, pattern, pattern, pattern, pattern);
    }

    return { where: clauses.join(' AND '), params };
  }

  /**
   * Newest first, each with its item count.
   */
  list(
    podcastId: number,
    filter: EpisodeGuideFilter,
    limit: number,
    offset: number
  ): EpisodeGuideWithItemCount[] {
    const { where, params } = this.buildFilter(podcastId, filter);
    const rows = this.db
      .prepare(
        `SELECT g.*,
           (SELECT COUNT(*) FROM episode_guide_items i WHERE i.guide_id = g.id) AS item_count
         FROM episode_guides g
         WHERE ${where}
         ORDER BY g.created_at DESC, g.id DESC
         LIMIT ? OFFSET ?`
      )
      .all(...params, limit, offset);

    const guides: EpisodeGuideWithItemCount[] = [];
    for (const row of rows) {
      if (!isRecord(row)) {
        continue;
      }
      const guide = this.parseRow(row);
      if (guide) {
        guides.push({ guide, itemCount: readNumber(row, 'item_count') ?? 0 });
      }
    }
    return guides;
  }

  countMatching(podcastId: number, filter: EpisodeGuideFilter): number {
    const { where, params } = this.buildFilter(podcastId, filter);
    const count: unknown = this.db
      .prepare(`SELECT COUNT(*) FROM episode_guides g WHERE ${where}`)
      .pluck()
      .get(...params);
    return typeof count === 'number' ? count : 0;
  }

  getStats(podcastId: number): EpisodeGuideStats {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS total,
           COALESCE(SUM(CASE WHEN status = 'draft' THEN 1 ELSE 0 END), 0) AS drafts,
           COALESCE(SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END), 0) AS completed
         FROM episode_guides WHERE podcast_id = ?`
      )
      .get(podcastId);

    if (!isRecord(row)) {
      return { total: 0, drafts: 0, completed: 0 };
    }
    return {
      total: readNumber(row, 'total') ?? 0,
      drafts: readNumber(row, 'drafts') ?? 0,
      completed: readNumber(row, 'completed') ?? 0,
    };
  }

  protected parseRow(data: Record<string, unknown>): EpisodeGuide | null {
    const id = readNumber(data, 'id');
    const podcastId = readNumber(data, 'podcast_id');
    const templateId = readNullableNumber(data, 'template_id');
    const title = readString(data, 'title');
    const episodeNumber = readNullableNumber(data, 'episode_number');
    const scheduledDate = readNullableString(data, 'scheduled_date');
    const status = readEnum(data, 'status', STATUSES);
    const startedAt = readNullableString(data, 'recording_started_at');
    const endedAt = readNullableString(data, 'recording_ended_at');
    const duration = readNullableNumber(data, 'total_duration_seconds');
    const notes = readNullableString(data, 'notes');
    const previousPoll = readNullableString(data, 'previous_poll');
    const previousPollLink = readNullableString(data, 'previous_poll_link');
    const newPoll = readNullableString(data, 'new_poll');
    const newPollLink = readNullableString(data, 'new_poll_link');
    const introContent = readJsonStringArray(data, 'intro_static_content');
    const outroContent = readJsonStringArray(data, 'outro_static_content');
    const customSections = readSectionList(data, 'custom_sections');
    const createdAt = readString(data, 'created_at');
    const updatedAt = readString(data, 'updated_at');

    if (
      id === null ||
      podcastId === null ||
      templateId === undefined ||
      title === null ||
      episodeNumber === undefined ||
      scheduledDate === undefined ||
      status === null ||
      startedAt === undefined ||
      endedAt === undefined ||
      duration === undefined ||
      notes === undefined ||
      previousPoll === undefined ||
      previousPollLink === undefined ||
      newPoll === undefined ||
      newPollLink === undefined ||
      introContent === undefined ||
      outroContent === undefined ||
      customSections === null ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }

    return {
      id,
      podcast_id: podcastId,
      template_id: templateId,
      title,
      episode_number: episodeNumber,
      scheduled_date: scheduledDate,
      status,
      recording_started_at: startedAt,
      recording_ended_at: endedAt,
      total_duration_seconds: duration,
      notes,
      previous_poll: previousPoll,
      previous_poll_link: previousPollLink,
      new_poll: newPoll,
      new_poll_link: newPollLink,
      intro_static_content: introContent,
      outro_static_content: outroContent,
      custom_sections: customSections,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }
}

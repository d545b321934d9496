import type { Database } from 'better-sqlite3';
import type { EpisodeGuideTemplate, SectionDefinition } from '@showdesk/shared';
import { BaseRepository } from './base.repository.js';
import {
  readFlag,
  readJsonStringArray,
  readNullableNumber,
  readNullableString,
  readNumber,
  readSectionList,
  readString,
} from './row-guards.js';

export interface CreateTemplateDTO {
  podcast_id: number;
  name: string;
  description: string | null;
  intro_static_content: string[] | null;
  outro_static_content: string[] | null;
  default_sections: SectionDefinition[];
  default_poll_1: string | null;
  default_poll_2: string | null;
  is_default: boolean;
  created_by: number | null;
}

export type UpdateTemplateDTO = Partial<
  Omit<CreateTemplateDTO, 'podcast_id' | 'created_by'>
>;

export class EpisodeGuideTemplateRepository extends BaseRepository<
  EpisodeGuideTemplate,
  UpdateTemplateDTO
> {
  protected readonly tableName = 'episode_guide_templates';
  protected readonly updatableColumns: readonly string[] = [
    'name',
    'description',
    'intro_static_content',
    'outro_static_content',
    'default_sections',
    'default_poll_1',
    'default_poll_2',
    'is_default',
  ];

  constructor(db: Database) {
    super(db);
  }

  create(data: CreateTemplateDTO): EpisodeGuideTemplate {
    const timestamps = this.createTimestamps();
    const result = this.db
      .prepare(
        `INSERT INTO episode_guide_templates (
           podcast_id, name, description, intro_static_content, outro_static_content,
           default_sections, default_poll_1, default_poll_2, is_default, created_by,
           created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        data.podcast_id,
        data.name,
        data.description,
        this.toColumnValue(data.intro_static_content),
        this.toColumnValue(data.outro_static_content),
        JSON.stringify(data.default_sections),
        data.default_poll_1,
        data.default_poll_2,
        data.is_default ? 1 : 0,
        data.created_by,
        timestamps.created_at,
        timestamps.updated_at
      );

    return {
      id: Number(result.lastInsertRowid),
      ...data,
      ...timestamps,
    };
  }

  findInPodcast(podcastId: number, id: number): EpisodeGuideTemplate | null {
    const row = this.db
      .prepare('SELECT * FROM episode_guide_templates WHERE podcast_id = ? AND id = ?')
      .get(podcastId, id);
    return this.rowToEntity(row);
  }

  /**
   * Default template first, then by name.
   */
  findByPodcast(podcastId: number): EpisodeGuideTemplate[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM episode_guide_templates
         WHERE podcast_id = ?
         ORDER BY is_default DESC, name COLLATE NOCASE, id`
      )
      .all(podcastId);
    return this.rowsToEntities(rows);
  }

  findDefault(podcastId: number): EpisodeGuideTemplate | null {
    const row = this.db
      .prepare(
        `SELECT * FROM episode_guide_templates
         WHERE podcast_id = ? AND is_default = 1
         ORDER BY id LIMIT 1`
      )
      .get(podcastId);
    return this.rowToEntity(row);
  }

  clearDefault(podcastId: number, exceptId: number): void {
    this.db
      .prepare(
        `UPDATE episode_guide_templates
         SET is_default = 0, updated_at = ?
         WHERE podcast_id = ? AND id != ? AND is_default = 1`
      )
      .run(this.updateTimestamp(), podcastId, exceptId);
  }

  protected parseRow(data: Record<string, unknown>): EpisodeGuideTemplate | null {
    const id = readNumber(data, 'id');
    const podcastId = readNumber(data, 'podcast_id');
    const name = readString(data, 'name');
    const description = readNullableString(data, 'description');
    const introContent = readJsonStringArray(data, 'intro_static_content');
    const outroContent = readJsonStringArray(data, 'outro_static_content');
    const defaultSections = readSectionList(data, 'default_sections');
    const defaultPoll1 = readNullableString(data, 'default_poll_1');
    const defaultPoll2 = readNullableString(data, 'default_poll_2');
    const isDefault = readFlag(data, 'is_default');
    const createdBy = readNullableNumber(data, 'created_by');
    const createdAt = readString(data, 'created_at');
    const updatedAt = readString(data, 'updated_at');

    if (
      id === null ||
      podcastId === null ||
      name === null ||
      description === undefined ||
      introContent === undefined ||
      outroContent === undefined ||
      defaultSections === null ||
      defaultPoll1 === undefined ||
      defaultPoll2 === undefined ||
      isDefault === null ||
      createdBy === undefined ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }

    return {
      id,
      podcast_id: podcastId,
      name,
      description,
      intro_static_content: introContent,
      outro_static_content: outroContent,
      default_sections: defaultSections,
      default_poll_1: defaultPoll1,
      default_poll_2: defaultPoll2,
      is_default: isDefault,
      created_by: createdBy,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }
}

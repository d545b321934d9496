import type { Database } from 'better-sqlite3';
import type {
  CreateTemplateInput,
  EpisodeGuideTemplate,
  UpdateTemplateInput,
} from '@showdesk/shared';
import {
  EpisodeGuideItemRepository,
  EpisodeGuideRepository,
  EpisodeGuideTemplateRepository,
} from '../repositories/index.js';
import { runInTransaction } from '../db/transaction.js';
import { ConflictError, NotFoundError } from '../types/errors.js';

export class TemplateService {
  private db: Database;
  private templateRepo: EpisodeGuideTemplateRepository;
  private guideRepo: EpisodeGuideRepository;
  private itemRepo: EpisodeGuideItemRepository;

  constructor(db: Database) {
    this.db = db;
    this.templateRepo = new EpisodeGuideTemplateRepository(db);
    this.guideRepo = new EpisodeGuideRepository(db);
    this.itemRepo = new EpisodeGuideItemRepository(db);
  }

  list(podcastId: number): EpisodeGuideTemplate[] {
    return this.templateRepo.findByPodcast(podcastId);
  }

  getById(podcastId: number, id: number): EpisodeGuideTemplate {
    const template = this.templateRepo.findInPodcast(podcastId, id);
    if (!template) {
      throw new NotFoundError('Template', id);
    }
    return template;
  }

  create(podcastId: number, userId: number, input: CreateTemplateInput): EpisodeGuideTemplate {
    return runInTransaction(this.db, () => {
      const template = this.templateRepo.create({
        podcast_id: podcastId,
        name: input.name,
        description: input.description ?? null,
        intro_static_content: input.intro_static_content ?? null,
        outro_static_content: input.outro_static_content ?? null,
        default_sections: input.default_sections,
        default_poll_1: input.default_poll_1 ?? null,
        default_poll_2: input.default_poll_2 ?? null,
        is_default: input.is_default,
        created_by: userId,
      });
      if (template.is_default) {
        this.templateRepo.clearDefault(podcastId, template.id);
      }
      return template;
    });
  }

  /**
   * Sections the template would stop providing that a guide using it still
   * has items in. A guide's own custom section of the same key keeps it valid.
   */
  private findSectionsInUse(
    templateId: number,
    removedKeys: ReadonlySet<string>
  ): Map<string, number> {
    const inUse = new Map<string, number>();
    if (removedKeys.size === 0) {
      return inUse;
    }

    for (const guide of this.guideRepo.findByTemplate(templateId)) {
      const customKeys = new Set(guide.custom_sections.map((section) => section.key));
      for (const [section, count] of this.itemRepo.countBySection(guide.id)) {
        if (removedKeys.has(section) && !customKeys.has(section)) {
          inUse.set(section, (inUse.get(section) ?? 0) + count);
        }
      }
    }
    return inUse;
  }

  private assertSectionsUnused(templateId: number, keys: ReadonlySet<string>): void {
    const inUse = this.findSectionsInUse(templateId, keys);
    if (inUse.size > 0) {
      const names = [...inUse.keys()].map((key) => `"${key}"`).join(', ');
      throw new ConflictError(`Sections still have items in guides using this template: ${names}`, {
        sections: Object.fromEntries(inUse),
      });
    }
  }

  update(template: EpisodeGuideTemplate, input: UpdateTemplateInput): EpisodeGuideTemplate {
    return runInTransaction(this.db, () => {
      if (input.default_sections !== undefined) {
        const nextKeys = new Set(input.default_sections.map((section) => section.key));
        const removedKeys = new Set(
          template.default_sections
            .map((section) => section.key)
            .filter((key) => !nextKeys.has(key))
        );
        this.assertSectionsUnused(template.id, removedKeys);
      }

      const updated = this.templateRepo.update(template.id, input);
      if (!updated) {
        throw new NotFoundError('Template', template.id);
      }
      if (input.is_default === true) {
        this.templateRepo.clearDefault(updated.podcast_id, updated.id);
      }
      return updated;
    });
  }

  /**
   * Guides using the template fall back to builtin and custom sections, so
   * the template may only go once none of its sections hold items.
   */
  delete(template: EpisodeGuideTemplate): void {
    runInTransaction(this.db, () => {
      this.assertSectionsUnused(
        template.id,
        new Set(template.default_sections.map((section) => section.key))
      );
      this.templateRepo.delete(template.id);
    });
  }
}

import type { Database } from 'better-sqlite3';
import {
  DEFAULT_SECTION_COLOR,
  deriveSectionKey,
  isBuiltinSection,
  type AddSectionInput,
  type AddSectionResult,
  type CatalogSection,
  type EpisodeGuide,
  type SectionDefinition,
} from '@showdesk/shared';
import { EpisodeGuideItemRepository, EpisodeGuideRepository } from '../repositories/index.js';
import { runInTransaction } from '../db/transaction.js';
import { ConflictError, NotFoundError, ValidationError } from '../types/errors.js';
import type { RequestCache } from './request-cache.js';
import { SectionCatalogService } from './section-catalog.service.js';

export class SectionService {
  private db: Database;
  private guideRepo: EpisodeGuideRepository;
  private itemRepo: EpisodeGuideItemRepository;
  private catalog: SectionCatalogService;

  constructor(db: Database) {
    this.db = db;
    this.guideRepo = new EpisodeGuideRepository(db);
    this.itemRepo = new EpisodeGuideItemRepository(db);
    this.catalog = new SectionCatalogService(db);
  }

  private reload(guide: EpisodeGuide): EpisodeGuide {
    const current = this.guideRepo.findById(guide.id);
    if (!current) {
      throw new NotFoundError('Episode guide', guide.id);
    }
    return current;
  }

  listSections(guide: EpisodeGuide, cache?: RequestCache): CatalogSection[] {
    return this.catalog.getCatalog(guide, cache);
  }

  /**
   * Append a custom section. Its key is derived from the name and made
   * unique against every section the guide already has.
   */
  addCustomSection(
    guide: EpisodeGuide,
    input: AddSectionInput,
    cache?: RequestCache
  ): AddSectionResult {
    return runInTransaction(this.db, () => {
      const current = this.reload(guide);
      const key = deriveSectionKey(input.name, this.catalog.getValidKeys(current, cache));
      if (key === '') {
        throw new ValidationError('Section name must contain at least one letter or digit');
      }

      const section: SectionDefinition = {
        key,
        name: input.name,
        parent: input.parent ?? null,
        color: input.color ?? DEFAULT_SECTION_COLOR,
      };

      const updated = this.guideRepo.update(current.id, {
        custom_sections: [...current.custom_sections, section],
      });
      if (!updated) {
        throw new NotFoundError('Episode guide', current.id);
      }

      return { section, all_sections: this.catalog.getCatalog(updated, cache) };
    });
  }

  /**
   * Remove a custom section. Builtin and template sections cannot be
   * removed, and a section that still holds items is left alone.
   */
  deleteCustomSection(guide: EpisodeGuide, key: string, cache?: RequestCache): void {
    if (isBuiltinSection(key)) {
      throw new ValidationError(`Built-in section "${key}" cannot be deleted`);
    }

    runInTransaction(this.db, () => {
      const current = this.reload(guide);
      const templateSections = this.catalog.getTemplate(current, cache)?.default_sections ?? [];
      if (templateSections.some((section) => section.key === key)) {
        throw new ValidationError(
          `Section "${key}" comes from the guide's template and cannot be deleted here`
        );
      }

      if (!current.custom_sections.some((section) => section.key === key)) {
        throw new NotFoundError('Section', key);
      }

      const itemCount = this.itemRepo.countInSection(current.id, key);
      if (itemCount > 0) {
        throw new ConflictError(
          `Section "${key}" still has ${itemCount} item${itemCount === 1 ? '' : 's'}; move or delete them first`,
          { item_count: itemCount }
        );
      }

      this.guideRepo.update(current.id, {
        custom_sections: current.custom_sections.filter((section) => section.key !== key),
      });
    });
  }
}

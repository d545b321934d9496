import type { Database } from 'better-sqlite3';
import {
  buildSectionCatalog,
  type CatalogSection,
  type EpisodeGuide,
  type EpisodeGuideTemplate,
} from '@showdesk/shared';
import { EpisodeGuideTemplateRepository } from '../repositories/index.js';
import { InvalidSectionError } from '../types/errors.js';
import type { RequestCache } from './request-cache.js';

/**
 * Resolves the sections valid for a guide: builtins, then the guide's
 * template defaults, then the guide's own custom sections.
 */
export class SectionCatalogService {
  private templateRepo: EpisodeGuideTemplateRepository;

  constructor(db: Database) {
    this.templateRepo = new EpisodeGuideTemplateRepository(db);
  }

  getTemplate(guide: EpisodeGuide, cache?: RequestCache): EpisodeGuideTemplate | null {
    const templateId = guide.template_id;
    if (templateId === null) {
      return null;
    }
    const load = (): EpisodeGuideTemplate | null => this.templateRepo.findById(templateId);
    return cache ? cache.template(templateId, load) : load();
  }

  getCatalog(guide: EpisodeGuide, cache?: RequestCache): CatalogSection[] {
    const template = this.getTemplate(guide, cache);
    return buildSectionCatalog(template?.default_sections ?? [], guide.custom_sections);
  }

  getValidKeys(guide: EpisodeGuide, cache?: RequestCache): Set<string> {
    return new Set(this.getCatalog(guide, cache).map((section) => section.key));
  }

  assertValidSection(guide: EpisodeGuide, section: string, cache?: RequestCache): void {
    if (!this.getValidKeys(guide, cache).has(section)) {
      throw new InvalidSectionError(section);
    }
  }
}

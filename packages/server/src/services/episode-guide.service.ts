import type { Database } from 'better-sqlite3';
import {
  formatDuration,
  type CreateEpisodeGuideInput,
  type EpisodeGuide,
  type EpisodeGuideDetail,
  type EpisodeGuideItemWithTimestamp,
  type EpisodeGuideListResult,
  type EpisodeGuideSummary,
  type EpisodeGuideTemplate,
  type ListEpisodeGuidesQuery,
  type UpdateEpisodeGuideInput,
  type UpdateStaticContentInput,
} from '@showdesk/shared';
import {
  EpisodeGuideItemRepository,
  EpisodeGuideRepository,
  EpisodeGuideTemplateRepository,
  type UpdateEpisodeGuideDTO,
} from '../repositories/index.js';
import { runInTransaction } from '../db/transaction.js';
import { NotFoundError } from '../types/errors.js';
import { withFormattedTimestamp } from './episode-guide-item.service.js';
import type { RequestCache } from './request-cache.js';
import { SectionCatalogService } from './section-catalog.service.js';

interface PreviousPoll {
  previous_poll: string;
  previous_poll_link: string | null;
}

function toSummary(guide: EpisodeGuide, itemCount: number): EpisodeGuideSummary {
  return {
    ...guide,
    formatted_duration: formatDuration(guide.total_duration_seconds),
    item_count: itemCount,
  };
}

export class EpisodeGuideService {
  private db: Database;
  private guideRepo: EpisodeGuideRepository;
  private itemRepo: EpisodeGuideItemRepository;
  private templateRepo: EpisodeGuideTemplateRepository;
  private catalog: SectionCatalogService;

  constructor(db: Database) {
    this.db = db;
    this.guideRepo = new EpisodeGuideRepository(db);
    this.itemRepo = new EpisodeGuideItemRepository(db);
    this.templateRepo = new EpisodeGuideTemplateRepository(db);
    this.catalog = new SectionCatalogService(db);
  }

  list(podcastId: number, query: ListEpisodeGuidesQuery): EpisodeGuideListResult {
    const filter = { status: query.status, search: query.search || undefined };
    const offset = (query.page - 1) * query.per_page;

    const guides = this.guideRepo
      .list(podcastId, filter, query.per_page, offset)
      .map(({ guide, itemCount }) => toSummary(guide, itemCount));

    return {
      guides,
      page: query.page,
      per_page: query.per_page,
      total_matches: this.guideRepo.countMatching(podcastId, filter),
      stats: this.guideRepo.getStats(podcastId),
    };
  }

  getById(podcastId: number, id: number): EpisodeGuide {
    const guide = this.guideRepo.findInPodcast(podcastId, id);
    if (!guide) {
      throw new NotFoundError('Episode guide', id);
    }
    return guide;
  }

  /**
   * The guide with its catalog sections, each holding its items in order.
   * Intro/outro content falls back to the template's.
   */
  getDetail(guide: EpisodeGuide, cache?: RequestCache): EpisodeGuideDetail {
    const template = this.catalog.getTemplate(guide, cache);
    const items = this.itemRepo.findByGuide(guide.id).map(withFormattedTimestamp);

    const bySection = new Map<string, EpisodeGuideItemWithTimestamp[]>();
    for (const item of items) {
      const sectionItems = bySection.get(item.section) ?? [];
      sectionItems.push(item);
      bySection.set(item.section, sectionItems);
    }

    return {
      ...toSummary(guide, items.length),
      template_name: template?.name ?? null,
      intro_content: guide.intro_static_content ?? template?.intro_static_content ?? [],
      outro_content: guide.outro_static_content ?? template?.outro_static_content ?? [],
      sections: this.catalog.getCatalog(guide, cache).map((section) => ({
        ...section,
        items: bySection.get(section.key) ?? [],
      })),
    };
  }

  /**
   * The new poll of the podcast's previous episode, if it has one.
   */
  private findPreviousPoll(podcastId: number, episodeNumber: number | null): PreviousPoll | null {
    if (episodeNumber === null || episodeNumber <= 1) {
      return null;
    }
    const previous = this.guideRepo.findByEpisodeNumber(podcastId, episodeNumber - 1);
    if (!previous?.new_poll) {
      return null;
    }
    return { previous_poll: previous.new_poll, previous_poll_link: previous.new_poll_link };
  }

  private resolveTemplate(
    podcastId: number,
    templateId: number | null | undefined
  ): EpisodeGuideTemplate | null {
    if (templateId === null) {
      return null;
    }
    if (templateId === undefined) {
      return this.templateRepo.findDefault(podcastId);
    }
    const template = this.templateRepo.findInPodcast(podcastId, templateId);
    if (!template) {
      throw new NotFoundError('Template', templateId);
    }
    return template;
  }

  create(podcastId: number, input: CreateEpisodeGuideInput): EpisodeGuide {
    const template = this.resolveTemplate(podcastId, input.template_id);
    const episodeNumber = input.episode_number ?? null;
    const previousPoll = this.findPreviousPoll(podcastId, episodeNumber);

    return this.guideRepo.create({
      podcast_id: podcastId,
      template_id: template?.id ?? null,
      title: input.title,
      episode_number: episodeNumber,
      scheduled_date: input.scheduled_date ?? null,
      notes: input.notes ?? null,
      previous_poll: previousPoll?.previous_poll ?? null,
      previous_poll_link: previousPoll?.previous_poll_link ?? null,
      new_poll: template?.default_poll_1 ?? null,
      new_poll_link: null,
      intro_static_content: template?.intro_static_content ?? null,
      outro_static_content: template?.outro_static_content ?? null,
      custom_sections: [],
    });
  }

  /**
   * Update metadata. Changing the episode number fills in the previous
   * poll when the guide does not have one yet.
   */
  update(guide: EpisodeGuide, input: UpdateEpisodeGuideInput): EpisodeGuide {
    const update: UpdateEpisodeGuideDTO = { ...input };

    const numberChanged =
      input.episode_number !== undefined && input.episode_number !== guide.episode_number;
    const previousPollEmpty =
      input.previous_poll === undefined ? !guide.previous_poll : !input.previous_poll;

    if (numberChanged && previousPollEmpty) {
      const previousPoll = this.findPreviousPoll(guide.podcast_id, input.episode_number ?? null);
      if (previousPoll) {
        update.previous_poll = previousPoll.previous_poll;
        update.previous_poll_link = previousPoll.previous_poll_link;
      }
    }

    const updated = this.guideRepo.update(guide.id, update);
    if (!updated) {
      throw new NotFoundError('Episode guide', guide.id);
    }
    return updated;
  }

  updateStaticContent(guide: EpisodeGuide, input: UpdateStaticContentInput): EpisodeGuide {
    const updated = this.guideRepo.update(guide.id, {
      intro_static_content: input.intro_static_content,
      outro_static_content: input.outro_static_content,
    });
    if (!updated) {
      throw new NotFoundError('Episode guide', guide.id);
    }
    return updated;
  }

  /**
   * New draft with the same template, custom sections and items. Item
   * timestamps and discussed flags are not carried over.
   */
  copy(guide: EpisodeGuide): EpisodeGuide {
    return runInTransaction(this.db, () => {
      const copy = this.guideRepo.create({
        podcast_id: guide.podcast_id,
        template_id: guide.template_id,
        title: `Copy of ${guide.title}`,
        episode_number: guide.episode_number === null ? null : guide.episode_number + 1,
        scheduled_date: null,
        notes: null,
        previous_poll: null,
        previous_poll_link: null,
        new_poll: null,
        new_poll_link: null,
        intro_static_content: null,
        outro_static_content: null,
        custom_sections: guide.custom_sections,
      });
      this.itemRepo.copyToGuide(guide.id, copy.id);
      return copy;
    });
  }

  delete(guide: EpisodeGuide): void {
    this.guideRepo.delete(guide.id);
  }
}

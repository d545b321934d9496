import type { Database } from 'better-sqlite3';
import {
  formatDuration,
  type CreateItemInput,
  type EpisodeGuide,
  type EpisodeGuideItem,
  type EpisodeGuideItemWithTimestamp,
  type MoveItemInput,
  type MoveItemResult,
  type PositionIssue,
  type ReorderItemsInput,
  type UpdateItemInput,
} from '@showdesk/shared';
import { EpisodeGuideItemRepository } from '../repositories/index.js';
import { runInTransaction } from '../db/transaction.js';
import { InvalidPositionError, NotFoundError } from '../types/errors.js';
import type { RequestCache } from './request-cache.js';
import { SectionCatalogService } from './section-catalog.service.js';

export function withFormattedTimestamp(item: EpisodeGuideItem): EpisodeGuideItemWithTimestamp {
  return { ...item, formatted_timestamp: formatDuration(item.timestamp_seconds) };
}

/**
 * Links arrive as an array or as newline-separated text. Blank entries are dropped.
 */
export function normalizeLinks(links: string[] | string | null | undefined): string[] {
  if (links === null || links === undefined) {
    return [];
  }
  const entries = typeof links === 'string' ? links.split('\n') : links;
  return entries.map((link) => link.trim()).filter((link) => link.length > 0);
}

function toPosition(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InvalidPositionError();
  }
  return value;
}

/**
 * Item lifecycle within a guide. Positions in every (guide, section) stay
 * dense and zero-based: every mutation that changes positions reads the
 * item and runs its range UPDATEs inside one immediate transaction.
 */
export class EpisodeGuideItemService {
  private db: Database;
  private itemRepo: EpisodeGuideItemRepository;
  private catalog: SectionCatalogService;

  constructor(db: Database) {
    this.db = db;
    this.itemRepo = new EpisodeGuideItemRepository(db);
    this.catalog = new SectionCatalogService(db);
  }

  list(guide: EpisodeGuide): EpisodeGuideItemWithTimestamp[] {
    return this.itemRepo.findByGuide(guide.id).map(withFormattedTimestamp);
  }

  getById(guide: EpisodeGuide, itemId: number): EpisodeGuideItem {
    const item = this.itemRepo.findInGuide(guide.id, itemId);
    if (!item) {
      throw new NotFoundError('Item', itemId);
    }
    return item;
  }

  /**
   * Append a new item to the end of its section.
   */
  create(
    guide: EpisodeGuide,
    input: CreateItemInput,
    cache?: RequestCache
  ): EpisodeGuideItemWithTimestamp {
    this.catalog.assertValidSection(guide, input.section, cache);

    const links = input.links !== undefined ? normalizeLinks(input.links) : normalizeLinks(input.link);

    const item = runInTransaction(this.db, () =>
      this.itemRepo.create({
        guide_id: guide.id,
        section: input.section,
        title: input.title,
        links,
        notes: input.notes ?? null,
        position: this.itemRepo.maxPosition(guide.id, input.section) + 1,
      })
    );
    return withFormattedTimestamp(item);
  }

  /**
   * Update item fields. A `section` or `position` in the input is applied
   * as a move in the same transaction.
   */
  update(
    guide: EpisodeGuide,
    itemId: number,
    input: UpdateItemInput,
    cache?: RequestCache
  ): EpisodeGuideItemWithTimestamp {
    if (input.section !== undefined) {
      this.catalog.assertValidSection(guide, input.section, cache);
    }
    const position = input.position === undefined ? undefined : toPosition(input.position);

    const updated = runInTransaction(this.db, () => {
      const item = this.getById(guide, itemId);
      this.itemRepo.update(item.id, {
        title: input.title,
        links: input.links !== undefined ? normalizeLinks(input.links) : undefined,
        notes: input.notes,
        discussed: input.discussed,
        timestamp_seconds: input.timestamp_seconds,
      });

      if (input.section !== undefined || position !== undefined) {
        const targetSection = input.section ?? item.section;
        const targetPosition =
          position ?? (targetSection === item.section ? item.position : Number.MAX_SAFE_INTEGER);
        this.applyMove(item, targetSection, targetPosition);
      }

      return this.getById(guide, item.id);
    });
    return withFormattedTimestamp(updated);
  }

  /**
   * Delete an item and close the gap it leaves in its section.
   */
  delete(guide: EpisodeGuide, itemId: number): void {
    runInTransaction(this.db, () => {
      const item = this.getById(guide, itemId);
      this.itemRepo.delete(item.id);
      this.itemRepo.decrementAfter(guide.id, item.section, item.position);
    });
  }

  /**
   * Move an item to `target_section` at `target_position`. A target past the
   * end of the section lands at the end.
   */
  move(guide: EpisodeGuide, input: MoveItemInput, cache?: RequestCache): MoveItemResult {
    this.catalog.assertValidSection(guide, input.target_section, cache);
    const targetPosition = toPosition(input.target_position);

    return runInTransaction(this.db, () => {
      const item = this.getById(guide, input.item_id);
      this.applyMove(item, input.target_section, targetPosition);
      const moved = this.getById(guide, item.id);
      return {
        item: withFormattedTimestamp(moved),
        old_section: item.section,
        new_section: moved.section,
      };
    });
  }

  /**
   * Set a section's order from the full list of its item ids.
   */
  reorder(
    guide: EpisodeGuide,
    input: ReorderItemsInput,
    cache?: RequestCache
  ): EpisodeGuideItemWithTimestamp[] {
    this.catalog.assertValidSection(guide, input.section, cache);

    const items = runInTransaction(this.db, () => {
      const current = this.itemRepo.findBySection(guide.id, input.section);
      const currentIds = new Set(current.map((item) => item.id));
      const requestedIds = new Set(input.item_ids);

      if (
        requestedIds.size !== input.item_ids.length ||
        requestedIds.size !== currentIds.size ||
        input.item_ids.some((id) => !currentIds.has(id))
      ) {
        throw new InvalidPositionError(
          `item_ids must list each item in section "${input.section}" exactly once`
        );
      }

      this.itemRepo.setPositions(guide.id, input.section, input.item_ids);
      return this.itemRepo.findBySection(guide.id, input.section);
    });
    return items.map(withFormattedTimestamp);
  }

  /**
   * Items whose stored position differs from their rank in the section.
   */
  auditPositions(guide: EpisodeGuide): PositionIssue[] {
    const bySection = new Map<string, EpisodeGuideItem[]>();
    for (const item of this.itemRepo.findByGuide(guide.id)) {
      const sectionItems = bySection.get(item.section) ?? [];
      sectionItems.push(item);
      bySection.set(item.section, sectionItems);
    }

    const issues: PositionIssue[] = [];
    for (const [section, items] of bySection) {
      items.forEach((item, index) => {
        if (item.position !== index) {
          issues.push({
            section,
            item_id: item.id,
            current_position: item.position,
            expected_position: index,
          });
        }
      });
    }
    return issues;
  }

  /**
   * Renumber every section to its rank order. Returns how many items changed.
   */
  normalizePositions(guide: EpisodeGuide): number {
    return runInTransaction(this.db, () => {
      const issues = this.auditPositions(guide);
      for (const issue of issues) {
        this.itemRepo.place(issue.item_id, issue.section, issue.expected_position);
      }
      return issues.length;
    });
  }

  /**
   * Shift the source and destination ranges, then write the item's own
   * placement. Must run inside a transaction.
   */
  private applyMove(item: EpisodeGuideItem, targetSection: string, requested: number): void {
    const guideId = item.guide_id;
    const oldPosition = item.position;

    if (targetSection !== item.section) {
      const target = Math.min(requested, this.itemRepo.countInSection(guideId, targetSection));
      this.itemRepo.decrementAfter(guideId, item.section, oldPosition);
      this.itemRepo.incrementFrom(guideId, targetSection, target);
      this.itemRepo.place(item.id, targetSection, target);
      return;
    }

    const lastPosition = this.itemRepo.countInSection(guideId, targetSection) - 1;
    const target = Math.min(requested, lastPosition);
    if (target === oldPosition) {
      return;
    }

    if (target > oldPosition) {
      this.itemRepo.decrementRange(guideId, targetSection, oldPosition, target);
    } else {
      this.itemRepo.incrementRange(guideId, targetSection, target, oldPosition);
    }
    this.itemRepo.place(item.id, targetSection, target);
  }
}

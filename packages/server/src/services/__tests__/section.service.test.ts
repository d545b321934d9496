import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { EpisodeGuide } from '@showdesk/shared';
import { SectionService } from '../section.service.js';
import { EpisodeGuideService } from '../episode-guide.service.js';
import { EpisodeGuideItemService } from '../episode-guide-item.service.js';
import { TemplateService } from '../template.service.js';
import { createTestDatabase } from '../../test/test-app.js';
import { createGuideFixture } from '../../test/fixtures.js';
import { ConflictError, NotFoundError, ValidationError } from '../../types/errors.js';

describe('SectionService', () => {
  let db: Database.Database;
  let service: SectionService;
  let guides: EpisodeGuideService;
  let guide: EpisodeGuide;

  function refresh(): EpisodeGuide {
    guide = guides.getById(guide.podcast_id, guide.id);
    return guide;
  }

  beforeEach(() => {
    db = createTestDatabase();
    ({ guide } = createGuideFixture(db));
    service = new SectionService(db);
    guides = new EpisodeGuideService(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('addCustomSection', () => {
    it('should derive the key from the name', () => {
      const result = service.addCustomSection(guide, { name: 'Deep Dive' });

      expect(result.section).toEqual({
        key: 'deep_dive',
        name: 'Deep Dive',
        parent: null,
        color: 'gray',
      });
      expect(refresh().custom_sections).toEqual([result.section]);
    });

    it('should append a numeric suffix when the key is taken', () => {
      const first = service.addCustomSection(guide, { name: 'foo' });
      const second = service.addCustomSection(guide, { name: 'foo' });

      expect(first.section.key).toBe('foo');
      expect(second.section.key).toBe('foo_2');
    });

    it('should strip punctuation before checking for collisions', () => {
      service.addCustomSection(guide, { name: 'My Cool Topic' });

      const result = service.addCustomSection(guide, { name: 'My Cool Topic!' });

      expect(result.section.key).toBe('my_cool_topic_2');
    });

    it('should never reuse a builtin key', () => {
      const result = service.addCustomSection(guide, { name: 'Introduction' });

      expect(result.section.key).toBe('introduction_2');
    });

    it('should keep the given parent and color', () => {
      const result = service.addCustomSection(guide, {
        name: 'Headsets',
        parent: 'news',
        color: 'purple',
      });

      expect(result.section).toEqual({
        key: 'headsets',
        name: 'Headsets',
        parent: 'news',
        color: 'purple',
      });
    });

    it('should return the full catalog with the new section last', () => {
      const result = service.addCustomSection(guide, { name: 'Mailbag' });

      expect(result.all_sections.map((section) => section.key)).toEqual([
        'introduction',
        'news_mice',
        'news_other',
        'news_pads',
        'news_keyboards',
        'community_recap',
        'personal_ramblings',
        'outro',
        'mailbag',
      ]);
      expect(result.all_sections.at(-1)?.origin).toBe('custom');
    });

    it('should reject a name with no usable characters', () => {
      expect(() => service.addCustomSection(guide, { name: '!!!' })).toThrow(ValidationError);
      expect(refresh().custom_sections).toEqual([]);
    });
  });

  describe('deleteCustomSection', () => {
    it('should remove an empty custom section', () => {
      service.addCustomSection(guide, { name: 'Mailbag' });

      service.deleteCustomSection(refresh(), 'mailbag');

      expect(refresh().custom_sections).toEqual([]);
    });

    it('should refuse a section that still has items and change nothing', () => {
      service.addCustomSection(guide, { name: 'Deep Dive' });
      const items = new EpisodeGuideItemService(db);
      for (const title of ['One', 'Two', 'Three']) {
        items.create(refresh(), { section: 'deep_dive', title });
      }

      expect(() => service.deleteCustomSection(refresh(), 'deep_dive')).toThrow(
        new ConflictError('Section "deep_dive" still has 3 items; move or delete them first')
      );
      expect(refresh().custom_sections.map((section) => section.key)).toEqual(['deep_dive']);
      expect(items.list(guide).map((item) => item.title)).toEqual(['One', 'Two', 'Three']);
    });

    it('should refuse builtin sections', () => {
      expect(() => service.deleteCustomSection(guide, 'outro')).toThrow(ValidationError);
    });

    it('should refuse sections that come from the template', () => {
      const templates = new TemplateService(db);
      const template = templates.create(guide.podcast_id, 1, {
        name: 'Weekly',
        default_sections: [{ key: 'listener_mail', name: 'Listener Mail', parent: null, color: 'blue' }],
        is_default: false,
      });
      const templated = guides.create(guide.podcast_id, { title: 'Templated', template_id: template.id });

      expect(() => service.deleteCustomSection(templated, 'listener_mail')).toThrow(ValidationError);
    });

    it('should throw NotFoundError for an unknown key', () => {
      expect(() => service.deleteCustomSection(guide, 'missing')).toThrow(NotFoundError);
    });
  });
});

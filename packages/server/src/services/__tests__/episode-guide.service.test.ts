import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { listEpisodeGuidesQuerySchema, type EpisodeGuide, type Podcast } from '@showdesk/shared';
import { EpisodeGuideService } from '../episode-guide.service.js';
import { EpisodeGuideItemService } from '../episode-guide-item.service.js';
import { SectionService } from '../section.service.js';
import { TemplateService } from '../template.service.js';
import { RecordingService } from '../recording.service.js';
import { createTestDatabase } from '../../test/test-app.js';
import { createGuideFixture } from '../../test/fixtures.js';
import { NotFoundError } from '../../types/errors.js';

describe('EpisodeGuideService', () => {
  let db: Database.Database;
  let service: EpisodeGuideService;
  let templates: TemplateService;
  let items: EpisodeGuideItemService;
  let podcast: Podcast;
  let userId: number;

  beforeEach(() => {
    db = createTestDatabase();
    const fixture = createGuideFixture(db);
    db.prepare('DELETE FROM episode_guides').run();
    podcast = fixture.podcast;
    userId = fixture.user.id;
    service = new EpisodeGuideService(db);
    templates = new TemplateService(db);
    items = new EpisodeGuideItemService(db);
  });

  afterEach(() => {
    db.close();
  });

  function createDefaultTemplate(): number {
    return templates.create(podcast.id, userId, {
      name: 'Weekly Show',
      intro_static_content: ['Welcome back'],
      outro_static_content: ['Thanks for listening'],
      default_sections: [{ key: 'listener_mail', name: 'Listener Mail', parent: null, color: 'blue' }],
      default_poll_1: 'Favorite mouse?',
      is_default: true,
    }).id;
  }

  describe('create', () => {
    it('should use the default template when none is given', () => {
      const templateId = createDefaultTemplate();

      const guide = service.create(podcast.id, { title: 'Episode 1' });

      expect(guide.template_id).toBe(templateId);
      expect(guide.status).toBe('draft');
      expect(guide.new_poll).toBe('Favorite mouse?');
      expect(guide.intro_static_content).toEqual(['Welcome back']);
      expect(guide.outro_static_content).toEqual(['Thanks for listening']);
    });

    it('should create a guide without a template when template_id is null', () => {
      createDefaultTemplate();

      const guide = service.create(podcast.id, { title: 'Episode 1', template_id: null });

      expect(guide.template_id).toBeNull();
      expect(guide.new_poll).toBeNull();
      expect(guide.intro_static_content).toBeNull();
    });

    it('should throw NotFoundError for an unknown template', () => {
      expect(() => service.create(podcast.id, { title: 'Episode 1', template_id: 999 })).toThrow(
        NotFoundError
      );
    });

    it('should carry over the previous episode poll', () => {
      const first = service.create(podcast.id, { title: 'Episode 1', episode_number: 1 });
      service.update(first, { new_poll: 'Best pad?', new_poll_link: 'https://example.com/poll' });

      const second = service.create(podcast.id, { title: 'Episode 2', episode_number: 2 });

      expect(second.previous_poll).toBe('Best pad?');
      expect(second.previous_poll_link).toBe('https://example.com/poll');
    });
  });

  describe('update', () => {
    it('should fill the previous poll when the episode number changes', () => {
      const first = service.create(podcast.id, { title: 'Episode 1', episode_number: 1 });
      service.update(first, { new_poll: 'Best pad?' });
      const second = service.create(podcast.id, { title: 'Untitled' });

      const updated = service.update(second, { episode_number: 2 });

      expect(updated.episode_number).toBe(2);
      expect(updated.previous_poll).toBe('Best pad?');
    });

    it('should keep an existing previous poll', () => {
      const first = service.create(podcast.id, { title: 'Episode 1', episode_number: 1 });
      service.update(first, { new_poll: 'Best pad?' });
      const second = service.create(podcast.id, { title: 'Untitled' });
      const withPoll = service.update(second, { previous_poll: 'Hand-written poll' });

      const updated = service.update(withPoll, { episode_number: 2 });

      expect(updated.previous_poll).toBe('Hand-written poll');
    });
  });

  describe('updateStaticContent', () => {
    it('should replace intro and outro lines', () => {
      const guide = service.create(podcast.id, { title: 'Episode 1' });

      const updated = service.updateStaticContent(guide, {
        intro_static_content: ['Hello', 'Sponsor read'],
        outro_static_content: null,
      });

      expect(updated.intro_static_content).toEqual(['Hello', 'Sponsor read']);
      expect(updated.outro_static_content).toBeNull();
    });
  });

  describe('getDetail', () => {
    it('should group items by section in catalog order', () => {
      createDefaultTemplate();
      const guide = service.create(podcast.id, { title: 'Episode 1' });
      items.create(guide, { section: 'outro', title: 'Goodbye' });
      items.create(guide, { section: 'listener_mail', title: 'Letter' });
      items.create(guide, { section: 'introduction', title: 'Hello' });

      const detail = service.getDetail(guide);

      expect(detail.template_name).toBe('Weekly Show');
      expect(detail.item_count).toBe(3);
      expect(detail.sections.map((section) => section.key)).toEqual([
        'introduction',
        'news_mice',
        'news_other',
        'news_pads',
        'news_keyboards',
        'community_recap',
        'personal_ramblings',
        'outro',
        'listener_mail',
      ]);
      const titles = Object.fromEntries(
        detail.sections.map((section) => [section.key, section.items.map((item) => item.title)])
      );
      expect(titles['introduction']).toEqual(['Hello']);
      expect(titles['outro']).toEqual(['Goodbye']);
      expect(titles['listener_mail']).toEqual(['Letter']);
      expect(titles['news_mice']).toEqual([]);
    });

    it('should fall back to the template static content', () => {
      createDefaultTemplate();
      const guide = service.create(podcast.id, { title: 'Episode 1' });
      const cleared = service.updateStaticContent(guide, { intro_static_content: null });

      const detail = service.getDetail(cleared);

      expect(detail.intro_content).toEqual(['Welcome back']);
      expect(detail.outro_content).toEqual(['Thanks for listening']);
    });

    it('should use empty content without a template', () => {
      const guide = service.create(podcast.id, { title: 'Episode 1' });

      const detail = service.getDetail(guide);

      expect(detail.template_name).toBeNull();
      expect(detail.intro_content).toEqual([]);
      expect(detail.outro_content).toEqual([]);
    });
  });

  describe('list', () => {
    let guides: EpisodeGuide[];

    beforeEach(() => {
      guides = ['100% Wireless', '1000 Clicks', 'Keyboard Week'].map((title) =>
        service.create(podcast.id, { title })
      );
    });

    it('should list newest first with stats', () => {
      const result = service.list(podcast.id, listEpisodeGuidesQuerySchema.parse({}));

      expect(result.guides.map((guide) => guide.title)).toEqual([
        'Keyboard Week',
        '1000 Clicks',
        '100% Wireless',
      ]);
      expect(result.total_matches).toBe(3);
      expect(result.stats).toEqual({ total: 3, drafts: 3, completed: 0 });
    });

    it('should treat LIKE wildcards in the search literally', () => {
      const result = service.list(podcast.id, listEpisodeGuidesQuerySchema.parse({ search: '100%' }));

      expect(result.guides.map((guide) => guide.title)).toEqual(['100% Wireless']);
    });

    it('should match item titles', () => {
      const [first] = guides;
      if (!first) throw new Error('missing guide');
      items.create(first, { section: 'introduction', title: 'New Viper mouse' });

      const result = service.list(podcast.id, listEpisodeGuidesQuerySchema.parse({ search: 'viper' }));

      expect(result.guides.map((guide) => guide.title)).toEqual(['100% Wireless']);
      expect(result.guides[0]?.item_count).toBe(1);
    });

    it('should filter by status', () => {
      const [first] = guides;
      if (!first) throw new Error('missing guide');
      const recording = new RecordingService(db);
      recording.start(first);
      recording.stop(service.getById(podcast.id, first.id));

      const result = service.list(
        podcast.id,
        listEpisodeGuidesQuerySchema.parse({ status: 'completed' })
      );

      expect(result.guides.map((guide) => guide.title)).toEqual(['100% Wireless']);
      expect(result.total_matches).toBe(1);
      expect(result.stats).toEqual({ total: 3, drafts: 2, completed: 1 });
    });

    it('should paginate', () => {
      const result = service.list(
        podcast.id,
        listEpisodeGuidesQuerySchema.parse({ page: '2', per_page: '2' })
      );

      expect(result.guides.map((guide) => guide.title)).toEqual(['100% Wireless']);
      expect(result.page).toBe(2);
      expect(result.per_page).toBe(2);
      expect(result.total_matches).toBe(3);
    });
  });

  describe('copy', () => {
    it('should copy items and custom sections into a new draft', () => {
      const guide = service.create(podcast.id, { title: 'Episode 7', episode_number: 7 });
      new SectionService(db).addCustomSection(guide, { name: 'Mailbag' });
      const withSection = service.getById(podcast.id, guide.id);
      items.create(withSection, { section: 'mailbag', title: 'Letter' });
      const item = items.create(withSection, { section: 'introduction', title: 'Hello' });
      items.update(withSection, item.id, { timestamp_seconds: 30, discussed: true });

      const copy = service.copy(withSection);

      expect(copy.id).not.toBe(guide.id);
      expect(copy.title).toBe('Copy of Episode 7');
      expect(copy.episode_number).toBe(8);
      expect(copy.status).toBe('draft');
      expect(copy.custom_sections.map((section) => section.key)).toEqual(['mailbag']);
      const copied = items.list(copy);
      expect(copied.map((copiedItem) => [copiedItem.section, copiedItem.title])).toEqual([
        ['introduction', 'Hello'],
        ['mailbag', 'Letter'],
      ]);
      for (const copiedItem of copied) {
        expect(copiedItem.timestamp_seconds).toBeNull();
        expect(copiedItem.discussed).toBe(false);
      }
    });
  });

  describe('delete', () => {
    it('should remove the guide and its items', () => {
      const guide = service.create(podcast.id, { title: 'Episode 1' });
      items.create(guide, { section: 'introduction', title: 'Hello' });

      service.delete(guide);

      expect(() => service.getById(podcast.id, guide.id)).toThrow(NotFoundError);
      const remaining: unknown = db.prepare('SELECT COUNT(*) FROM episode_guide_items').pluck().get();
      expect(remaining).toBe(0);
    });
  });
});

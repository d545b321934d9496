import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { User } from '@showdesk/shared';
import { PodcastService, slugifyPodcastName } from '../podcast.service.js';
import { createTestDatabase, createTestUser } from '../../test/test-app.js';
import { AppError, ConflictError, NotFoundError, ValidationError } from '../../types/errors.js';

describe('slugifyPodcastName', () => {
  it('should collapse punctuation and spaces into single hyphens', () => {
    expect(slugifyPodcastName('  The Mouse & Pad Show! ')).toBe('the-mouse-pad-show');
  });

  it('should return an empty string when nothing usable remains', () => {
    expect(slugifyPodcastName('???')).toBe('');
  });
});

describe('PodcastService', () => {
  let db: Database.Database;
  let service: PodcastService;
  let host: User;
  let guest: User;

  beforeEach(() => {
    db = createTestDatabase();
    service = new PodcastService(db);
    host = createTestUser(db).user;
    guest = createTestUser(db, 'guest@example.com', 'Guest').user;
  });

  afterEach(() => {
    db.close();
  });

  describe('create', () => {
    it('should make the creator an admin', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });

      expect(podcast.slug).toBe('click-talk');
      expect(podcast.role).toBe('admin');
      expect(podcast.is_active).toBe(true);
      expect(service.getRole(podcast.id, host.id)).toBe('admin');
      expect(service.getRole(podcast.id, guest.id)).toBeNull();
    });

    it('should suffix colliding slugs', () => {
      service.create(host.id, { name: 'Click Talk' });
      const second = service.create(host.id, { name: 'Click  Talk' });
      const third = service.create(host.id, { name: 'click talk!' });

      expect(second.slug).toBe('click-talk-2');
      expect(third.slug).toBe('click-talk-3');
    });

    it('should reject names without letters or digits', () => {
      expect(() => service.create(host.id, { name: '!!!' })).toThrow(ValidationError);
    });
  });

  describe('update', () => {
    it('should re-slug when the name changes', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });

      const updated = service.update(podcast, { name: 'Switch Talk', is_active: false });

      expect(updated.slug).toBe('switch-talk');
      expect(updated.is_active).toBe(false);
    });

    it('should keep its own slug when renamed to the same slug', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });

      expect(service.update(podcast, { name: 'Click talk' }).slug).toBe('click-talk');
    });
  });

  describe('listForUser', () => {
    it('should only list podcasts the user belongs to', () => {
      service.create(host.id, { name: 'Zeta' });
      service.create(host.id, { name: 'Alpha' });
      service.create(guest.id, { name: 'Guest Show' });

      expect(service.listForUser(host.id).map((podcast) => podcast.name)).toEqual(['Alpha', 'Zeta']);
    });
  });

  describe('members', () => {
    it('should add a member by email', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });

      const member = service.addMember(podcast.id, host.id, {
        email: 'guest@example.com',
        role: 'contributor',
      });

      expect(member).toMatchObject({
        podcast_id: podcast.id,
        user_id: guest.id,
        role: 'contributor',
        added_by: host.id,
        email: 'guest@example.com',
        name: 'Guest',
      });
      expect(service.listMembers(podcast.id).map((m) => m.email)).toEqual([
        'host@example.com',
        'guest@example.com',
      ]);
    });

    it('should report unknown emails as not found', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });

      let caught: unknown;
      try {
        service.addMember(podcast.id, host.id, { email: 'nobody@example.com', role: 'contributor' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AppError);
      expect(caught).toMatchObject({ statusCode: 404, code: 'NOT_FOUND' });
    });

    it('should refuse duplicate members', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });
      service.addMember(podcast.id, host.id, { email: 'guest@example.com', role: 'contributor' });

      expect(() =>
        service.addMember(podcast.id, host.id, { email: 'guest@example.com', role: 'admin' })
      ).toThrow(ConflictError);
    });

    it('should keep at least one admin', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });

      expect(() => service.updateMemberRole(podcast.id, host.id, 'contributor')).toThrow(
        new ConflictError('A podcast must keep at least one admin')
      );
      expect(() => service.removeMember(podcast.id, host.id)).toThrow(ConflictError);
    });

    it('should allow demoting an admin once another exists', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });
      service.addMember(podcast.id, host.id, { email: 'guest@example.com', role: 'admin' });

      const demoted = service.updateMemberRole(podcast.id, host.id, 'contributor');

      expect(demoted.role).toBe('contributor');
      expect(service.getRole(podcast.id, host.id)).toBe('contributor');
    });

    it('should remove contributors', () => {
      const podcast = service.create(host.id, { name: 'Click Talk' });
      service.addMember(podcast.id, host.id, { email: 'guest@example.com', role: 'contributor' });

      service.removeMember(podcast.id, guest.id);

      expect(service.getRole(podcast.id, guest.id)).toBeNull();
      expect(() => service.removeMember(podcast.id, guest.id)).toThrow(NotFoundError);
    });
  });
});

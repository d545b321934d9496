import type { Database } from 'better-sqlite3';
import type {
  AddMemberInput,
  CreatePodcastInput,
  Podcast,
  PodcastMemberWithUser,
  PodcastRole,
  PodcastWithRole,
  UpdatePodcastInput,
} from '@showdesk/shared';
import {
  PodcastMemberRepository,
  PodcastRepository,
  UserRepository,
} from '../repositories/index.js';
import { runInTransaction } from '../db/transaction.js';
import { AppError, ConflictError, NotFoundError, ValidationError } from '../types/errors.js';

/**
 * Lowercase, runs of anything outside [a-z0-9] become `-`, trimmed of `-`.
 */
export function slugifyPodcastName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export class PodcastService {
  private db: Database;
  private podcastRepo: PodcastRepository;
  private memberRepo: PodcastMemberRepository;
  private userRepo: UserRepository;

  constructor(db: Database) {
    this.db = db;
    this.podcastRepo = new PodcastRepository(db);
    this.memberRepo = new PodcastMemberRepository(db);
    this.userRepo = new UserRepository(db);
  }

  private uniqueSlug(name: string, excludeId?: number): string {
    const base = slugifyPodcastName(name);
    if (base === '') {
      throw new ValidationError('Podcast name must contain at least one letter or digit');
    }

    let slug = base;
    let counter = 2;
    while (this.podcastRepo.slugExists(slug, excludeId)) {
      slug = `${base}-${counter}`;
      counter++;
    }
    return slug;
  }

  listForUser(userId: number): PodcastWithRole[] {
    return this.podcastRepo.findForUser(userId);
  }

  getById(id: number): Podcast {
    const podcast = this.podcastRepo.findById(id);
    if (!podcast) {
      throw new NotFoundError('Podcast', id);
    }
    return podcast;
  }

  getRole(podcastId: number, userId: number): PodcastRole | null {
    return this.memberRepo.findMembership(podcastId, userId)?.role ?? null;
  }

  /**
   * Create a podcast; its creator becomes its first admin.
   */
  create(userId: number, input: CreatePodcastInput): PodcastWithRole {
    return runInTransaction(this.db, () => {
      const podcast = this.podcastRepo.create({
        name: input.name,
        slug: this.uniqueSlug(input.name),
        description: input.description ?? null,
        created_by: userId,
      });
      this.memberRepo.create({
        podcast_id: podcast.id,
        user_id: userId,
        role: 'admin',
        added_by: userId,
      });
      return { ...podcast, role: 'admin' };
    });
  }

  update(podcast: Podcast, input: UpdatePodcastInput): Podcast {
    return runInTransaction(this.db, () => {
      const slug =
        input.name !== undefined && input.name !== podcast.name
          ? this.uniqueSlug(input.name, podcast.id)
          : undefined;
      const updated = this.podcastRepo.update(podcast.id, { ...input, slug });
      if (!updated) {
        throw new NotFoundError('Podcast', podcast.id);
      }
      return updated;
    });
  }

  delete(podcast: Podcast): void {
    this.podcastRepo.delete(podcast.id);
  }

  listMembers(podcastId: number): PodcastMemberWithUser[] {
    return this.memberRepo.findByPodcast(podcastId);
  }

  private findMember(podcastId: number, userId: number): PodcastMemberWithUser {
    const member = this.memberRepo
      .findByPodcast(podcastId)
      .find((candidate) => candidate.user_id === userId);
    if (!member) {
      throw new NotFoundError('Member', userId);
    }
    return member;
  }

  addMember(podcastId: number, addedBy: number, input: AddMemberInput): PodcastMemberWithUser {
    return runInTransaction(this.db, () => {
      const user = this.userRepo.findByEmail(input.email);
      if (!user) {
        throw new AppError(404, 'NOT_FOUND', `No user with email ${input.email}`);
      }
      if (this.memberRepo.findMembership(podcastId, user.id)) {
        throw new ConflictError(`${user.email} is already a member of this podcast`);
      }
      const member = this.memberRepo.create({
        podcast_id: podcastId,
        user_id: user.id,
        role: input.role,
        added_by: addedBy,
      });
      return { ...member, email: user.email, name: user.name };
    });
  }

  private assertNotLastAdmin(podcastId: number, member: PodcastMemberWithUser): void {
    if (member.role === 'admin' && this.memberRepo.countAdmins(podcastId) <= 1) {
      throw new ConflictError('A podcast must keep at least one admin');
    }
  }

  updateMemberRole(podcastId: number, userId: number, role: PodcastRole): PodcastMemberWithUser {
    return runInTransaction(this.db, () => {
      const member = this.findMember(podcastId, userId);
      if (member.role === role) {
        return member;
      }
      this.assertNotLastAdmin(podcastId, member);
      this.memberRepo.update(member.id, { role });
      return { ...member, role };
    });
  }

  removeMember(podcastId: number, userId: number): void {
    runInTransaction(this.db, () => {
      const member = this.findMember(podcastId, userId);
      this.assertNotLastAdmin(podcastId, member);
      this.memberRepo.delete(member.id);
    });
  }
}

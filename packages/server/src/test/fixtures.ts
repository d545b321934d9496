import type Database from 'better-sqlite3';
import type { EpisodeGuide, PodcastWithRole, User } from '@showdesk/shared';
import { AuthService } from '../services/auth.service.js';
import { EpisodeGuideService } from '../services/episode-guide.service.js';
import { PodcastService } from '../services/podcast.service.js';

export interface GuideFixture {
  user: User;
  podcast: PodcastWithRole;
  guide: EpisodeGuide;
}

/**
 * A user, a podcast they administer and an empty draft guide without a template.
 */
export function createGuideFixture(db: Database.Database, title = 'Episode 1'): GuideFixture {
  const { user } = new AuthService(db).createUser('host@example.com', 'Test Host');
  const podcast = new PodcastService(db).create(user.id, { name: 'Test Show' });
  const guide = new EpisodeGuideService(db).create(podcast.id, { title });
  return { user, podcast, guide };
}

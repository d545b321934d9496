// Base entity with timestamps
export interface BaseEntity {
  id: number;
  created_at: string;
  updated_at: string;
}

// Users
export interface User {
  id: number;
  email: string;
  name: string;
  created_at: string;
}

// Podcasts
export interface Podcast extends BaseEntity {
  name: string;
  slug: string;
  description: string | null;
  is_active: boolean;
  created_by: number | null;
}

export type PodcastRole = 'admin' | 'contributor';

export interface PodcastMember {
  id: number;
  podcast_id: number;
  user_id: number;
  role: PodcastRole;
  added_by: number | null;
  created_at: string;
}

export interface PodcastMemberWithUser extends PodcastMember {
  email: string;
  name: string;
}

export interface PodcastWithRole extends Podcast {
  role: PodcastRole;
}

// Sections
export type SectionOrigin = 'builtin' | 'template' | 'custom';

export interface SectionDefinition {
  key: string;
  name: string;
  /** Grouping key shared by sibling sections, e.g. `news`. Not itself a section key. */
  parent: string | null;
  color: string;
}

export interface CatalogSection extends SectionDefinition {
  origin: SectionOrigin;
}

// Templates
export interface EpisodeGuideTemplate extends BaseEntity {
  podcast_id: number;
  name: string;
  description: string | null;
  intro_static_content: string[] | null;
  outro_static_content: string[] | null;
  default_sections: SectionDefinition[];
  default_poll_1: string | null;
  default_poll_2: string | null;
  is_default: boolean;
  created_by: number | null;
}

// Episode guides
export type EpisodeGuideStatus = 'draft' | 'recording' | 'completed';

export interface EpisodeGuide extends BaseEntity {
  podcast_id: number;
  template_id: number | null;
  title: string;
  episode_number: number | null;
  scheduled_date: string | null;
  status: EpisodeGuideStatus;
  recording_started_at: string | null;
  recording_ended_at: string | null;
  total_duration_seconds: number | null;
  notes: string | null;
  previous_poll: string | null;
  previous_poll_link: string | null;
  new_poll: string | null;
  new_poll_link: string | null;
  intro_static_content: string[] | null;
  outro_static_content: string[] | null;
  custom_sections: SectionDefinition[];
}

export interface EpisodeGuideItem extends BaseEntity {
  guide_id: number;
  section: string;
  title: string;
  links: string[];
  notes: string | null;
  /** Zero-based rank within (guide_id, section); always dense. */
  position: number;
  timestamp_seconds: number | null;
  discussed: boolean;
}

// Custom options
export interface CustomOption {
  id: number;
  user_id: number;
  option_type: string;
  value: string;
  label: string;
  created_at: string;
}

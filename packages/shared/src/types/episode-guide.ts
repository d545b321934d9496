import type {
  CatalogSection,
  EpisodeGuide,
  EpisodeGuideItem,
  EpisodeGuideStatus,
  SectionDefinition,
} from './database.js';

export interface EpisodeGuideItemWithTimestamp extends EpisodeGuideItem {
  formatted_timestamp: string | null;
}

export interface EpisodeGuideSummary extends EpisodeGuide {
  formatted_duration: string | null;
  item_count: number;
}

export interface GuideSection extends CatalogSection {
  items: EpisodeGuideItemWithTimestamp[];
}

export interface EpisodeGuideDetail extends EpisodeGuideSummary {
  template_name: string | null;
  intro_content: string[];
  outro_content: string[];
  sections: GuideSection[];
}

export interface EpisodeGuideStats {
  total: number;
  drafts: number;
  completed: number;
}

export interface EpisodeGuideListResult {
  guides: EpisodeGuideSummary[];
  page: number;
  per_page: number;
  total_matches: number;
  stats: EpisodeGuideStats;
}

export interface MoveItemResult {
  item: EpisodeGuideItemWithTimestamp;
  old_section: string;
  new_section: string;
}

export interface AddSectionResult {
  section: SectionDefinition;
  all_sections: CatalogSection[];
}

export interface PositionIssue {
  section: string;
  item_id: number;
  current_position: number;
  expected_position: number;
}

export interface CaptureTimestampResult {
  item: EpisodeGuideItemWithTimestamp;
  timestamp_seconds: number;
  timestamp_formatted: string | null;
}

export interface RecordingState {
  status: EpisodeGuideStatus;
  recording_started_at: string | null;
  recording_ended_at: string | null;
  total_duration_seconds: number | null;
  formatted_duration: string | null;
}

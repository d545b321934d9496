import { getDatabase } from '../db/index.js';
import { AuthService } from './auth.service.js';
import { CustomOptionService } from './custom-option.service.js';
import { EpisodeGuideItemService } from './episode-guide-item.service.js';
import { EpisodeGuideService } from './episode-guide.service.js';
import { PodcastService } from './podcast.service.js';
import { RecordingService } from './recording.service.js';
import { SectionService } from './section.service.js';
import { TemplateService } from './template.service.js';

export { AuthService } from './auth.service.js';
export { CustomOptionService } from './custom-option.service.js';
export { EpisodeGuideItemService } from './episode-guide-item.service.js';
export { EpisodeGuideService } from './episode-guide.service.js';
export { PodcastService } from './podcast.service.js';
export { RecordingService } from './recording.service.js';
export { SectionCatalogService } from './section-catalog.service.js';
export { SectionService } from './section.service.js';
export { TemplateService } from './template.service.js';
export { RequestCache } from './request-cache.js';
export type { Clock } from './recording.service.js';

// Singleton instances for use with the default database
let authService: AuthService | null = null;
let podcastService: PodcastService | null = null;
let templateService: TemplateService | null = null;
let episodeGuideService: EpisodeGuideService | null = null;
let itemService: EpisodeGuideItemService | null = null;
let sectionService: SectionService | null = null;
let recordingService: RecordingService | null = null;
let customOptionService: CustomOptionService | null = null;

// Reset all service singletons (for testing)
export function resetServices(): void {
  authService = null;
  podcastService = null;
  templateService = null;
  episodeGuideService = null;
  itemService = null;
  sectionService = null;
  recordingService = null;
  customOptionService = null;
}

export function getAuthService(): AuthService {
  if (!authService) {
    authService = new AuthService(getDatabase());
  }
  return authService;
}

export function getPodcastService(): PodcastService {
  if (!podcastService) {
    podcastService = new PodcastService(getDatabase());
  }
  return podcastService;
}

export function getTemplateService(): TemplateService {
  if (!templateService) {
    templateService = new TemplateService(getDatabase());
  }
  return templateService;
}

export function getEpisodeGuideService(): EpisodeGuideService {
  if (!episodeGuideService) {
    episodeGuideService = new EpisodeGuideService(getDatabase());
  }
  return episodeGuideService;
}

export function getItemService(): EpisodeGuideItemService {
  if (!itemService) {
    itemService = new EpisodeGuideItemService(getDatabase());
  }
  return itemService;
}

export function getSectionService(): SectionService {
  if (!sectionService) {
    sectionService = new SectionService(getDatabase());
  }
  return sectionService;
}

export function getRecordingService(): RecordingService {
  if (!recordingService) {
    recordingService = new RecordingService(getDatabase());
  }
  return recordingService;
}

export function getCustomOptionService(): CustomOptionService {
  if (!customOptionService) {
    customOptionService = new CustomOptionService(getDatabase());
  }
  return customOptionService;
}

export { UserRepository } from './user.repository.js';
export { PodcastRepository } from './podcast.repository.js';
export { PodcastMemberRepository } from './podcast-member.repository.js';
export { EpisodeGuideTemplateRepository } from './episode-guide-template.repository.js';
export { EpisodeGuideRepository } from './episode-guide.repository.js';
export { EpisodeGuideItemRepository } from './episode-guide-item.repository.js';
export { CustomOptionRepository } from './custom-option.repository.js';
export type { CreateTemplateDTO, UpdateTemplateDTO } from './episode-guide-template.repository.js';
export type {
  CreateEpisodeGuideDTO,
  UpdateEpisodeGuideDTO,
  EpisodeGuideFilter,
} from './episode-guide.repository.js';

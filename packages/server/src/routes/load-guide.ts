import type { Request } from 'express';
import { episodeParamsSchema, type EpisodeGuide } from '@showdesk/shared';
import { getEpisodeGuideService } from '../services/index.js';

/**
 * The guide addressed by `:podcastId/episodes/:episodeId`. Guides of other
 * podcasts are reported as not found.
 */
export function loadGuide(req: Request<Record<string, string>, unknown, unknown>): EpisodeGuide {
  const { podcastId, episodeId } = episodeParamsSchema.parse(req.params);
  return getEpisodeGuideService().getById(podcastId, episodeId);
}

import { z } from 'zod';
import { isoDateSchema, optionalText, staticContentSchema } from './common.schema.js';

export const episodeGuideStatusSchema = z.enum(['draft', 'recording', 'completed']);

const titleSchema = z.string().trim().min(1, 'Title is required').max(200);
const episodeNumberSchema = z.number().int().positive().nullable();

export const createEpisodeGuideSchema = z.object({
  title: titleSchema,
  episode_number: episodeNumberSchema.optional(),
  scheduled_date: isoDateSchema.nullable().optional(),
  notes: optionalText(10000).optional(),
  template_id: z.number().int().positive().nullable().optional(),
});

export const updateEpisodeGuideSchema = z.object({
  title: titleSchema.optional(),
  episode_number: episodeNumberSchema.optional(),
  scheduled_date: isoDateSchema.nullable().optional(),
  notes: optionalText(10000).optional(),
  previous_poll: optionalText(500).optional(),
  previous_poll_link: optionalText(500).optional(),
  new_poll: optionalText(500).optional(),
  new_poll_link: optionalText(500).optional(),
});

export const updateStaticContentSchema = z.object({
  intro_static_content: staticContentSchema.optional(),
  outro_static_content: staticContentSchema.optional(),
});

export const listEpisodeGuidesQuerySchema = z.object({
  status: episodeGuideStatusSchema.optional(),
  search: z
    .string()
    .trim()
    .transform((value) => value.slice(0, 100))
    .optional(),
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(50),
});

export type CreateEpisodeGuideInput = z.infer<typeof createEpisodeGuideSchema>;
export type UpdateEpisodeGuideInput = z.infer<typeof updateEpisodeGuideSchema>;
export type UpdateStaticContentInput = z.infer<typeof updateStaticContentSchema>;
export type ListEpisodeGuidesQuery = z.infer<typeof listEpisodeGuidesQuerySchema>;

import { z } from 'zod';
import { optionalText } from './common.schema.js';

export const podcastRoleSchema = z.enum(['admin', 'contributor']);

export const createPodcastSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  description: optionalText(2000).optional(),
});

export const updatePodcastSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100).optional(),
  description: optionalText(2000).optional(),
  is_active: z.boolean().optional(),
});

export const addMemberSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  role: podcastRoleSchema.default('contributor'),
});

export const updateMemberSchema = z.object({
  role: podcastRoleSchema,
});

export const memberParamsSchema = z.object({
  podcastId: z.coerce.number().int().positive(),
  userId: z.coerce.number().int().positive(),
});

export type CreatePodcastInput = z.infer<typeof createPodcastSchema>;
export type UpdatePodcastInput = z.infer<typeof updatePodcastSchema>;
export type AddMemberInput = z.infer<typeof addMemberSchema>;
export type UpdateMemberInput = z.infer<typeof updateMemberSchema>;

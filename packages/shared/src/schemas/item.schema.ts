import { z } from 'zod';
import { DEFAULT_ITEM_SECTION } from '../sections.js';
import { optionalText } from './common.schema.js';

const titleSchema = z.string().trim().min(1, 'Title is required').max(500);

const linksSchema = z.union([z.array(z.string()), z.string()]).nullable();

export const createItemSchema = z.object({
  section: z.string().trim().min(1).default(DEFAULT_ITEM_SECTION),
  title: titleSchema,
  links: linksSchema.optional(),
  /** Single-link form kept for older clients; ignored when `links` is given. */
  link: z.string().nullish(),
  notes: optionalText(10000).optional(),
});

export const updateItemSchema = z.object({
  title: titleSchema.optional(),
  links: linksSchema.optional(),
  notes: optionalText(10000).optional(),
  discussed: z.boolean().optional(),
  timestamp_seconds: z.number().int().min(0).nullable().optional(),
  section: z.string().trim().min(1).optional(),
  /** Checked by the move operation, which reports INVALID_POSITION for any non-integer. */
  position: z.unknown(),
});

export const moveItemSchema = z.object({
  item_id: z.number().int().positive(),
  target_section: z.string().min(1),
  /** Checked by the move operation, which reports INVALID_POSITION for any non-integer. */
  target_position: z.unknown(),
});

export const reorderItemsSchema = z.object({
  section: z.string().min(1),
  item_ids: z.array(z.number().int().positive()),
});

export type CreateItemInput = z.infer<typeof createItemSchema>;
export type UpdateItemInput = z.infer<typeof updateItemSchema>;
export type MoveItemInput = z.infer<typeof moveItemSchema>;
export type ReorderItemsInput = z.infer<typeof reorderItemsSchema>;

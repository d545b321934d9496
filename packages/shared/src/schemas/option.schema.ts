import { z } from 'zod';
import { OPTION_TYPES } from '../options.js';

export const optionTypeSchema = z.enum(OPTION_TYPES);

export const createCustomOptionSchema = z.object({
  option_type: optionTypeSchema,
  label: z.string().trim().min(1, 'Label is required').max(100),
});

export type CreateCustomOptionInput = z.infer<typeof createCustomOptionSchema>;

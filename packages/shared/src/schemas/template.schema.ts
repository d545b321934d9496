import { z } from 'zod';
import { optionalText, staticContentSchema } from './common.schema.js';
import { sectionListSchema } from './section.schema.js';

const templateFields = {
  name: z.string().trim().min(1, 'Name is required').max(100),
  description: optionalText(2000),
  intro_static_content: staticContentSchema,
  outro_static_content: staticContentSchema,
  default_sections: sectionListSchema,
  default_poll_1: optionalText(200),
  default_poll_2: optionalText(200),
  is_default: z.boolean(),
};

export const createTemplateSchema = z.object({
  name: templateFields.name,
  description: templateFields.description.optional(),
  intro_static_content: templateFields.intro_static_content.optional(),
  outro_static_content: templateFields.outro_static_content.optional(),
  default_sections: templateFields.default_sections.default([]),
  default_poll_1: templateFields.default_poll_1.optional(),
  default_poll_2: templateFields.default_poll_2.optional(),
  is_default: templateFields.is_default.default(false),
});

export const updateTemplateSchema = z.object(templateFields).partial();

export type CreateTemplateInput = z.infer<typeof createTemplateSchema>;
export type UpdateTemplateInput = z.infer<typeof updateTemplateSchema>;

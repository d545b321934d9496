import { z } from 'zod';
import { DEFAULT_SECTION_COLOR, SECTION_KEY_PATTERN, isBuiltinSection } from '../sections.js';

const sectionKeySchema = z
  .string()
  .min(1)
  .max(50)
  .regex(SECTION_KEY_PATTERN, 'Section keys may only contain a-z, 0-9 and _');

const colorSchema = z.string().trim().min(1).max(20);

export const sectionDefinitionSchema = z.object({
  key: sectionKeySchema,
  name: z.string().trim().min(1).max(100),
  parent: sectionKeySchema.nullable().default(null),
  color: colorSchema.default(DEFAULT_SECTION_COLOR),
});

/**
 * Section lists owned by a template or a guide: keys must be unique and may not reuse a builtin key.
 */
export const sectionListSchema = z.array(sectionDefinitionSchema).superRefine((sections, ctx) => {
  const seen = new Set<string>();
  sections.forEach((section, index) => {
    if (isBuiltinSection(section.key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'key'],
        message: `"${section.key}" is a built-in section`,
      });
    }
    if (seen.has(section.key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'key'],
        message: `Duplicate section key "${section.key}"`,
      });
    }
    seen.add(section.key);
  });
});

export const addSectionSchema = z.object({
  name: z.string().trim().min(1, 'Section name is required').max(100),
  parent: sectionKeySchema.nullish(),
  color: colorSchema.nullish(),
});

export type AddSectionInput = z.infer<typeof addSectionSchema>;

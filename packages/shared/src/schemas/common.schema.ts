import { z } from 'zod';

export const idSchema = z.coerce.number().int().positive();

export const podcastParamsSchema = z.object({
  podcastId: idSchema,
});

export const episodeParamsSchema = podcastParamsSchema.extend({
  episodeId: idSchema,
});

export const itemParamsSchema = episodeParamsSchema.extend({
  itemId: idSchema,
});

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format');

/**
 * Optional free text: trimmed, and an empty string is stored as null.
 */
export function optionalText(maxLength: number): z.ZodType<string | null, z.ZodTypeDef, string | null> {
  return z
    .string()
    .trim()
    .max(maxLength)
    .nullable()
    .transform((value) => (value === '' ? null : value));
}

/**
 * Static intro/outro lines, sent either as an array or as one newline-separated string.
 * Blank lines are dropped; no remaining lines means null.
 */
export const staticContentSchema = z
  .union([z.array(z.string()), z.string()])
  .nullable()
  .transform((content): string[] | null => {
    if (content === null) {
      return null;
    }
    const lines = (typeof content === 'string' ? content.split('\n') : content)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return lines.length > 0 ? lines : null;
  });

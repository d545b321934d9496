import { sectionDefinitionSchema, type SectionDefinition } from '@showdesk/shared';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value)
  );
}

export function readString(
  data: Record<string, unknown>,
  key: string
): string | null {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  return null;
}

export function readNumber(
  data: Record<string, unknown>,
  key: string
): number | null {
  const value = data[key];
  if (typeof value === 'number') {
    return value;
  }
  return null;
}

/**
 * SQLite has no boolean type; flags are stored as 0/1 integers.
 */
export function readFlag(
  data: Record<string, unknown>,
  key: string
): boolean | null {
  const value = data[key];
  if (value === 0 || value === 1) {
    return value === 1;
  }
  return null;
}

export function readNullableString(
  data: Record<string, unknown>,
  key: string
): string | null | undefined {
  const value = data[key];
  if (value === null) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  return undefined;
}

export function readNullableNumber(
  data: Record<string, unknown>,
  key: string
): number | null | undefined {
  const value = data[key];
  if (value === null) {
    return null;
  }
  if (typeof value === 'number') {
    return value;
  }
  return undefined;
}

export function readEnum<T extends string>(
  data: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T | null {
  const value = data[key];
  if (typeof value !== 'string') {
    return null;
  }
  return allowed.find((candidate) => candidate === value) ?? null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Read a JSON-encoded string array column. A NULL column reads as null;
 * anything that is not an array of strings reads as undefined.
 */
export function readJsonStringArray(
  data: Record<string, unknown>,
  key: string
): string[] | null | undefined {
  const raw = readNullableString(data, key);
  if (raw === null || raw === undefined) {
    return raw;
  }
  const value = parseJson(raw);
  if (!Array.isArray(value)) {
    return undefined;
  }
  const strings = value.filter((entry): entry is string => typeof entry === 'string');
  return strings.length === value.length ? strings : undefined;
}

/**
 * Read a JSON-encoded list of section definitions. Entries that do not
 * parse as a section definition are dropped.
 */
export function readSectionList(
  data: Record<string, unknown>,
  key: string
): SectionDefinition[] | null {
  const raw = readString(data, key);
  if (raw === null) {
    return null;
  }
  const value = parseJson(raw);
  if (!Array.isArray(value)) {
    return null;
  }
  const sections: SectionDefinition[] = [];
  for (const entry of value) {
    const parsed = sectionDefinitionSchema.safeParse(entry);
    if (parsed.success) {
      sections.push(parsed.data);
    }
  }
  return sections;
}

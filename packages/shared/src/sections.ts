import type { CatalogSection, SectionDefinition } from './types/database.js';

export const DEFAULT_SECTION_COLOR = 'gray';

/**
 * Sections every guide has. Order here is display order.
 */
export const BUILTIN_SECTIONS: readonly SectionDefinition[] = [
  { key: 'introduction', name: 'Introduction', parent: null, color: DEFAULT_SECTION_COLOR },
  { key: 'news_mice', name: 'Mice', parent: 'news', color: DEFAULT_SECTION_COLOR },
  { key: 'news_other', name: 'Other', parent: 'news', color: DEFAULT_SECTION_COLOR },
  { key: 'news_pads', name: 'Pads', parent: 'news', color: DEFAULT_SECTION_COLOR },
  { key: 'news_keyboards', name: 'Keyboards', parent: 'news', color: DEFAULT_SECTION_COLOR },
  { key: 'community_recap', name: 'Community Recap', parent: null, color: DEFAULT_SECTION_COLOR },
  { key: 'personal_ramblings', name: 'Personal Ramblings', parent: null, color: DEFAULT_SECTION_COLOR },
  { key: 'outro', name: 'Outro', parent: null, color: DEFAULT_SECTION_COLOR },
];

export const BUILTIN_SECTION_KEYS: ReadonlySet<string> = new Set(
  BUILTIN_SECTIONS.map((section) => section.key)
);

export const DEFAULT_ITEM_SECTION = 'introduction';

export const SECTION_KEY_PATTERN = /^[a-z0-9_]+$/;

export function isBuiltinSection(key: string): boolean {
  return BUILTIN_SECTION_KEYS.has(key);
}

/**
 * Turn a display name into a machine key: lowercase, spaces and hyphens
 * become underscores, everything outside [a-z0-9_] is dropped.
 * May return an empty string.
 */
export function slugifySectionName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[\s-]/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

/**
 * Derive a key for `name` that is not in `existingKeys`, appending `_2`, `_3`, ...
 * to the base key until it is unique.
 */
export function deriveSectionKey(name: string, existingKeys: ReadonlySet<string>): string {
  const base = slugifySectionName(name);
  if (base === '' || !existingKeys.has(base)) {
    return base;
  }

  let counter = 2;
  let candidate = `${base}_${counter}`;
  while (existingKeys.has(candidate)) {
    counter++;
    candidate = `${base}_${counter}`;
  }
  return candidate;
}

/**
 * Merge builtin, template and custom sections into one ordered catalog.
 * The first definition of a key wins, so builtins can never be shadowed.
 */
export function buildSectionCatalog(
  templateSections: readonly SectionDefinition[],
  customSections: readonly SectionDefinition[]
): CatalogSection[] {
  const catalog: CatalogSection[] = [];
  const seen = new Set<string>();

  const append = (sections: readonly SectionDefinition[], origin: CatalogSection['origin']): void => {
    for (const section of sections) {
      if (seen.has(section.key)) {
        continue;
      }
      seen.add(section.key);
      catalog.push({ ...section, origin });
    }
  };

  append(BUILTIN_SECTIONS, 'builtin');
  append(templateSections, 'template');
  append(customSections, 'custom');

  return catalog;
}

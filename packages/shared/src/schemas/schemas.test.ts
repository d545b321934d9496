import { describe, it, expect } from 'vitest';
import { optionalText, staticContentSchema } from './common.schema.js';
import { sectionListSchema } from './section.schema.js';
import { addMemberSchema } from './podcast.schema.js';
import { listEpisodeGuidesQuerySchema } from './episode-guide.schema.js';
import { moveItemSchema, updateItemSchema } from './item.schema.js';

describe('staticContentSchema', () => {
  it('should split text on newlines and drop blank lines', () => {
    expect(staticContentSchema.parse('Welcome\n\n  Sponsor read  \n')).toEqual([
      'Welcome',
      'Sponsor read',
    ]);
  });

  it('should trim array entries', () => {
    expect(staticContentSchema.parse([' a ', '', 'b'])).toEqual(['a', 'b']);
  });

  it('should store empty content as null', () => {
    expect(staticContentSchema.parse('  \n ')).toBeNull();
    expect(staticContentSchema.parse(null)).toBeNull();
  });
});

describe('optionalText', () => {
  it('should turn blank strings into null', () => {
    expect(optionalText(10).parse('   ')).toBeNull();
    expect(optionalText(10).parse(' poll ')).toBe('poll');
  });

  it('should enforce the maximum length', () => {
    expect(optionalText(3).safeParse('abcd').success).toBe(false);
  });
});

describe('sectionListSchema', () => {
  it('should fill in parent and color', () => {
    expect(sectionListSchema.parse([{ key: 'mailbag', name: 'Mailbag' }])).toEqual([
      { key: 'mailbag', name: 'Mailbag', parent: null, color: 'gray' },
    ]);
  });

  it('should reject duplicate keys', () => {
    const result = sectionListSchema.safeParse([
      { key: 'mailbag', name: 'Mailbag' },
      { key: 'mailbag', name: 'Mailbag 2' },
    ]);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Duplicate section key "mailbag"');
  });

  it('should reject keys outside the allowed characters', () => {
    expect(sectionListSchema.safeParse([{ key: 'Mail Bag', name: 'Mailbag' }]).success).toBe(false);
  });
});

describe('addMemberSchema', () => {
  it('should normalise the email and default the role', () => {
    expect(addMemberSchema.parse({ email: ' Guest@Example.com ' })).toEqual({
      email: 'guest@example.com',
      role: 'contributor',
    });
  });
});

describe('listEpisodeGuidesQuerySchema', () => {
  it('should coerce paging parameters and apply defaults', () => {
    expect(listEpisodeGuidesQuerySchema.parse({ page: '3' })).toEqual({ page: 3, per_page: 50 });
  });

  it('should cap the search term at 100 characters', () => {
    const parsed = listEpisodeGuidesQuerySchema.parse({ search: 'x'.repeat(150) });

    expect(parsed.search).toHaveLength(100);
  });

  it('should reject a page size above 100', () => {
    expect(listEpisodeGuidesQuerySchema.safeParse({ per_page: '500' }).success).toBe(false);
  });
});

describe('moveItemSchema', () => {
  it('should leave position range checks to the move operation', () => {
    expect(
      moveItemSchema.parse({ item_id: 1, target_section: 'outro', target_position: -1 }).target_position
    ).toBe(-1);
  });

  it('should pass a non-numeric position through unchanged', () => {
    expect(
      moveItemSchema.parse({ item_id: 1, target_section: 'outro', target_position: '1' }).target_position
    ).toBe('1');
    expect(
      moveItemSchema.parse({ item_id: 1, target_section: 'outro', target_position: null }).target_position
    ).toBeNull();
  });
});

describe('updateItemSchema', () => {
  it('should leave position undefined when it is not sent', () => {
    expect(updateItemSchema.parse({ title: 'Renamed' }).position).toBeUndefined();
  });

  it('should pass a string position through unchanged', () => {
    expect(updateItemSchema.parse({ position: '0' }).position).toBe('0');
  });
});

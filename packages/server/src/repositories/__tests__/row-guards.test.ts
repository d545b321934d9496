import { describe, it, expect } from 'vitest';
import {
  isRecord,
  readEnum,
  readFlag,
  readJsonStringArray,
  readNullableNumber,
  readNullableString,
  readNumber,
  readSectionList,
  readString,
} from '../row-guards.js';

describe('row-guards', () => {
  describe('isRecord', () => {
    it('should accept plain objects', () => {
      expect(isRecord({ id: 1 })).toBe(true);
    });

    it('should reject arrays, null, and primitives', () => {
      expect(isRecord([1, 2, 3])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('row')).toBe(false);
      expect(isRecord(42)).toBe(false);
    });
  });

  describe('readString', () => {
    it('should read strings', () => {
      expect(readString({ title: 'Intro' }, 'title')).toBe('Intro');
    });

    it('should return null for anything else', () => {
      expect(readString({ title: 7 }, 'title')).toBeNull();
      expect(readString({}, 'missing')).toBeNull();
    });
  });

  describe('readNumber', () => {
    it('should read numbers', () => {
      expect(readNumber({ position: 0 }, 'position')).toBe(0);
    });

    it('should return null for anything else', () => {
      expect(readNumber({ position: '0' }, 'position')).toBeNull();
    });
  });

  describe('readFlag', () => {
    it('should read 0 and 1 as booleans', () => {
      expect(readFlag({ discussed: 1 }, 'discussed')).toBe(true);
      expect(readFlag({ discussed: 0 }, 'discussed')).toBe(false);
    });

    it('should return null for other values', () => {
      expect(readFlag({ discussed: 2 }, 'discussed')).toBeNull();
      expect(readFlag({ discussed: true }, 'discussed')).toBeNull();
    });
  });

  describe('readNullableString', () => {
    it('should distinguish null from a wrong type', () => {
      expect(readNullableString({ notes: null }, 'notes')).toBeNull();
      expect(readNullableString({ notes: 'text' }, 'notes')).toBe('text');
      expect(readNullableString({ notes: 3 }, 'notes')).toBeUndefined();
    });
  });

  describe('readNullableNumber', () => {
    it('should distinguish null from a wrong type', () => {
      expect(readNullableNumber({ seconds: null }, 'seconds')).toBeNull();
      expect(readNullableNumber({ seconds: 95 }, 'seconds')).toBe(95);
      expect(readNullableNumber({ seconds: '95' }, 'seconds')).toBeUndefined();
    });
  });

  describe('readEnum', () => {
    const statuses = ['draft', 'recording', 'completed'] as const;

    it('should return allowed values', () => {
      expect(readEnum({ status: 'recording' }, 'status', statuses)).toBe('recording');
    });

    it('should return null for unknown values', () => {
      expect(readEnum({ status: 'archived' }, 'status', statuses)).toBeNull();
    });
  });

  describe('readJsonStringArray', () => {
    it('should parse JSON string arrays', () => {
      expect(readJsonStringArray({ links: '["https://example.com/a"]' }, 'links')).toEqual([
        'https://example.com/a',
      ]);
    });

    it('should pass NULL through', () => {
      expect(readJsonStringArray({ links: null }, 'links')).toBeNull();
    });

    it('should return undefined for malformed or mixed content', () => {
      expect(readJsonStringArray({ links: 'not json' }, 'links')).toBeUndefined();
      expect(readJsonStringArray({ links: '["a", 1]' }, 'links')).toBeUndefined();
      expect(readJsonStringArray({ links: '{"a": 1}' }, 'links')).toBeUndefined();
    });
  });

  describe('readSectionList', () => {
    it('should parse section definitions and apply defaults', () => {
      const raw = JSON.stringify([{ key: 'mailbag', name: 'Mailbag' }]);

      expect(readSectionList({ custom_sections: raw }, 'custom_sections')).toEqual([
        { key: 'mailbag', name: 'Mailbag', parent: null, color: 'gray' },
      ]);
    });

    it('should drop entries that are not section definitions', () => {
      const raw = JSON.stringify([{ key: 'Bad Key', name: 'Bad' }, { key: 'ok', name: 'Ok' }, 5]);

      expect(readSectionList({ custom_sections: raw }, 'custom_sections')).toEqual([
        { key: 'ok', name: 'Ok', parent: null, color: 'gray' },
      ]);
    });

    it('should return null when the column is not a JSON array', () => {
      expect(readSectionList({ custom_sections: '{}' }, 'custom_sections')).toBeNull();
      expect(readSectionList({ custom_sections: null }, 'custom_sections')).toBeNull();
    });
  });
});

import { describe, expect, it } from 'vitest';
import {
  ALL_CATEGORIES_KEY,
  categoryKey,
  itemKey,
  itemKeyForTitle,
  normalizeQuery,
  searchKey,
  suggestKey,
  ttlClassOf
} from '../../src/cache/CacheKeySpace';

describe('CacheKeySpace', () => {
  describe('normalizeQuery', () => {
    it('should lowercase, trim and collapse whitespace', () => {
      expect(normalizeQuery('  Arasaka   Tower\t')).toBe('arasaka tower');
    });

    it('should normalize queries that differ only in case and spacing identically', () => {
      expect(normalizeQuery(' Ripperdoc ')).toBe(normalizeQuery('ripperdoc'));
    });
  });

  describe('key builders', () => {
    it('should build category keys', () => {
      expect(categoryKey('weapons')).toBe('category:weapons');
    });

    it('should build scoped and unscoped item keys', () => {
      expect(itemKey('weapons', 'Malorian')).toBe('item:weapons:Malorian');
      expect(itemKey(undefined, 'Malorian')).toBe('item:Malorian');
    });

    it('should encode titles so item ids never contain a colon', () => {
      expect(itemKeyForTitle('Johnny: Silverhand', 'characters')).toBe('item:characters:Johnny%3A%20Silverhand');
      expect(itemKeyForTitle('V (character)')).toBe('item:V%20(character)');
    });

    it('should build search keys without filters', () => {
      expect(searchKey('ripperdoc')).toBe('search:ripperdoc');
      expect(searchKey('ripperdoc', [])).toBe('search:ripperdoc');
    });

    it('should sort and de-duplicate search filters', () => {
      expect(searchKey('arasaka tower', ['weapons', 'characters', 'weapons']))
        .toBe('search:arasaka%20tower:characters,weapons');
      expect(searchKey('x', ['b', 'a'])).toBe(searchKey('x', ['a', 'b']));
    });

    it('should include the limit in suggestion keys', () => {
      expect(suggestKey('jo', 10)).toBe('suggest:jo:10');
      expect(suggestKey('jo', 5)).not.toBe(suggestKey('jo', 10));
    });
  });

  describe('ttlClassOf', () => {
    it('should map each key family onto its TTL class', () => {
      expect(ttlClassOf(ALL_CATEGORIES_KEY)).toBe('directory');
      expect(ttlClassOf(categoryKey('weapons'))).toBe('category');
      expect(ttlClassOf(itemKeyForTitle('Malorian', 'weapons'))).toBe('item');
      expect(ttlClassOf(searchKey('ripperdoc'))).toBe('search');
      expect(ttlClassOf(suggestKey('jo', 10))).toBe('suggest');
    });

    it('should fall back to the default class for other keys', () => {
      expect(ttlClassOf('health')).toBe('default');
    });
  });
});

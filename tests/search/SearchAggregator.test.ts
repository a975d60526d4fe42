import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { categoryKey, searchKey } from '../../src/cache/CacheKeySpace';
import { WikiCacheContext } from '../../src/CacheContext';
import { InvalidArgumentError } from '../../src/errors';
import { matches } from '../../src/search/SearchAggregator';
import { ItemRecord } from '../../src/types';
import { createTestContext } from '../helpers/context';
import { createTempDir, FakeWikiSource, makeItem, makeSnapshot, removeTempDir } from '../helpers/fixtures';

const characters: ItemRecord[] = [
  makeItem('Viktor Vektor', { description: 'Viktor is a ripperdoc in Watson.' }),
  makeItem('Judy Alvarez', { description: 'Braindance technician.' }),
  makeItem('Jackie Welles', { description: null, sections: [{ title: 'Trivia', content: 'Jackie knows a good Ripperdoc.' }] })
];

const vehicles: ItemRecord[] = [
  makeItem('Quadra Type-66', { description: 'A muscle car.' }),
  makeItem('Viktor Vektor', { description: 'Also listed here.' }),
  makeItem('Villefort Alvarado', { description: null })
];

describe('SearchAggregator', () => {
  let directory: string;
  let context: WikiCacheContext;

  const seed = async (target: WikiCacheContext) => {
    await target.cache.set(categoryKey('characters'), { kind: 'category', value: makeSnapshot('characters', characters) });
    await target.cache.set(categoryKey('vehicles'), { kind: 'category', value: makeSnapshot('vehicles', vehicles) });
  };

  beforeEach(async () => {
    directory = await createTempDir();
    context = createTestContext(directory, new FakeWikiSource());
    await seed(context);
  });

  afterEach(async () => {
    await context.close();
    await removeTempDir(directory);
  });

  describe('search', () => {
    it('should reject queries shorter than the minimum', async () => {
      await expect(context.search.search('ab')).rejects.toThrow(InvalidArgumentError);
      await expect(context.search.search('  ab  ')).rejects.toThrow('Search query must be at least 3 characters long');
    });

    it('should match titles, descriptions and sections and tag each result with its category', async () => {
      const page = await context.search.search('ripperdoc');

      expect(page.total).toBe(2);
      expect(page.results.map(item => [item.title, item.categories])).toEqual([
        ['Viktor Vektor', ['characters']],
        ['Jackie Welles', ['characters']]
      ]);
    });

    it('should share one cached result set between queries that normalize identically', async () => {
      const first = await context.search.search(' Ripperdoc ');
      const second = await context.search.search('ripperdoc');

      expect(first.cached).toBe(false);
      expect(second.cached).toBe(true);
      expect(first.normalizedQuery).toBe('ripperdoc');
      expect(second.query).toBe('ripperdoc');
      expect(second.results).toEqual(first.results);
      expect(await context.cache.getAs(searchKey('ripperdoc'), 'search')).not.toBeNull();
    });

    it('should serve a cached result set until it expires', async () => {
      await context.search.search('ripperdoc');
      await context.cache.set(categoryKey('characters'), { kind: 'category', value: makeSnapshot('characters', []) });

      const page = await context.search.search('ripperdoc');

      expect(page.total).toBe(2);
    });

    it('should restrict results to the requested categories', async () => {
      const page = await context.search.search('viktor', { categories: ['vehicles'] });

      expect(page.categories).toEqual(['vehicles']);
      expect(page.results).toEqual([
        makeItem('Viktor Vektor', { description: 'Also listed here.', categories: ['vehicles'] })
      ]);
    });

    it('should accept category names as filters', async () => {
      await context.search.search('viktor', { categories: ['vehicles'] });
      const byName = await context.search.search('viktor', { categories: ['Test Vehicles'] });

      expect(byName.cached).toBe(true);
    });

    it('should reject unknown category filters', async () => {
      await expect(context.search.search('viktor', { categories: ['perks'] }))
        .rejects.toThrow('Unknown categories: perks. Available: characters, vehicles, weapons');
    });

    it('should list a title found in several categories once', async () => {
      const page = await context.search.search('viktor');
      expect(page.results.map(item => item.title)).toEqual(['Viktor Vektor']);
      expect(page.results[0]?.description).toBe('Viktor is a ripperdoc in Watson.');
    });

    it('should page through results', async () => {
      const page = await context.search.search('ripperdoc', { limit: 1, offset: 1 });

      expect(page).toEqual(expect.objectContaining({ total: 2, limit: 1, offset: 1 }));
      expect(page.results.map(item => item.title)).toEqual(['Jackie Welles']);
    });

    it('should cap result sets at the configured maximum', async () => {
      const capped = createTestContext(path.join(directory, 'capped'), new FakeWikiSource(), { search: { maxResults: 1 } });
      await seed(capped);

      const page = await capped.search.search('ripperdoc');
      await capped.close();

      expect(page.total).toBe(1);
      expect(page.results[0]?.title).toBe('Viktor Vektor');
    });

    it('should return nothing when no category is cached', async () => {
      await context.cache.flush();
      const page = await context.search.search('ripperdoc');
      expect(page).toEqual(expect.objectContaining({ total: 0, results: [] }));
    });
  });

  describe('suggest', () => {
    it('should reject prefixes shorter than two characters', async () => {
      await expect(context.search.suggest('v')).rejects.toThrow('Suggestion prefix must be at least 2 characters long');
    });

    it('should suggest titles with a word starting with the prefix, sorted', async () => {
      expect(await context.search.suggest('Vi')).toEqual(['Viktor Vektor', 'Villefort Alvarado']);
      expect(await context.search.suggest('al')).toEqual(['Judy Alvarez', 'Villefort Alvarado']);
    });

    it('should not match inside a word', async () => {
      expect(await context.search.suggest('ktor')).toEqual([]);
    });

    it('should honour the limit', async () => {
      expect(await context.search.suggest('al', 1)).toEqual(['Judy Alvarez']);
    });
  });

  describe('matches', () => {
    it('should compare case-insensitively', () => {
      expect(matches('muscle', 'Quadra Type-66', makeItem('Quadra Type-66', { description: 'A MUSCLE car.' }))).toBe(true);
      expect(matches('sedan', 'Quadra Type-66', makeItem('Quadra Type-66', { description: 'A muscle car.' }))).toBe(false);
    });

    it('should match section titles', () => {
      expect(matches('trivia', 'Jackie Welles', characters[2] ?? makeItem('missing'))).toBe(true);
    });
  });
});

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';
import { CacheTier } from '../../src/cache/tiers/CacheTier';
import { NotFoundError } from '../../src/errors';
import { CategorySnapshot, ItemRecord } from '../../src/types';
import { CategoryMember, WikiSource } from '../../src/wiki/WikiSource';

export const makeItem = (title: string, overrides: Partial<ItemRecord> = {}): ItemRecord => ({
  title,
  url: `https://wiki.test/wiki/${title.replace(/ /g, '_')}`,
  description: `${title} description`,
  categories: [],
  images: [],
  sections: [],
  relatedPages: [],
  infobox: {},
  ...overrides
});

export const makeSnapshot = (categoryKey: string, items: ItemRecord[], fetchedAt = new Date('2024-05-01T12:00:00.000Z')): CategorySnapshot => ({
  categoryKey,
  items: new Map(items.map(item => [item.title, item])),
  fetchedAt
});

export const TEST_CATEGORIES: Record<string, string> = {
  characters: 'Test Characters',
  vehicles: 'Test Vehicles',
  weapons: 'Test Weapons'
};

/**
 * In-process WikiSource. Category contents and single items are configured per
 * test; every method is a spy.
 */
export class FakeWikiSource implements WikiSource {
  readonly categories = new Map<string, ItemRecord[]>();
  readonly items = new Map<string, ItemRecord>();
  directory: string[] = ['Test Characters', 'Test Vehicles'];
  reachable = true;
  /** Resolve scrapes only when `release` is called */
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  readonly scrapeCategory = vi.fn(async (categoryName: string, limit?: number): Promise<Map<string, ItemRecord>> => {
    if (this.gate) {
      await this.gate;
    }
    const listed = this.categories.get(categoryName);
    if (listed === undefined) {
      throw new Error(`Scrape of ${categoryName} failed`);
    }
    const selected = limit === undefined ? listed : listed.slice(0, limit);
    return new Map(selected.map(item => [item.title, item]));
  });

  readonly fetchCategoryMembers = vi.fn(async (categoryName: string): Promise<CategoryMember[]> =>
    (this.categories.get(categoryName) ?? []).map(item => ({ title: item.title })));

  readonly fetchItemMetadata = vi.fn(async (title: string): Promise<ItemRecord> => {
    const item = this.items.get(title);
    if (!item) {
      throw new NotFoundError(`Wiki page "${title}" not found`);
    }
    return item;
  });

  readonly fetchAllCategories = vi.fn(async (): Promise<string[]> => [...this.directory]);

  readonly ping = vi.fn(async (): Promise<boolean> => this.reachable);

  /** Hold every scrape until `release` is called. */
  hold(): void {
    this.gate = new Promise(resolve => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }
}

/** Tier whose every operation rejects, standing in for an unreachable redis. */
export class FailingTier implements CacheTier {
  readonly implementationType = 'failing';
  alive = false;

  readonly get = vi.fn(async (_key: string): Promise<string | null> => {
    throw new Error('connection refused');
  });

  readonly set = vi.fn(async (_key: string, _raw: string, _ttlSeconds: number): Promise<void> => {
    throw new Error('connection refused');
  });

  readonly delete = vi.fn(async (_key: string): Promise<boolean> => {
    throw new Error('connection refused');
  });

  readonly flush = vi.fn(async (): Promise<void> => {
    throw new Error('connection refused');
  });

  readonly ping = vi.fn(async (): Promise<boolean> => this.alive);

  readonly close = vi.fn(async (): Promise<void> => undefined);
}

export const createTempDir = (): Promise<string> => mkdtemp(path.join(tmpdir(), 'wiki-cache-test-'));

export const removeTempDir = (directory: string): Promise<void> => rm(directory, { recursive: true, force: true });

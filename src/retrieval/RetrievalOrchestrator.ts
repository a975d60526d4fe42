import { ALL_CATEGORIES_KEY, categoryKey, itemKeyForTitle } from '../cache/CacheKeySpace';
import { TieredCache, TieredCacheInfo } from '../cache/TieredCache';
import { CategoryRegistry } from '../categories/CategoryRegistry';
import { CacheStats, CacheStatsManager } from '../CacheStats';
import { CacheUnavailableError, errorMessage, InvalidArgumentError, NotFoundError } from '../errors';
import { CacheEventEmitter } from '../events/CacheEventEmitter';
import { CacheEventFactory } from '../events/CacheEventFactory';
import { RefreshScheduler } from '../refresh/RefreshScheduler';
import { SnapshotStore } from '../snapshots/SnapshotStore';
import { CategorySnapshot, ItemRecord, RefreshTask } from '../types';
import { paginate, validatePageRequest } from '../utils/paginate';
import { VERSION } from '../version';
import { WikiSource } from '../wiki/WikiSource';
import LibLogger from '../logger';

const logger = LibLogger.get('RetrievalOrchestrator');

export interface GetCategoryOptions {
  forceRefresh?: boolean;
  limit?: number;
  offset?: number;
}

export interface CategoryPage {
  status: 'ok';
  /** `cache` when served from the tiered cache, `snapshot` when from the durable snapshot file */
  source: 'cache' | 'snapshot';
  category: string;
  fetchedAt: Date;
  total: number;
  limit: number;
  offset: number;
  items: ItemRecord[];
  /** Refresh triggered by this request */
  refresh?: RefreshTask;
}

export interface CategoryPending {
  status: 'pending';
  category: string;
  retryAfterSeconds: number;
  refresh: RefreshTask;
}

export type CategoryResult = CategoryPage | CategoryPending;

export interface ItemResult {
  /**
   * `cache` for the item key, `category` for a cached snapshot, `wiki` for a
   * direct fetch, `snapshot` for an item file read while the wiki is failing
   */
  source: 'cache' | 'category' | 'wiki' | 'snapshot';
  item: ItemRecord;
}

export interface CategoryListing {
  /** `config` when the wiki directory was unavailable and only configured keys are listed */
  source: 'cache' | 'wiki' | 'config';
  categories: string[];
  configured: Array<{ key: string; name: string }>;
}

/**
 * What a list of requested keys clears: everything when the list is empty or
 * names `all`, otherwise the keys themselves.
 */
export const clearTargetOf = (keys: readonly string[] | undefined): 'all' | string[] =>
  keys === undefined || keys.length === 0 || keys.includes('all') ? 'all' : [...keys];

export type ClearCacheResult =
  | { scope: 'all'; cleared: true }
  | { scope: 'categories'; results: Record<string, boolean> };

export interface ServiceStatus {
  status: 'online';
  version: string;
  cache: TieredCacheInfo;
  fastTierReady: boolean;
  wikiReady: boolean;
  cachedCategories: string[];
  storedSnapshots: string[];
  activeRefreshes: RefreshTask[];
  stats: CacheStats;
  hitRate: string;
}

export interface RetrievalOrchestratorOptions {
  cache: TieredCache;
  snapshots: SnapshotStore;
  source: WikiSource;
  categories: CategoryRegistry;
  scheduler: RefreshScheduler;
  statsManager: CacheStatsManager;
  retryAfterSeconds: number;
  defaultItemsLimit: number;
  maxItemsLimit: number;
  eventEmitter?: CacheEventEmitter;
}

/**
 * Decides for every category and item request whether to answer from the cache,
 * from the durable snapshot while a refresh runs, or with a pending signal.
 */
export class RetrievalOrchestrator {
  private readonly cache: TieredCache;
  private readonly snapshots: SnapshotStore;
  private readonly source: WikiSource;
  private readonly categories: CategoryRegistry;
  private readonly scheduler: RefreshScheduler;
  private readonly statsManager: CacheStatsManager;
  private readonly retryAfterSeconds: number;
  private readonly defaultItemsLimit: number;
  private readonly maxItemsLimit: number;
  private readonly eventEmitter: CacheEventEmitter | undefined;

  constructor(options: RetrievalOrchestratorOptions) {
    this.cache = options.cache;
    this.snapshots = options.snapshots;
    this.source = options.source;
    this.categories = options.categories;
    this.scheduler = options.scheduler;
    this.statsManager = options.statsManager;
    this.retryAfterSeconds = options.retryAfterSeconds;
    this.defaultItemsLimit = options.defaultItemsLimit;
    this.maxItemsLimit = options.maxItemsLimit;
    this.eventEmitter = options.eventEmitter;
  }

  /**
   * A page of a category's items.
   *
   * A cached snapshot is served as is unless `forceRefresh` is set. Otherwise a
   * background refresh is scheduled and the request is answered from whatever
   * exists meanwhile: the cached snapshot (forced refresh), the durable snapshot
   * file, or a pending result carrying a retry hint.
   */
  async getCategory(key: string, options: GetCategoryOptions = {}): Promise<CategoryResult> {
    const page = { limit: options.limit ?? this.defaultItemsLimit, offset: options.offset ?? 0 };
    this.categories.nameOf(key);
    validatePageRequest(page, this.maxItemsLimit);

    this.statsManager.incrementRequests();
    const cached = await this.cache.getAs(categoryKey(key), 'category');

    if (cached && !options.forceRefresh) {
      this.statsManager.incrementHits();
      logger.debug('Category hit', { categoryKey: key, items: cached.items.size });
      return this.categoryPage('cache', cached, page);
    }

    const refresh = this.scheduler.refresh(key);
    if (cached) {
      this.statsManager.incrementHits();
      logger.debug('Forced refresh, serving cached snapshot meanwhile', { categoryKey: key });
      return { ...this.categoryPage('cache', cached, page), refresh };
    }

    this.statsManager.incrementMisses();
    const interim = await this.snapshots.load(key);
    if (interim) {
      this.statsManager.incrementInterim();
      logger.info('Serving durable snapshot while refreshing', { categoryKey: key, items: interim.items.size });
      return { ...this.categoryPage('snapshot', interim, page), refresh };
    }

    this.statsManager.incrementPending();
    logger.info('No data yet, answering pending', { categoryKey: key, state: refresh.state });
    return { status: 'pending', category: key, retryAfterSeconds: this.retryAfterSeconds, refresh };
  }

  /**
   * One item by title: its item key, then the cached category snapshots in
   * configuration order, then the wiki itself. With `category`, only that
   * category is searched and its scoped item key is used.
   *
   * A wiki fetch is written to the item file of the named category, or of every
   * configured category when none is named. Those files answer when the wiki
   * itself fails.
   */
  async getItem(title: string, options: { category?: string } = {}): Promise<ItemResult> {
    const trimmed = title.trim();
    if (trimmed.length === 0) {
      throw new InvalidArgumentError('Item title must not be empty');
    }
    if (options.category !== undefined) {
      this.categories.nameOf(options.category);
    }

    this.statsManager.incrementRequests();
    const key = itemKeyForTitle(trimmed, options.category);

    const cached = await this.cache.getAs(key, 'item');
    if (cached) {
      this.statsManager.incrementHits();
      return { source: 'cache', item: cached };
    }
    this.statsManager.incrementMisses();

    const scan = options.category !== undefined ? [options.category] : this.categories.keys();
    for (const categoryKeyToScan of scan) {
      const snapshot = await this.cache.getAs(categoryKey(categoryKeyToScan), 'category');
      const item = snapshot?.items.get(trimmed);
      if (item) {
        logger.debug('Item found in category snapshot', { title: trimmed, categoryKey: categoryKeyToScan });
        await this.cache.set(key, { kind: 'item', value: item });
        return { source: 'category', item };
      }
    }

    let item: ItemRecord;
    try {
      item = await this.source.fetchItemMetadata(trimmed);
    } catch (error) {
      logger.warning('Direct item fetch failed', { title: trimmed, error: errorMessage(error) });
      const stored = await this.storedItem(trimmed, scan);
      if (stored) {
        return { source: 'snapshot', item: stored };
      }
      throw new NotFoundError(`Item "${trimmed}" not found`, { cause: error });
    }

    this.statsManager.incrementDirectFetches();
    await this.cache.set(key, { kind: 'item', value: item });
    for (const categoryToPersist of scan) {
      await this.persistItem(categoryToPersist, item);
    }
    return { source: 'wiki', item };
  }

  /**
   * Every category the wiki reports, followed by configured keys it does not list.
   */
  async listCategories(): Promise<CategoryListing> {
    let source: CategoryListing['source'];
    let categories: string[];

    const cached = await this.cache.getAs(ALL_CATEGORIES_KEY, 'directory');
    if (cached) {
      source = 'cache';
      categories = [...cached.categories];
    } else {
      try {
        categories = await this.source.fetchAllCategories();
        source = 'wiki';
        if (categories.length > 0) {
          await this.cache.set(ALL_CATEGORIES_KEY, {
            kind: 'directory',
            value: { categories, fetchedAt: new Date() }
          });
        }
      } catch (error) {
        if (error instanceof CacheUnavailableError) {
          throw error;
        }
        logger.warning('Category directory unavailable, listing configured keys', { error: errorMessage(error) });
        source = 'config';
        categories = [];
      }
    }

    const listed = new Set(categories);
    for (const key of this.categories.keys()) {
      if (!listed.has(key)) {
        categories.push(key);
      }
    }

    return {
      source,
      categories,
      configured: this.categories.entries().map(([key, name]) => ({ key, name }))
    };
  }

  /**
   * Evict cached data. `all` flushes both tiers; a list of keys evicts each
   * category snapshot with the scoped and unscoped item keys of its titles.
   * Durable snapshot files stay.
   */
  async clearCache(target: 'all' | readonly string[]): Promise<ClearCacheResult> {
    if (target === 'all') {
      await this.cache.flush();
      this.eventEmitter?.emit(CacheEventFactory.createCacheClearedEvent('all', this.categories.keys()));
      logger.info('Cache cleared');
      return { scope: 'all', cleared: true };
    }

    const results: Record<string, boolean> = {};
    for (const key of target) {
      results[key] = this.categories.has(key) ? await this.evictCategory(key) : false;
    }

    this.eventEmitter?.emit(
      CacheEventFactory.createCacheClearedEvent('categories', Object.keys(results).filter(key => results[key]))
    );
    logger.info('Categories evicted', { results });
    return { scope: 'categories', results };
  }

  async status(): Promise<ServiceStatus> {
    const [fastTierReady, wikiReady, cachedCategories, storedSnapshots] = await Promise.all([
      this.cache.ping(),
      this.source.ping(),
      this.cachedCategoryKeys(),
      this.snapshots.listStored()
    ]);

    return {
      status: 'online',
      version: VERSION,
      cache: this.cache.describe(),
      fastTierReady,
      wikiReady,
      cachedCategories,
      storedSnapshots,
      activeRefreshes: this.scheduler.activeTasks(),
      stats: this.statsManager.getStats(),
      hitRate: this.statsManager.getHitRate()
    };
  }

  private categoryPage(
    source: CategoryPage['source'],
    snapshot: CategorySnapshot,
    request: { limit: number; offset: number }
  ): CategoryPage {
    const page = paginate(Array.from(snapshot.items.values()), request);
    return {
      status: 'ok',
      source,
      category: snapshot.categoryKey,
      fetchedAt: snapshot.fetchedAt,
      total: page.total,
      limit: page.limit,
      offset: page.offset,
      items: page.items
    };
  }

  private async evictCategory(key: string): Promise<boolean> {
    const snapshot = await this.cache.getAs(categoryKey(key), 'category');
    let evicted = await this.cache.delete(categoryKey(key));
    if (snapshot) {
      for (const title of snapshot.items.keys()) {
        evicted = (await this.cache.delete(itemKeyForTitle(title, key))) || evicted;
        evicted = (await this.cache.delete(itemKeyForTitle(title))) || evicted;
      }
    }
    return evicted;
  }

  private async cachedCategoryKeys(): Promise<string[]> {
    const cached: string[] = [];
    for (const key of this.categories.keys()) {
      try {
        if (await this.cache.getAs(categoryKey(key), 'category')) {
          cached.push(key);
        }
      } catch (error) {
        logger.warning('Cache unreadable while collecting status', { categoryKey: key, error: errorMessage(error) });
      }
    }
    return cached;
  }

  private async storedItem(title: string, scan: readonly string[]): Promise<ItemRecord | null> {
    for (const categoryToRead of scan) {
      const stored = await this.snapshots.loadItem(categoryToRead, title);
      // Titles that sanitize alike share a file
      if (stored && stored.title === title) {
        logger.info('Serving item file while the wiki is failing', { title, categoryKey: categoryToRead });
        return stored;
      }
    }
    return null;
  }

  private async persistItem(category: string, item: ItemRecord): Promise<void> {
    try {
      await this.snapshots.saveItem(category, item);
    } catch (error) {
      logger.warning('Item file not written', { categoryKey: category, title: item.title, error: errorMessage(error) });
    }
  }
}

import * as path from 'node:path';
import { TieredCache } from './cache/TieredCache';
import { CacheTier } from './cache/tiers/CacheTier';
import { FileTier } from './cache/tiers/FileTier';
import { MemoryTier } from './cache/tiers/MemoryTier';
import { RedisTier } from './cache/tiers/RedisTier';
import { CategoryRegistry } from './categories/CategoryRegistry';
import { CacheStatsManager } from './CacheStats';
import { CacheEventEmitter } from './events/CacheEventEmitter';
import { WikiCacheOptions } from './Options';
import { RefreshScheduler } from './refresh/RefreshScheduler';
import { RetrievalOrchestrator } from './retrieval/RetrievalOrchestrator';
import { SearchAggregator } from './search/SearchAggregator';
import { SnapshotStore } from './snapshots/SnapshotStore';
import { TTLCalculator } from './ttl/TTLCalculator';
import { MediaWikiClient } from './wiki/MediaWikiClient';
import { WikiSource } from './wiki/WikiSource';
import LibLogger from './logger';

const logger = LibLogger.get('CacheContext');

/**
 * Every long-lived collaborator of the service, wired once per process and
 * handed to the HTTP layer and the CLI.
 */
export interface WikiCacheContext {
  options: WikiCacheOptions;

  /** Two-tier key/value cache */
  cache: TieredCache;

  /** Durable category snapshot files */
  snapshots: SnapshotStore;

  /** The wiki being cached */
  source: WikiSource;

  categories: CategoryRegistry;

  scheduler: RefreshScheduler;

  orchestrator: RetrievalOrchestrator;

  search: SearchAggregator;

  eventEmitter: CacheEventEmitter;

  statsManager: CacheStatsManager;

  /** Stop background refreshes and release tier connections */
  close(): Promise<void>;
}

/**
 * Replacements for the collaborators the context would otherwise build from options.
 * A `fastTier` of null runs without a fast tier.
 */
export interface WikiCacheContextOverrides {
  fastTier?: CacheTier | null;
  durableTier?: CacheTier;
  source?: WikiSource;
  clock?: () => number;
}

export const createFastTier = (options: WikiCacheOptions): CacheTier | null => {
  switch (options.fastTier) {
    case 'redis':
      return new RedisTier(options.redis);
    case 'memory':
      return new MemoryTier();
    case 'none':
      return null;
  }
};

/**
 * Creates a WikiCacheContext from options
 */
export const createWikiCacheContext = (
  options: WikiCacheOptions,
  overrides: WikiCacheContextOverrides = {}
): WikiCacheContext => {
  const eventEmitter = new CacheEventEmitter();
  const statsManager = new CacheStatsManager();
  const categories = new CategoryRegistry(options.wiki.categories);

  const fast = overrides.fastTier !== undefined ? overrides.fastTier : createFastTier(options);
  const cache = new TieredCache({
    fast,
    durable: overrides.durableTier ?? new FileTier(path.join(options.dataDir, 'cache')),
    ttlCalculator: new TTLCalculator(options.ttlConfig),
    healthCheckIntervalMs: options.healthCheckIntervalMs,
    eventEmitter,
    ...(overrides.clock ? { clock: overrides.clock } : {})
  });

  const snapshots = new SnapshotStore(path.join(options.dataDir, 'snapshots'));
  const source = overrides.source ?? new MediaWikiClient({
    apiUrl: options.wiki.apiUrl,
    baseUrl: options.wiki.baseUrl,
    timeoutMs: options.wiki.timeoutMs
  });

  const scheduler = new RefreshScheduler({
    cache,
    snapshots,
    source,
    categories,
    maxConcurrent: options.maxConcurrentRefreshes,
    eventEmitter
  });

  const orchestrator = new RetrievalOrchestrator({
    cache,
    snapshots,
    source,
    categories,
    scheduler,
    statsManager,
    retryAfterSeconds: options.retryAfterSeconds,
    defaultItemsLimit: options.defaultItemsLimit,
    maxItemsLimit: options.maxItemsLimit,
    eventEmitter
  });

  const search = new SearchAggregator({
    cache,
    categories,
    minQueryLength: options.search.minQueryLength,
    maxResults: options.search.maxResults,
    defaultLimit: options.defaultItemsLimit,
    maxLimit: options.maxItemsLimit
  });

  logger.info('Context created', {
    dataDir: options.dataDir,
    fastTier: fast?.implementationType ?? 'none',
    categories: categories.keys()
  });

  return {
    options,
    cache,
    snapshots,
    source,
    categories,
    scheduler,
    orchestrator,
    search,
    eventEmitter,
    statsManager,
    close: async () => {
      await scheduler.close();
      await cache.close();
      eventEmitter.destroy();
      logger.info('Context closed');
    }
  };
};

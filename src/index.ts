// Core cache functionality
export { TieredCache } from './cache/TieredCache';
export type { TieredCacheOptions, TieredCacheInfo } from './cache/TieredCache';
export {
  ALL_CATEGORIES_KEY,
  categoryKey,
  itemKey,
  itemKeyForTitle,
  itemIdOf,
  normalizeQuery,
  searchKey,
  suggestKey,
  ttlClassOf
} from './cache/CacheKeySpace';

// Tier implementations
export type { CacheTier, FastTierType } from './cache/tiers/CacheTier';
export { MemoryTier } from './cache/tiers/MemoryTier';
export { FileTier } from './cache/tiers/FileTier';
export { RedisTier } from './cache/tiers/RedisTier';

// Retrieval, refresh and search
export { RetrievalOrchestrator, clearTargetOf } from './retrieval/RetrievalOrchestrator';
export type {
  CategoryResult,
  CategoryPage,
  CategoryPending,
  ItemResult,
  CategoryListing,
  ClearCacheResult,
  ServiceStatus
} from './retrieval/RetrievalOrchestrator';
export { RefreshScheduler } from './refresh/RefreshScheduler';
export { SearchAggregator } from './search/SearchAggregator';
export type { SearchOptions, SearchPage } from './search/SearchAggregator';
export { CategoryRegistry } from './categories/CategoryRegistry';
export { SnapshotStore, sanitizeTitle } from './snapshots/SnapshotStore';

// Wiki access
export type { WikiSource, CategoryMember } from './wiki/WikiSource';
export { MediaWikiClient } from './wiki/MediaWikiClient';
export { cleanDescription } from './wiki/textCleanup';

// Serialization
export { encodeEntry, decodeEntry } from './codec/PayloadCodec';
export type { CacheEntry } from './codec/PayloadCodec';

// Configuration and wiring
export { createOptions, validateOptions, optionsFromEnv, DEFAULT_CATEGORIES } from './Options';
export type { CorsConfig, WikiCacheOptions, WikiCacheOptionsInput } from './Options';
export { createWikiCacheContext } from './CacheContext';
export type { WikiCacheContext, WikiCacheContextOverrides } from './CacheContext';
export { createApp, corsMiddleware, API_PREFIX } from './http/app';
export { startServer, stopServer, serverPort } from './http/server';

// TTL
export type { TTLConfig, TTLClass } from './ttl/TTLConfig';
export { defaultTTLConfig, validateTTLConfig } from './ttl/TTLConfig';
export { TTLCalculator } from './ttl/TTLCalculator';

// Events and statistics
export { CacheEventEmitter } from './events/CacheEventEmitter';
export { CacheEventFactory } from './events/CacheEventFactory';
export type {
  AnyCacheEvent,
  CacheEventType,
  CacheEventListener,
  CacheSubscription,
  CacheSubscriptionOptions
} from './events/CacheEventTypes';
export { CacheStatsManager } from './CacheStats';
export type { CacheStats } from './CacheStats';

// Errors and types
export * from './errors';
export type * from './types';

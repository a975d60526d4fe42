import { RefreshTask } from '../types';

/**
 * Types of events emitted by the cache, the orchestrator and the refresh scheduler
 */
export type CacheEventType =
  | 'cache_hit'          // A key was served from a cache tier
  | 'cache_miss'         // No tier held a live entry for the key
  | 'tier_demoted'       // The fast tier failed and is skipped until it passes a health check
  | 'tier_restored'      // A demoted fast tier passed a health check
  | 'refresh_scheduled'  // A refresh task was created for a category
  | 'refresh_started'    // A refresh task took a worker slot
  | 'refresh_completed'  // A refresh replaced the category snapshot
  | 'refresh_failed'     // A refresh ended without replacing anything
  | 'cache_cleared';     // Keys were evicted on request

/**
 * Base interface for all cache events
 */
export interface CacheEvent {
  type: CacheEventType;

  /** Epoch milliseconds */
  timestamp: number;

  source: 'cache' | 'orchestrator' | 'scheduler';
}

export interface CacheAccessEvent extends CacheEvent {
  type: 'cache_hit' | 'cache_miss';
  key: string;
  /** Tier that answered a hit */
  tier?: 'fast' | 'durable';
}

export interface TierEvent extends CacheEvent {
  type: 'tier_demoted' | 'tier_restored';
  tier: string;
  error?: string;
}

export interface RefreshEvent extends CacheEvent {
  type: 'refresh_scheduled' | 'refresh_started' | 'refresh_completed' | 'refresh_failed';
  categoryKey: string;
  /** Copy of the task at the time of the event */
  task: RefreshTask;
}

export interface CacheClearedEvent extends CacheEvent {
  type: 'cache_cleared';
  scope: 'all' | 'categories';
  categoryKeys: string[];
}

export type AnyCacheEvent = CacheAccessEvent | TierEvent | RefreshEvent | CacheClearedEvent;

export type CacheEventListener = (event: AnyCacheEvent) => void;

export interface CacheSubscriptionOptions {
  /** Only deliver these event types */
  eventTypes?: CacheEventType[];
  /** Only deliver refresh and clear events touching these categories */
  categoryKeys?: string[];
}

export interface CacheSubscription {
  id: string;
  unsubscribe(): void;
  isActive(): boolean;
}

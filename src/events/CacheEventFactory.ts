import { RefreshTask } from '../types';
import {
  CacheAccessEvent,
  CacheClearedEvent,
  RefreshEvent,
  TierEvent
} from './CacheEventTypes';

/**
 * Factory functions for creating cache events
 */
export class CacheEventFactory {
  private static lastTimestamp = 0;

  /**
   * Strictly increasing timestamps, so events created in the same millisecond
   * still sort in creation order.
   */
  private static timestamp(): number {
    const now = Date.now();
    this.lastTimestamp = now > this.lastTimestamp ? now : this.lastTimestamp + 1;
    return this.lastTimestamp;
  }

  static resetTimestamp(): void {
    this.lastTimestamp = 0;
  }

  static createAccessEvent(
    type: CacheAccessEvent['type'],
    key: string,
    tier?: CacheAccessEvent['tier']
  ): CacheAccessEvent {
    const event: CacheAccessEvent = { type, key, timestamp: this.timestamp(), source: 'cache' };
    if (tier) {
      event.tier = tier;
    }
    return event;
  }

  static createTierEvent(type: TierEvent['type'], tier: string, error?: string): TierEvent {
    const event: TierEvent = { type, tier, timestamp: this.timestamp(), source: 'cache' };
    if (error !== undefined) {
      event.error = error;
    }
    return event;
  }

  static createRefreshEvent(type: RefreshEvent['type'], task: RefreshTask): RefreshEvent {
    return {
      type,
      categoryKey: task.categoryKey,
      task: { ...task },
      timestamp: this.timestamp(),
      source: 'scheduler'
    };
  }

  static createCacheClearedEvent(scope: CacheClearedEvent['scope'], categoryKeys: string[]): CacheClearedEvent {
    return {
      type: 'cache_cleared',
      scope,
      categoryKeys: [...categoryKeys],
      timestamp: this.timestamp(),
      source: 'orchestrator'
    };
  }
}

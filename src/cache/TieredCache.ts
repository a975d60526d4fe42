import { CacheEntry, decodeEntry, encodeEntry } from '../codec/PayloadCodec';
import { CacheUnavailableError, CodecError, errorMessage } from '../errors';
import { CacheEventEmitter } from '../events/CacheEventEmitter';
import { CacheEventFactory } from '../events/CacheEventFactory';
import { TTLCalculator } from '../ttl/TTLCalculator';
import { CachePayload, CachePayloadKind, PayloadOf } from '../types';
import { ttlClassOf } from './CacheKeySpace';
import { CacheTier } from './tiers/CacheTier';
import LibLogger from '../logger';

const logger = LibLogger.get('TieredCache');

export interface TieredCacheOptions {
  /** Fast volatile tier; omit for durable-only operation */
  fast?: CacheTier | null;
  /** Durable local tier */
  durable: CacheTier;
  ttlCalculator: TTLCalculator;
  /** Minimum delay between health checks of a demoted fast tier (milliseconds) */
  healthCheckIntervalMs?: number;
  eventEmitter?: CacheEventEmitter;
  /** Clock in epoch milliseconds, replaceable in tests */
  clock?: () => number;
}

export interface TieredCacheInfo {
  fastTier: string;
  fastTierAvailable: boolean;
  durableTier: string;
}

type TierRole = 'fast' | 'durable';

/**
 * Key/value cache over a fast tier and a durable tier.
 *
 * Reads try the fast tier first and fall back to the durable tier, promoting a
 * durable hit back into the fast tier for its remaining lifetime. Writes go to
 * every available tier and succeed when at least one tier accepted them. A
 * failing fast tier is demoted: it is skipped until a health check passes, and
 * while demoted the check runs at most once per `healthCheckIntervalMs`.
 * Tier failures only surface, as CacheUnavailableError, when every tier failed.
 */
export class TieredCache {
  private readonly fast: CacheTier | null;
  private readonly durable: CacheTier;
  private readonly ttlCalculator: TTLCalculator;
  private readonly healthCheckIntervalMs: number;
  private readonly eventEmitter: CacheEventEmitter | undefined;
  private readonly clock: () => number;

  private fastAvailable: boolean;
  private lastHealthCheck = 0;

  constructor(options: TieredCacheOptions) {
    this.fast = options.fast ?? null;
    this.durable = options.durable;
    this.ttlCalculator = options.ttlCalculator;
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 30000;
    this.eventEmitter = options.eventEmitter;
    this.clock = options.clock ?? Date.now;
    this.fastAvailable = this.fast !== null;

    logger.debug('TieredCache initialized', {
      fastTier: this.fast?.implementationType ?? 'none',
      durableTier: this.durable.implementationType,
      healthCheckIntervalMs: this.healthCheckIntervalMs
    });
  }

  async get(key: string): Promise<CachePayload | null> {
    const entry = await this.getEntry(key);
    return entry ? entry.payload : null;
  }

  /**
   * Read a value expected to be of one payload kind. An entry of another kind
   * under the key is reported as absent.
   */
  async getAs<K extends CachePayloadKind>(key: string, kind: K): Promise<PayloadOf<K> | null> {
    const payload = await this.get(key);
    if (!payload) {
      return null;
    }
    if (!isPayloadOfKind(payload, kind)) {
      logger.warning('Cached value has an unexpected kind', { key, expected: kind, actual: payload.kind });
      return null;
    }
    return payload.value;
  }

  /**
   * Live entry for a key together with its write time and TTL.
   */
  async getEntry(key: string): Promise<CacheEntry | null> {
    const now = this.clock();
    let consulted = 0;
    let failed = 0;

    const fast = await this.activeFastTier();
    if (fast) {
      consulted++;
      try {
        const entry = await this.readTier(fast, 'fast', key, now);
        if (entry) {
          this.emitAccess('cache_hit', key, 'fast');
          return entry;
        }
      } catch (error) {
        failed++;
        this.demote(error);
      }
    }

    consulted++;
    try {
      const entry = await this.readTier(this.durable, 'durable', key, now);
      if (entry) {
        await this.promote(key, entry, now);
        this.emitAccess('cache_hit', key, 'durable');
        return entry;
      }
    } catch (error) {
      failed++;
      logger.error('Durable tier read failed', { key, error: errorMessage(error) });
    }

    if (failed === consulted) {
      throw new CacheUnavailableError(`Every cache tier failed to read "${key}"`);
    }

    this.emitAccess('cache_miss', key);
    return null;
  }

  /**
   * Store a value. The TTL defaults to the TTL class of the key family.
   */
  async set(key: string, payload: CachePayload, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.ttlCalculator.ttlFor(ttlClassOf(key));
    const raw = encodeEntry({ key, payload, writtenAt: this.clock(), ttlSeconds: ttl });
    let stored = 0;

    const fast = await this.activeFastTier();
    if (fast) {
      try {
        await fast.set(key, raw, ttl);
        stored++;
      } catch (error) {
        this.demote(error);
      }
    }

    try {
      await this.durable.set(key, raw, ttl);
      stored++;
    } catch (error) {
      logger.error('Durable tier write failed', { key, error: errorMessage(error) });
    }

    if (stored === 0) {
      throw new CacheUnavailableError(`Every cache tier failed to store "${key}"`);
    }

    logger.trace('Stored', { key, kind: payload.kind, ttl, tiers: stored });
  }

  /**
   * Remove a key from every tier. Resolves true when any tier held it.
   */
  async delete(key: string): Promise<boolean> {
    const results = await Promise.allSettled(this.allTiers().map(tier => tier.delete(key)));
    return this.collect(results, `delete "${key}"`).some(Boolean);
  }

  async flush(): Promise<void> {
    const results = await Promise.allSettled(this.allTiers().map(tier => tier.flush()));
    this.collect(results, 'flush');
    logger.info('Cache flushed', { tiers: this.allTiers().map(tier => tier.implementationType) });
  }

  /**
   * Liveness of the fast tier. A passing probe restores a demoted tier.
   */
  async ping(): Promise<boolean> {
    if (!this.fast) {
      return false;
    }
    const alive = await this.fast.ping();
    this.lastHealthCheck = this.clock();
    if (alive && !this.fastAvailable) {
      this.restore();
    }
    return alive;
  }

  isFastTierAvailable(): boolean {
    return this.fast !== null && this.fastAvailable;
  }

  describe(): TieredCacheInfo {
    return {
      fastTier: this.fast?.implementationType ?? 'none',
      fastTierAvailable: this.isFastTierAvailable(),
      durableTier: this.durable.implementationType
    };
  }

  async close(): Promise<void> {
    await Promise.all(this.allTiers().map(tier => tier.close()));
  }

  private allTiers(): CacheTier[] {
    return this.fast ? [this.fast, this.durable] : [this.durable];
  }

  private collect<T>(results: PromiseSettledResult<T>[], operation: string): T[] {
    const values: T[] = [];
    const tiers = this.allTiers();
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        values.push(result.value);
      } else {
        logger.error('Tier operation failed', {
          operation,
          tier: tiers[index]?.implementationType,
          error: errorMessage(result.reason)
        });
      }
    });

    if (values.length === 0) {
      throw new CacheUnavailableError(`Every cache tier failed to ${operation}`);
    }
    return values;
  }

  private async readTier(tier: CacheTier, role: TierRole, key: string, now: number): Promise<CacheEntry | null> {
    const raw = await tier.get(key);
    if (raw === null) {
      return null;
    }

    let entry: CacheEntry;
    try {
      entry = decodeEntry(raw);
    } catch (error) {
      if (!(error instanceof CodecError)) {
        throw error;
      }
      logger.warning('Evicting undecodable entry', { key, tier: role, error: error.message });
      await this.evict(tier, key);
      return null;
    }

    if (this.ttlCalculator.isExpired(entry.writtenAt, entry.ttlSeconds, now)) {
      logger.debug('Evicting expired entry', { key, tier: role, writtenAt: entry.writtenAt, ttl: entry.ttlSeconds });
      await this.evict(tier, key);
      return null;
    }

    return entry;
  }

  private async evict(tier: CacheTier, key: string): Promise<void> {
    try {
      await tier.delete(key);
    } catch (error) {
      logger.warning('Eviction failed', { key, tier: tier.implementationType, error: errorMessage(error) });
    }
  }

  /**
   * Copy a durable hit into the fast tier for the rest of its lifetime.
   */
  private async promote(key: string, entry: CacheEntry, now: number): Promise<void> {
    const fast = this.fast && this.fastAvailable ? this.fast : null;
    if (!fast) {
      return;
    }
    const remaining = this.ttlCalculator.remainingSeconds(entry.writtenAt, entry.ttlSeconds, now);
    try {
      await fast.set(key, encodeEntry(entry), remaining);
    } catch (error) {
      this.demote(error);
    }
  }

  private async activeFastTier(): Promise<CacheTier | null> {
    if (!this.fast) {
      return null;
    }
    if (this.fastAvailable) {
      return this.fast;
    }

    const now = this.clock();
    if (now - this.lastHealthCheck < this.healthCheckIntervalMs) {
      return null;
    }

    this.lastHealthCheck = now;
    let alive = false;
    try {
      alive = await this.fast.ping();
    } catch (error) {
      logger.debug('Fast tier health check failed', { error: errorMessage(error) });
    }

    if (!alive) {
      return null;
    }
    this.restore();
    return this.fast;
  }

  private demote(error: unknown): void {
    if (!this.fast) {
      return;
    }
    const wasAvailable = this.fastAvailable;
    this.fastAvailable = false;
    this.lastHealthCheck = this.clock();
    logger.warning('Fast tier failed, serving from durable tier', {
      tier: this.fast.implementationType,
      error: errorMessage(error)
    });
    if (wasAvailable) {
      this.eventEmitter?.emit(
        CacheEventFactory.createTierEvent('tier_demoted', this.fast.implementationType, errorMessage(error))
      );
    }
  }

  private restore(): void {
    if (!this.fast) {
      return;
    }
    this.fastAvailable = true;
    logger.info('Fast tier restored', { tier: this.fast.implementationType });
    this.eventEmitter?.emit(CacheEventFactory.createTierEvent('tier_restored', this.fast.implementationType));
  }

  private emitAccess(type: 'cache_hit' | 'cache_miss', key: string, tier?: TierRole): void {
    this.eventEmitter?.emit(CacheEventFactory.createAccessEvent(type, key, tier));
  }
}

const isPayloadOfKind = <K extends CachePayloadKind>(
  payload: CachePayload,
  kind: K
): payload is Extract<CachePayload, { kind: K }> => payload.kind === kind;

import { CacheTier } from './CacheTier';
import LibLogger from '../../logger';

const logger = LibLogger.get('MemoryTier');

interface StoredValue {
  raw: string;
  expiresAt: number | null;
}

export interface MemoryTierOptions {
  /** Clock in epoch milliseconds, replaceable in tests */
  clock?: () => number;
}

/**
 * Volatile in-process tier. Used as the fast tier for single-process
 * deployments and as the stand-in for Redis in tests. Entries expire natively
 * the same way Redis `EX` keys do.
 */
export class MemoryTier implements CacheTier {
  public readonly implementationType = 'memory';

  private storage: Map<string, StoredValue> = new Map();
  private readonly clock: () => number;

  constructor(options: MemoryTierOptions = {}) {
    this.clock = options.clock ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const stored = this.storage.get(key);
    if (!stored) {
      logger.trace('Miss', { key });
      return null;
    }

    if (stored.expiresAt !== null && stored.expiresAt <= this.clock()) {
      this.storage.delete(key);
      logger.trace('Expired', { key });
      return null;
    }

    return stored.raw;
  }

  async set(key: string, raw: string, ttlSeconds: number): Promise<void> {
    const expiresAt = ttlSeconds > 0 ? this.clock() + ttlSeconds * 1000 : null;
    this.storage.set(key, { raw, expiresAt });
  }

  async delete(key: string): Promise<boolean> {
    return this.storage.delete(key);
  }

  async flush(): Promise<void> {
    const count = this.storage.size;
    this.storage.clear();
    logger.debug('Flushed', { count });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.storage.clear();
  }

  get size(): number {
    return this.storage.size;
  }

  keys(): string[] {
    return Array.from(this.storage.keys());
  }
}

/**
 * One backing store of the tiered cache. Tiers store opaque encoded strings;
 * TTL bookkeeping and decoding happen in TieredCache. Every method may reject
 * when the store is unreachable.
 */
export interface CacheTier {
  /** Implementation name, reported by status endpoints */
  readonly implementationType: string;

  get(key: string): Promise<string | null>;

  /** `ttlSeconds` of 0 stores without native expiry */
  set(key: string, raw: string, ttlSeconds: number): Promise<void>;

  /** Resolves true when the key existed */
  delete(key: string): Promise<boolean>;

  flush(): Promise<void>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}

export type FastTierType = 'redis' | 'memory' | 'none';

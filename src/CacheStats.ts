import LibLogger from './logger';

const logger = LibLogger.get('CacheStats');

/**
 * Retrieval statistics reported by the status endpoint
 */
export interface CacheStats {
  /** Total number of category and item lookups */
  numRequests: number;
  /** Lookups answered from a cache tier */
  numHits: number;
  /** Lookups that found nothing in the cache */
  numMisses: number;
  /** Misses answered from the durable snapshot while a refresh runs */
  numInterim: number;
  /** Misses answered with a pending result */
  numPending: number;
  /** Items fetched directly from the wiki */
  numDirectFetches: number;
}

const emptyStats = (): CacheStats => ({
  numRequests: 0,
  numHits: 0,
  numMisses: 0,
  numInterim: 0,
  numPending: 0,
  numDirectFetches: 0
});

/**
 * Cache statistics manager that tracks retrieval outcomes
 */
export class CacheStatsManager {
  private stats: CacheStats = emptyStats();
  private lastLoggedRequests = 0;
  private readonly LOG_THRESHOLD = 100; // Log every 100 requests

  incrementRequests(): void {
    this.stats.numRequests++;
    this.maybeLogStats();
  }

  incrementHits(): void {
    this.stats.numHits++;
  }

  incrementMisses(): void {
    this.stats.numMisses++;
  }

  incrementInterim(): void {
    this.stats.numInterim++;
  }

  incrementPending(): void {
    this.stats.numPending++;
  }

  incrementDirectFetches(): void {
    this.stats.numDirectFetches++;
  }

  /**
   * Hit rate in percent, two decimals
   */
  getHitRate(): string {
    return this.stats.numRequests > 0
      ? ((this.stats.numHits / this.stats.numRequests) * 100).toFixed(2)
      : '0.00';
  }

  private maybeLogStats(): void {
    const requestsSinceLastLog = this.stats.numRequests - this.lastLoggedRequests;

    if (requestsSinceLastLog >= this.LOG_THRESHOLD) {
      logger.debug('Cache statistics update', {
        totalRequests: this.stats.numRequests,
        hits: this.stats.numHits,
        misses: this.stats.numMisses,
        interim: this.stats.numInterim,
        pending: this.stats.numPending,
        hitRate: `${this.getHitRate()}%`
      });
      this.lastLoggedRequests = this.stats.numRequests;
    }
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = emptyStats();
    this.lastLoggedRequests = 0;
  }
}

/**
 * TTL Calculator - resolves the TTL of a key family and answers expiry questions
 * for entries written at a known time.
 */

import { TTLClass, TTLConfig } from './TTLConfig';

export class TTLCalculator {
  constructor(private config: TTLConfig) {}

  /**
   * TTL in seconds for a key family
   */
  ttlFor(ttlClass: TTLClass): number {
    switch (ttlClass) {
      case 'category':
        return this.config.category;
      case 'item':
        return this.config.item;
      case 'search':
        return this.config.search;
      case 'suggest':
        return this.config.suggest ?? Math.floor(this.config.search / 2);
      case 'directory':
        return this.config.directory;
      case 'default':
        return this.config.default;
    }
  }

  /**
   * An entry is expired once `ttlSeconds` have passed since it was written, the
   * same instant a fast-tier key expires. A TTL of 0 never expires.
   */
  isExpired(writtenAt: number, ttlSeconds: number, now: number = Date.now()): boolean {
    if (ttlSeconds <= 0) {
      return false;
    }
    return now - writtenAt >= ttlSeconds * 1000;
  }

  /**
   * Seconds an entry has left, rounded up; 0 for entries that never expire.
   */
  remainingSeconds(writtenAt: number, ttlSeconds: number, now: number = Date.now()): number {
    if (ttlSeconds <= 0) {
      return 0;
    }
    const remainingMs = writtenAt + ttlSeconds * 1000 - now;
    return Math.max(1, Math.ceil(remainingMs / 1000));
  }
}

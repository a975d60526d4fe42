import { beforeEach, describe, expect, it } from 'vitest';
import { CacheStats, CacheStatsManager } from '../src/CacheStats';

describe('CacheStatsManager', () => {
  let statsManager: CacheStatsManager;

  beforeEach(() => {
    statsManager = new CacheStatsManager();
  });

  describe('Initialization', () => {
    it('should start with every counter at zero', () => {
      const expected: CacheStats = {
        numRequests: 0,
        numHits: 0,
        numMisses: 0,
        numInterim: 0,
        numPending: 0,
        numDirectFetches: 0
      };
      expect(statsManager.getStats()).toEqual(expected);
    });

    it('should report a hit rate of 0.00 without requests', () => {
      expect(statsManager.getHitRate()).toBe('0.00');
    });
  });

  describe('Request Tracking', () => {
    it('should count each outcome separately', () => {
      statsManager.incrementRequests();
      statsManager.incrementRequests();
      statsManager.incrementRequests();
      statsManager.incrementHits();
      statsManager.incrementMisses();
      statsManager.incrementMisses();
      statsManager.incrementInterim();
      statsManager.incrementPending();
      statsManager.incrementDirectFetches();

      expect(statsManager.getStats()).toEqual({
        numRequests: 3,
        numHits: 1,
        numMisses: 2,
        numInterim: 1,
        numPending: 1,
        numDirectFetches: 1
      });
    });

    it('should count past the logging threshold', () => {
      for (let i = 0; i < 150; i++) {
        statsManager.incrementRequests();
      }
      expect(statsManager.getStats().numRequests).toBe(150);
    });
  });

  describe('Hit Rate', () => {
    it('should format the hit rate with two decimals', () => {
      statsManager.incrementRequests();
      statsManager.incrementRequests();
      statsManager.incrementRequests();
      statsManager.incrementHits();

      expect(statsManager.getHitRate()).toBe('33.33');
    });

    it('should report 100.00 when every request hit', () => {
      statsManager.incrementRequests();
      statsManager.incrementHits();

      expect(statsManager.getHitRate()).toBe('100.00');
    });
  });

  describe('Snapshots and Reset', () => {
    it('should return a copy of the counters', () => {
      const stats = statsManager.getStats();
      stats.numHits = 99;
      expect(statsManager.getStats().numHits).toBe(0);
    });

    it('should reset every counter', () => {
      statsManager.incrementRequests();
      statsManager.incrementHits();
      statsManager.reset();

      expect(statsManager.getStats().numRequests).toBe(0);
      expect(statsManager.getHitRate()).toBe('0.00');
    });
  });
});

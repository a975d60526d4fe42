import { describe, expect, it } from 'vitest';
import * as WikiCache from '../src/index';

describe('package exports', () => {
  it('should expose the service building blocks', () => {
    expect(typeof WikiCache.createWikiCacheContext).toBe('function');
    expect(typeof WikiCache.createApp).toBe('function');
    expect(typeof WikiCache.TieredCache).toBe('function');
    expect(typeof WikiCache.RefreshScheduler).toBe('function');
    expect(WikiCache.API_PREFIX).toBe('/api/v1/wiki');
  });

  it('should expose the error classes', () => {
    const error = new WikiCache.NotFoundError('missing');
    expect(error).toBeInstanceOf(WikiCache.WikiCacheError);
    expect(error.code).toBe('NOT_FOUND');
    expect(error.name).toBe('NotFoundError');
  });
});

/**
 * TTL Configuration
 *
 * Each family of cache keys has its own time-to-live. Search results and
 * suggestions rot faster than the category data they are computed from,
 * because the snapshot behind them may still be refreshing.
 */

export type TTLClass = 'category' | 'item' | 'search' | 'suggest' | 'directory' | 'default';

export interface TTLConfig {
  /** Fallback TTL in seconds for keys outside the known families */
  default: number;
  /** Category snapshots (seconds) */
  category: number;
  /** Individually cached items (seconds) */
  item: number;
  /** Search result sets (seconds) */
  search: number;
  /** Title suggestions (seconds, defaults to half the search TTL) */
  suggest?: number;
  /** The wiki's category directory (seconds) */
  directory: number;
}

export const defaultTTLConfig: TTLConfig = {
  default: 3600,
  category: 3600,
  item: 3600,
  search: 300,
  directory: 86400
};

export const validateTTLConfig = (config: TTLConfig): void => {
  const entries: Array<[string, number | undefined]> = [
    ['default', config.default],
    ['category', config.category],
    ['item', config.item],
    ['search', config.search],
    ['suggest', config.suggest],
    ['directory', config.directory]
  ];

  for (const [name, value] of entries) {
    if (value === undefined) continue;
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`TTL "${name}" must be a non-negative integer number of seconds, got ${value}`);
    }
  }

  if (config.search > config.category && config.category > 0) {
    throw new Error(
      `Search TTL (${config.search}s) must not exceed the category TTL (${config.category}s): ` +
      'search results are computed from category snapshots'
    );
  }
};

import { categoryKey, normalizeQuery, searchKey, suggestKey } from '../cache/CacheKeySpace';
import { TieredCache } from '../cache/TieredCache';
import { CategoryRegistry } from '../categories/CategoryRegistry';
import { InvalidArgumentError } from '../errors';
import { ItemRecord, SearchResultSet } from '../types';
import { paginate, validatePageRequest } from '../utils/paginate';
import LibLogger from '../logger';

const logger = LibLogger.get('SearchAggregator');

const MIN_SUGGEST_LENGTH = 2;

export interface SearchOptions {
  /** Category keys or wiki category names */
  categories?: readonly string[];
  limit?: number;
  offset?: number;
}

export interface SearchPage {
  query: string;
  normalizedQuery: string;
  categories?: string[];
  /** Whether the result set came from the cache */
  cached: boolean;
  total: number;
  limit: number;
  offset: number;
  results: ItemRecord[];
}

export interface SearchAggregatorOptions {
  cache: TieredCache;
  categories: CategoryRegistry;
  minQueryLength: number;
  maxResults: number;
  defaultLimit: number;
  maxLimit: number;
}

/**
 * Substring search over the cached category snapshots. Result sets are cached
 * per normalized query and filter set under the short search TTL.
 */
export class SearchAggregator {
  constructor(private readonly options: SearchAggregatorOptions) {}

  async search(query: string, options: SearchOptions = {}): Promise<SearchPage> {
    const normalizedQuery = normalizeQuery(query);
    if (normalizedQuery.length < this.options.minQueryLength) {
      throw new InvalidArgumentError(
        `Search query must be at least ${this.options.minQueryLength} characters long`
      );
    }

    const filters = options.categories && options.categories.length > 0
      ? this.options.categories.resolveFilter(options.categories)
      : undefined;
    const page = { limit: options.limit ?? this.options.defaultLimit, offset: options.offset ?? 0 };
    validatePageRequest(page, this.options.maxLimit);

    const key = searchKey(normalizedQuery, filters);
    let resultSet = await this.options.cache.getAs(key, 'search');
    const cached = resultSet !== null;

    if (!resultSet) {
      resultSet = await this.compute(normalizedQuery, filters);
      await this.options.cache.set(key, { kind: 'search', value: resultSet });
    }

    const { total, limit, offset, items } = paginate(resultSet.items, page);
    const result: SearchPage = { query, normalizedQuery, cached, total, limit, offset, results: items };
    if (filters) {
      result.categories = filters;
    }
    return result;
  }

  /**
   * Titles of cached items with a word starting with `prefix`, sorted.
   */
  async suggest(prefix: string, limit: number = 10): Promise<string[]> {
    const normalized = normalizeQuery(prefix);
    if (normalized.length < MIN_SUGGEST_LENGTH) {
      throw new InvalidArgumentError(`Suggestion prefix must be at least ${MIN_SUGGEST_LENGTH} characters long`);
    }
    validatePageRequest({ limit, offset: 0 }, this.options.maxLimit);

    const key = suggestKey(normalized, limit);
    const cached = await this.options.cache.getAs(key, 'suggestions');
    if (cached) {
      return cached;
    }

    const titles = new Set<string>();
    for (const category of this.options.categories.keys()) {
      const snapshot = await this.options.cache.getAs(categoryKey(category), 'category');
      for (const title of snapshot?.items.keys() ?? []) {
        const words = normalizeQuery(title);
        if (words.startsWith(normalized) || words.includes(` ${normalized}`)) {
          titles.add(title);
        }
      }
    }

    const suggestions = Array.from(titles).sort((a, b) => a.localeCompare(b)).slice(0, limit);
    await this.options.cache.set(key, { kind: 'suggestions', value: suggestions });
    return suggestions;
  }

  private async compute(normalizedQuery: string, filters: string[] | undefined): Promise<SearchResultSet> {
    const scanned = filters ?? this.options.categories.keys();
    const collected = new Map<string, ItemRecord>();
    let skipped = 0;

    for (const category of scanned) {
      const snapshot = await this.options.cache.getAs(categoryKey(category), 'category');
      if (!snapshot) {
        skipped++;
        continue;
      }
      for (const [title, item] of snapshot.items) {
        if (collected.has(title) || !matches(normalizedQuery, title, item)) {
          continue;
        }
        collected.set(title, {
          ...item,
          categories: item.categories.includes(category) ? [...item.categories] : [...item.categories, category]
        });
      }
    }

    const items = Array.from(collected.values()).slice(0, this.options.maxResults);
    logger.debug('Search computed', {
      normalizedQuery,
      filters,
      matched: collected.size,
      returned: items.length,
      categoriesWithoutData: skipped
    });

    const resultSet: SearchResultSet = { normalizedQuery, items, computedAt: new Date() };
    if (filters) {
      resultSet.filterCategories = filters;
    }
    return resultSet;
  }
}

/** Case-insensitive substring match on title, description and sections. */
export const matches = (normalizedQuery: string, title: string, item: ItemRecord): boolean => {
  if (title.toLowerCase().includes(normalizedQuery)) {
    return true;
  }
  if (item.description && item.description.toLowerCase().includes(normalizedQuery)) {
    return true;
  }
  return item.sections.some(section =>
    section.title.toLowerCase().includes(normalizedQuery) ||
    section.content.toLowerCase().includes(normalizedQuery)
  );
};

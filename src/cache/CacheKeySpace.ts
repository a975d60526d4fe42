import { TTLClass } from '../ttl/TTLConfig';

/**
 * Cache key conventions. Every key the service writes is built here so the
 * families below never overlap:
 *
 * - `category:{categoryKey}`
 * - `item:{categoryKey}:{itemId}` and the category-independent `item:{itemId}`
 * - `search:{query}` and `search:{query}:{filters}`
 * - `suggest:{prefix}:{limit}`
 * - `all_categories`
 *
 * Item ids and query text are URI-encoded, so they never contain `:`.
 */

export const ALL_CATEGORIES_KEY = 'all_categories';

const CATEGORY_PREFIX = 'category:';
const ITEM_PREFIX = 'item:';
const SEARCH_PREFIX = 'search:';
const SUGGEST_PREFIX = 'suggest:';

/**
 * Lowercase, trim and collapse internal whitespace.
 * Two queries differing only in case or spacing normalize identically.
 */
export const normalizeQuery = (query: string): string =>
  query.trim().replace(/\s+/g, ' ').toLowerCase();

export const itemIdOf = (title: string): string => encodeURIComponent(title);

export const categoryKey = (key: string): string => `${CATEGORY_PREFIX}${key}`;

export const itemKey = (category: string | undefined, itemId: string): string =>
  category ? `${ITEM_PREFIX}${category}:${itemId}` : `${ITEM_PREFIX}${itemId}`;

/** Item key for a page title, scoped to a category when one is given. */
export const itemKeyForTitle = (title: string, category?: string): string =>
  itemKey(category, itemIdOf(title));

/**
 * Search result key. Filters are part of the key, sorted so their order in the
 * request does not matter.
 */
export const searchKey = (normalizedQuery: string, filters?: readonly string[]): string => {
  const base = `${SEARCH_PREFIX}${encodeURIComponent(normalizedQuery)}`;
  if (!filters || filters.length === 0) {
    return base;
  }
  const sorted = Array.from(new Set(filters)).sort();
  return `${base}:${sorted.join(',')}`;
};

export const suggestKey = (normalizedPrefix: string, limit: number): string =>
  `${SUGGEST_PREFIX}${encodeURIComponent(normalizedPrefix)}:${limit}`;

export const ttlClassOf = (key: string): TTLClass => {
  if (key === ALL_CATEGORIES_KEY) return 'directory';
  if (key.startsWith(CATEGORY_PREFIX)) return 'category';
  if (key.startsWith(ITEM_PREFIX)) return 'item';
  if (key.startsWith(SEARCH_PREFIX)) return 'search';
  if (key.startsWith(SUGGEST_PREFIX)) return 'suggest';
  return 'default';
};

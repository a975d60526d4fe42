export interface ImageRef {
  title: string;
  url: string;
}

export interface Section {
  title: string;
  content: string;
}

/**
 * Metadata scraped for a single wiki page.
 */
export interface ItemRecord {
  /** Page id reported by the wiki, when known */
  id?: number;
  title: string;
  url: string;
  description?: string | null;
  /** Category names, without duplicates */
  categories: string[];
  images: ImageRef[];
  sections: Section[];
  relatedPages: string[];
  infobox: Record<string, unknown>;
}

/**
 * The full item set of one category at a point in time.
 * `items` keeps insertion order, which is the order pagination walks.
 */
export interface CategorySnapshot {
  categoryKey: string;
  items: Map<string, ItemRecord>;
  fetchedAt: Date;
}

export interface SearchResultSet {
  normalizedQuery: string;
  filterCategories?: string[];
  items: ItemRecord[];
  computedAt: Date;
}

export interface CategoryDirectory {
  categories: string[];
  fetchedAt: Date;
}

export type RefreshState = 'pending' | 'running' | 'done' | 'failed';

export interface RefreshTask {
  categoryKey: string;
  state: RefreshState;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  itemCount?: number;
  error?: string;
}

/** A scalar stored directly in the cache */
export type ScalarValue = string | number | boolean | null;

/**
 * Everything the tiered cache accepts, tagged by entity kind.
 */
export type CachePayload =
  | { kind: 'category'; value: CategorySnapshot }
  | { kind: 'item'; value: ItemRecord }
  | { kind: 'search'; value: SearchResultSet }
  | { kind: 'directory'; value: CategoryDirectory }
  | { kind: 'suggestions'; value: string[] }
  | { kind: 'scalar'; value: ScalarValue };

export type CachePayloadKind = CachePayload['kind'];

export type PayloadOf<K extends CachePayloadKind> = Extract<CachePayload, { kind: K }>['value'];

export interface Page<T> {
  total: number;
  limit: number;
  offset: number;
  items: T[];
}

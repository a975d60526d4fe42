import { ItemRecord } from '../types';

export interface CategoryMember {
  pageid?: number;
  title: string;
}

/**
 * Read access to the wiki the service caches.
 *
 * `fetchItemMetadata` fails with NotFoundError for a page the wiki does not have
 * and UpstreamUnavailableError when the wiki cannot be reached. The listing
 * calls return what they gathered before a transient failure.
 */
export interface WikiSource {
  fetchCategoryMembers(categoryName: string): Promise<CategoryMember[]>;
  fetchItemMetadata(title: string): Promise<ItemRecord>;
  /** Metadata of every member of a category, keyed by title in listing order */
  scrapeCategory(categoryName: string, limit?: number): Promise<Map<string, ItemRecord>>;
  fetchAllCategories(): Promise<string[]>;
  ping(): Promise<boolean>;
}

import { InvalidArgumentError, NotFoundError } from '../errors';

/**
 * The fixed, ordered set of categories the service caches, each key mapped to
 * the wiki category it is scraped from.
 */
export class CategoryRegistry {
  private readonly names: Map<string, string>;
  private readonly keysByName: Map<string, string>;

  constructor(categories: Record<string, string>) {
    this.names = new Map(Object.entries(categories));
    this.keysByName = new Map();
    for (const [key, name] of this.names) {
      this.keysByName.set(name.toLowerCase(), key);
    }
  }

  keys(): string[] {
    return Array.from(this.names.keys());
  }

  entries(): Array<[string, string]> {
    return Array.from(this.names.entries());
  }

  has(key: string): boolean {
    return this.names.has(key);
  }

  nameOf(key: string): string {
    const name = this.names.get(key);
    if (name === undefined) {
      throw new NotFoundError(`Category "${key}" not found`);
    }
    return name;
  }

  /** Category key for a key or a wiki category name (names match case-insensitively). */
  resolve(value: string): string | undefined {
    const trimmed = value.trim();
    if (this.names.has(trimmed)) {
      return trimmed;
    }
    return this.keysByName.get(trimmed.toLowerCase());
  }

  /**
   * Resolve search filters to category keys, in configuration order and without
   * duplicates.
   */
  resolveFilter(values: readonly string[]): string[] {
    const resolved = new Set<string>();
    const unknown: string[] = [];
    for (const value of values) {
      const key = this.resolve(value);
      if (key === undefined) {
        unknown.push(value);
      } else {
        resolved.add(key);
      }
    }

    if (unknown.length > 0) {
      throw new InvalidArgumentError(
        `Unknown categories: ${unknown.join(', ')}. Available: ${this.keys().join(', ')}`
      );
    }
    return this.keys().filter(key => resolved.has(key));
  }
}

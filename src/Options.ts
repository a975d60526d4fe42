import { z } from 'zod';
import { FastTierType } from './cache/tiers/CacheTier';
import { defaultTTLConfig, TTLConfig, validateTTLConfig } from './ttl/TTLConfig';
import LibLogger from './logger';

const logger = LibLogger.get('Options');

/**
 * HTTP listener settings
 */
export interface ServerConfig {
  host: string;
  port: number;
}

/**
 * Connection settings for the redis fast tier
 */
export interface RedisConfig {
  url: string;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

/**
 * The wiki the service caches
 */
export interface WikiConfig {
  /** MediaWiki `api.php` endpoint */
  apiUrl: string;
  /** Prefix of article URLs */
  baseUrl: string;
  /** Timeout of a single wiki request in milliseconds */
  timeoutMs: number;
  /** Ordered category keys mapped to wiki category names */
  categories: Record<string, string>;
}

/**
 * Browser origins allowed to call the API
 */
export interface CorsConfig {
  /** Exact origins; `*` allows any origin */
  origins: string[];
}

export interface SearchConfig {
  /** Shortest normalized query accepted */
  minQueryLength: number;
  /** Cap on a cached result set */
  maxResults: number;
}

/**
 * Service options
 */
export interface WikiCacheOptions {
  server: ServerConfig;

  cors: CorsConfig;

  /** Root of the durable cache files and category snapshots */
  dataDir: string;

  /** Fast tier in front of the durable tier */
  fastTier: FastTierType;

  redis: RedisConfig;

  /** TTL per key family */
  ttlConfig: TTLConfig;

  /** Minimum delay between health checks of a demoted fast tier */
  healthCheckIntervalMs: number;

  search: SearchConfig;

  /** Worker slots for background category refreshes */
  maxConcurrentRefreshes: number;

  /** Retry hint sent with pending answers, in seconds */
  retryAfterSeconds: number;

  /** Page size when a request names none */
  defaultItemsLimit: number;

  /** Largest page size a request may ask for */
  maxItemsLimit: number;

  wiki: WikiConfig;
}

export type WikiCacheOptionsInput = Partial<Omit<WikiCacheOptions, 'server' | 'cors' | 'redis' | 'ttlConfig' | 'search' | 'wiki'>> & {
  server?: Partial<ServerConfig>;
  cors?: Partial<CorsConfig>;
  redis?: Partial<RedisConfig>;
  ttlConfig?: Partial<TTLConfig>;
  search?: Partial<SearchConfig>;
  wiki?: Partial<WikiConfig>;
};

export const DEFAULT_CATEGORIES: Record<string, string> = {
  characters: 'Cyberpunk 2077 Characters',
  vehicles: 'Cyberpunk 2077 Vehicles',
  weapons: 'Weapons in Cyberpunk 2077',
  locations: 'Cyberpunk 2077 Locations',
  perks: 'Perks in Cyberpunk 2077',
  items: 'Items in Cyberpunk 2077'
};

const DEFAULT_OPTIONS: WikiCacheOptions = {
  server: { host: '0.0.0.0', port: 8000 },
  cors: { origins: ['http://localhost:3000', 'http://localhost:8000'] },
  dataDir: 'data',
  fastTier: 'memory',
  redis: { url: 'redis://localhost:6379/0', connectTimeoutMs: 5000, commandTimeoutMs: 2000 },
  ttlConfig: defaultTTLConfig,
  healthCheckIntervalMs: 30000,
  search: { minQueryLength: 3, maxResults: 20 },
  maxConcurrentRefreshes: 2,
  retryAfterSeconds: 30,
  defaultItemsLimit: 20,
  maxItemsLimit: 100,
  wiki: {
    apiUrl: 'https://cyberpunk.fandom.com/api.php',
    baseUrl: 'https://cyberpunk.fandom.com/wiki/',
    timeoutMs: 30000,
    categories: DEFAULT_CATEGORIES
  }
};

/**
 * Create service options with defaults
 */
export const createOptions = (input: WikiCacheOptionsInput = {}): WikiCacheOptions => {
  // Nested objects are copied so instances never share mutable config
  const result: WikiCacheOptions = {
    ...DEFAULT_OPTIONS,
    ...input,
    server: { ...DEFAULT_OPTIONS.server, ...input.server },
    cors: { origins: [...(input.cors?.origins ?? DEFAULT_OPTIONS.cors.origins)] },
    redis: { ...DEFAULT_OPTIONS.redis, ...input.redis },
    ttlConfig: { ...DEFAULT_OPTIONS.ttlConfig, ...input.ttlConfig },
    search: { ...DEFAULT_OPTIONS.search, ...input.search },
    wiki: {
      ...DEFAULT_OPTIONS.wiki,
      ...input.wiki,
      categories: { ...(input.wiki?.categories ?? DEFAULT_OPTIONS.wiki.categories) }
    }
  };

  validateOptions(result);
  return result;
};

const VALID_PROPERTIES = new Set(Object.keys(DEFAULT_OPTIONS));
const FAST_TIERS: readonly FastTierType[] = ['redis', 'memory', 'none'];
const CATEGORY_KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

const requirePositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
};

/**
 * Validate service options
 */
export const validateOptions = (options: WikiCacheOptions): void => {
  const unknownProperties = Object.keys(options).filter(key => !VALID_PROPERTIES.has(key));
  if (unknownProperties.length > 0) {
    logger.error('Unknown options', { unknownProperties, validProperties: Array.from(VALID_PROPERTIES) });
    throw new Error(
      `Unknown configuration properties: ${unknownProperties.join(', ')}. ` +
      `Valid properties are: ${Array.from(VALID_PROPERTIES).join(', ')}`
    );
  }

  if (!Number.isInteger(options.server.port) || options.server.port < 0 || options.server.port > 65535) {
    throw new Error(`server.port must be an integer between 0 and 65535, got ${options.server.port}`);
  }

  const blankOrigin = options.cors.origins.find(origin => origin.trim().length === 0);
  if (blankOrigin !== undefined) {
    throw new Error('cors.origins must not contain blank entries');
  }

  if (options.dataDir.trim().length === 0) {
    throw new Error('dataDir must not be empty');
  }

  if (!FAST_TIERS.includes(options.fastTier)) {
    throw new Error(`fastTier must be one of ${FAST_TIERS.join(', ')}, got ${String(options.fastTier)}`);
  }

  if (options.fastTier === 'redis' && options.redis.url.trim().length === 0) {
    throw new Error('redis.url is required when fastTier is "redis"');
  }

  validateTTLConfig(options.ttlConfig);

  requirePositiveInteger('search.minQueryLength', options.search.minQueryLength);
  requirePositiveInteger('search.maxResults', options.search.maxResults);
  requirePositiveInteger('maxConcurrentRefreshes', options.maxConcurrentRefreshes);
  requirePositiveInteger('retryAfterSeconds', options.retryAfterSeconds);
  requirePositiveInteger('defaultItemsLimit', options.defaultItemsLimit);
  requirePositiveInteger('maxItemsLimit', options.maxItemsLimit);
  requirePositiveInteger('wiki.timeoutMs', options.wiki.timeoutMs);

  if (!Number.isInteger(options.healthCheckIntervalMs) || options.healthCheckIntervalMs < 0) {
    throw new Error(`healthCheckIntervalMs must be a non-negative integer, got ${options.healthCheckIntervalMs}`);
  }

  if (options.defaultItemsLimit > options.maxItemsLimit) {
    throw new Error(
      `defaultItemsLimit (${options.defaultItemsLimit}) must not exceed maxItemsLimit (${options.maxItemsLimit})`
    );
  }

  const categoryKeys = Object.keys(options.wiki.categories);
  if (categoryKeys.length === 0) {
    throw new Error('wiki.categories must name at least one category');
  }
  for (const key of categoryKeys) {
    if (!CATEGORY_KEY_PATTERN.test(key) || key === 'all') {
      throw new Error(
        `Invalid category key "${key}": use letters, digits, "_" or "-", and not the reserved word "all"`
      );
    }
  }
};

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envInt = z.preprocess(blankToUndefined, z.coerce.number().int().optional());
const envString = z.preprocess(blankToUndefined, z.string().optional());

const CategoriesJson = z.string().transform((raw, ctx) => {
  try {
    return JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'WIKI_CATEGORIES must be a JSON object' });
    return z.NEVER;
  }
}).pipe(z.record(z.string(), z.string().min(1)));

/** A JSON array, or a comma-separated list */
const OriginList = z.string().transform(raw => {
  const trimmed = raw.trim();
  if (trimmed.startsWith('[')) {
    try {
      return JSON.parse(trimmed);
    } catch {
      return [trimmed];
    }
  }
  return trimmed.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0);
}).pipe(z.array(z.string().min(1)));

const EnvSchema = z.object({
  PORT: envInt,
  HOST: envString,
  CORS_ORIGINS: z.preprocess(blankToUndefined, OriginList.optional()),
  DATA_DIR: envString,
  FAST_TIER: z.preprocess(blankToUndefined, z.enum(['redis', 'memory', 'none']).optional()),
  REDIS_URL: envString,
  CACHE_TTL: envInt,
  ITEM_CACHE_TTL: envInt,
  SEARCH_CACHE_TTL: envInt,
  DIRECTORY_CACHE_TTL: envInt,
  SEARCH_MIN_QUERY_LENGTH: envInt,
  SEARCH_MAX_RESULTS: envInt,
  MAX_CONCURRENT_REFRESHES: envInt,
  RETRY_AFTER_SECONDS: envInt,
  WIKI_API_URL: envString,
  WIKI_BASE_URL: envString,
  WIKI_CATEGORIES: z.preprocess(blankToUndefined, CategoriesJson.optional()),
  DEFAULT_ITEMS_LIMIT: envInt
});

/**
 * Options from environment variables, on top of the defaults.
 */
export const optionsFromEnv = (env: NodeJS.ProcessEnv = process.env): WikiCacheOptions => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`);
  }
  const vars = parsed.data;

  const input: WikiCacheOptionsInput = {
    server: pickDefined({ host: vars.HOST, port: vars.PORT }),
    cors: pickDefined({ origins: vars.CORS_ORIGINS }),
    redis: pickDefined({ url: vars.REDIS_URL }),
    ttlConfig: pickDefined({
      default: vars.CACHE_TTL,
      category: vars.CACHE_TTL,
      item: vars.ITEM_CACHE_TTL,
      search: vars.SEARCH_CACHE_TTL,
      directory: vars.DIRECTORY_CACHE_TTL
    }),
    search: pickDefined({ minQueryLength: vars.SEARCH_MIN_QUERY_LENGTH, maxResults: vars.SEARCH_MAX_RESULTS }),
    wiki: pickDefined({ apiUrl: vars.WIKI_API_URL, baseUrl: vars.WIKI_BASE_URL, categories: vars.WIKI_CATEGORIES }),
    ...pickDefined({
      dataDir: vars.DATA_DIR,
      fastTier: vars.FAST_TIER,
      maxConcurrentRefreshes: vars.MAX_CONCURRENT_REFRESHES,
      retryAfterSeconds: vars.RETRY_AFTER_SECONDS,
      defaultItemsLimit: vars.DEFAULT_ITEMS_LIMIT
    })
  };

  return createOptions(input);
};

/** Drop undefined entries so they do not override defaults when spread. */
const pickDefined = <T extends object>(values: T): Partial<T> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));

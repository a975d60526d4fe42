import safeStringify from 'fast-safe-stringify';
import { z } from 'zod';
import { CodecError, errorMessage } from '../errors';
import {
  CachePayload,
  CachePayloadKind,
  CategoryDirectory,
  CategorySnapshot,
  ItemRecord,
  SearchResultSet
} from '../types';

/**
 * Single serialization boundary for everything that leaves the process:
 * cache tier values and durable snapshot files. Documents are written with
 * fast-safe-stringify and every read goes back through a zod schema, so a
 * foreign or truncated value never reaches the orchestrator as data.
 */

export const ENTRY_FORMAT_VERSION = 1;

const ImageRefSchema = z.object({
  title: z.string(),
  url: z.string()
});

const SectionSchema = z.object({
  title: z.string(),
  content: z.string()
});

export const ItemRecordSchema = z.object({
  id: z.number().int().optional(),
  title: z.string().min(1),
  url: z.string(),
  description: z.string().nullable().optional(),
  categories: z.array(z.string()).default([]),
  images: z.array(ImageRefSchema).default([]),
  sections: z.array(SectionSchema).default([]),
  relatedPages: z.array(z.string()).default([]),
  infobox: z.record(z.string(), z.unknown()).default({})
});

const IsoDate = z.string().datetime();

export const SnapshotDocumentSchema = z.object({
  categoryKey: z.string().min(1),
  fetchedAt: IsoDate,
  // Ordered [title, record] pairs; an object would reorder integer-like titles.
  items: z.array(z.tuple([z.string(), ItemRecordSchema]))
});

const SearchDocumentSchema = z.object({
  normalizedQuery: z.string(),
  filterCategories: z.array(z.string()).optional(),
  items: z.array(ItemRecordSchema),
  computedAt: IsoDate
});

const DirectoryDocumentSchema = z.object({
  categories: z.array(z.string()),
  fetchedAt: IsoDate
});

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const PAYLOAD_KINDS = ['category', 'item', 'search', 'directory', 'suggestions', 'scalar'] as const;

const EntryEnvelopeSchema = z.object({
  v: z.literal(ENTRY_FORMAT_VERSION),
  key: z.string(),
  kind: z.enum(PAYLOAD_KINDS),
  writtenAt: z.number().int().nonnegative(),
  ttlSeconds: z.number().int().nonnegative(),
  data: z.unknown()
});

export type SnapshotDocument = z.infer<typeof SnapshotDocumentSchema>;

/**
 * One stored cache value together with the bookkeeping needed for TTL checks.
 * `writtenAt` is epoch milliseconds; `ttlSeconds` of 0 never expires.
 */
export interface CacheEntry {
  key: string;
  payload: CachePayload;
  writtenAt: number;
  ttlSeconds: number;
}

export const snapshotToDocument = (snapshot: CategorySnapshot): SnapshotDocument => ({
  categoryKey: snapshot.categoryKey,
  fetchedAt: snapshot.fetchedAt.toISOString(),
  items: Array.from(snapshot.items.entries())
});

export const snapshotFromDocument = (doc: SnapshotDocument): CategorySnapshot => ({
  categoryKey: doc.categoryKey,
  fetchedAt: new Date(doc.fetchedAt),
  items: new Map(doc.items)
});

const parseWith = <T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> => {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new CodecError(`Invalid ${what} document: ${result.error.issues[0]?.message ?? 'unknown issue'}`, {
      cause: result.error
    });
  }
  return result.data;
};

export const parseItemRecord = (data: unknown): ItemRecord =>
  parseWith(ItemRecordSchema, data, 'item');

export const parseSnapshotDocument = (data: unknown): CategorySnapshot =>
  snapshotFromDocument(parseWith(SnapshotDocumentSchema, data, 'snapshot'));

/**
 * Plain JSON document for a payload value (Maps become ordered pairs, Dates ISO strings).
 */
export const toDocument = (payload: CachePayload): unknown => {
  switch (payload.kind) {
    case 'category':
      return snapshotToDocument(payload.value);
    case 'search':
      return {
        normalizedQuery: payload.value.normalizedQuery,
        filterCategories: payload.value.filterCategories,
        items: payload.value.items,
        computedAt: payload.value.computedAt.toISOString()
      };
    case 'directory':
      return {
        categories: payload.value.categories,
        fetchedAt: payload.value.fetchedAt.toISOString()
      };
    case 'item':
    case 'suggestions':
    case 'scalar':
      return payload.value;
  }
};

export const fromDocument = (kind: CachePayloadKind, data: unknown): CachePayload => {
  switch (kind) {
    case 'category':
      return { kind, value: parseSnapshotDocument(data) };
    case 'item':
      return { kind, value: parseItemRecord(data) };
    case 'search': {
      const doc = parseWith(SearchDocumentSchema, data, 'search');
      const value: SearchResultSet = {
        normalizedQuery: doc.normalizedQuery,
        items: doc.items,
        computedAt: new Date(doc.computedAt)
      };
      if (doc.filterCategories) {
        value.filterCategories = doc.filterCategories;
      }
      return { kind, value };
    }
    case 'directory': {
      const doc = parseWith(DirectoryDocumentSchema, data, 'directory');
      const value: CategoryDirectory = { categories: doc.categories, fetchedAt: new Date(doc.fetchedAt) };
      return { kind, value };
    }
    case 'suggestions':
      return { kind, value: parseWith(z.array(z.string()), data, 'suggestions') };
    case 'scalar':
      return { kind, value: parseWith(ScalarSchema, data, 'scalar') };
  }
};

export const encodeEntry = (entry: CacheEntry): string =>
  safeStringify({
    v: ENTRY_FORMAT_VERSION,
    key: entry.key,
    kind: entry.payload.kind,
    writtenAt: entry.writtenAt,
    ttlSeconds: entry.ttlSeconds,
    data: toDocument(entry.payload)
  });

export const decodeEntry = (raw: string): CacheEntry => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CodecError(`Cache entry is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const envelope = parseWith(EntryEnvelopeSchema, parsed, 'cache entry');
  return {
    key: envelope.key,
    payload: fromDocument(envelope.kind, envelope.data),
    writtenAt: envelope.writtenAt,
    ttlSeconds: envelope.ttlSeconds
  };
};

/** Pretty-printed JSON for files meant to be read by people as well. */
export const toPrettyJson = (document: unknown): string => safeStringify(document, undefined, 2);

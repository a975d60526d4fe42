import { describe, expect, it } from 'vitest';
import {
  decodeEntry,
  encodeEntry,
  parseItemRecord,
  parseSnapshotDocument,
  snapshotToDocument
} from '../../src/codec/PayloadCodec';
import { CodecError } from '../../src/errors';
import { makeItem, makeSnapshot } from '../helpers/fixtures';

describe('PayloadCodec', () => {
  const writtenAt = Date.parse('2024-05-01T12:00:00.000Z');

  describe('cache entries', () => {
    it('should keep the item order of a category snapshot, integer-like titles included', () => {
      const snapshot = makeSnapshot('weapons', [makeItem('Zeta'), makeItem('2077'), makeItem('Alpha')]);
      const raw = encodeEntry({ key: 'category:weapons', payload: { kind: 'category', value: snapshot }, writtenAt, ttlSeconds: 60 });

      const entry = decodeEntry(raw);

      expect(entry.key).toBe('category:weapons');
      expect(entry.writtenAt).toBe(writtenAt);
      expect(entry.ttlSeconds).toBe(60);
      expect(entry.payload.kind).toBe('category');
      if (entry.payload.kind === 'category') {
        expect(Array.from(entry.payload.value.items.keys())).toEqual(['Zeta', '2077', 'Alpha']);
        expect(entry.payload.value.fetchedAt.toISOString()).toBe('2024-05-01T12:00:00.000Z');
      }
    });

    it('should restore search result dates and filters', () => {
      const raw = encodeEntry({
        key: 'search:ripperdoc:characters',
        payload: {
          kind: 'search',
          value: {
            normalizedQuery: 'ripperdoc',
            filterCategories: ['characters'],
            items: [makeItem('Viktor Vektor')],
            computedAt: new Date(writtenAt)
          }
        },
        writtenAt,
        ttlSeconds: 300
      });

      const entry = decodeEntry(raw);

      expect(entry.payload).toEqual({
        kind: 'search',
        value: {
          normalizedQuery: 'ripperdoc',
          filterCategories: ['characters'],
          items: [makeItem('Viktor Vektor')],
          computedAt: new Date(writtenAt)
        }
      });
    });

    it('should carry scalars', () => {
      const entry = decodeEntry(encodeEntry({ key: 'x', payload: { kind: 'scalar', value: null }, writtenAt, ttlSeconds: 0 }));
      expect(entry.payload).toEqual({ kind: 'scalar', value: null });
    });

    it('should reject text that is not JSON', () => {
      expect(() => decodeEntry('{not json')).toThrow(CodecError);
    });

    it('should reject an envelope of an unknown format version', () => {
      const raw = JSON.stringify({ v: 2, key: 'x', kind: 'scalar', writtenAt, ttlSeconds: 0, data: 1 });
      expect(() => decodeEntry(raw)).toThrow(CodecError);
    });

    it('should reject data that does not match the declared kind', () => {
      const raw = JSON.stringify({ v: 1, key: 'item:x', kind: 'item', writtenAt, ttlSeconds: 0, data: { url: 'u' } });
      expect(() => decodeEntry(raw)).toThrow(/^Invalid item document/);
    });
  });

  describe('documents', () => {
    it('should fill missing item lists with defaults', () => {
      expect(parseItemRecord({ title: 'Jackie Welles', url: 'https://wiki.test/wiki/Jackie_Welles' })).toEqual({
        title: 'Jackie Welles',
        url: 'https://wiki.test/wiki/Jackie_Welles',
        categories: [],
        images: [],
        sections: [],
        relatedPages: [],
        infobox: {}
      });
    });

    it('should round-trip a snapshot document', () => {
      const snapshot = makeSnapshot('vehicles', [makeItem('Quadra Type-66')]);
      const restored = parseSnapshotDocument(JSON.parse(JSON.stringify(snapshotToDocument(snapshot))));
      expect(restored).toEqual(snapshot);
    });

    it('should reject a snapshot without a fetch time', () => {
      expect(() => parseSnapshotDocument({ categoryKey: 'vehicles', items: [] })).toThrow(CodecError);
    });
  });
});

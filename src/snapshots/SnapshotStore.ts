import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { parseItemRecord, parseSnapshotDocument, snapshotToDocument, toPrettyJson } from '../codec/PayloadCodec';
import { errorMessage } from '../errors';
import { CategorySnapshot, ItemRecord } from '../types';
import { isMissingFile } from '../utils/fsErrors';
import LibLogger from '../logger';

const logger = LibLogger.get('SnapshotStore');

const SNAPSHOT_EXTENSION = '.json';

/** Replace every character that is not a letter or a digit with `_`. */
export const sanitizeTitle = (title: string): string => title.replace(/[^\p{L}\p{N}]/gu, '_');

/**
 * Durable copies of category snapshots:
 *
 * - `{directory}/{categoryKey}.json` holds the whole category
 * - `{directory}/{categoryKey}/{sanitizedTitle}.json` holds one item
 *
 * The category file is the one read back for categories. Item files answer
 * single-item lookups while the wiki is unreachable. Titles that sanitize
 * identically share a file.
 */
export class SnapshotStore {
  private writeSequence = 0;

  constructor(private readonly directory: string) {}

  snapshotFile(categoryKey: string): string {
    return path.join(this.directory, `${categoryKey}${SNAPSHOT_EXTENSION}`);
  }

  itemFile(categoryKey: string, title: string): string {
    return path.join(this.directory, categoryKey, `${sanitizeTitle(title)}${SNAPSHOT_EXTENSION}`);
  }

  async save(snapshot: CategorySnapshot): Promise<void> {
    await mkdir(path.join(this.directory, snapshot.categoryKey), { recursive: true });
    await this.writeAtomically(this.snapshotFile(snapshot.categoryKey), toPrettyJson(snapshotToDocument(snapshot)));

    for (const item of snapshot.items.values()) {
      await this.writeAtomically(this.itemFile(snapshot.categoryKey, item.title), toPrettyJson(item));
    }

    logger.info('Snapshot saved', {
      categoryKey: snapshot.categoryKey,
      items: snapshot.items.size,
      file: this.snapshotFile(snapshot.categoryKey)
    });
  }

  async saveItem(categoryKey: string, item: ItemRecord): Promise<void> {
    await mkdir(path.join(this.directory, categoryKey), { recursive: true });
    await this.writeAtomically(this.itemFile(categoryKey, item.title), toPrettyJson(item));
  }

  /**
   * Read a category snapshot. A missing or unreadable file yields null.
   */
  async load(categoryKey: string): Promise<CategorySnapshot | null> {
    const file = this.snapshotFile(categoryKey);
    try {
      const snapshot = parseSnapshotDocument(JSON.parse(await readFile(file, 'utf8')));
      logger.debug('Snapshot loaded', { categoryKey, items: snapshot.items.size });
      return snapshot;
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug('No snapshot on disk', { categoryKey });
      } else {
        logger.warning('Snapshot file unreadable', { categoryKey, file, error: errorMessage(error) });
      }
      return null;
    }
  }

  async loadItem(categoryKey: string, title: string): Promise<ItemRecord | null> {
    const file = this.itemFile(categoryKey, title);
    try {
      return parseItemRecord(JSON.parse(await readFile(file, 'utf8')));
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warning('Item file unreadable', { categoryKey, file, error: errorMessage(error) });
      }
      return null;
    }
  }

  /** Category keys with a snapshot file on disk, sorted. */
  async listStored(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
    return names
      .filter(name => name.endsWith(SNAPSHOT_EXTENSION))
      .map(name => name.slice(0, -SNAPSHOT_EXTENSION.length))
      .sort();
  }

  private async writeAtomically(file: string, contents: string): Promise<void> {
    const temp = `${file}.${process.pid}.${++this.writeSequence}.tmp`;
    await writeFile(temp, contents, 'utf8');
    await rename(temp, file);
  }
}

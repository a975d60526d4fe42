import { createHash } from 'node:crypto';
import { mkdir, readdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { CacheTier } from './CacheTier';
import { isMissingFile } from '../../utils/fsErrors';
import LibLogger from '../../logger';

const logger = LibLogger.get('FileTier');

const CACHE_FILE_EXTENSION = '.cache';

/**
 * Durable tier: one file per key inside `directory`. File names keep a readable
 * sanitized form of the key plus a short hash of the exact key, so keys that
 * sanitize identically still get distinct files.
 */
export class FileTier implements CacheTier {
  public readonly implementationType = 'file';

  private directoryReady = false;
  private writeSequence = 0;

  constructor(private readonly directory: string) {}

  fileFor(key: string): string {
    const readable = key.replace(/[^A-Za-z0-9._-]/g, '_').slice(0, 80);
    const digest = createHash('sha1').update(key).digest('hex').slice(0, 12);
    return path.join(this.directory, `${readable}-${digest}${CACHE_FILE_EXTENSION}`);
  }

  async get(key: string): Promise<string | null> {
    try {
      return await readFile(this.fileFor(key), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async set(key: string, raw: string, _ttlSeconds: number): Promise<void> {
    await this.ensureDirectory();
    const target = this.fileFor(key);
    // Write-then-rename keeps readers from seeing a half-written entry.
    const temp = `${target}.${process.pid}.${++this.writeSequence}.tmp`;
    await writeFile(temp, raw, 'utf8');
    await rename(temp, target);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.fileFor(key));
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  async flush(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }

    const cacheFiles = names.filter(name => name.endsWith(CACHE_FILE_EXTENSION));
    await Promise.all(cacheFiles.map(name => unlink(path.join(this.directory, name))));
    logger.debug('Flushed cache files', { directory: this.directory, count: cacheFiles.length });
  }

  async ping(): Promise<boolean> {
    try {
      await this.ensureDirectory();
      return (await stat(this.directory)).isDirectory();
    } catch (error) {
      logger.warning('Cache directory unavailable', { directory: this.directory, error });
      return false;
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls.
  }

  private async ensureDirectory(): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await mkdir(this.directory, { recursive: true });
    this.directoryReady = true;
  }
}

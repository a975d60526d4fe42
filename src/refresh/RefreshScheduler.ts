import { TieredCache } from '../cache/TieredCache';
import { categoryKey, itemKeyForTitle } from '../cache/CacheKeySpace';
import { CategoryRegistry } from '../categories/CategoryRegistry';
import { errorMessage } from '../errors';
import { CacheEventEmitter } from '../events/CacheEventEmitter';
import { CacheEventFactory } from '../events/CacheEventFactory';
import { RefreshEvent } from '../events/CacheEventTypes';
import { SnapshotStore } from '../snapshots/SnapshotStore';
import { CategorySnapshot, RefreshTask } from '../types';
import { WikiSource } from '../wiki/WikiSource';
import LibLogger from '../logger';

const logger = LibLogger.get('RefreshScheduler');

export interface RefreshSchedulerOptions {
  cache: TieredCache;
  snapshots: SnapshotStore;
  source: WikiSource;
  categories: CategoryRegistry;
  /** Worker slots; refreshes beyond this wait in FIFO order */
  maxConcurrent: number;
  eventEmitter?: CacheEventEmitter;
}

/**
 * Background repopulation of category snapshots.
 *
 * At most one pending or running task exists per category: `refresh` checks and
 * claims the in-flight slot of a key in the same synchronous step, so concurrent
 * callers get the task already under way instead of a second scrape.
 */
export class RefreshScheduler {
  private readonly cache: TieredCache;
  private readonly snapshots: SnapshotStore;
  private readonly source: WikiSource;
  private readonly categories: CategoryRegistry;
  private readonly maxConcurrent: number;
  private readonly eventEmitter: CacheEventEmitter | undefined;

  private readonly inFlight = new Map<string, RefreshTask>();
  private readonly lastResults = new Map<string, RefreshTask>();
  private readonly queue: RefreshTask[] = [];
  private readonly running = new Set<Promise<void>>();
  private closed = false;

  constructor(options: RefreshSchedulerOptions) {
    this.cache = options.cache;
    this.snapshots = options.snapshots;
    this.source = options.source;
    this.categories = options.categories;
    this.maxConcurrent = options.maxConcurrent;
    this.eventEmitter = options.eventEmitter;
  }

  /**
   * Schedule a refresh of one category without waiting for it. Returns the task
   * already in flight for the key when there is one.
   */
  refresh(key: string): RefreshTask {
    this.categories.nameOf(key);
    if (this.closed) {
      throw new Error('Refresh scheduler is closed');
    }

    const existing = this.inFlight.get(key);
    if (existing) {
      logger.debug('Refresh already in flight', { categoryKey: key, state: existing.state });
      return { ...existing };
    }

    const task: RefreshTask = { categoryKey: key, state: 'pending', createdAt: new Date() };
    this.inFlight.set(key, task);
    this.queue.push(task);
    logger.info('Refresh scheduled', { categoryKey: key, queued: this.queue.length, running: this.running.size });
    this.emit('refresh_scheduled', task);

    this.drain();
    return { ...task };
  }

  /** `refresh` for every configured category, each independently. */
  refreshAll(): RefreshTask[] {
    return this.categories.keys().map(key => this.refresh(key));
  }

  /** The in-flight task for a key, or else its last finished task. */
  getTask(key: string): RefreshTask | undefined {
    const task = this.inFlight.get(key) ?? this.lastResults.get(key);
    return task ? { ...task } : undefined;
  }

  activeTasks(): RefreshTask[] {
    return Array.from(this.inFlight.values(), task => ({ ...task }));
  }

  lastResult(key: string): RefreshTask | undefined {
    const task = this.lastResults.get(key);
    return task ? { ...task } : undefined;
  }

  /** Resolves once no task is queued or running. */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0 || this.queue.length > 0) {
      await Promise.all(Array.from(this.running));
    }
  }

  /**
   * Stop accepting refreshes. Queued tasks are failed, running ones are awaited.
   */
  async close(): Promise<void> {
    this.closed = true;
    for (const task of this.queue.splice(0)) {
      this.finish(task, 'failed', 'Scheduler closed before the refresh started');
    }
    await this.whenIdle();
  }

  private drain(): void {
    while (this.running.size < this.maxConcurrent && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) {
        break;
      }
      const work: Promise<void> = this.execute(task).finally(() => {
        this.running.delete(work);
        this.drain();
      });
      this.running.add(work);
    }
  }

  /**
   * Run one task to a terminal state. Never rejects.
   */
  private async execute(task: RefreshTask): Promise<void> {
    task.state = 'running';
    task.startedAt = new Date();
    this.emit('refresh_started', task);
    logger.info('Refresh started', { categoryKey: task.categoryKey });

    try {
      const items = await this.source.scrapeCategory(this.categories.nameOf(task.categoryKey));
      if (items.size === 0) {
        logger.warning('Refresh returned no items, keeping prior data', { categoryKey: task.categoryKey });
        this.finish(task, 'failed', 'Wiki returned no items');
        return;
      }

      const snapshot: CategorySnapshot = { categoryKey: task.categoryKey, items, fetchedAt: new Date() };
      await this.store(snapshot);
      task.itemCount = items.size;
      this.finish(task, 'done');
    } catch (error) {
      logger.error('Refresh failed', { categoryKey: task.categoryKey, error: errorMessage(error) });
      this.finish(task, 'failed', errorMessage(error));
    }
  }

  /**
   * Replace the cached snapshot, cache each item under its scoped key and write
   * the durable copy. The durable copy is written even when the cache rejects.
   *
   * Unscoped item keys are dropped; the next unscoped lookup resolves them
   * again in configuration order.
   */
  private async store(snapshot: CategorySnapshot): Promise<void> {
    let cacheError: unknown = null;
    try {
      await this.cache.set(categoryKey(snapshot.categoryKey), { kind: 'category', value: snapshot });
      for (const [title, item] of snapshot.items) {
        await this.cache.set(itemKeyForTitle(title, snapshot.categoryKey), { kind: 'item', value: item });
        await this.cache.delete(itemKeyForTitle(title));
      }
    } catch (error) {
      cacheError = error;
    }

    try {
      await this.snapshots.save(snapshot);
    } catch (error) {
      logger.error('Snapshot persistence failed', { categoryKey: snapshot.categoryKey, error: errorMessage(error) });
    }

    if (cacheError !== null) {
      throw cacheError;
    }
  }

  private finish(task: RefreshTask, state: 'done' | 'failed', error?: string): void {
    task.state = state;
    task.finishedAt = new Date();
    if (error !== undefined) {
      task.error = error;
    }

    this.inFlight.delete(task.categoryKey);
    this.lastResults.set(task.categoryKey, { ...task });

    logger.info('Refresh finished', {
      categoryKey: task.categoryKey,
      state,
      itemCount: task.itemCount,
      error
    });
    this.emit(state === 'done' ? 'refresh_completed' : 'refresh_failed', task);
  }

  private emit(type: RefreshEvent['type'], task: RefreshTask): void {
    this.eventEmitter?.emit(CacheEventFactory.createRefreshEvent(type, task));
  }
}

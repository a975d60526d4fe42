import Redis from 'ioredis';
import { CacheTier } from './CacheTier';
import { errorMessage } from '../../errors';
import LibLogger from '../../logger';

const logger = LibLogger.get('RedisTier');

export interface RedisTierOptions {
  /** redis:// connection string */
  url: string;
  /** Socket connect timeout in milliseconds */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds */
  commandTimeoutMs?: number;
}

/**
 * Fast networked tier backed by Redis. The client does not queue commands while
 * disconnected, so an outage surfaces as an immediate rejection and TieredCache
 * can fall back to the durable tier; ioredis keeps reconnecting in the background.
 */
export class RedisTier implements CacheTier {
  public readonly implementationType = 'redis';

  private readonly client: Redis;

  constructor(options: RedisTierOptions | { client: Redis }) {
    if ('client' in options) {
      this.client = options.client;
    } else {
      this.client = new Redis(options.url, {
        connectTimeout: options.connectTimeoutMs ?? 5000,
        commandTimeout: options.commandTimeoutMs ?? 5000,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false
      });
    }

    this.client.on('error', (error: Error) => {
      logger.warning('Redis connection error', { error: error.message });
    });
    this.client.on('ready', () => {
      logger.info('Redis connection ready');
    });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, raw: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds > 0) {
      await this.client.set(key, raw, 'EX', ttlSeconds);
    } else {
      await this.client.set(key, raw);
    }
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(key)) > 0;
  }

  async flush(): Promise<void> {
    await this.client.flushdb();
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      logger.debug('Redis ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      logger.debug('Redis quit failed, disconnecting', { error: errorMessage(error) });
      this.client.disconnect();
    }
  }
}

import { createClient, RedisClientOptions } from 'redis';
import { Config } from '../config/types';
import { logger } from '../utils/logger';
import { LRUCache } from '../utils/lru-cache';
import { CACHE } from '../constants';

/**
 * Hot key-value tier. Values go in as JSON-serializable data and come back
 * as `unknown`; callers validate what they read.
 *
 * The plain methods degrade to an in-process copy when the backend is down.
 * The strict methods throw instead, for state every instance must agree on.
 */
export interface CacheService {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSec: number): Promise<void>;
  delete(key: string): Promise<void>;
  getStrict(key: string): Promise<unknown>;
  setStrict(key: string, value: unknown, ttlSec: number): Promise<void>;
  deleteStrict(key: string): Promise<void>;
  /** Overwrite an existing key only; false when the key is already gone */
  touchStrict(key: string, value: unknown, ttlSec: number): Promise<boolean>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Decode a stored value. Unparsable text is handed back as-is so the
 * caller's validation rejects it.
 */
export function decodeStored(raw: string | null): unknown {
  if (raw === null) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function rethrow(error: unknown): never {
  throw error;
}

type RedisClient = ReturnType<typeof createClient>;

export type RedisCacheConfig = Pick<
  Config,
  | 'REDIS_URL'
  | 'REDIS_PASSWORD'
  | 'REDIS_MAX_RECONNECT_ATTEMPTS'
  | 'REDIS_RECONNECT_BASE_DELAY_MS'
  | 'REDIS_RECONNECT_MAX_DELAY_MS'
  | 'CACHE_LRU_MAX_TTL_SECONDS'
>;

export class RedisCacheService implements CacheService {
  private client: RedisClient;
  private connected = false;
  private reconnectInProgress = false;
  private periodicReconnectInterval: NodeJS.Timeout | null = null;

  // In-memory LRU cache fallback when Redis is unavailable
  private readonly fallbackCache: LRUCache<string>;

  constructor(private readonly cfg: RedisCacheConfig) {
    this.fallbackCache = new LRUCache<string>({
      maxSize: CACHE.REDIS_FALLBACK_MAX_SIZE,
      defaultTtlMs: cfg.CACHE_LRU_MAX_TTL_SECONDS * 1000,
    });

    const clientOptions: RedisClientOptions = {
      url: cfg.REDIS_URL,
      socket: {
        connectTimeout: CACHE.REDIS_CONNECTION_TIMEOUT_MS,
        reconnectStrategy: (retries: number) => {
          if (retries > cfg.REDIS_MAX_RECONNECT_ATTEMPTS) {
            logger.error(
              'CacheService',
              `Redis reconnection failed after ${cfg.REDIS_MAX_RECONNECT_ATTEMPTS} attempts`
            );
            return false;
          }
          return Math.min(
            cfg.REDIS_RECONNECT_BASE_DELAY_MS * Math.pow(2, retries - 1),
            cfg.REDIS_RECONNECT_MAX_DELAY_MS
          );
        },
      },
      ...(cfg.REDIS_PASSWORD ? { password: cfg.REDIS_PASSWORD } : {}),
    };

    this.client = createClient(clientOptions);

    this.client.on('ready', () => {
      this.connected = true;
    });
    this.client.on('error', (err: unknown) => {
      logger.error('CacheService', 'Redis client error', err);
      this.connected = false;
    });
    this.client.on('end', () => {
      this.connected = false;
    });

    this.startPeriodicReconnect();
    this.client.connect().catch((err: unknown) => {
      logger.error('CacheService', 'Redis initial connection failed', err);
    });
  }

  /** While down, retry every interval; the client's own strategy gives up after the max attempts */
  private startPeriodicReconnect(): void {
    this.periodicReconnectInterval = setInterval(() => {
      if (!this.connected && !this.reconnectInProgress) {
        this.attemptReconnect().catch(err => {
          logger.warn('CacheService', `Redis periodic reconnection failed: ${errorMessage(err)}`);
        });
      }
    }, CACHE.REDIS_PERIODIC_RECONNECT_INTERVAL_MS);

    this.periodicReconnectInterval.unref();
  }

  private async attemptReconnect(): Promise<void> {
    if (this.reconnectInProgress || this.connected) {
      return;
    }

    this.reconnectInProgress = true;

    try {
      if (this.client.isOpen) {
        this.connected = true;
        return;
      }
      await this.client.connect();
    } finally {
      this.reconnectInProgress = false;
    }
  }

  /** Fallback entries never outlive the configured ceiling */
  private fallbackTtl(ttlSec: number): number {
    return Math.min(ttlSec, this.cfg.CACHE_LRU_MAX_TTL_SECONDS);
  }

  /**
   * Run a Redis command when connected. On failure the client is marked down
   * for the periodic reconnect and `onFailure` decides the outcome.
   */
  private async run<T>(
    operation: string,
    key: string,
    command: (client: RedisClient) => Promise<T>,
    onFailure: (error: unknown) => T
  ): Promise<T> {
    try {
      return await command(this.client);
    } catch (error) {
      this.connected = false;
      logger.warn('CacheService', `Redis ${operation} failed: ${key}`, { error: errorMessage(error) });
      return onFailure(error);
    }
  }

  async get(key: string): Promise<unknown> {
    const fromFallback = (): unknown => decodeStored(this.fallbackCache.get(key));
    if (!this.connected) {
      return fromFallback();
    }
    return this.run('get', key, async client => decodeStored(await client.get(key)), fromFallback);
  }

  /** Writes the fallback copy first so a later outage still serves the value */
  async set(key: string, value: unknown, ttlSec: number): Promise<void> {
    const serialized = JSON.stringify(value);
    this.fallbackCache.set(key, serialized, this.fallbackTtl(ttlSec));
    if (this.connected) {
      await this.run('set', key, async client => { await client.setEx(key, ttlSec, serialized); }, () => undefined);
    }
  }

  async delete(key: string): Promise<void> {
    this.fallbackCache.delete(key);
    if (this.connected) {
      await this.run('delete', key, async client => { await client.del(key); }, () => undefined);
    }
  }

  async getStrict(key: string): Promise<unknown> {
    this.assertConnected('get');
    return this.run('strict get', key, async client => decodeStored(await client.get(key)), rethrow);
  }

  async setStrict(key: string, value: unknown, ttlSec: number): Promise<void> {
    this.assertConnected('set');
    const serialized = JSON.stringify(value);
    await this.run('strict set', key, async client => { await client.setEx(key, ttlSec, serialized); }, rethrow);
  }

  async deleteStrict(key: string): Promise<void> {
    this.assertConnected('delete');
    await this.run('strict delete', key, async client => { await client.del(key); }, rethrow);
  }

  /** SET ... XX: a key deleted by another instance stays deleted */
  async touchStrict(key: string, value: unknown, ttlSec: number): Promise<boolean> {
    this.assertConnected('touch');
    const serialized = JSON.stringify(value);
    const reply = await this.run(
      'strict touch',
      key,
      client => client.set(key, serialized, { EX: ttlSec, XX: true }),
      rethrow
    );
    return reply !== null;
  }

  private assertConnected(operation: string): void {
    if (!this.connected) {
      throw new Error(`Redis unavailable for strict ${operation}`);
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this.connected) {
      return false;
    }

    try {
      await this.client.ping();
      return true;
    } catch (error) {
      logger.error('CacheService', 'Health check failed', error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.periodicReconnectInterval) {
      clearInterval(this.periodicReconnectInterval);
      this.periodicReconnectInterval = null;
    }

    this.fallbackCache.dispose();

    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}

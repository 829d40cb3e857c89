import { CACHE } from '../constants';
import { LRUCache } from '../utils/lru-cache';
import { CacheService, decodeStored } from './cache.service';

/**
 * Single-process cache backend over the LRU cache.
 * Values are stored serialized so readers never share references with writers.
 * Strict and plain operations behave the same since there is no remote side to lose.
 */
export class MemoryCacheService implements CacheService {
  private readonly cache: LRUCache<string>;

  constructor(options: { maxSize?: number; now?: () => number } = {}) {
    this.cache = new LRUCache<string>({
      maxSize: options.maxSize ?? CACHE.REDIS_FALLBACK_MAX_SIZE,
      ...(options.now ? { now: options.now } : {}),
    });
  }

  async get(key: string): Promise<unknown> {
    return decodeStored(this.cache.get(key));
  }

  async set(key: string, value: unknown, ttlSec: number): Promise<void> {
    this.cache.set(key, JSON.stringify(value), ttlSec);
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key);
  }

  getStrict(key: string): Promise<unknown> {
    return this.get(key);
  }

  setStrict(key: string, value: unknown, ttlSec: number): Promise<void> {
    return this.set(key, value, ttlSec);
  }

  deleteStrict(key: string): Promise<void> {
    return this.delete(key);
  }

  async touchStrict(key: string, value: unknown, ttlSec: number): Promise<boolean> {
    if (this.cache.get(key) === null) {
      return false;
    }
    this.cache.set(key, JSON.stringify(value), ttlSec);
    return true;
  }

  /** Store a raw string, bypassing serialization */
  async setRaw(key: string, raw: string, ttlSec: number): Promise<void> {
    this.cache.set(key, raw, ttlSec);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.cache.dispose();
  }
}

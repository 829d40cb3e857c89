import { CACHE } from '../constants';

/**
 * Bounded in-process key-value store with per-entry expiry.
 * Holds sessions and payloads for the memory backend, and the Redis fallback tier.
 * Map insertion order doubles as recency order.
 */

interface Slot<T> {
  value: T;
  expiresAt: number;
}

export interface LRUCacheOptions {
  maxSize?: number;
  defaultTtlMs?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export class LRUCache<T> {
  private readonly slots = new Map<string, Slot<T>>();
  private readonly capacity: number;
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null;

  constructor(options: LRUCacheOptions = {}) {
    this.capacity = Math.max(1, options.maxSize ?? CACHE.LRU_DEFAULT_MAX_SIZE);
    this.defaultTtlMs = options.defaultTtlMs ?? CACHE.LRU_DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;

    this.sweepTimer = setInterval(() => this.sweep(), CACHE.LRU_CLEANUP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  /** Live value for a key, or null. A hit becomes the most recent entry. */
  get(key: string): T | null {
    const slot = this.slots.get(key);
    if (slot === undefined) {
      return null;
    }
    this.slots.delete(key);
    if (this.isExpired(slot)) {
      return null;
    }
    this.slots.set(key, slot);
    return slot.value;
  }

  /** TTL is in seconds; without one the default applies. */
  set(key: string, value: T, ttlSeconds?: number): void {
    this.slots.delete(key);
    if (this.slots.size >= this.capacity) {
      this.evictOldest();
    }
    const ttlMs = ttlSeconds !== undefined && ttlSeconds > 0 ? ttlSeconds * 1000 : this.defaultTtlMs;
    this.slots.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.slots.delete(key);
  }

  get size(): number {
    return this.slots.size;
  }

  dispose(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.slots.clear();
  }

  private isExpired(slot: Slot<T>): boolean {
    return this.now() >= slot.expiresAt;
  }

  private evictOldest(): void {
    const oldest = this.slots.keys().next();
    if (!oldest.done) {
      this.slots.delete(oldest.value);
    }
  }

  private sweep(): void {
    for (const [key, slot] of this.slots) {
      if (this.isExpired(slot)) {
        this.slots.delete(key);
      }
    }
  }
}

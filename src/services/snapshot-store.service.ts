import { CacheService } from './cache.service';
import { CACHE } from '../constants';
import { AcademicRepository } from '../repositories/interfaces/academic.repository';
import { OwnerRef } from '../types/academic.types';
import { payloadSchemas } from '../types/portal.schemas';
import { ResourceKind, ResourcePayloads } from '../types/portal.types';
import { logger } from '../utils/logger';

/**
 * Hot-cache TTL per resource kind, in seconds
 */
export type CacheTtls = Record<ResourceKind, number>;

type Savers = {
  [K in ResourceKind]: (owner: OwnerRef, scope: string, payload: ResourcePayloads[K]) => Promise<unknown>;
};

export interface StoredPayload<T> {
  data: T;
  fetchedAt: Date;
}

/**
 * Placeholder written in cache keys for an empty scope
 */
const EMPTY_SCOPE_KEY: Partial<Record<ResourceKind, string>> = {
  grades: 'all',
  schedule: 'current',
};

/**
 * SnapshotStoreService - durable snapshots behind a read-through hot cache
 * PostgreSQL (or the in-process repository) is the source of truth; the cache is best effort.
 */
export class SnapshotStoreService {
  private readonly savers: Savers = {
    profile: (owner, _scope, payload) => this.repository.saveProfile(owner, payload),
    semesters: (owner, _scope, payload) => this.repository.saveSemesters(owner, payload),
    grades: (owner, scope, payload) => this.repository.saveGrades(owner, scope, payload),
    schedule: (owner, scope, payload) => this.repository.saveSchedule(owner, scope, payload),
  };

  constructor(
    private readonly repository: AcademicRepository,
    private readonly cache: CacheService,
    private readonly ttls: CacheTtls
  ) {}

  /**
   * portal:{kind}:{owner}[:{scope}]
   */
  cacheKey(kind: ResourceKind, externalId: string, scope: string): string {
    const scopePart = scope || EMPTY_SCOPE_KEY[kind];
    const base = `${CACHE.KEY_PREFIX}:${kind}:${externalId}`;
    return scopePart ? `${base}:${scopePart}` : base;
  }

  /**
   * Cached payload, or null on a miss. Values that fail validation are evicted.
   */
  async readCached<K extends ResourceKind>(
    kind: K,
    externalId: string,
    scope: string
  ): Promise<ResourcePayloads[K] | null> {
    const key = this.cacheKey(kind, externalId, scope);
    const raw = await this.cache.get(key);
    if (raw === null) {
      return null;
    }

    const parsed = payloadSchemas[kind].safeParse(raw);
    if (!parsed.success) {
      logger.warn('SnapshotStoreService', 'Evicting invalid cache entry', { key });
      await this.cache.delete(key);
      return null;
    }
    return parsed.data;
  }

  /**
   * Persist a fresh payload in one transaction, then refresh its cache key.
   * Throws when the durable write fails; the cache is left untouched then.
   */
  async save<K extends ResourceKind>(
    kind: K,
    owner: OwnerRef,
    scope: string,
    payload: ResourcePayloads[K]
  ): Promise<void> {
    await this.savers[kind](owner, scope, payload);
    await this.cache.set(this.cacheKey(kind, owner.externalId, scope), payload, this.ttls[kind]);
  }

  /**
   * Most recent durable snapshot that still validates
   */
  async latest<K extends ResourceKind>(
    kind: K,
    externalId: string,
    scope: string
  ): Promise<StoredPayload<ResourcePayloads[K]> | null> {
    const snapshot = await this.repository.latestSnapshot(externalId, kind, scope);
    if (!snapshot) {
      return null;
    }

    const parsed = payloadSchemas[kind].safeParse(snapshot.payload);
    if (!parsed.success) {
      logger.warn('SnapshotStoreService', 'Latest snapshot does not match its schema', {
        snapshotId: snapshot.id,
        kind,
        externalId,
      });
      return null;
    }
    return { data: parsed.data, fetchedAt: snapshot.fetchedAt };
  }
}

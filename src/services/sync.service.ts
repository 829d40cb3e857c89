import { PortalClient, PortalCredentials } from '../clients/portal.client';
import { PortalError, PortalErrorCode, isPortalError } from '../errors/portal.errors';
import { OwnerRef } from '../types/academic.types';
import {
  FetchFailure,
  FetchOptions,
  FetchResult,
  ResourceKind,
  ResourcePayloads,
} from '../types/portal.types';
import { logger } from '../utils/logger';
import { SessionStoreService } from './session-store.service';
import { SnapshotStoreService, StoredPayload } from './snapshot-store.service';

type Fetchers = {
  [K in ResourceKind]: (
    who: PortalCredentials,
    scope: string,
    requestId: string | undefined
  ) => Promise<ResourcePayloads[K]>;
};

function failure(error: PortalError): FetchFailure {
  return {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      ...(error.diagnostic ? { diagnostic: error.diagnostic } : {}),
    },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * SyncService - layered read of one resource for one session:
 * hot cache, then the live portal, then the last durable snapshot
 */
export class SyncService {
  private readonly fetchers: Fetchers = {
    profile: (who, _scope, requestId) => this.portal.fetchProfile(who, requestId),
    semesters: (who, _scope, requestId) => this.portal.fetchSemesters(who, requestId),
    grades: (who, scope, requestId) => this.portal.fetchGrades(who, scope, requestId),
    schedule: (who, scope, requestId) => this.portal.fetchSchedule(who, scope, requestId),
  };

  constructor(
    private readonly sessions: SessionStoreService,
    private readonly snapshots: SnapshotStoreService,
    private readonly portal: PortalClient
  ) {}

  async fetch<K extends ResourceKind>(
    sessionId: string,
    kind: K,
    options: FetchOptions = {}
  ): Promise<FetchResult<ResourcePayloads[K]>> {
    const scope = options.scope?.trim() ?? '';
    const requestId = options.requestId;

    const session = await this.sessions.get(sessionId);
    if (!session) {
      return failure(
        new PortalError(PortalErrorCode.SESSION_INVALID, 'Session is missing or expired')
      );
    }

    const owner: OwnerRef = { externalId: session.identity, accountName: session.identity };
    const logMeta = { requestId, kind, scope, externalId: owner.externalId };

    if (!options.forceRefresh) {
      const cached = await this.snapshots.readCached(kind, owner.externalId, scope);
      if (cached !== null) {
        logger.debug('SyncService', 'Cache hit', logMeta);
        return { success: true, data: cached, cached: true, fallback: false };
      }
    }

    let data: ResourcePayloads[K];
    try {
      data = await this.fetchers[kind](
        { identity: session.identity, cookies: session.cookies },
        scope,
        requestId
      );
    } catch (error) {
      if (isPortalError(error, PortalErrorCode.SESSION_INVALID)) {
        logger.info('SyncService', 'Portal session ended, dropping local session', logMeta);
        await this.sessions.delete(session.sessionId);
        return failure(error);
      }
      return this.fallback(kind, owner, scope, error, logMeta);
    }

    try {
      await this.snapshots.save(kind, owner, scope, data);
    } catch (error) {
      logger.warn('SyncService', 'Persisting fetched data failed', {
        ...logMeta,
        error: errorMessage(error),
      });
      return {
        success: true,
        data,
        cached: false,
        fallback: false,
        warning: {
          code: PortalErrorCode.PERSISTENCE_WARNING,
          message: `Fetched data was not persisted: ${errorMessage(error)}`,
        },
      };
    }

    return { success: true, data, cached: false, fallback: false };
  }

  /**
   * Serve the last durable snapshot after a failed live fetch.
   * Without one, portal errors are returned as failures and anything else is rethrown.
   */
  private async fallback<K extends ResourceKind>(
    kind: K,
    owner: OwnerRef,
    scope: string,
    cause: unknown,
    logMeta: Record<string, unknown>
  ): Promise<FetchResult<ResourcePayloads[K]>> {
    logger.warn('SyncService', 'Live fetch failed, trying last snapshot', {
      ...logMeta,
      error: errorMessage(cause),
    });

    let stored: StoredPayload<ResourcePayloads[K]> | null = null;
    try {
      stored = await this.snapshots.latest(kind, owner.externalId, scope);
    } catch (error) {
      logger.error('SyncService', 'Reading last snapshot failed', error, logMeta);
    }

    if (stored) {
      return {
        success: true,
        data: stored.data,
        cached: false,
        fallback: true,
        fetchedAt: stored.fetchedAt.toISOString(),
      };
    }

    if (cause instanceof PortalError) {
      return failure(cause);
    }
    throw cause;
  }
}

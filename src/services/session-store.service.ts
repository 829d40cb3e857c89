import { CacheService } from './cache.service';
import { SESSION, TIME } from '../constants';
import { portalSessionSchema } from '../types/portal.schemas';
import { CookieJar, PortalSession } from '../types/portal.types';
import { generateSessionId } from '../utils/crypto-helpers';
import { KeyedMutex } from '../utils/keyed-mutex';
import { logger } from '../utils/logger';

export interface SessionStoreOptions {
  absoluteTtlSec: number;
  idleTtlSec: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

/**
 * SessionStoreService - portal sessions with an absolute and an idle expiry
 *
 * Records live in the key-value store with a native TTL equal to the remaining
 * idle window, so the store drops idle sessions by itself. Writes go through
 * the strict path: a session must never exist on one instance only.
 */
export class SessionStoreService {
  private readonly mutex = new KeyedMutex();
  private readonly now: () => number;

  constructor(
    private readonly store: CacheService,
    private readonly options: SessionStoreOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Create a session for an authenticated portal login
   */
  async create(identity: string, cookies: CookieJar): Promise<PortalSession> {
    const now = this.now();
    const absoluteExpiresAt = now + this.options.absoluteTtlSec * TIME.MS_PER_SECOND;
    const session: PortalSession = {
      sessionId: generateSessionId(),
      identity,
      cookies,
      createdAt: now,
      absoluteExpiresAt,
      idleExpiresAt: this.nextIdleExpiry(now, absoluteExpiresAt),
    };

    await this.mutex.runExclusive(session.sessionId, () =>
      this.store.setStrict(this.key(session.sessionId), session, this.storeTtlSec(session, now))
    );

    logger.info('SessionStoreService', 'Session created', {
      sessionId: session.sessionId,
      identity,
      absoluteExpiresAt: new Date(absoluteExpiresAt).toISOString(),
    });
    return session;
  }

  /**
   * Get a live session and extend its idle window.
   * Missing, corrupt and expired entries yield null; the last two are deleted.
   */
  async get(sessionId: string): Promise<PortalSession | null> {
    if (!sessionId) {
      return null;
    }

    return this.mutex.runExclusive(sessionId, async () => {
      const key = this.key(sessionId);
      const raw = await this.store.getStrict(key);
      if (raw === null) {
        return null;
      }

      const parsed = portalSessionSchema.safeParse(raw);
      if (!parsed.success || parsed.data.sessionId !== sessionId) {
        logger.warn('SessionStoreService', 'Dropping unreadable session record', { sessionId });
        await this.store.deleteStrict(key);
        return null;
      }

      const session = parsed.data;
      const now = this.now();
      if (now >= session.absoluteExpiresAt || now >= session.idleExpiresAt) {
        logger.debug('SessionStoreService', 'Session expired', {
          sessionId,
          reason: now >= session.absoluteExpiresAt ? 'absolute' : 'idle',
        });
        await this.store.deleteStrict(key);
        return null;
      }

      const touched: PortalSession = {
        ...session,
        idleExpiresAt: this.nextIdleExpiry(now, session.absoluteExpiresAt),
      };
      if (!(await this.store.touchStrict(key, touched, this.storeTtlSec(touched, now)))) {
        logger.debug('SessionStoreService', 'Session removed while being read', { sessionId });
        return null;
      }
      return touched;
    });
  }

  /**
   * Delete a session (logout)
   */
  async delete(sessionId: string): Promise<void> {
    if (!sessionId) {
      return;
    }
    await this.mutex.runExclusive(sessionId, () => this.store.deleteStrict(this.key(sessionId)));
    logger.debug('SessionStoreService', 'Session deleted', { sessionId });
  }

  private key(sessionId: string): string {
    return `${SESSION.KEY_PREFIX}${sessionId}`;
  }

  private nextIdleExpiry(now: number, absoluteExpiresAt: number): number {
    return Math.min(now + this.options.idleTtlSec * TIME.MS_PER_SECOND, absoluteExpiresAt);
  }

  /**
   * Remaining idle window in whole seconds, at least 1
   */
  private storeTtlSec(session: PortalSession, now: number): number {
    return Math.max(1, Math.ceil((session.idleExpiresAt - now) / TIME.MS_PER_SECOND));
  }
}

import { PortalClient } from '../clients/portal.client';
import { PortalError, PortalErrorCode, isPortalError } from '../errors/portal.errors';
import {
  FetchFailure,
  FetchResult,
  FetchSuccess,
  GradeTable,
  LoginOutcome,
  PortalHealth,
  ProfileView,
  ScheduleView,
  SemesterList,
} from '../types/portal.types';
import { logger } from '../utils/logger';
import { SessionStoreService } from './session-store.service';
import { SyncService } from './sync.service';

type SuccessMeta = Omit<FetchSuccess<unknown>, 'data'>;

export type LoginResult =
  | { success: true; sessionId: string; expiresAt: string }
  | FetchFailure;

export type ProfileResult = FetchResult<ProfileView>;
export type SemestersResult = (SuccessMeta & SemesterList) | FetchFailure;
export type GradesResult = (SuccessMeta & GradeTable) | FetchFailure;
export type ScheduleResult = (SuccessMeta & ScheduleView) | FetchFailure;

function badRequest(message: string): FetchFailure {
  return { success: false, error: { code: PortalErrorCode.BAD_REQUEST, message } };
}

/**
 * Spread a successful fetch's payload next to its cached/fallback flags
 */
function flatten<T extends object>(result: FetchResult<T>): (SuccessMeta & T) | FetchFailure {
  if (!result.success) {
    return result;
  }
  const { data, ...meta } = result;
  return { ...meta, ...data };
}

/**
 * AcademicService - the operations exposed to the HTTP layer
 */
export class AcademicService {
  constructor(
    private readonly portal: PortalClient,
    private readonly sessions: SessionStoreService,
    private readonly sync: SyncService
  ) {}

  health(requestId?: string): Promise<PortalHealth> {
    return this.portal.health(requestId);
  }

  /**
   * Log into the portal and open a local session bound to its cookies
   */
  async login(username: string, password: string, requestId?: string): Promise<LoginResult> {
    const account = username.trim();
    if (!account || !password) {
      return badRequest('username and password are required');
    }

    let outcome: LoginOutcome;
    try {
      outcome = await this.portal.login(account, password, requestId);
    } catch (error) {
      if (isPortalError(error)) {
        return { success: false, error: error.toJSON() };
      }
      throw error;
    }

    if (!outcome.success) {
      const rejected = new PortalError(
        PortalErrorCode.CREDENTIALS_REJECTED,
        'Portal rejected the credentials',
        outcome.diagnostic ?? undefined
      );
      return { success: false, error: rejected.toJSON() };
    }

    const session = await this.sessions.create(account, outcome.cookies);
    logger.info('AcademicService', 'Login succeeded', { requestId, identity: account });
    return {
      success: true,
      sessionId: session.sessionId,
      expiresAt: new Date(session.absoluteExpiresAt).toISOString(),
    };
  }

  async logout(sessionId: string): Promise<{ success: true }> {
    await this.sessions.delete(sessionId);
    return { success: true };
  }

  me(sessionId: string, requestId?: string, refresh = false): Promise<ProfileResult> {
    return this.sync.fetch(sessionId, 'profile', {
      forceRefresh: refresh,
      ...(requestId ? { requestId } : {}),
    });
  }

  async semesters(sessionId: string, requestId?: string, refresh = false): Promise<SemestersResult> {
    return flatten(
      await this.sync.fetch(sessionId, 'semesters', {
        forceRefresh: refresh,
        ...(requestId ? { requestId } : {}),
      })
    );
  }

  async grades(
    sessionId: string,
    semester = '',
    requestId?: string,
    refresh = false
  ): Promise<GradesResult> {
    return flatten(
      await this.sync.fetch(sessionId, 'grades', {
        scope: semester,
        forceRefresh: refresh,
        ...(requestId ? { requestId } : {}),
      })
    );
  }

  async schedule(
    sessionId: string,
    xnxq = '',
    requestId?: string,
    refresh = false
  ): Promise<ScheduleResult> {
    return flatten(
      await this.sync.fetch(sessionId, 'schedule', {
        scope: xnxq,
        forceRefresh: refresh,
        ...(requestId ? { requestId } : {}),
      })
    );
  }
}

import { describe, expect, it, vi } from 'vitest';
import { PortalError, PortalErrorCode } from '../../src/errors/portal.errors';
import { createAcademicStack, sampleGrades, sampleProfile } from '../support/academic-stack';
import { loadFixture } from '../support/fixtures';

async function stackWithSession() {
  const stack = createAcademicStack();
  const session = await stack.sessions.create('20220001', { JSESSIONID: 'live' });
  return { ...stack, sessionId: session.sessionId };
}

describe('SyncService', () => {
  it('fails without a live session', async () => {
    const { sync } = createAcademicStack();

    expect(await sync.fetch('S-missing', 'profile')).toEqual({
      success: false,
      error: { code: PortalErrorCode.SESSION_INVALID, message: 'Session is missing or expired' },
    });
  });

  it('fetches live, persists, and serves the next read from cache', async () => {
    const { sync, portal, repository, sessionId } = await stackWithSession();
    const fetchGrades = vi.spyOn(portal.client, 'fetchGrades').mockResolvedValue(sampleGrades());

    const live = await sync.fetch(sessionId, 'grades', { scope: '2024-2025-1' });
    const cached = await sync.fetch(sessionId, 'grades', { scope: '2024-2025-1' });

    expect(live).toEqual({ success: true, data: sampleGrades(), cached: false, fallback: false });
    expect(cached).toEqual({ success: true, data: sampleGrades(), cached: true, fallback: false });
    expect(fetchGrades).toHaveBeenCalledTimes(1);
    expect(fetchGrades).toHaveBeenCalledWith(
      { identity: '20220001', cookies: { JSESSIONID: 'live' } },
      '2024-2025-1',
      undefined
    );
    expect(await repository.listSnapshots('20220001', 'grades', '2024-2025-1', 10)).toHaveLength(1);
  });

  it('bypasses the cache on forced refresh', async () => {
    const { sync, portal, sessionId } = await stackWithSession();
    const fetchProfile = vi.spyOn(portal.client, 'fetchProfile').mockResolvedValue(sampleProfile());

    await sync.fetch(sessionId, 'profile');
    const refreshed = await sync.fetch(sessionId, 'profile', { forceRefresh: true });

    expect(refreshed.success && refreshed.cached).toBe(false);
    expect(fetchProfile).toHaveBeenCalledTimes(2);
  });

  it('keeps the last good profile when the portal serves a page it cannot read', async () => {
    const { sync, portal, repository, sessionId } = await stackWithSession();
    portal.pool.intercept({ path: '/jsxsd/grxx/xsxx', method: 'GET' }).reply(200, loadFixture('profile.html'));
    portal.pool.intercept({ path: '/jsxsd/grxx/xsxx', method: 'GET' }).reply(200, '<p>系统维护中</p>');

    const live = await sync.fetch(sessionId, 'profile');
    const refreshed = await sync.fetch(sessionId, 'profile', { forceRefresh: true });

    expect(live.success && live.data.displayName).toBe('测试学生');
    expect(refreshed).toMatchObject({ success: true, cached: false, fallback: true });
    expect(refreshed.success && refreshed.data).toEqual(live.success && live.data);
    expect(await repository.listSnapshots('20220001', 'profile', '', 10)).toHaveLength(1);
    portal.agent.assertNoPendingInterceptors();
  });

  it('surfaces a degraded page when there is nothing to fall back to', async () => {
    const { sync, portal, sessionId } = await stackWithSession();
    portal.pool.intercept({ path: '/jsxsd/kscj/cjcx_list', method: 'POST' }).reply(200, '<p>系统维护中</p>');

    expect(await sync.fetch(sessionId, 'grades', { scope: '2024-2025-1' })).toEqual({
      success: false,
      error: {
        code: PortalErrorCode.EXTRACTION_DEGRADED,
        message: 'Grade page has no grade table',
        diagnostic: { htmlSample: '<p>系统维护中</p>' },
      },
    });
  });

  it('serves the last snapshot when the portal is down', async () => {
    const { sync, portal, clock, sessionId } = await stackWithSession();
    const savedAt = new Date(clock.now()).toISOString();
    vi.spyOn(portal.client, 'fetchGrades')
      .mockResolvedValueOnce(sampleGrades())
      .mockRejectedValueOnce(
        new PortalError(PortalErrorCode.UPSTREAM_UNREACHABLE, 'Portal unreachable: ETIMEDOUT')
      );

    await sync.fetch(sessionId, 'grades');
    clock.advanceSeconds(120);
    const result = await sync.fetch(sessionId, 'grades', { forceRefresh: true });

    expect(result).toEqual({
      success: true,
      data: sampleGrades(),
      cached: false,
      fallback: true,
      fetchedAt: savedAt,
    });
  });

  it('returns the portal failure when nothing was stored yet', async () => {
    const { sync, portal, sessionId } = await stackWithSession();
    vi.spyOn(portal.client, 'fetchSemesters').mockRejectedValue(
      new PortalError(PortalErrorCode.UPSTREAM_UNREACHABLE, 'Portal answered with status 503', {
        statusCode: 503,
      })
    );

    expect(await sync.fetch(sessionId, 'semesters')).toEqual({
      success: false,
      error: {
        code: PortalErrorCode.UPSTREAM_UNREACHABLE,
        message: 'Portal answered with status 503',
        diagnostic: { statusCode: 503 },
      },
    });
  });

  it('rethrows unexpected errors when nothing was stored yet', async () => {
    const { sync, portal, sessionId } = await stackWithSession();
    vi.spyOn(portal.client, 'fetchSchedule').mockRejectedValue(new TypeError('boom'));

    await expect(sync.fetch(sessionId, 'schedule')).rejects.toThrow('boom');
  });

  it('drops the local session when the portal session ended', async () => {
    const { sync, portal, sessions, sessionId } = await stackWithSession();
    vi.spyOn(portal.client, 'fetchProfile').mockRejectedValue(
      new PortalError(PortalErrorCode.SESSION_INVALID, 'Portal redirected to its login page')
    );

    const result = await sync.fetch(sessionId, 'profile');

    expect(result).toEqual({
      success: false,
      error: { code: PortalErrorCode.SESSION_INVALID, message: 'Portal redirected to its login page' },
    });
    expect(await sessions.get(sessionId)).toBeNull();
  });

  it('still answers when persisting fails, with a warning', async () => {
    const { sync, portal, repository, sessionId } = await stackWithSession();
    vi.spyOn(portal.client, 'fetchProfile').mockResolvedValue(sampleProfile());
    vi.spyOn(repository, 'saveProfile').mockRejectedValue(new Error('disk full'));

    expect(await sync.fetch(sessionId, 'profile')).toEqual({
      success: true,
      data: sampleProfile(),
      cached: false,
      fallback: false,
      warning: {
        code: PortalErrorCode.PERSISTENCE_WARNING,
        message: 'Fetched data was not persisted: disk full',
      },
    });
  });
});

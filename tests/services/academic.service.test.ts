import { describe, expect, it, vi } from 'vitest';
import { PortalError, PortalErrorCode } from '../../src/errors/portal.errors';
import { createAcademicStack, sampleGrades, sampleSchedule } from '../support/academic-stack';

describe('AcademicService', () => {
  it('requires both username and password', async () => {
    const { academic, portal } = createAcademicStack();
    const login = vi.spyOn(portal.client, 'login');

    expect(await academic.login('   ', 'test-secret')).toEqual({
      success: false,
      error: { code: PortalErrorCode.BAD_REQUEST, message: 'username and password are required' },
    });
    expect(await academic.login('stu001', '')).toMatchObject({ success: false });
    expect(login).not.toHaveBeenCalled();
  });

  it('opens a session after a successful portal login', async () => {
    const { academic, portal, sessions, clock } = createAcademicStack();
    vi.spyOn(portal.client, 'login').mockResolvedValue({
      success: true,
      cookies: { JSESSIONID: 'live' },
      diagnostic: null,
    });

    const result = await academic.login(' stu001 ', 'test-secret', 'req-1');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.expiresAt).toBe(new Date(clock.now() + 3600 * 1000).toISOString());
      const session = await sessions.get(result.sessionId);
      expect(session?.identity).toBe('stu001');
      expect(session?.cookies).toEqual({ JSESSIONID: 'live' });
    }
    expect(portal.client.login).toHaveBeenCalledWith('stu001', 'test-secret', 'req-1');
  });

  it('reports rejected credentials with the portal diagnostic', async () => {
    const { academic, portal } = createAcademicStack();
    vi.spyOn(portal.client, 'login').mockResolvedValue({
      success: false,
      cookies: {},
      diagnostic: { statusCode: 200, redirectLocation: null, htmlSample: '<form>' },
    });

    expect(await academic.login('stu001', 'wrong-secret')).toEqual({
      success: false,
      error: {
        code: PortalErrorCode.CREDENTIALS_REJECTED,
        message: 'Portal rejected the credentials',
        diagnostic: { statusCode: 200, redirectLocation: null, htmlSample: '<form>' },
      },
    });
  });

  it('reports an unreachable portal during login', async () => {
    const { academic, portal } = createAcademicStack();
    vi.spyOn(portal.client, 'login').mockRejectedValue(
      new PortalError(PortalErrorCode.UPSTREAM_UNREACHABLE, 'Portal unreachable: ECONNREFUSED')
    );

    expect(await academic.login('stu001', 'test-secret')).toEqual({
      success: false,
      error: { code: PortalErrorCode.UPSTREAM_UNREACHABLE, message: 'Portal unreachable: ECONNREFUSED' },
    });
  });

  it('does not blame the credentials when the portal fails the login POST', async () => {
    const { academic, portal } = createAcademicStack();
    portal.pool.intercept({ path: '/jsxsd/', method: 'GET' }).reply(200, 'login');
    portal.pool.intercept({ path: '/jsxsd/xk/LoginToXk', method: 'POST' }).reply(503, 'maintenance');

    expect(await academic.login('stu001', 'test-secret')).toEqual({
      success: false,
      error: {
        code: PortalErrorCode.UPSTREAM_UNREACHABLE,
        message: 'Portal login answered 503',
        diagnostic: { statusCode: 503, redirectLocation: null, htmlSample: 'maintenance' },
      },
    });
    portal.agent.assertNoPendingInterceptors();
  });

  it('spreads grade tables next to the fetch flags', async () => {
    const { academic, portal, sessions } = createAcademicStack();
    const session = await sessions.create('20220001', {});
    vi.spyOn(portal.client, 'fetchGrades').mockResolvedValue(sampleGrades());

    expect(await academic.grades(session.sessionId, '2024-2025-1')).toEqual({
      success: true,
      cached: false,
      fallback: false,
      ...sampleGrades(),
    });
  });

  it('passes the term through to the schedule fetch', async () => {
    const { academic, portal, sessions } = createAcademicStack();
    const session = await sessions.create('20220001', {});
    const fetchSchedule = vi.spyOn(portal.client, 'fetchSchedule').mockResolvedValue(sampleSchedule());

    const result = await academic.schedule(session.sessionId, '2024-2025-1', 'req-2', true);

    expect(result).toMatchObject({ success: true, semester: '2024-2025-1', currentWeek: 5 });
    expect(fetchSchedule).toHaveBeenCalledWith(
      { identity: '20220001', cookies: {} },
      '2024-2025-1',
      'req-2'
    );
  });

  it('logs out by dropping the session', async () => {
    const { academic, sessions } = createAcademicStack();
    const session = await sessions.create('20220001', {});

    expect(await academic.logout(session.sessionId)).toEqual({ success: true });
    expect(await sessions.get(session.sessionId)).toBeNull();
  });
});

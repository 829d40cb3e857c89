import { afterEach, describe, expect, it } from 'vitest';
import { PortalErrorCode } from '../../src/errors/portal.errors';
import { loadFixture } from '../support/fixtures';
import { createMockPortal, PORTAL_ORIGIN } from '../support/mock-portal';

const who = { identity: 'stu001', cookies: { JSESSIONID: 'live' } };

describe('PortalClient', () => {
  const portal = createMockPortal();

  afterEach(() => {
    portal.agent.assertNoPendingInterceptors();
  });

  it('reports the portal reachable for any answer below 500', async () => {
    portal.pool
      .intercept({ path: '/jsxsd/', method: 'GET' })
      .reply(302, 'moved', { headers: { location: '/jsxsd/xk/LoginToXk' } });

    expect(await portal.client.health('req-h')).toEqual({
      reachable: true,
      statusCode: 302,
      url: `${PORTAL_ORIGIN}/jsxsd/`,
      redirectLocation: '/jsxsd/xk/LoginToXk',
      contentSample: 'moved',
      contentLength: 5,
      contentType: null,
    });
  });

  it('reports the portal unreachable instead of throwing', async () => {
    portal.pool.intercept({ path: '/jsxsd/', method: 'GET' }).replyWithError(new Error('ETIMEDOUT'));

    const health = await portal.client.health();

    expect(health.reachable).toBe(false);
    expect(health.statusCode).toBeNull();
    expect(health.error).toBe('Portal unreachable: ETIMEDOUT');
  });

  it('posts the grade query form with the session cookies', async () => {
    portal.pool
      .intercept({
        path: '/jsxsd/kscj/cjcx_list',
        method: 'POST',
        body: 'kksj=2024-2025-1&kcxz=&kcmc=&xsfs=all',
        headers: { cookie: 'JSESSIONID=live' },
      })
      .reply(200, loadFixture('grades.html'));

    const table = await portal.client.fetchGrades(who, '2024-2025-1');

    expect(table.semester).toBe('2024-2025-1');
    expect(table.rows).toHaveLength(2);
    expect(table.rows[1]?.['课程名称']).toBe('程序设计');
  });

  it('requests the timetable of the given term', async () => {
    portal.pool
      .intercept({ path: '/jsxsd/xskb/xskb_list.do?xnxq01id=2023-2024-2', method: 'GET' })
      .reply(200, loadFixture('schedule.html'));

    const view = await portal.client.fetchSchedule(who, '2023-2024-2');

    expect(view.semester).toBe('2023-2024-2');
    expect(view.courses).toHaveLength(3);
  });

  it('reads the profile for the session identity', async () => {
    portal.pool.intercept({ path: '/jsxsd/grxx/xsxx', method: 'GET' }).reply(200, loadFixture('profile.html'));

    const profile = await portal.client.fetchProfile(who);

    expect(profile.externalId).toBe('20220001');
    expect(profile.accountName).toBe('stu001');
  });

  it('treats a redirect to the login page as an ended session', async () => {
    portal.pool
      .intercept({ path: '/jsxsd/kscj/cjcx_query', method: 'GET' })
      .reply(302, '', { headers: { location: `${PORTAL_ORIGIN}/jsxsd/xk/LoginToXk` } });

    await expect(portal.client.fetchSemesters(who)).rejects.toMatchObject({
      code: PortalErrorCode.SESSION_INVALID,
      diagnostic: { statusCode: 302, redirectLocation: `${PORTAL_ORIGIN}/jsxsd/xk/LoginToXk` },
    });
  });

  it('treats a served login page as an ended session', async () => {
    portal.pool
      .intercept({ path: '/jsxsd/kscj/cjcx_query', method: 'GET' })
      .reply(200, loadFixture('login-page.html'));

    await expect(portal.client.fetchSemesters(who)).rejects.toMatchObject({
      code: PortalErrorCode.SESSION_INVALID,
    });
  });

  it('maps server errors to UPSTREAM_UNREACHABLE', async () => {
    portal.pool.intercept({ path: '/jsxsd/grxx/xsxx', method: 'GET' }).reply(500, 'oops');

    await expect(portal.client.fetchProfile(who)).rejects.toMatchObject({
      code: PortalErrorCode.UPSTREAM_UNREACHABLE,
      message: 'Portal answered with status 500',
    });
  });
});

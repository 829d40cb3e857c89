import * as cheerio from 'cheerio';
import { PORTAL } from '../constants';
import { PortalError, PortalErrorCode } from '../errors/portal.errors';

/**
 * Fragments of a redirect target that point back at a login page
 */
export const LOGIN_REDIRECT_MARKERS = [
  'logintoxk',
  'login.jsp',
  'login.do',
  'logon.do',
  'cas/login',
] as const;

/**
 * Fragments only present in the authenticated frame of the portal
 */
export const AUTHENTICATED_FRAME_MARKERS = [
  'xsmain',
  'framework/main',
  'mainframe',
  'main_frame',
] as const;

const LOGIN_PROMPT_PATTERN = /请先登录|登录超时|请重新登录|会话已过期|session\s+(?:has\s+)?expired/i;

function containsAny(haystack: string, needles: readonly string[]): boolean {
  const lower = haystack.toLowerCase();
  return needles.some(needle => lower.includes(needle));
}

export function isLoginRedirect(location: string | null): boolean {
  return location !== null && containsAny(location, LOGIN_REDIRECT_MARKERS);
}

export function hasAuthenticatedFrameMarker(html: string): boolean {
  return containsAny(html, AUTHENTICATED_FRAME_MARKERS);
}

/**
 * True when a page is the portal's login form or a "please sign in again" notice.
 * A logout link pointing at the login endpoint is not enough on its own.
 */
export function looksLikeLoginPage(html: string): boolean {
  if (!html) {
    return false;
  }
  if (LOGIN_PROMPT_PATTERN.test(html)) {
    return true;
  }

  const $ = cheerio.load(html);
  if ($('input[name="userAccount"], input#userAccount').length > 0) {
    return true;
  }
  return (
    $('form')
      .toArray()
      .some(form => ($(form).attr('action') ?? '').toLowerCase().includes('logintoxk'))
  );
}

export function htmlSample(html: string): string {
  return html.slice(0, PORTAL.HTML_SAMPLE_LENGTH);
}

/**
 * Throw SESSION_INVALID when the page is the login page
 */
export function assertNotLoginPage(html: string, statusCode?: number): void {
  if (looksLikeLoginPage(html)) {
    throw new PortalError(PortalErrorCode.SESSION_INVALID, 'Portal session expired', {
      ...(statusCode !== undefined ? { statusCode } : {}),
      htmlSample: htmlSample(html),
    });
  }
}

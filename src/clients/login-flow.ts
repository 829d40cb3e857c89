import { CredentialEncoder } from './credential-encoder';
import { mergeCookies, PortalTransport } from './portal-transport';
import {
  hasAuthenticatedFrameMarker,
  htmlSample,
  isLoginRedirect,
  looksLikeLoginPage,
} from '../extractors/session-markers';
import { PortalError, PortalErrorCode } from '../errors/portal.errors';
import { LoginOutcome } from '../types/portal.types';
import { logger } from '../utils/logger';

export interface LoginFlowPaths {
  healthPath: string;
  loginPath: string;
}

/**
 * Decide from the credential POST's response whether the portal accepted the login
 */
export function isLoginAccepted(statusCode: number, location: string | null, body: string): boolean {
  if (statusCode >= 300 && statusCode < 400) {
    return !isLoginRedirect(location);
  }
  if (statusCode === 200) {
    return hasAuthenticatedFrameMarker(body) && !looksLikeLoginPage(body);
  }
  return false;
}

interface PortalAnswer {
  statusCode: number;
  location: string | null;
  body: string;
}

/**
 * Anything outside 2xx/3xx means the portal itself is failing, not the credentials
 */
function assertPortalAnswered(step: string, response: PortalAnswer): void {
  if (response.statusCode >= 200 && response.statusCode < 400) {
    return;
  }
  throw new PortalError(PortalErrorCode.UPSTREAM_UNREACHABLE, `Portal ${step} answered ${response.statusCode}`, {
    statusCode: response.statusCode,
    redirectLocation: response.location,
    htmlSample: htmlSample(response.body),
  });
}

/**
 * Portal login handshake: warm-up GET, then the credential POST on the same cookie jar.
 * Network failures and error statuses on either call propagate as UPSTREAM_UNREACHABLE.
 */
export class LoginFlow {
  constructor(
    private readonly transport: PortalTransport,
    private readonly encoder: CredentialEncoder,
    private readonly paths: LoginFlowPaths
  ) {}

  async login(username: string, password: string, requestId?: string): Promise<LoginOutcome> {
    const warmUp = await this.transport.send({
      method: 'GET',
      path: this.paths.healthPath,
      ...(requestId ? { requestId } : {}),
    });
    assertPortalAnswered('warm-up', warmUp);
    let cookies = mergeCookies({}, warmUp.setCookies);

    const response = await this.transport.send({
      method: 'POST',
      path: this.paths.loginPath,
      form: {
        userAccount: username,
        userPassword: '',
        encoded: this.encoder.encode(username, password),
      },
      cookies,
      ...(requestId ? { requestId } : {}),
    });
    assertPortalAnswered('login', response);
    cookies = mergeCookies(cookies, response.setCookies);

    if (isLoginAccepted(response.statusCode, response.location, response.body)) {
      logger.info('LoginFlow', 'Portal login accepted', {
        requestId,
        statusCode: response.statusCode,
        cookieNames: Object.keys(cookies),
      });
      return { success: true, cookies, diagnostic: null };
    }

    const diagnostic = {
      statusCode: response.statusCode,
      redirectLocation: response.location,
      htmlSample: htmlSample(response.body),
    };
    logger.warn('LoginFlow', 'Portal login rejected', {
      requestId,
      statusCode: response.statusCode,
      redirectLocation: response.location,
    });
    return { success: false, cookies, diagnostic };
  }
}

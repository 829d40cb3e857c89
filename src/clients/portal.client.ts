import { LoginFlow } from './login-flow';
import { PortalTransport, TransportRequest, TransportResponse } from './portal-transport';
import { PortalError, PortalErrorCode, isPortalError } from '../errors/portal.errors';
import { extractGrades } from '../extractors/grade.extractor';
import { extractProfile } from '../extractors/profile.extractor';
import { ScheduleExtractor } from '../extractors/schedule';
import { extractSemesters } from '../extractors/semester.extractor';
import { htmlSample, isLoginRedirect } from '../extractors/session-markers';
import {
  CookieJar,
  GradeTable,
  LoginOutcome,
  PortalHealth,
  ProfileView,
  ScheduleView,
  SemesterList,
} from '../types/portal.types';
import { PORTAL } from '../constants';

export interface PortalPaths {
  healthPath: string;
  profilePath: string;
  semestersPath: string;
  gradesPath: string;
  schedulePath: string;
}

/**
 * Who the page is fetched for
 */
export interface PortalCredentials {
  identity: string;
  cookies: CookieJar;
}

/**
 * Fetches portal pages with a session's cookies and runs the matching extractor
 */
export class PortalClient {
  constructor(
    private readonly transport: PortalTransport,
    private readonly loginFlow: LoginFlow,
    private readonly scheduleExtractor: ScheduleExtractor,
    private readonly paths: PortalPaths
  ) {}

  /**
   * Probe the portal without credentials. Any answer below 500 counts as reachable.
   */
  async health(requestId?: string): Promise<PortalHealth> {
    const url = this.transport.buildUrl(this.paths.healthPath).toString();
    try {
      const res = await this.transport.send({
        method: 'GET',
        path: this.paths.healthPath,
        ...(requestId ? { requestId } : {}),
      });
      return {
        reachable: res.statusCode >= 200 && res.statusCode < 500,
        statusCode: res.statusCode,
        url: res.url,
        redirectLocation: res.location,
        contentSample: res.body.slice(0, PORTAL.HTML_SAMPLE_LENGTH),
        contentLength: res.contentLength,
        contentType: res.contentType,
      };
    } catch (error) {
      if (!isPortalError(error, PortalErrorCode.UPSTREAM_UNREACHABLE)) {
        throw error;
      }
      return {
        reachable: false,
        statusCode: null,
        url,
        redirectLocation: null,
        contentSample: '',
        contentLength: 0,
        contentType: null,
        error: error.message,
      };
    }
  }

  login(username: string, password: string, requestId?: string): Promise<LoginOutcome> {
    return this.loginFlow.login(username, password, requestId);
  }

  async fetchProfile(who: PortalCredentials, requestId?: string): Promise<ProfileView> {
    const res = await this.fetchPage({
      method: 'GET',
      path: this.paths.profilePath,
      cookies: who.cookies,
      ...(requestId ? { requestId } : {}),
    });
    return extractProfile(res.body, who.identity);
  }

  async fetchSemesters(who: PortalCredentials, requestId?: string): Promise<SemesterList> {
    const res = await this.fetchPage({
      method: 'GET',
      path: this.paths.semestersPath,
      cookies: who.cookies,
      ...(requestId ? { requestId } : {}),
    });
    return extractSemesters(res.body);
  }

  async fetchGrades(who: PortalCredentials, semester: string, requestId?: string): Promise<GradeTable> {
    const res = await this.fetchPage({
      method: 'POST',
      path: this.paths.gradesPath,
      form: { kksj: semester, kcxz: '', kcmc: '', xsfs: 'all' },
      cookies: who.cookies,
      ...(requestId ? { requestId } : {}),
    });
    return extractGrades(res.body, semester);
  }

  async fetchSchedule(who: PortalCredentials, xnxq: string, requestId?: string): Promise<ScheduleView> {
    const res = await this.fetchPage({
      method: 'GET',
      path: this.paths.schedulePath,
      ...(xnxq ? { query: { xnxq01id: xnxq } } : {}),
      cookies: who.cookies,
      ...(requestId ? { requestId } : {}),
    });
    return this.scheduleExtractor.extract(res.body, {
      ...(xnxq ? { semester: xnxq } : {}),
      requestUrl: res.url,
    });
  }

  /**
   * Send a page request; redirects to the login page mean the portal session ended
   */
  private async fetchPage(req: TransportRequest): Promise<TransportResponse> {
    const res = await this.transport.send(req);
    const diagnostic = {
      statusCode: res.statusCode,
      redirectLocation: res.location,
      htmlSample: htmlSample(res.body),
    };

    if (res.statusCode >= 300 && res.statusCode < 400) {
      if (res.location === null || isLoginRedirect(res.location)) {
        throw new PortalError(
          PortalErrorCode.SESSION_INVALID,
          'Portal redirected to its login page',
          diagnostic
        );
      }
      throw new PortalError(
        PortalErrorCode.UPSTREAM_UNREACHABLE,
        `Unexpected portal redirect to ${res.location}`,
        diagnostic
      );
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new PortalError(
        PortalErrorCode.UPSTREAM_UNREACHABLE,
        `Portal answered with status ${res.statusCode}`,
        diagnostic
      );
    }

    return res;
  }
}

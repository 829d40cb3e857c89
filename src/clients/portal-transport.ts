import { Agent, Dispatcher, request } from 'undici';
import { PORTAL } from '../constants';
import { PortalError, PortalErrorCode } from '../errors/portal.errors';
import { CookieJar } from '../types/portal.types';
import { logger } from '../utils/logger';

export interface PortalTransportOptions {
  baseUrl: string;
  connectTimeoutMs: number;
  /** Applied to both the response headers and the body */
  readTimeoutMs: number;
  insecureSkipVerify: boolean;
  userAgent: string;
  /** Custom dispatcher, e.g. a mock agent */
  dispatcher?: Dispatcher;
}

export interface TransportRequest {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string>;
  form?: Record<string, string>;
  cookies?: CookieJar;
  requestId?: string;
}

export interface TransportResponse {
  statusCode: number;
  url: string;
  location: string | null;
  contentType: string | null;
  body: string;
  contentLength: number;
  /** Cookies set by this response; an empty value marks a removed cookie */
  setCookies: CookieJar;
}

type HeaderValue = string | string[] | undefined;

function firstHeader(value: HeaderValue): string | null {
  if (Array.isArray(value)) {
    return value[0] ?? null;
  }
  return value ?? null;
}

function allHeaders(value: HeaderValue): string[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Parse Set-Cookie header values into name → value.
 * Cookies expired on arrival map to the empty string.
 */
export function parseSetCookies(headers: string[]): CookieJar {
  const jar: CookieJar = {};
  for (const header of headers) {
    const [pair = '', ...attributes] = header.split(';');
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    const expired = attributes.some(attribute => /^\s*max-age\s*=\s*0\s*$/i.test(attribute));
    jar[name] = expired ? '' : value;
  }
  return jar;
}

/**
 * Merge cookies set by a response into a jar, dropping removed ones
 */
export function mergeCookies(jar: CookieJar, update: CookieJar): CookieJar {
  const merged: CookieJar = { ...jar };
  for (const [name, value] of Object.entries(update)) {
    if (value === '') {
      delete merged[name];
    } else {
      merged[name] = value;
    }
  }
  return merged;
}

export function serializeCookies(jar: CookieJar): string {
  return Object.entries(jar)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * Request executor for the portal: fixed timeouts, redirects never followed,
 * the same browser-like headers on every call.
 */
export class PortalTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(private readonly options: PortalTransportOptions) {
    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connect: {
          timeout: options.connectTimeoutMs,
          rejectUnauthorized: !options.insecureSkipVerify,
        },
        headersTimeout: options.readTimeoutMs,
        bodyTimeout: options.readTimeoutMs,
      });
      this.ownsDispatcher = true;
    }
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  buildUrl(path: string, query?: Record<string, string>): URL {
    const url = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    const url = this.buildUrl(req.path, req.query);
    const headers: Record<string, string> = {
      'user-agent': this.options.userAgent,
      accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'accept-language': 'zh-CN,zh;q=0.9,en;q=0.8',
    };
    if (req.requestId) {
      headers[PORTAL.REQUEST_ID_HEADER.toLowerCase()] = req.requestId;
    }
    if (req.cookies && Object.keys(req.cookies).length > 0) {
      headers['cookie'] = serializeCookies(req.cookies);
    }

    let body: string | undefined;
    if (req.form) {
      headers['content-type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(req.form).toString();
    }

    try {
      const res = await request(url, {
        method: req.method,
        headers,
        body,
        dispatcher: this.dispatcher,
      });
      const text = await res.body.text();

      return {
        statusCode: res.statusCode,
        url: url.toString(),
        location: firstHeader(res.headers['location']),
        contentType: firstHeader(res.headers['content-type']),
        body: text,
        contentLength: Buffer.byteLength(text),
        setCookies: parseSetCookies(allHeaders(res.headers['set-cookie'])),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('PortalTransport', 'Upstream request failed', {
        method: req.method,
        path: url.pathname,
        requestId: req.requestId,
        error: message,
      });
      throw new PortalError(
        PortalErrorCode.UPSTREAM_UNREACHABLE,
        `Portal unreachable: ${message}`
      );
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

/**
 * Error codes surfaced by the portal sync engine
 */
export const PortalErrorCode = {
  CREDENTIALS_REJECTED: 'CREDENTIALS_REJECTED',
  SESSION_INVALID: 'SESSION_INVALID',
  UPSTREAM_UNREACHABLE: 'UPSTREAM_UNREACHABLE',
  EXTRACTION_DEGRADED: 'EXTRACTION_DEGRADED',
  PERSISTENCE_WARNING: 'PERSISTENCE_WARNING',
  BAD_REQUEST: 'BAD_REQUEST',
} as const;

export type PortalErrorCode = (typeof PortalErrorCode)[keyof typeof PortalErrorCode];

/**
 * What the upstream answered when a call went wrong.
 * Never carries credentials.
 */
export interface PortalDiagnostic {
  statusCode?: number;
  redirectLocation?: string | null;
  htmlSample?: string;
}

export class PortalError extends Error {
  readonly code: PortalErrorCode;
  readonly diagnostic: PortalDiagnostic | undefined;

  constructor(code: PortalErrorCode, message: string, diagnostic?: PortalDiagnostic) {
    super(message);
    this.name = 'PortalError';
    this.code = code;
    this.diagnostic = diagnostic;
  }

  toJSON(): { code: PortalErrorCode; message: string; diagnostic?: PortalDiagnostic } {
    return {
      code: this.code,
      message: this.message,
      ...(this.diagnostic ? { diagnostic: this.diagnostic } : {}),
    };
  }
}

export function isPortalError(error: unknown, code?: PortalErrorCode): error is PortalError {
  return error instanceof PortalError && (code === undefined || error.code === code);
}

/**
 * HTTP status for each error code
 */
export const HTTP_STATUS_BY_CODE: Record<PortalErrorCode, number> = {
  CREDENTIALS_REJECTED: 401,
  SESSION_INVALID: 401,
  UPSTREAM_UNREACHABLE: 502,
  EXTRACTION_DEGRADED: 502,
  PERSISTENCE_WARNING: 500,
  BAD_REQUEST: 400,
};

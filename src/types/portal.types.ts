/**
 * Portal sync types and interfaces
 */

import type { PortalDiagnostic, PortalErrorCode } from '../errors/portal.errors';

/**
 * Cookie name → value, in the order the upstream set them
 */
export type CookieJar = Record<string, string>;

/**
 * Server-side session bound to the portal's cookies
 */
export interface PortalSession {
  /** Opaque session id (format: S-{32-hex-chars}) */
  sessionId: string;

  /** Login account owning the session */
  identity: string;

  cookies: CookieJar;

  /** Epoch milliseconds */
  createdAt: number;

  /** Hard end, fixed at creation (epoch milliseconds) */
  absoluteExpiresAt: number;

  /** Rolling end, never beyond absoluteExpiresAt (epoch milliseconds) */
  idleExpiresAt: number;
}

export const RESOURCE_KINDS = ['profile', 'semesters', 'grades', 'schedule'] as const;
export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export interface ProfileView {
  externalId: string;
  accountName: string;
  displayName: string | null;
  orgUnit: string | null;
  program: string | null;
  cohortLabel: string | null;
  enrollmentYear: string | null;
  studyLevel: string | null;
  /** Every label/value pair found on the page */
  fields: Record<string, string>;
}

export interface SemesterOption {
  value: string;
  label: string;
}

export interface SemesterList {
  semesters: SemesterOption[];
  selected: string | null;
}

export type GradeRow = Record<string, string>;

export interface GradeTable {
  semester: string;
  headers: string[];
  rows: GradeRow[];
}

export interface ScheduleCourse {
  name: string;
  teacher: string;
  location: string;
  /** 1 = Monday .. 7 = Sunday */
  weekday: number;
  startSlot: number;
  endSlot: number;
  /** Week label as printed, e.g. "1-8,10(周)" */
  weekRange: string;
  /** Sorted, distinct */
  weeks: number[];
}

export interface ScheduleView {
  semester: string;
  currentWeek: number | null;
  courses: ScheduleCourse[];
}

/**
 * Payload type of each resource kind
 */
export interface ResourcePayloads {
  profile: ProfileView;
  semesters: SemesterList;
  grades: GradeTable;
  schedule: ScheduleView;
}

export interface FetchWarning {
  code: PortalErrorCode;
  message: string;
}

export interface FetchFailure {
  success: false;
  error: {
    code: PortalErrorCode;
    message: string;
    diagnostic?: PortalDiagnostic;
  };
}

export interface FetchSuccess<T> {
  success: true;
  data: T;
  cached: boolean;
  fallback: boolean;
  /** ISO timestamp of the snapshot served on fallback */
  fetchedAt?: string;
  warning?: FetchWarning;
}

export type FetchResult<T> = FetchSuccess<T> | FetchFailure;

export interface FetchOptions {
  scope?: string;
  forceRefresh?: boolean;
  requestId?: string;
}

/**
 * Result of a portal login attempt
 */
export interface LoginOutcome {
  success: boolean;
  cookies: CookieJar;
  diagnostic: PortalDiagnostic | null;
}

export interface PortalHealth {
  reachable: boolean;
  statusCode: number | null;
  url: string;
  redirectLocation: string | null;
  contentSample: string;
  contentLength: number;
  contentType: string | null;
  error?: string;
}

/**
 * Durable record types
 */

import type { GradeRow, ResourceKind, ScheduleCourse } from './portal.types';

/**
 * Owner of stored records: the login account and its external id
 */
export interface OwnerRef {
  externalId: string;
  accountName: string;
}

export interface IdentityRecord {
  externalId: string;
  accountName: string;
  displayName: string | null;
  orgUnit: string | null;
  program: string | null;
  cohortLabel: string | null;
  enrollmentYear: string | null;
  studyLevel: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface SnapshotRecord {
  id: string;
  externalId: string;
  kind: ResourceKind;
  scope: string;
  payload: unknown;
  fetchedAt: Date;
}

/**
 * Grade row with normalized columns picked out of the raw row
 */
export interface NormalizedGrade {
  courseCode: string | null;
  courseName: string | null;
  credit: string | null;
  score: string | null;
  gradePoint: string | null;
  contentHash: string;
  rawPayload: GradeRow;
}

export interface GradeRecord extends NormalizedGrade {
  id: string;
  externalId: string;
  semesterScope: string;
  fetchedAt: Date;
}

export interface NormalizedCourse extends ScheduleCourse {
  contentHash: string;
}

export interface CourseRecord extends NormalizedCourse {
  id: string;
  scheduleId: string;
}

export interface ScheduleRecord {
  id: string;
  externalId: string;
  semesterScope: string;
  currentWeek: number | null;
  rawPayload: unknown;
  fetchedAt: Date;
  courses: CourseRecord[];
}

export interface GradeSaveResult {
  snapshotId: string;
  /** Distinct rows written (inserted or touched) */
  rowCount: number;
}

export interface ScheduleSaveResult {
  snapshotId: string;
  scheduleId: string;
  courseCount: number;
}

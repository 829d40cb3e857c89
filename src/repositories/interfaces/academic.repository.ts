import {
  GradeRecord,
  GradeSaveResult,
  IdentityRecord,
  OwnerRef,
  ScheduleRecord,
  ScheduleSaveResult,
  SnapshotRecord,
} from '../../types/academic.types';
import {
  GradeTable,
  ProfileView,
  ResourceKind,
  ScheduleView,
  SemesterList,
} from '../../types/portal.types';

/**
 * Durable store of portal data.
 * Every save runs in one transaction: identity upsert, snapshot append,
 * then the normalized rows of that resource.
 */
export interface AcademicRepository {
  /**
   * Create tables and indexes when missing
   */
  ensureSchema(): Promise<void>;

  /**
   * Upsert the identity row; returns the stored row
   */
  ensureIdentity(owner: OwnerRef): Promise<IdentityRecord>;

  getIdentity(externalId: string): Promise<IdentityRecord | null>;

  /**
   * Snapshot the profile and merge its fields into the identity row.
   * Missing fields keep their stored value.
   */
  saveProfile(owner: OwnerRef, profile: ProfileView): Promise<string>;

  saveSemesters(owner: OwnerRef, list: SemesterList): Promise<string>;

  /**
   * Snapshot the grade table and upsert its rows, deduplicated by content hash
   */
  saveGrades(owner: OwnerRef, scope: string, table: GradeTable): Promise<GradeSaveResult>;

  /**
   * Snapshot the schedule and replace every course row of (owner, scope)
   */
  saveSchedule(owner: OwnerRef, scope: string, view: ScheduleView): Promise<ScheduleSaveResult>;

  latestSnapshot(externalId: string, kind: ResourceKind, scope: string): Promise<SnapshotRecord | null>;

  /**
   * Most recent snapshots first
   */
  listSnapshots(
    externalId: string,
    kind: ResourceKind,
    scope: string,
    limit: number
  ): Promise<SnapshotRecord[]>;

  listGrades(externalId: string, scope: string): Promise<GradeRecord[]>;

  getSchedule(externalId: string, scope: string): Promise<ScheduleRecord | null>;

  /**
   * Remove an identity and everything it owns
   */
  deleteIdentity(externalId: string): Promise<boolean>;

  /**
   * Delete snapshots older than the cutoff, in batches.
   * The newest snapshot of each (owner, kind, scope) is always kept.
   */
  pruneSnapshots(olderThan: Date, batchSize: number, batchDelayMs: number): Promise<number>;

  healthCheck(): Promise<boolean>;
}

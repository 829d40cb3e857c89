import { AcademicRepository } from '../interfaces/academic.repository';
import { normalizeCourses, normalizeGrades } from '../record-normalizer';
import {
  CourseRecord,
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

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * In-process academic repository for single-process runs and tests.
 * Each save mutates state without awaiting in between, so a save is
 * all-or-nothing from the point of view of other callers.
 */
export class MemoryAcademicRepository implements AcademicRepository {
  private readonly identities = new Map<string, IdentityRecord>();
  private snapshots: SnapshotRecord[] = [];
  private grades: GradeRecord[] = [];
  private readonly schedules = new Map<string, ScheduleRecord>();
  private nextId = 1;

  constructor(private readonly now: () => number = Date.now) {}

  async ensureSchema(): Promise<void> {
    // Nothing to create
  }

  async ensureIdentity(owner: OwnerRef): Promise<IdentityRecord> {
    return clone(this.upsertIdentity(owner));
  }

  async getIdentity(externalId: string): Promise<IdentityRecord | null> {
    const identity = this.identities.get(externalId);
    return identity ? clone(identity) : null;
  }

  async saveProfile(owner: OwnerRef, profile: ProfileView): Promise<string> {
    const identity = this.upsertIdentity(owner);
    const snapshotId = this.appendSnapshot(owner.externalId, 'profile', '', profile);

    identity.displayName = profile.displayName ?? identity.displayName;
    identity.orgUnit = profile.orgUnit ?? identity.orgUnit;
    identity.program = profile.program ?? identity.program;
    identity.cohortLabel = profile.cohortLabel ?? identity.cohortLabel;
    identity.enrollmentYear = profile.enrollmentYear ?? identity.enrollmentYear;
    identity.studyLevel = profile.studyLevel ?? identity.studyLevel;
    identity.updatedAt = new Date(this.now());

    return snapshotId;
  }

  async saveSemesters(owner: OwnerRef, list: SemesterList): Promise<string> {
    this.upsertIdentity(owner);
    return this.appendSnapshot(owner.externalId, 'semesters', '', list);
  }

  async saveGrades(owner: OwnerRef, scope: string, table: GradeTable): Promise<GradeSaveResult> {
    const normalized = normalizeGrades(table.rows);
    this.upsertIdentity(owner);
    const snapshotId = this.appendSnapshot(owner.externalId, 'grades', scope, table);
    const fetchedAt = new Date(this.now());

    for (const grade of normalized) {
      const existing = this.grades.find(
        row =>
          row.externalId === owner.externalId &&
          row.semesterScope === scope &&
          row.contentHash === grade.contentHash
      );
      if (existing) {
        Object.assign(existing, clone(grade), { fetchedAt });
        continue;
      }
      this.grades.push({
        ...clone(grade),
        id: this.allocateId(),
        externalId: owner.externalId,
        semesterScope: scope,
        fetchedAt,
      });
    }

    return { snapshotId, rowCount: normalized.length };
  }

  async saveSchedule(
    owner: OwnerRef,
    scope: string,
    view: ScheduleView
  ): Promise<ScheduleSaveResult> {
    const normalized = normalizeCourses(view.courses);
    this.upsertIdentity(owner);
    const snapshotId = this.appendSnapshot(owner.externalId, 'schedule', scope, view);

    const key = this.scheduleKey(owner.externalId, scope);
    const existing = this.schedules.get(key);
    const scheduleId = existing?.id ?? this.allocateId();
    const courses: CourseRecord[] = normalized.map(course => ({
      ...clone(course),
      id: this.allocateId(),
      scheduleId,
    }));

    this.schedules.set(key, {
      id: scheduleId,
      externalId: owner.externalId,
      semesterScope: scope,
      currentWeek: view.currentWeek,
      rawPayload: clone(view),
      fetchedAt: new Date(this.now()),
      courses,
    });

    return { snapshotId, scheduleId, courseCount: courses.length };
  }

  async latestSnapshot(
    externalId: string,
    kind: ResourceKind,
    scope: string
  ): Promise<SnapshotRecord | null> {
    const [latest] = await this.listSnapshots(externalId, kind, scope, 1);
    return latest ?? null;
  }

  async listSnapshots(
    externalId: string,
    kind: ResourceKind,
    scope: string,
    limit: number
  ): Promise<SnapshotRecord[]> {
    return this.snapshots
      .filter(s => s.externalId === externalId && s.kind === kind && s.scope === scope)
      .sort((a, b) => b.fetchedAt.getTime() - a.fetchedAt.getTime() || Number(b.id) - Number(a.id))
      .slice(0, limit)
      .map(clone);
  }

  async listGrades(externalId: string, scope: string): Promise<GradeRecord[]> {
    return this.grades
      .filter(row => row.externalId === externalId && row.semesterScope === scope)
      .map(clone);
  }

  async getSchedule(externalId: string, scope: string): Promise<ScheduleRecord | null> {
    const schedule = this.schedules.get(this.scheduleKey(externalId, scope));
    return schedule ? clone(schedule) : null;
  }

  async deleteIdentity(externalId: string): Promise<boolean> {
    const existed = this.identities.delete(externalId);
    this.snapshots = this.snapshots.filter(s => s.externalId !== externalId);
    this.grades = this.grades.filter(row => row.externalId !== externalId);
    for (const [key, schedule] of this.schedules) {
      if (schedule.externalId === externalId) {
        this.schedules.delete(key);
      }
    }
    return existed;
  }

  async pruneSnapshots(olderThan: Date, _batchSize: number, _batchDelayMs: number): Promise<number> {
    const newest = new Map<string, SnapshotRecord>();
    for (const snapshot of this.snapshots) {
      const group = `${snapshot.externalId}\u0000${snapshot.kind}\u0000${snapshot.scope}`;
      const current = newest.get(group);
      if (!current || snapshot.fetchedAt.getTime() > current.fetchedAt.getTime()) {
        newest.set(group, snapshot);
      }
    }
    const keep = new Set(newest.values());

    const before = this.snapshots.length;
    this.snapshots = this.snapshots.filter(
      s => keep.has(s) || s.fetchedAt.getTime() >= olderThan.getTime()
    );
    return before - this.snapshots.length;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Number of course rows currently stored, across all schedules */
  courseCount(): number {
    let total = 0;
    for (const schedule of this.schedules.values()) {
      total += schedule.courses.length;
    }
    return total;
  }

  private upsertIdentity(owner: OwnerRef): IdentityRecord {
    const existing = this.identities.get(owner.externalId);
    if (existing) {
      existing.accountName = owner.accountName;
      return existing;
    }
    const now = new Date(this.now());
    const identity: IdentityRecord = {
      externalId: owner.externalId,
      accountName: owner.accountName,
      displayName: null,
      orgUnit: null,
      program: null,
      cohortLabel: null,
      enrollmentYear: null,
      studyLevel: null,
      createdAt: now,
      updatedAt: now,
    };
    this.identities.set(owner.externalId, identity);
    return identity;
  }

  private appendSnapshot(
    externalId: string,
    kind: ResourceKind,
    scope: string,
    payload: unknown
  ): string {
    const id = this.allocateId();
    this.snapshots.push({
      id,
      externalId,
      kind,
      scope,
      payload: clone(payload),
      fetchedAt: new Date(this.now()),
    });
    return id;
  }

  private allocateId(): string {
    return String(this.nextId++);
  }

  private scheduleKey(externalId: string, scope: string): string {
    return `${externalId}\u0000${scope}`;
  }
}

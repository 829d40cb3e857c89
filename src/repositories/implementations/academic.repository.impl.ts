import { QueryResultRow } from 'pg';
import { AcademicRepository } from '../interfaces/academic.repository';
import { BaseRepositoryImpl } from './base.repository.impl';
import { normalizeCourses, normalizeGrades } from '../record-normalizer';
import { SqlSession } from '../../services/database.service';
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
  RESOURCE_KINDS,
  ResourceKind,
  ScheduleView,
  SemesterList,
} from '../../types/portal.types';
import { logger } from '../../utils/logger';

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS portal_identity (
    external_id VARCHAR(64) PRIMARY KEY,
    account_name VARCHAR(128) NOT NULL,
    display_name VARCHAR(128),
    org_unit VARCHAR(255),
    program VARCHAR(255),
    cohort_label VARCHAR(255),
    enrollment_year VARCHAR(32),
    study_level VARCHAR(64),
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE TABLE IF NOT EXISTS portal_snapshot (
    id BIGSERIAL PRIMARY KEY,
    external_id VARCHAR(64) NOT NULL REFERENCES portal_identity(external_id) ON DELETE CASCADE,
    kind VARCHAR(32) NOT NULL,
    scope VARCHAR(64) NOT NULL DEFAULT '',
    payload JSONB NOT NULL,
    fetched_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
  CREATE INDEX IF NOT EXISTS idx_portal_snapshot_lookup
    ON portal_snapshot(external_id, kind, scope, fetched_at DESC);
  CREATE INDEX IF NOT EXISTS idx_portal_snapshot_fetched_at ON portal_snapshot(fetched_at);

  CREATE TABLE IF NOT EXISTS portal_grade (
    id BIGSERIAL PRIMARY KEY,
    external_id VARCHAR(64) NOT NULL REFERENCES portal_identity(external_id) ON DELETE CASCADE,
    semester_scope VARCHAR(64) NOT NULL DEFAULT '',
    course_code VARCHAR(64),
    course_name TEXT,
    credit VARCHAR(32),
    score VARCHAR(32),
    grade_point VARCHAR(32),
    content_hash CHAR(40) NOT NULL,
    raw_payload JSONB NOT NULL,
    fetched_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT uq_portal_grade UNIQUE (external_id, semester_scope, content_hash)
  );

  CREATE TABLE IF NOT EXISTS portal_schedule (
    id BIGSERIAL PRIMARY KEY,
    external_id VARCHAR(64) NOT NULL REFERENCES portal_identity(external_id) ON DELETE CASCADE,
    semester_scope VARCHAR(64) NOT NULL DEFAULT '',
    current_week INTEGER,
    raw_payload JSONB NOT NULL,
    fetched_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT uq_portal_schedule UNIQUE (external_id, semester_scope)
  );

  CREATE TABLE IF NOT EXISTS portal_schedule_course (
    id BIGSERIAL PRIMARY KEY,
    schedule_id BIGINT NOT NULL REFERENCES portal_schedule(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    teacher TEXT NOT NULL DEFAULT '',
    location TEXT NOT NULL DEFAULT '',
    weekday SMALLINT NOT NULL,
    start_slot SMALLINT NOT NULL,
    end_slot SMALLINT NOT NULL,
    week_range TEXT NOT NULL DEFAULT '',
    weeks INTEGER[] NOT NULL,
    content_hash CHAR(40) NOT NULL,
    CONSTRAINT uq_portal_schedule_course UNIQUE (schedule_id, content_hash)
  );
`;

const UPSERT_IDENTITY_SQL = `
  INSERT INTO portal_identity (external_id, account_name)
  VALUES ($1, $2)
  ON CONFLICT (external_id) DO UPDATE SET account_name = EXCLUDED.account_name
  RETURNING *`;

const INSERT_SNAPSHOT_SQL = `
  INSERT INTO portal_snapshot (external_id, kind, scope, payload)
  VALUES ($1, $2, $3, $4::jsonb)
  RETURNING id`;

const MERGE_PROFILE_SQL = `
  UPDATE portal_identity SET
    display_name = COALESCE($2, display_name),
    org_unit = COALESCE($3, org_unit),
    program = COALESCE($4, program),
    cohort_label = COALESCE($5, cohort_label),
    enrollment_year = COALESCE($6, enrollment_year),
    study_level = COALESCE($7, study_level),
    updated_at = NOW()
  WHERE external_id = $1`;

const UPSERT_GRADE_SQL = `
  INSERT INTO portal_grade (
    external_id, semester_scope, course_code, course_name, credit, score,
    grade_point, content_hash, raw_payload, fetched_at
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, NOW())
  ON CONFLICT (external_id, semester_scope, content_hash) DO UPDATE SET
    course_code = EXCLUDED.course_code,
    course_name = EXCLUDED.course_name,
    credit = EXCLUDED.credit,
    score = EXCLUDED.score,
    grade_point = EXCLUDED.grade_point,
    raw_payload = EXCLUDED.raw_payload,
    fetched_at = NOW()`;

const UPSERT_SCHEDULE_SQL = `
  INSERT INTO portal_schedule (external_id, semester_scope, current_week, raw_payload, fetched_at)
  VALUES ($1, $2, $3, $4::jsonb, NOW())
  ON CONFLICT (external_id, semester_scope) DO UPDATE SET
    current_week = EXCLUDED.current_week,
    raw_payload = EXCLUDED.raw_payload,
    fetched_at = NOW()
  RETURNING id`;

const DELETE_COURSES_SQL = 'DELETE FROM portal_schedule_course WHERE schedule_id = $1';

const INSERT_COURSE_SQL = `
  INSERT INTO portal_schedule_course (
    schedule_id, name, teacher, location, weekday, start_slot, end_slot,
    week_range, weeks, content_hash
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  ON CONFLICT (schedule_id, content_hash) DO NOTHING`;

const PRUNE_SNAPSHOTS_SQL = `
  DELETE FROM portal_snapshot WHERE id IN (
    SELECT s.id FROM portal_snapshot s
    WHERE s.fetched_at < $1
      AND EXISTS (
        SELECT 1 FROM portal_snapshot n
        WHERE n.external_id = s.external_id
          AND n.kind = s.kind
          AND n.scope = s.scope
          AND n.fetched_at > s.fetched_at
      )
    LIMIT $2
  )`;

function text(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

function textOrNull(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(text(value));
}

function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

function toKind(value: unknown): ResourceKind {
  const kind = RESOURCE_KINDS.find(candidate => candidate === value);
  if (kind === undefined) {
    throw new Error(`Unknown snapshot kind: ${text(value)}`);
  }
  return kind;
}

function toStringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, entry] of Object.entries(value)) {
      result[key] = text(entry);
    }
  }
  return result;
}

function toWeeks(value: unknown): number[] {
  return Array.isArray(value) ? value.map(Number).filter(Number.isInteger) : [];
}

/**
 * PostgreSQL implementation of the academic repository
 */
export class AcademicRepositoryImpl extends BaseRepositoryImpl implements AcademicRepository {
  /**
   * Ensure portal tables exist
   */
  async ensureSchema(): Promise<void> {
    try {
      await this.query(SCHEMA_SQL);
    } catch (error) {
      logger.error('AcademicRepository', 'Failed to ensure portal tables', error);
      throw error;
    }
  }

  async ensureIdentity(owner: OwnerRef): Promise<IdentityRecord> {
    return this.upsertIdentity(owner, this.db);
  }

  async getIdentity(externalId: string): Promise<IdentityRecord | null> {
    const result = await this.query('SELECT * FROM portal_identity WHERE external_id = $1', [
      externalId,
    ]);
    const row = result.rows[0];
    return row ? this.mapIdentityRow(row) : null;
  }

  async saveProfile(owner: OwnerRef, profile: ProfileView): Promise<string> {
    return this.withTransaction(async client => {
      await this.upsertIdentity(owner, client);
      const snapshotId = await this.appendSnapshot(client, owner.externalId, 'profile', '', profile);
      await this.query(
        MERGE_PROFILE_SQL,
        [
          owner.externalId,
          profile.displayName,
          profile.orgUnit,
          profile.program,
          profile.cohortLabel,
          profile.enrollmentYear,
          profile.studyLevel,
        ],
        client
      );
      return snapshotId;
    });
  }

  async saveSemesters(owner: OwnerRef, list: SemesterList): Promise<string> {
    return this.withTransaction(async client => {
      await this.upsertIdentity(owner, client);
      return this.appendSnapshot(client, owner.externalId, 'semesters', '', list);
    });
  }

  async saveGrades(owner: OwnerRef, scope: string, table: GradeTable): Promise<GradeSaveResult> {
    const grades = normalizeGrades(table.rows);

    return this.withTransaction(async client => {
      await this.upsertIdentity(owner, client);
      const snapshotId = await this.appendSnapshot(client, owner.externalId, 'grades', scope, table);

      for (const grade of grades) {
        await this.query(
          UPSERT_GRADE_SQL,
          [
            owner.externalId,
            scope,
            grade.courseCode,
            grade.courseName,
            grade.credit,
            grade.score,
            grade.gradePoint,
            grade.contentHash,
            JSON.stringify(grade.rawPayload),
          ],
          client
        );
      }

      logger.debug('AcademicRepository', 'Grades saved', {
        externalId: owner.externalId,
        scope,
        rows: grades.length,
      });

      return { snapshotId, rowCount: grades.length };
    });
  }

  async saveSchedule(
    owner: OwnerRef,
    scope: string,
    view: ScheduleView
  ): Promise<ScheduleSaveResult> {
    const courses = normalizeCourses(view.courses);

    return this.withTransaction(async client => {
      await this.upsertIdentity(owner, client);
      const snapshotId = await this.appendSnapshot(client, owner.externalId, 'schedule', scope, view);

      const scheduleResult = await this.query(
        UPSERT_SCHEDULE_SQL,
        [owner.externalId, scope, view.currentWeek, JSON.stringify(view)],
        client
      );
      const scheduleId = text(scheduleResult.rows[0]?.['id']);

      await this.query(DELETE_COURSES_SQL, [scheduleId], client);

      for (const course of courses) {
        await this.query(
          INSERT_COURSE_SQL,
          [
            scheduleId,
            course.name,
            course.teacher,
            course.location,
            course.weekday,
            course.startSlot,
            course.endSlot,
            course.weekRange,
            course.weeks,
            course.contentHash,
          ],
          client
        );
      }

      return { snapshotId, scheduleId, courseCount: courses.length };
    });
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
    const result = await this.query(
      `SELECT id, external_id, kind, scope, payload, fetched_at
       FROM portal_snapshot
       WHERE external_id = $1 AND kind = $2 AND scope = $3
       ORDER BY fetched_at DESC, id DESC
       LIMIT $4`,
      [externalId, kind, scope, limit]
    );
    return result.rows.map(row => this.mapSnapshotRow(row));
  }

  async listGrades(externalId: string, scope: string): Promise<GradeRecord[]> {
    const result = await this.query(
      `SELECT * FROM portal_grade
       WHERE external_id = $1 AND semester_scope = $2
       ORDER BY id`,
      [externalId, scope]
    );
    return result.rows.map(row => this.mapGradeRow(row));
  }

  async getSchedule(externalId: string, scope: string): Promise<ScheduleRecord | null> {
    const scheduleResult = await this.query(
      'SELECT * FROM portal_schedule WHERE external_id = $1 AND semester_scope = $2',
      [externalId, scope]
    );
    const row = scheduleResult.rows[0];
    if (!row) {
      return null;
    }

    const scheduleId = text(row['id']);
    const courseResult = await this.query(
      'SELECT * FROM portal_schedule_course WHERE schedule_id = $1 ORDER BY weekday, start_slot, id',
      [scheduleId]
    );

    return {
      id: scheduleId,
      externalId: text(row['external_id']),
      semesterScope: text(row['semester_scope']),
      currentWeek: toNumberOrNull(row['current_week']),
      rawPayload: row['raw_payload'],
      fetchedAt: toDate(row['fetched_at']),
      courses: courseResult.rows.map(course => this.mapCourseRow(course)),
    };
  }

  async deleteIdentity(externalId: string): Promise<boolean> {
    const result = await this.query('DELETE FROM portal_identity WHERE external_id = $1', [
      externalId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async pruneSnapshots(olderThan: Date, batchSize: number, batchDelayMs: number): Promise<number> {
    let totalDeleted = 0;
    let deleted = 0;

    do {
      const result = await this.query(PRUNE_SNAPSHOTS_SQL, [olderThan, batchSize]);

      deleted = result.rowCount ?? 0;
      totalDeleted += deleted;

      if (deleted > 0) {
        logger.debug('AcademicRepository', 'Pruned snapshot batch', {
          batchDeleted: deleted,
          totalDeleted,
        });
      }

      // Small delay between batches to avoid resource exhaustion
      if (deleted === batchSize) {
        await new Promise(resolve => setTimeout(resolve, batchDelayMs));
      }
    } while (deleted === batchSize);

    return totalDeleted;
  }

  private async upsertIdentity(owner: OwnerRef, session: SqlSession): Promise<IdentityRecord> {
    const result = await this.query(
      UPSERT_IDENTITY_SQL,
      [owner.externalId, owner.accountName],
      session
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Identity upsert returned no row for ${owner.externalId}`);
    }
    return this.mapIdentityRow(row);
  }

  private async appendSnapshot(
    session: SqlSession,
    externalId: string,
    kind: ResourceKind,
    scope: string,
    payload: unknown
  ): Promise<string> {
    const result = await this.query(
      INSERT_SNAPSHOT_SQL,
      [externalId, kind, scope, JSON.stringify(payload)],
      session
    );
    return text(result.rows[0]?.['id']);
  }

  private mapIdentityRow(row: QueryResultRow): IdentityRecord {
    return {
      externalId: text(row['external_id']),
      accountName: text(row['account_name']),
      displayName: textOrNull(row['display_name']),
      orgUnit: textOrNull(row['org_unit']),
      program: textOrNull(row['program']),
      cohortLabel: textOrNull(row['cohort_label']),
      enrollmentYear: textOrNull(row['enrollment_year']),
      studyLevel: textOrNull(row['study_level']),
      createdAt: toDate(row['created_at']),
      updatedAt: toDate(row['updated_at']),
    };
  }

  private mapSnapshotRow(row: QueryResultRow): SnapshotRecord {
    return {
      id: text(row['id']),
      externalId: text(row['external_id']),
      kind: toKind(row['kind']),
      scope: text(row['scope']),
      payload: row['payload'],
      fetchedAt: toDate(row['fetched_at']),
    };
  }

  private mapGradeRow(row: QueryResultRow): GradeRecord {
    return {
      id: text(row['id']),
      externalId: text(row['external_id']),
      semesterScope: text(row['semester_scope']),
      courseCode: textOrNull(row['course_code']),
      courseName: textOrNull(row['course_name']),
      credit: textOrNull(row['credit']),
      score: textOrNull(row['score']),
      gradePoint: textOrNull(row['grade_point']),
      contentHash: text(row['content_hash']).trim(),
      rawPayload: toStringMap(row['raw_payload']),
      fetchedAt: toDate(row['fetched_at']),
    };
  }

  private mapCourseRow(row: QueryResultRow): CourseRecord {
    return {
      id: text(row['id']),
      scheduleId: text(row['schedule_id']),
      name: text(row['name']),
      teacher: text(row['teacher']),
      location: text(row['location']),
      weekday: Number(row['weekday']),
      startSlot: Number(row['start_slot']),
      endSlot: Number(row['end_slot']),
      weekRange: text(row['week_range']),
      weeks: toWeeks(row['weeks']),
      contentHash: text(row['content_hash']).trim(),
    };
  }
}

import { describe, expect, it } from 'vitest';
import { AcademicRepositoryImpl, SCHEMA_SQL } from '../../src/repositories/implementations/academic.repository.impl';
import { sampleGrades, sampleSchedule } from '../support/academic-stack';
import { RecordingSql, Responder } from '../support/recording-sql';

const owner = { externalId: '20220001', accountName: 'stu001' };

const identityRow = {
  external_id: '20220001',
  account_name: 'stu001',
  display_name: null,
  created_at: new Date(0),
  updated_at: new Date(0),
};

const portalDb: Responder = summary => {
  switch (summary) {
    case 'INSERT INTO portal_identity':
      return { rows: [identityRow], rowCount: 1 };
    case 'INSERT INTO portal_snapshot':
      return { rows: [{ id: 41 }], rowCount: 1 };
    case 'INSERT INTO portal_schedule':
      return { rows: [{ id: 7 }], rowCount: 1 };
    default:
      return undefined;
  }
};

describe('AcademicRepositoryImpl', () => {
  it('stores merged course text in unbounded columns', () => {
    const schema = SCHEMA_SQL.replace(/\s+/g, ' ');

    expect(schema).toContain('week_range TEXT NOT NULL');
    expect(schema).toContain('teacher TEXT NOT NULL');
    expect(schema).toContain('location TEXT NOT NULL');
    expect(schema).toContain('course_name TEXT,');
  });

  it('writes identity, snapshot and grade rows in one transaction', async () => {
    const db = new RecordingSql(portalDb);
    const repository = new AcademicRepositoryImpl(db);
    const table = sampleGrades();
    const withDuplicate = { ...table, rows: [...table.rows, { ...table.rows[1] }] };

    const result = await repository.saveGrades(owner, '2024-2025-1', withDuplicate);

    expect(result).toEqual({ snapshotId: '41', rowCount: 2 });
    expect(db.summaries()).toEqual([
      'BEGIN',
      'INSERT INTO portal_identity',
      'INSERT INTO portal_snapshot',
      'INSERT INTO portal_grade',
      'INSERT INTO portal_grade',
      'COMMIT',
    ]);
    expect(db.statements.every(statement => statement.onClient)).toBe(true);
    expect(db.released).toBe(1);
    expect(db.paramsOf('INSERT INTO portal_identity')).toEqual([['20220001', 'stu001']]);
    expect(db.paramsOf('INSERT INTO portal_snapshot')).toEqual([
      ['20220001', 'grades', '2024-2025-1', JSON.stringify(withDuplicate)],
    ]);
    expect(db.paramsOf('INSERT INTO portal_grade')[0]?.slice(0, 7)).toEqual([
      '20220001',
      '2024-2025-1',
      'MA101',
      '高等数学',
      '5',
      '92',
      null,
    ]);
  });

  it('rolls back and releases the client when a statement fails', async () => {
    const db = new RecordingSql((summary, params) =>
      summary === 'INSERT INTO portal_grade' ? new Error('deadlock detected') : portalDb(summary, params)
    );
    const repository = new AcademicRepositoryImpl(db);

    await expect(repository.saveGrades(owner, '', sampleGrades())).rejects.toThrow('deadlock detected');
    expect(db.summaries()).toEqual([
      'BEGIN',
      'INSERT INTO portal_identity',
      'INSERT INTO portal_snapshot',
      'INSERT INTO portal_grade',
      'ROLLBACK',
    ]);
    expect(db.released).toBe(1);
  });

  it('replaces the course rows of a schedule', async () => {
    const db = new RecordingSql(portalDb);
    const repository = new AcademicRepositoryImpl(db);

    const result = await repository.saveSchedule(owner, '2024-2025-1', sampleSchedule());

    expect(result).toEqual({ snapshotId: '41', scheduleId: '7', courseCount: 2 });
    expect(db.summaries()).toEqual([
      'BEGIN',
      'INSERT INTO portal_identity',
      'INSERT INTO portal_snapshot',
      'INSERT INTO portal_schedule',
      'DELETE FROM portal_schedule_course',
      'INSERT INTO portal_schedule_course',
      'INSERT INTO portal_schedule_course',
      'COMMIT',
    ]);
    expect(db.paramsOf('DELETE FROM portal_schedule_course')).toEqual([['7']]);
    expect(db.paramsOf('INSERT INTO portal_schedule_course')[1]?.slice(0, 8)).toEqual([
      '7',
      '程序设计',
      '王老师',
      '机房3',
      2,
      3,
      4,
      '1-12(周)',
    ]);
  });

  it('merges profile fields with COALESCE', async () => {
    const db = new RecordingSql(portalDb);
    const repository = new AcademicRepositoryImpl(db);

    await repository.saveProfile(owner, {
      externalId: '20220001',
      accountName: 'stu001',
      displayName: '测试学生',
      orgUnit: null,
      program: '软件工程',
      cohortLabel: null,
      enrollmentYear: null,
      studyLevel: null,
      fields: {},
    });

    expect(db.paramsOf('UPDATE portal_identity SET')).toEqual([
      ['20220001', '测试学生', null, '软件工程', null, null, null],
    ]);
  });

  it('maps snapshot rows, newest first', async () => {
    const fetchedAt = new Date('2024-09-02T08:00:00.000Z');
    const db = new RecordingSql(summary =>
      summary === 'SELECT id, external_id,'
        ? {
            rows: [
              {
                id: '12',
                external_id: '20220001',
                kind: 'grades',
                scope: '',
                payload: { semester: '' },
                fetched_at: fetchedAt,
              },
            ],
            rowCount: 1,
          }
        : undefined
    );
    const repository = new AcademicRepositoryImpl(db);

    const latest = await repository.latestSnapshot('20220001', 'grades', '');

    expect(latest).toEqual({
      id: '12',
      externalId: '20220001',
      kind: 'grades',
      scope: '',
      payload: { semester: '' },
      fetchedAt,
    });
    expect(db.statements[0]?.params).toEqual(['20220001', 'grades', '', 1]);
  });

  it('prunes in batches until a short batch', async () => {
    const counts = [2, 2, 1];
    const db = new RecordingSql(() => ({ rows: [], rowCount: counts.shift() ?? 0 }));
    const repository = new AcademicRepositoryImpl(db);
    const cutoff = new Date('2024-01-01T00:00:00.000Z');

    expect(await repository.pruneSnapshots(cutoff, 2, 0)).toBe(5);
    expect(db.paramsOf('DELETE FROM portal_snapshot')).toEqual([
      [cutoff, 2],
      [cutoff, 2],
      [cutoff, 2],
    ]);
  });

  it('reports health from a trivial query', async () => {
    const healthy = new AcademicRepositoryImpl(
      new RecordingSql(() => ({ rows: [{ health: 1 }], rowCount: 1 }))
    );
    const broken = new AcademicRepositoryImpl(new RecordingSql(() => new Error('connection refused')));

    expect(await healthy.healthCheck()).toBe(true);
    expect(await broken.healthCheck()).toBe(false);
  });
});

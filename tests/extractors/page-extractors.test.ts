import { describe, expect, it } from 'vitest';
import { expandRows, extractGrades } from '../../src/extractors/grade.extractor';
import { extractLabelPairs, extractProfile } from '../../src/extractors/profile.extractor';
import { extractSemesters } from '../../src/extractors/semester.extractor';
import { PortalErrorCode, isPortalError } from '../../src/errors/portal.errors';
import { loadFixture } from '../support/fixtures';

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('extractSemesters', () => {
  it('lists unique options and the selected one', () => {
    expect(extractSemesters(loadFixture('semesters.html'))).toEqual({
      semesters: [
        { value: '2024-2025-1', label: '2024-2025-1' },
        { value: '2023-2024-2', label: '2023-2024-2' },
        { value: '2023-2024-1', label: '2023-2024-1' },
      ],
      selected: '2024-2025-1',
    });
  });

  it('falls back to the timetable term dropdown', () => {
    const html =
      '<select id="xnxq01id"><option value="2022-2023-1">2022-2023 第一学期</option></select>';

    expect(extractSemesters(html)).toEqual({
      semesters: [{ value: '2022-2023-1', label: '2022-2023 第一学期' }],
      selected: null,
    });
  });

  it('returns nothing when the page has no dropdown', () => {
    expect(extractSemesters('<p>维护中</p>')).toEqual({ semesters: [], selected: null });
  });

  it('treats the login page as an expired session', () => {
    const error = errorOf(() => extractSemesters(loadFixture('login-page.html')));
    expect(isPortalError(error, PortalErrorCode.SESSION_INVALID)).toBe(true);
  });
});

describe('extractGrades', () => {
  it('keys rows by header and carries rowspan cells down', () => {
    const table = extractGrades(loadFixture('grades.html'), '2024-2025-1');

    expect(table.semester).toBe('2024-2025-1');
    expect(table.headers).toEqual(['序号', '开课学期', '课程编号', '课程名称', '成绩', '学分', '考核方式']);
    expect(table.rows).toEqual([
      {
        序号: '1',
        开课学期: '2024-2025-1',
        课程编号: 'MA101',
        课程名称: '高等数学',
        成绩: '92',
        学分: '5',
        考核方式: '考试',
      },
      {
        序号: '2',
        开课学期: '2024-2025-1',
        课程编号: 'CS201',
        课程名称: '程序设计',
        成绩: '优秀',
        学分: '3',
        考核方式: '考查',
      },
    ]);
  });

  it('uses positional keys for missing or repeated headers', () => {
    const html = `
      <table><tr><th>课程</th><th>课程</th></tr>
      <tr><td>物理</td><td>88</td><td>extra</td></tr></table>`;

    expect(extractGrades(html).rows).toEqual([{ 课程: '物理', col1: '88', col2: 'extra' }]);
  });

  it('reports a page without a grade table as degraded', () => {
    const error = errorOf(() => extractGrades('<div>系统维护中</div>', '2020-2021-1'));

    expect(isPortalError(error, PortalErrorCode.EXTRACTION_DEGRADED)).toBe(true);
    expect(error).toMatchObject({ diagnostic: { htmlSample: '<div>系统维护中</div>' } });
  });

  it('keeps an empty grade table as a real result', () => {
    const html = '<table id="dataList"><tr><th>课程名称</th><th>成绩</th></tr><tr><td colspan="2">未查询到数据</td></tr></table>';

    expect(extractGrades(html, '2020-2021-1')).toEqual({
      semester: '2020-2021-1',
      headers: ['课程名称', '成绩'],
      rows: [],
    });
  });

  it('repeats colspan cells across columns', () => {
    expect(
      expandRows([
        [
          { text: 'a', colspan: 2, rowspan: 1 },
          { text: 'b', colspan: 1, rowspan: 1 },
        ],
      ])
    ).toEqual([['a', 'a', 'b']]);
  });
});

describe('extractProfile', () => {
  it('maps known labels onto profile fields', () => {
    const profile = extractProfile(loadFixture('profile.html'), 'stu-account');

    expect(profile).toEqual({
      externalId: '20220001',
      accountName: 'stu-account',
      displayName: '测试学生',
      orgUnit: '计算机学院',
      program: '软件工程',
      cohortLabel: '软件2201',
      enrollmentYear: '2022-09-01',
      studyLevel: '本科',
      fields: {
        院系: '计算机学院',
        专业: '软件工程',
        班级: '软件2201',
        学号: '20220001',
        姓名: '测试学生',
        入学日期: '2022-09-01',
        学历层次: '本科',
      },
    });
  });

  it('falls back to the account when the page has no student number', () => {
    const profile = extractProfile('<table><tr><td>姓名：测试</td></tr></table>', 'stu-account');

    expect(profile.externalId).toBe('stu-account');
    expect(profile.displayName).toBe('测试');
    expect(profile.program).toBeNull();
  });

  it('reports a page without profile labels as degraded', () => {
    const error = errorOf(() => extractProfile('<table><tr><td>系统维护中</td></tr></table>', 'stu-account'));

    expect(isPortalError(error, PortalErrorCode.EXTRACTION_DEGRADED)).toBe(true);
  });

  it('keeps the first value of a repeated label', () => {
    expect(extractLabelPairs('<table><tr><td>专业:甲</td><td>专业:乙</td></tr></table>')).toEqual({
      专业: '甲',
    });
  });
});

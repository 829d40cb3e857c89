import { describe, expect, it } from 'vitest';
import {
  createScheduleExtractor,
  MarkupScheduleExtractor,
  RegexScheduleExtractor,
} from '../../src/extractors/schedule';
import { detectCurrentWeek, resolveSemester, splitCourseFragments } from '../../src/extractors/schedule/schedule-rules';
import { PortalErrorCode, isPortalError } from '../../src/errors/portal.errors';
import { loadFixture } from '../support/fixtures';

const range = (start: number, end: number): number[] =>
  Array.from({ length: end - start + 1 }, (_, i) => start + i);

const engines = [new MarkupScheduleExtractor(), new RegexScheduleExtractor()];

describe.each(engines)('$engine schedule extractor', extractor => {
  const html = loadFixture('schedule.html');

  it('reads courses from the timetable grid', () => {
    const view = extractor.extract(html);

    expect(view.courses).toEqual([
      {
        name: '高等数学',
        teacher: '张老师',
        location: 'A101',
        weekday: 1,
        startSlot: 1,
        endSlot: 2,
        weekRange: '1-8(周),10-16(周)',
        weeks: [...range(1, 8), ...range(10, 16)],
      },
      {
        name: '大学英语',
        teacher: '李老师',
        location: 'B202',
        weekday: 3,
        startSlot: 1,
        endSlot: 2,
        weekRange: '2-16(双周)',
        weeks: [2, 4, 6, 8, 10, 12, 14, 16],
      },
      {
        name: '程序设计',
        teacher: '王老师',
        location: '机房3',
        weekday: 2,
        startSlot: 3,
        endSlot: 4,
        weekRange: '1-12(周)',
        weeks: range(1, 12),
      },
    ]);
  });

  it('takes the semester from the selected term and finds the current week', () => {
    const view = extractor.extract(html);

    expect(view.semester).toBe('2024-2025-1');
    expect(view.currentWeek).toBe(5);
  });

  it('prefers the semester the caller asked for', () => {
    expect(extractor.extract(html, { semester: '2023-2024-2' }).semester).toBe('2023-2024-2');
  });

  it('returns an empty schedule for a page without a timetable', () => {
    const view = extractor.extract('<html><body><p>暂无课表</p></body></html>', {
      requestUrl: 'https://portal.example.test/jsxsd/xskb/xskb_list.do?xnxq01id=2022-2023-2',
    });

    expect(view).toEqual({ semester: '2022-2023-2', currentWeek: null, courses: [] });
  });

  it('rejects the login page as an expired session', () => {
    let caught: unknown;
    try {
      extractor.extract(loadFixture('login-page.html'));
    } catch (error) {
      caught = error;
    }

    expect(isPortalError(caught, PortalErrorCode.SESSION_INVALID)).toBe(true);
  });
});

describe('schedule engines on irregular markup', () => {
  const html = [
    '<table id="kbtable">',
    '<tr><th>节次</th><th>星期一</th><th>星期二</th></tr>',
    '<tr><th>第一大节</th>',
    '<td><div class="kbcontent">C&middot;语言<br/><font title="老师">赵&amp;钱</font><br/>',
    '<font title="周次(节次)">1-4(周)</font><br/><font title="教室">D&#x31;01</font>',
    '<hr>数学&#99999999;<br/><font title="老师">张</font></div></td>',
    '<td><div class="kbcontent">&nbsp;</div></td>',
    '</tr>',
    '</table>',
  ].join('\n');

  it('decodes named and out-of-range entities the same way in both engines', () => {
    const markup = new MarkupScheduleExtractor().extract(html);
    const regex = new RegexScheduleExtractor().extract(html);

    expect(markup.courses).toEqual([
      {
        name: 'C·语言',
        teacher: '赵&钱',
        location: 'D101',
        weekday: 1,
        startSlot: 1,
        endSlot: 2,
        weekRange: '1-4(周)',
        weeks: [1, 2, 3, 4],
      },
      {
        name: '数学\uFFFD',
        teacher: '张',
        location: '',
        weekday: 1,
        startSlot: 1,
        endSlot: 2,
        weekRange: '',
        weeks: range(1, 20),
      },
    ]);
    expect(regex).toEqual(markup);
  });

  it('keeps going when a week label is out of range', () => {
    const page = html.replace('1-4(周)', '1-99999999999(周)');

    for (const extractor of engines) {
      expect(extractor.extract(page).courses[0]?.weeks).toEqual(range(1, 20));
    }
  });
});

describe('schedule rules', () => {
  it('selects the engine by name', () => {
    expect(createScheduleExtractor('regex').engine).toBe('regex');
    expect(createScheduleExtractor('markup').engine).toBe('markup');
  });

  it('splits fragments on dash rules and drops undecorated ones', () => {
    const fragments = splitCourseFragments(
      'A<br/><font title="老师">x</font><br/>----------<br/>B<br/><font title="老师">y</font><hr>&nbsp;'
    );

    expect(fragments).toEqual(['A<br/><font title="老师">x</font>', 'B<br/><font title="老师">y</font>']);
  });

  it('detects the current week in either language', () => {
    expect(detectCurrentWeek('本周 第 12 周 星期三')).toBe(12);
    expect(detectCurrentWeek('Teaching week 7 of 18')).toBe(7);
    expect(detectCurrentWeek('no marker')).toBeNull();
  });

  it('resolves the semester from the inline term label first', () => {
    expect(resolveSemester(undefined, '学年学期：2021-2022-1', '2024-2025-1', undefined)).toBe(
      '2021-2022-1'
    );
    expect(resolveSemester('  ', '', 'not-a-term', '/x?xnxq01id=bad')).toBe('');
  });
});

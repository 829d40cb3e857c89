import type { ScheduleParserEngine } from '../../config/types';
import { SCHEDULE } from '../../constants';
import { ScheduleCourse, ScheduleView } from '../../types/portal.types';
import { assertNotLoginPage } from '../session-markers';
import { mergeCourses } from './merge';
import { parseWeekRange } from './week-range';

/**
 * Rules shared by both schedule engines
 */

export interface ScheduleExtractOptions {
  /** Semester requested by the caller; wins over anything on the page */
  semester?: string;
  /** URL the page was requested with */
  requestUrl?: string;
}

export interface ScheduleExtractor {
  readonly engine: ScheduleParserEngine;
  extract(html: string, options?: ScheduleExtractOptions): ScheduleView;
}

export const TIME_LABEL_PATTERN = /节|上午|下午|晚上|中午|AM|PM|section|period/i;
export const REMARKS_PATTERN = /^\s*(?:备注|remarks?|notes?)(?![a-z])/i;
export const TEACHER_TITLE_PATTERN =
  /^\s*(?:班主任|head[-\s]?teacher)?\s*(?:老师|教师|任课教师|teachers?|instructors?)\s*$/i;
export const WEEK_TITLE_PATTERN = /周次|week/i;
export const ROOM_TITLE_PATTERN = /教室|地点|room/i;

/** Dash rule (five or more "-") or <hr>, with the line breaks around it */
const FRAGMENT_DELIMITER = /(?:<br\s*\/?>\s*)*(?:-{5,}|<hr[^>]*>)(?:\s*<br\s*\/?>)*/gi;
const DECORATED_FRAGMENT = /<(?:font|span)\b/i;

const TERM_PATTERN = /^\d{4}-\d{4}-[1-3]$/;
const INLINE_TERM_PATTERN = /学年学期[:：]\s*(\d{4}-\d{4}-\d)/;

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Slot pair of a zero-based data row, or null past the end of the table
 */
export function slotsForRow(rowIndex: number): { startSlot: number; endSlot: number } | null {
  const pair = SCHEDULE.SECTION_SLOTS[rowIndex];
  if (!pair) {
    return null;
  }
  return { startSlot: pair[0], endSlot: pair[1] };
}

export function isTimeLabel(text: string): boolean {
  return TIME_LABEL_PATTERN.test(text);
}

export function isRemarksRow(firstCellText: string): boolean {
  return REMARKS_PATTERN.test(firstCellText);
}

/**
 * Split a course container's inner markup into the fragments that hold a course
 */
export function splitCourseFragments(innerHtml: string): string[] {
  return innerHtml
    .split(FRAGMENT_DELIMITER)
    .map(fragment => fragment.trim())
    .filter(fragment => fragment !== '' && DECORATED_FRAGMENT.test(fragment));
}

export type TitledField = 'teacher' | 'weekRange' | 'location';

/**
 * Which course field an element's title attribute labels
 */
export function fieldForTitle(title: string): TitledField | null {
  if (TEACHER_TITLE_PATTERN.test(title)) {
    return 'teacher';
  }
  if (WEEK_TITLE_PATTERN.test(title)) {
    return 'weekRange';
  }
  if (ROOM_TITLE_PATTERN.test(title)) {
    return 'location';
  }
  return null;
}

export function detectCurrentWeek(pageText: string): number | null {
  const match = /第\s*(\d{1,2})\s*周/.exec(pageText) ?? /\bweek\s*(\d{1,2})\b/i.exec(pageText);
  return match ? Number(match[1]) : null;
}

export function isTermShaped(value: string | null | undefined): value is string {
  return value !== null && value !== undefined && TERM_PATTERN.test(value.trim());
}

/**
 * Semester label: caller's value, then the inline "学年学期：" text,
 * then the selected term option, then the request's xnxq01id parameter
 */
export function resolveSemester(
  explicit: string | undefined,
  pageText: string,
  selectedTerm: string | null,
  requestUrl: string | undefined
): string {
  if (explicit && explicit.trim() !== '') {
    return explicit.trim();
  }

  const inline = INLINE_TERM_PATTERN.exec(pageText);
  if (inline?.[1]) {
    return inline[1];
  }

  if (isTermShaped(selectedTerm)) {
    return selectedTerm.trim();
  }

  if (requestUrl) {
    try {
      const fromQuery = new URL(requestUrl, 'http://localhost').searchParams.get('xnxq01id');
      if (isTermShaped(fromQuery)) {
        return fromQuery.trim();
      }
    } catch {
      return '';
    }
  }

  return '';
}

export interface GridCell {
  /** Whitespace-normalized text of the cell */
  text: string;
  /** Inner markup of the course container, null when the cell has none */
  containerHtml: string | null;
}

export interface GridRow {
  /** False for header rows made only of th cells */
  hasDataCells: boolean;
  cells: GridCell[];
}

export interface FragmentParts {
  /** First top-level text run before any non-br element, else the first one after a br */
  name: string;
  /** Elements carrying a title attribute, in document order */
  titled: Array<{ title: string; text: string }>;
}

/**
 * What an engine reads out of the timetable page
 */
export interface ScheduleDocument {
  /** Rows of the timetable grid, null when the page has no grid */
  gridRows(): GridRow[] | null;
  pageText(): string;
  /** Value of the selected option of the term dropdown */
  selectedTerm(): string | null;
  parseFragment(fragmentHtml: string): FragmentParts;
}

function courseFromParts(
  parts: FragmentParts,
  weekday: number,
  slots: { startSlot: number; endSlot: number }
): ScheduleCourse | null {
  const name = normalizeText(parts.name);
  if (!name) {
    return null;
  }

  const fields: Record<TitledField, string> = { teacher: '', weekRange: '', location: '' };
  for (const { title, text } of parts.titled) {
    const field = fieldForTitle(title);
    if (field && !fields[field]) {
      fields[field] = normalizeText(text);
    }
  }

  return {
    name,
    teacher: fields.teacher,
    location: fields.location,
    weekday,
    startSlot: slots.startSlot,
    endSlot: slots.endSlot,
    weekRange: fields.weekRange,
    weeks: parseWeekRange(fields.weekRange),
  };
}

function coursesFromGrid(doc: ScheduleDocument, rows: GridRow[]): ScheduleCourse[] {
  const courses: ScheduleCourse[] = [];
  let dataRowIndex = 0;

  for (const row of rows) {
    if (!row.hasDataCells) {
      continue;
    }
    if (isRemarksRow(row.cells[0]?.text ?? '')) {
      continue;
    }

    const slots = slotsForRow(dataRowIndex);
    dataRowIndex += 1;
    if (!slots) {
      continue;
    }

    let weekday = 0;
    for (const cell of row.cells) {
      if (cell.containerHtml === null && isTimeLabel(cell.text)) {
        continue;
      }
      weekday += 1;
      if (weekday > SCHEDULE.WEEKDAYS) {
        break;
      }
      if (cell.containerHtml === null) {
        continue;
      }

      for (const fragment of splitCourseFragments(cell.containerHtml)) {
        const course = courseFromParts(doc.parseFragment(fragment), weekday, slots);
        if (course) {
          courses.push(course);
        }
      }
    }
  }

  return mergeCourses(courses);
}

/**
 * Turn an engine's view of the page into the schedule.
 * Throws SESSION_INVALID on the login page; anything else degrades to defaults.
 */
export function assembleSchedule(
  html: string,
  doc: ScheduleDocument,
  options: ScheduleExtractOptions = {}
): ScheduleView {
  assertNotLoginPage(html);

  const pageText = doc.pageText();
  const rows = doc.gridRows();

  return {
    semester: resolveSemester(options.semester, pageText, doc.selectedTerm(), options.requestUrl),
    currentWeek: detectCurrentWeek(pageText),
    courses: rows ? coursesFromGrid(doc, rows) : [],
  };
}

import { NormalizedCourse, NormalizedGrade } from '../types/academic.types';
import { GradeRow, ScheduleCourse } from '../types/portal.types';
import { contentHash } from '../utils/crypto-helpers';

/**
 * Header aliases of the normalized grade columns, first match wins
 */
export const GRADE_COLUMN_ALIASES = {
  courseCode: ['课程号', '课程代码', '课程编码', '课程编号'],
  courseName: ['课程名称', '课程名', '课程'],
  credit: ['学分', '课程学分'],
  score: ['成绩', '总评成绩', '最终成绩', '总成绩'],
  gradePoint: ['绩点', 'GPA'],
} as const;

function pick(row: GradeRow, aliases: readonly string[]): string | null {
  for (const alias of aliases) {
    const value = row[alias]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

export function normalizeGrade(row: GradeRow): NormalizedGrade {
  return {
    courseCode: pick(row, GRADE_COLUMN_ALIASES.courseCode),
    courseName: pick(row, GRADE_COLUMN_ALIASES.courseName),
    credit: pick(row, GRADE_COLUMN_ALIASES.credit),
    score: pick(row, GRADE_COLUMN_ALIASES.score),
    gradePoint: pick(row, GRADE_COLUMN_ALIASES.gradePoint),
    contentHash: contentHash(row),
    rawPayload: row,
  };
}

/**
 * Normalize a batch of grade rows, keeping the first of identical rows
 */
export function normalizeGrades(rows: GradeRow[]): NormalizedGrade[] {
  const seen = new Set<string>();
  const result: NormalizedGrade[] = [];
  for (const row of rows) {
    const grade = normalizeGrade(row);
    if (seen.has(grade.contentHash)) {
      continue;
    }
    seen.add(grade.contentHash);
    result.push(grade);
  }
  return result;
}

function isStorableCourse(course: ScheduleCourse): boolean {
  return (
    course.name.trim() !== '' &&
    course.weekday > 0 &&
    course.startSlot > 0 &&
    course.endSlot > 0
  );
}

/**
 * Course rows ready for insertion: unstorable entries dropped,
 * duplicate hashes within the batch skipped
 */
export function normalizeCourses(courses: ScheduleCourse[]): NormalizedCourse[] {
  const seen = new Set<string>();
  const result: NormalizedCourse[] = [];
  for (const course of courses) {
    if (!isStorableCourse(course)) {
      continue;
    }
    const hash = contentHash(course);
    if (seen.has(hash)) {
      continue;
    }
    seen.add(hash);
    result.push({ ...course, contentHash: hash });
  }
  return result;
}

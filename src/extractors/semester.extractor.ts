import * as cheerio from 'cheerio';
import { SemesterList, SemesterOption } from '../types/portal.types';
import { assertNotLoginPage } from './session-markers';

const SEMESTER_SELECTS = ['select#kksj', 'select[name="kksj"]', 'select#xnxq01id'];

/**
 * Semester options of the grade query page
 */
export function extractSemesters(html: string): SemesterList {
  assertNotLoginPage(html);

  const $ = cheerio.load(html);
  const selector = SEMESTER_SELECTS.find(candidate => $(candidate).length > 0);
  if (!selector) {
    return { semesters: [], selected: null };
  }

  const semesters: SemesterOption[] = [];
  const seen = new Set<string>();
  let selected: string | null = null;

  $(selector)
    .first()
    .find('option')
    .each((_, option) => {
      const value = ($(option).attr('value') ?? '').trim();
      if (!value || seen.has(value)) {
        return;
      }
      seen.add(value);
      semesters.push({ value, label: $(option).text().trim() || value });
      if (selected === null && $(option).attr('selected') !== undefined) {
        selected = value;
      }
    });

  return { semesters, selected };
}

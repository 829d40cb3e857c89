import * as cheerio from 'cheerio';
import { PortalError, PortalErrorCode } from '../errors/portal.errors';
import { ProfileView } from '../types/portal.types';
import { assertNotLoginPage, htmlSample } from './session-markers';

type ProfileField = Exclude<keyof ProfileView, 'accountName' | 'fields'>;

/**
 * Page labels → profile fields
 */
export const PROFILE_LABELS: Record<string, ProfileField> = {
  学号: 'externalId',
  姓名: 'displayName',
  院系: 'orgUnit',
  学院: 'orgUnit',
  专业: 'program',
  班级: 'cohortLabel',
  入学年份: 'enrollmentYear',
  入学日期: 'enrollmentYear',
  年级: 'enrollmentYear',
  学历层次: 'studyLevel',
  培养层次: 'studyLevel',
  层次: 'studyLevel',
};

function compact(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function labelKey(label: string): string {
  return label.replace(/\s+/g, '');
}

/**
 * Label/value pairs from table cells: "label：value" in one cell, or a label
 * cell (ending in a colon, or a known label) followed by the value cell
 */
export function extractLabelPairs(html: string): Record<string, string> {
  const $ = cheerio.load(html);
  const cells = $('td, th')
    .toArray()
    .map(cell => compact($(cell).text()));

  const pairs: Record<string, string> = {};
  for (let i = 0; i < cells.length; i++) {
    const text = cells[i] ?? '';
    const inline = /^([^:：]{1,20})[:：]\s*(.*)$/.exec(text);

    let label: string | null = null;
    let value = '';
    if (inline?.[1] !== undefined) {
      label = labelKey(inline[1]);
      value = compact(inline[2] ?? '');
      if (!value) {
        value = cells[i + 1] ?? '';
        i += 1;
      }
    } else if (labelKey(text) in PROFILE_LABELS) {
      label = labelKey(text);
      value = cells[i + 1] ?? '';
      i += 1;
    }

    if (label && value && !(label in pairs)) {
      pairs[label] = value;
    }
  }
  return pairs;
}

/**
 * Profile of the logged-in student. The account stands in for a missing student number.
 * A page without a single known label is EXTRACTION_DEGRADED.
 */
export function extractProfile(html: string, account: string): ProfileView {
  assertNotLoginPage(html);

  const fields = extractLabelPairs(html);
  if (!Object.keys(fields).some(label => label in PROFILE_LABELS)) {
    throw new PortalError(PortalErrorCode.EXTRACTION_DEGRADED, 'Profile page has no recognizable fields', {
      htmlSample: htmlSample(html),
    });
  }
  const profile: ProfileView = {
    externalId: account,
    accountName: account,
    displayName: null,
    orgUnit: null,
    program: null,
    cohortLabel: null,
    enrollmentYear: null,
    studyLevel: null,
    fields,
  };

  for (const [label, value] of Object.entries(fields)) {
    const field = PROFILE_LABELS[label];
    if (!field) {
      continue;
    }
    if (field === 'externalId') {
      profile.externalId = value;
    } else if (profile[field] === null) {
      profile[field] = value;
    }
  }

  return profile;
}

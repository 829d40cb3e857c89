import { SCHEDULE } from '../../constants';

type Parity = 'odd' | 'even' | null;

function detectParity(label: string): Parity {
  if (/单|odd/i.test(label)) {
    return 'odd';
  }
  if (/双|even/i.test(label)) {
    return 'even';
  }
  return null;
}

function defaultWeeks(): number[] {
  return Array.from({ length: SCHEDULE.DEFAULT_WEEK_COUNT }, (_, i) => i + 1);
}

function expandToken(token: string): number[] {
  const range = /^(\d+)-(\d+)$/.exec(token);
  if (range) {
    const start = Number(range[1]);
    const end = Number(range[2]);
    if (start > end || end > SCHEDULE.MAX_WEEK) {
      return [];
    }
    return Array.from({ length: end - start + 1 }, (_, i) => start + i);
  }
  if (/^\d+$/.test(token)) {
    const week = Number(token);
    return week <= SCHEDULE.MAX_WEEK ? [week] : [];
  }
  return [];
}

/**
 * Decode a week label such as "1-8,10-16(周)", "2-16(单)" or "[01-02节]2,4-7"
 * into sorted week numbers. Labels that yield nothing mean weeks 1..20.
 */
export function parseWeekRange(label: string | null | undefined): number[] {
  if (!label) {
    return defaultWeeks();
  }

  const withoutSlots = label.replace(/\[[^\]]*\]/g, '');
  const parity = detectParity(withoutSlots);
  const cleaned = withoutSlots
    .replace(/[，、;；]/g, ',')
    .replace(/[~～—–]/g, '-')
    .replace(/[^0-9,-]/g, '');

  const weeks = new Set<number>();
  for (const token of cleaned.split(',')) {
    for (const week of expandToken(token)) {
      if (week <= 0) {
        continue;
      }
      if (parity === 'odd' && week % 2 === 0) {
        continue;
      }
      if (parity === 'even' && week % 2 === 1) {
        continue;
      }
      weeks.add(week);
    }
  }

  if (weeks.size === 0) {
    return defaultWeeks();
  }
  return [...weeks].sort((a, b) => a - b);
}

import * as cheerio from 'cheerio';
import { PortalError, PortalErrorCode } from '../errors/portal.errors';
import { GradeRow, GradeTable } from '../types/portal.types';
import { assertNotLoginPage, htmlSample } from './session-markers';

function cellText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function spanOf(value: string | undefined): number {
  const span = Number.parseInt(value ?? '', 10);
  return Number.isFinite(span) && span > 1 ? span : 1;
}

interface PendingSpan {
  text: string;
  rowsLeft: number;
}

/**
 * Lay out row cells on a grid, carrying rowspan cells into later rows
 * and repeating colspan cells across columns
 */
export function expandRows(rows: Array<Array<{ text: string; colspan: number; rowspan: number }>>): string[][] {
  const pending = new Map<number, PendingSpan>();
  const grid: string[][] = [];

  const fillSpanned = (line: string[]): void => {
    let span = pending.get(line.length);
    while (span) {
      const column = line.length;
      line.push(span.text);
      span.rowsLeft -= 1;
      if (span.rowsLeft <= 0) {
        pending.delete(column);
      }
      span = pending.get(line.length);
    }
  };

  for (const cells of rows) {
    const line: string[] = [];
    for (const cell of cells) {
      fillSpanned(line);
      for (let i = 0; i < cell.colspan; i++) {
        const column = line.length;
        line.push(cell.text);
        if (cell.rowspan > 1) {
          pending.set(column, { text: cell.text, rowsLeft: cell.rowspan - 1 });
        }
      }
    }
    fillSpanned(line);
    grid.push(line);
  }

  return grid;
}

/**
 * Grade rows of the grade list page, keyed by header text.
 * A page without any grade table is EXTRACTION_DEGRADED.
 */
export function extractGrades(html: string, semester = ''): GradeTable {
  assertNotLoginPage(html);

  const $ = cheerio.load(html);
  let table = $('table#dataList').first();
  if (table.length === 0) {
    table = $('table')
      .filter((_, candidate) => $(candidate).find('th').length > 0)
      .first();
  }
  if (table.length === 0) {
    throw new PortalError(PortalErrorCode.EXTRACTION_DEGRADED, 'Grade page has no grade table', {
      htmlSample: htmlSample(html),
    });
  }

  const rows = table.find('tr').toArray();
  const headerRow = rows.find(row => $(row).children('th').length > 0);
  const headers = headerRow
    ? $(headerRow)
        .children('th')
        .toArray()
        .map(cell => cellText($(cell).text()))
    : [];

  const dataRows = rows
    .filter(row => row !== headerRow)
    .map(row => $(row).children('td').toArray())
    .filter(cells => cells.length >= 2)
    .map(cells =>
      cells.map(cell => ({
        text: cellText($(cell).text()),
        colspan: spanOf($(cell).attr('colspan')),
        rowspan: spanOf($(cell).attr('rowspan')),
      }))
    );

  const gradeRows = expandRows(dataRows).map(values => {
    const record: GradeRow = {};
    values.forEach((value, index) => {
      const header = headers[index];
      const key = header && !(header in record) ? header : `col${index}`;
      record[key] = value;
    });
    return record;
  });

  return { semester, headers, rows: gradeRows };
}

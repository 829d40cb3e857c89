import { decodeHTML, decodeHTMLAttribute } from 'entities';
import {
  assembleSchedule,
  FragmentParts,
  GridRow,
  normalizeText,
  ScheduleDocument,
  ScheduleExtractOptions,
  ScheduleExtractor,
} from './schedule-rules';
import { ScheduleView } from '../../types/portal.types';

const VOID_ELEMENTS = new Set(['br', 'hr', 'img', 'input', 'wbr', 'meta', 'link', 'col', 'area']);

function stripTags(html: string): string {
  return decodeHTML(html.replace(/<!--[\s\S]*?-->/g, '').replace(/<[^>]*>/g, ''));
}

function attribute(attrs: string, name: string): string | null {
  const match = new RegExp(`\\b${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s>]+))`, 'i').exec(attrs);
  if (!match) {
    return null;
  }
  return decodeHTMLAttribute(match[1] ?? match[2] ?? match[3] ?? '');
}

function hasClass(attrs: string, className: string): boolean {
  return (attribute(attrs, 'class') ?? '').split(/\s+/).includes(className);
}

function hasId(attrs: string, id: string): boolean {
  return attribute(attrs, 'id') === id;
}

function parseFragment(fragmentHtml: string): FragmentParts {
  const tokens = /<!--[\s\S]*?-->|<(\/?)([a-zA-Z][\w-]*)([^>]*)>|([^<]+)/g;

  let name = '';
  let afterBreak = '';
  let sawElement = false;
  let sawBreak = false;
  let depth = 0;

  for (const token of fragmentHtml.matchAll(tokens)) {
    const [, closing, tagName, attrs, rawText] = token;
    if (rawText !== undefined) {
      const text = normalizeText(decodeHTML(rawText));
      if (depth > 0 || !text) {
        continue;
      }
      if (!sawElement && !name) {
        name = text;
      }
      if (sawBreak && !afterBreak) {
        afterBreak = text;
      }
      continue;
    }
    if (tagName === undefined) {
      continue;
    }

    const tag = tagName.toLowerCase();
    if (closing) {
      depth = Math.max(0, depth - 1);
      continue;
    }
    if (depth === 0) {
      if (tag === 'br') {
        sawBreak = true;
      } else {
        sawElement = true;
      }
    }
    if (!VOID_ELEMENTS.has(tag) && !(attrs ?? '').trim().endsWith('/')) {
      depth += 1;
    }
  }

  const titled: FragmentParts['titled'] = [];
  for (const match of fragmentHtml.matchAll(/<([a-zA-Z][\w-]*)\b([^>]*)>([\s\S]*?)<\/\1\s*>/g)) {
    const title = attribute(match[2] ?? '', 'title');
    if (title !== null) {
      titled.push({ title, text: normalizeText(stripTags(match[3] ?? '')) });
    }
  }

  return { name: name || afterBreak, titled };
}

function findGrid(html: string): string | null {
  for (const match of html.matchAll(/<table\b([^>]*)>([\s\S]*?)<\/table\s*>/gi)) {
    if (hasId(match[1] ?? '', 'kbtable')) {
      return match[2] ?? '';
    }
  }
  return null;
}

function courseContainer(cellHtml: string): string | null {
  for (const match of cellHtml.matchAll(/<div\b([^>]*)>([\s\S]*?)<\/div\s*>/gi)) {
    if (hasClass(match[1] ?? '', 'kbcontent')) {
      return match[2] ?? '';
    }
  }
  return null;
}

function loadDocument(html: string): ScheduleDocument {
  return {
    gridRows(): GridRow[] | null {
      const grid = findGrid(html);
      if (grid === null) {
        return null;
      }
      return [...grid.matchAll(/<tr\b[^>]*>([\s\S]*?)<\/tr\s*>/gi)].map(row => {
        const cells = [...(row[1] ?? '').matchAll(/<(td|th)\b[^>]*>([\s\S]*?)<\/\1\s*>/gi)];
        return {
          hasDataCells: cells.some(cell => cell[1]?.toLowerCase() === 'td'),
          cells: cells.map(cell => {
            const inner = cell[2] ?? '';
            return {
              text: normalizeText(stripTags(inner)),
              containerHtml: courseContainer(inner),
            };
          }),
        };
      });
    },

    pageText(): string {
      return normalizeText(stripTags(html));
    },

    selectedTerm(): string | null {
      for (const select of html.matchAll(/<select\b([^>]*)>([\s\S]*?)<\/select\s*>/gi)) {
        if (!hasId(select[1] ?? '', 'xnxq01id')) {
          continue;
        }
        for (const option of (select[2] ?? '').matchAll(/<option\b([^>]*)>/gi)) {
          const attrs = option[1] ?? '';
          if (/\bselected\b/i.test(attrs)) {
            return attribute(attrs, 'value');
          }
        }
      }
      return null;
    },

    parseFragment,
  };
}

/**
 * Schedule extractor working on the raw markup with regular expressions
 */
export class RegexScheduleExtractor implements ScheduleExtractor {
  readonly engine = 'regex' as const;

  extract(html: string, options: ScheduleExtractOptions = {}): ScheduleView {
    return assembleSchedule(html, loadDocument(html), options);
  }
}

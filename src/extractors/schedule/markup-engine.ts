import * as cheerio from 'cheerio';
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

const TEXT_NODE = 3;
const ELEMENT_NODE = 1;

function parseFragment(fragmentHtml: string): FragmentParts {
  const $ = cheerio.load(fragmentHtml, null, false);

  let name = '';
  let afterBreak = '';
  let sawElement = false;
  let sawBreak = false;

  $.root()
    .contents()
    .each((_, node) => {
      if (node.nodeType === TEXT_NODE) {
        const text = normalizeText($(node).text());
        if (!text) {
          return;
        }
        if (!sawElement && !name) {
          name = text;
        }
        if (sawBreak && !afterBreak) {
          afterBreak = text;
        }
      } else if (node.nodeType === ELEMENT_NODE) {
        if ($(node).is('br')) {
          sawBreak = true;
        } else {
          sawElement = true;
        }
      }
    });

  const titled: FragmentParts['titled'] = [];
  $('[title]').each((_, element) => {
    titled.push({
      title: $(element).attr('title') ?? '',
      text: normalizeText($(element).text()),
    });
  });

  return { name: name || afterBreak, titled };
}

function loadDocument(html: string): ScheduleDocument {
  const $ = cheerio.load(html);

  return {
    gridRows(): GridRow[] | null {
      const grid = $('table#kbtable').first();
      if (grid.length === 0) {
        return null;
      }
      return grid
        .find('tr')
        .toArray()
        .map(row => {
          const cells = $(row).children('th, td');
          return {
            hasDataCells: cells.filter('td').length > 0,
            cells: cells.toArray().map(cell => {
              const container = $(cell).find('div.kbcontent').first();
              return {
                text: normalizeText($(cell).text()),
                containerHtml: container.length > 0 ? container.html() ?? '' : null,
              };
            }),
          };
        });
    },

    pageText(): string {
      return normalizeText($.root().text());
    },

    selectedTerm(): string | null {
      return $('select#xnxq01id option[selected]').first().attr('value') ?? null;
    },

    parseFragment,
  };
}

/**
 * Schedule extractor over a parsed DOM
 */
export class MarkupScheduleExtractor implements ScheduleExtractor {
  readonly engine = 'markup' as const;

  extract(html: string, options: ScheduleExtractOptions = {}): ScheduleView {
    return assembleSchedule(html, loadDocument(html), options);
  }
}

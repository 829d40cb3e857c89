import type { ScheduleParserEngine } from '../../config/types';
import { MarkupScheduleExtractor } from './markup-engine';
import { RegexScheduleExtractor } from './regex-engine';
import { ScheduleExtractor } from './schedule-rules';

export { MarkupScheduleExtractor } from './markup-engine';
export { RegexScheduleExtractor } from './regex-engine';
export { parseWeekRange } from './week-range';
export { mergeCourses } from './merge';
export type { ScheduleExtractOptions, ScheduleExtractor } from './schedule-rules';

export function createScheduleExtractor(engine: ScheduleParserEngine): ScheduleExtractor {
  return engine === 'regex' ? new RegexScheduleExtractor() : new MarkupScheduleExtractor();
}

import { z } from 'zod';
import { ISSUE_TAGS, PATTERN_TAGS, SESSION_TYPES } from '../types';

const KeywordList = z.array(z.string().min(1));

export const IndicatorTablesSchema = z.object({
  languages: z.record(KeywordList),
  fenceAliases: z.record(z.string()),
  frameworks: z.record(KeywordList),
  patterns: z.record(z.enum(PATTERN_TAGS), KeywordList),
  issues: z.record(z.enum(ISSUE_TAGS), KeywordList),
  sessionTypes: z.record(z.enum(SESSION_TYPES), KeywordList)
});

export type IndicatorTables = z.infer<typeof IndicatorTablesSchema>;

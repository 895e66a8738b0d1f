import rawIndicators from '../data/indicators.json';
import { IndicatorTablesSchema } from '../schemas/indicators';
import {
  ISSUE_TAGS, PATTERN_TAGS, SESSION_TYPES,
  type FeatureSummary, type IssueTag, type PatternTag, type SessionType, type Transcript
} from '../types';

const TABLES = IndicatorTablesSchema.parse(rawIndicators);
const FENCE_ALIASES = new Map(Object.entries(TABLES.fenceAliases));

// A pattern tag needs this many distinct keywords before it counts.
const PATTERN_MIN_KEYWORDS = 2;

const ERROR_INDICATORS: RegExp[] = [
  /\btraceback\b/gi,
  /\b\w*error:/gi,
  /\w*exception\b/gi,
  /^\s*at\s+\S.*:\d+:\d+\)?\s*$/gm, // JS stack frame
  /^\s*File ".+", line \d+/gm // Python stack frame
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word match on the sides of the keyword that are word characters. */
function keywordRegExp(keyword: string): RegExp {
  const lead = /^\w/.test(keyword) ? '\\b' : '';
  const trail = /\w$/.test(keyword) ? '\\b' : '';
  return new RegExp(`${lead}${escapeRegExp(keyword.toLowerCase())}${trail}`);
}

type CompiledTable<K extends string> = Array<{ name: K; regexps: RegExp[] }>;

function compile<K extends string>(names: readonly K[], table: Partial<Record<K, string[]>>): CompiledTable<K> {
  return names.map(name => ({ name, regexps: (table[name] ?? []).map(keywordRegExp) }));
}

const LANGUAGES = compile(Object.keys(TABLES.languages), TABLES.languages);
const FRAMEWORKS = compile(Object.keys(TABLES.frameworks), TABLES.frameworks);
const PATTERNS = compile(PATTERN_TAGS, TABLES.patterns);
const ISSUES = compile(ISSUE_TAGS, TABLES.issues);
const SESSION_TYPE_RULES = compile(SESSION_TYPES, TABLES.sessionTypes);

interface Hit<K> {
  name: K;
  index: number;
  distinct: number;
}

function scan<K extends string>(text: string, table: CompiledTable<K>): Hit<K>[] {
  const hits: Hit<K>[] = [];
  for (const { name, regexps } of table) {
    let index = -1;
    let distinct = 0;
    for (const re of regexps) {
      const match = re.exec(text);
      if (!match) continue;
      distinct++;
      if (index < 0 || match.index < index) index = match.index;
    }
    if (distinct > 0) hits.push({ name, index, distinct });
  }
  return hits;
}

// Stable sort keeps table order for ties.
function byFirstOccurrence<K>(hits: Hit<K>[]): K[] {
  return [...hits].sort((a, b) => a.index - b.index).map(h => h.name);
}

interface Fences {
  count: number;
  languages: Hit<string>[];
}

function scanFences(text: string): Fences {
  let fenceLines = 0;
  let offset = 0;
  const languages: Hit<string>[] = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trimStart();
    if (trimmed.startsWith('```')) {
      // Even-numbered fences open a block and may carry an info string.
      if (fenceLines % 2 === 0) {
        const info = trimmed.slice(3).trim().split(/\s+/)[0];
        const language = FENCE_ALIASES.get(info);
        if (language) languages.push({ name: language, index: offset, distinct: 1 });
      }
      fenceLines++;
    }
    offset += line.length + 1;
  }
  return { count: Math.ceil(fenceLines / 2), languages };
}

function countErrorIndicators(text: string): number {
  return ERROR_INDICATORS.reduce((sum, re) => sum + (text.match(re)?.length ?? 0), 0);
}

function mergeHits(...groups: Hit<string>[][]): Hit<string>[] {
  const merged = new Map<string, Hit<string>>();
  for (const hit of groups.flat()) {
    const seen = merged.get(hit.name);
    if (!seen || hit.index < seen.index) merged.set(hit.name, hit);
  }
  return [...merged.values()];
}

function classifySessionType(text: string): SessionType {
  for (const { name, regexps } of SESSION_TYPE_RULES) {
    if (regexps.some(re => re.test(text))) return name;
  }
  return 'general-development';
}

/**
 * Derives the feature summary for one transcript. Pure and deterministic;
 * an empty transcript yields an empty summary.
 */
export function extractFeatures(transcript: Transcript): FeatureSummary {
  const original = transcript.map(t => t.text).join('\n');
  const text = original.toLowerCase();

  const fences = scanFences(text);
  const languages = byFirstOccurrence(mergeHits(scan(text, LANGUAGES), fences.languages));
  const patterns: PatternTag[] = byFirstOccurrence(
    scan(text, PATTERNS).filter(h => h.distinct >= PATTERN_MIN_KEYWORDS)
  );
  const issues: IssueTag[] = byFirstOccurrence(scan(text, ISSUES));

  return {
    languages,
    frameworks: byFirstOccurrence(scan(text, FRAMEWORKS)),
    codeBlockCount: fences.count,
    errorIndicatorCount: countErrorIndicators(original),
    totalChars: transcript.reduce((sum, t) => sum + t.text.length, 0),
    turnCount: transcript.length,
    patterns,
    issues,
    sessionType: text === '' ? 'general-development' : classifySessionType(text)
  };
}

export function hasSignals(features: FeatureSummary): boolean {
  return features.codeBlockCount > 0
    || features.languages.length > 0
    || features.frameworks.length > 0
    || features.patterns.length > 0
    || features.issues.length > 0
    || features.errorIndicatorCount > 0;
}

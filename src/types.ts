export type TurnRole = 'user' | 'assistant' | 'tool' | 'system' | 'unknown';

export interface TranscriptTurn {
  role: TurnRole;
  text: string;
}
export type Transcript = readonly TranscriptTurn[];

export const PATTERN_TAGS = [
  'api-development',
  'database-work',
  'frontend-work',
  'backend-work',
  'testing',
  'devops',
  'security-sensitive',
  'machine-learning'
] as const;
export type PatternTag = typeof PATTERN_TAGS[number];

export const ISSUE_TAGS = [
  'hardcoded-credentials',
  'unsafe-execution',
  'missing-error-handling',
  'leftover-markers',
  'testing-gaps',
  'performance-concerns'
] as const;
export type IssueTag = typeof ISSUE_TAGS[number];

export const SESSION_TYPES = [
  'project-setup',
  'bug-fixing',
  'feature-development',
  'refactoring',
  'testing',
  'deployment',
  'general-development'
] as const;
export type SessionType = typeof SESSION_TYPES[number];

export interface FeatureSummary {
  readonly languages: readonly string[];
  readonly frameworks: readonly string[]; // frameworks and tools
  readonly codeBlockCount: number;
  readonly errorIndicatorCount: number;
  readonly totalChars: number;
  readonly turnCount: number;
  readonly patterns: readonly PatternTag[];
  readonly issues: readonly IssueTag[];
  readonly sessionType: SessionType;
}

export interface DecisionResult {
  shouldSuggest: boolean;
  reasoning: string;
  source: 'prefilter' | 'capability' | 'fallback';
}

export const CATEGORIES = [
  'quality',
  'security',
  'testing',
  'documentation',
  'architecture',
  'performance',
  'tooling'
] as const;
export type Category = typeof CATEGORIES[number];
export const DEFAULT_CATEGORY: Category = 'quality';

export interface SuggestionPayload {
  category: Category;
  title: string;
  body: string;
  origin: 'generated' | 'fallback';
}

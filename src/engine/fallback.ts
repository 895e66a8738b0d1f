import type { Category, FeatureSummary, IssueTag, PatternTag, SessionType, SuggestionPayload } from '../types';

interface Tip {
  category: Category;
  title: string;
  body: string;
}

// Highest-risk first, independent of where the issue appeared.
const ISSUE_TIPS: Array<[IssueTag, Tip]> = [
  ['hardcoded-credentials', {
    category: 'security',
    title: 'Move hard-coded credentials out of the source',
    body: 'Credentials appeared inline in this session. Load them from environment variables or a secret manager, and rotate any value that was committed.'
  }],
  ['unsafe-execution', {
    category: 'security',
    title: 'Replace dynamic code execution with a safer call',
    body: 'The session used eval/exec-style execution or raw HTML injection. Pass arguments explicitly or sanitize the input before it reaches these calls.'
  }],
  ['missing-error-handling', {
    category: 'quality',
    title: 'Stop swallowing errors in the code you changed',
    body: 'Bare except/empty catch blocks hide failures. Handle the specific error you expect and log or rethrow the rest.'
  }],
  ['testing-gaps', {
    category: 'testing',
    title: 'Add automated tests for this session\'s changes',
    body: 'The changes were verified manually or not at all. Capture the behavior you checked by hand in a test so it stays fixed.'
  }],
  ['performance-concerns', {
    category: 'performance',
    title: 'Measure the slow path flagged in this session',
    body: 'The session mentioned nested loops, N+1 queries or slowness. Profile that path before optimizing, then batch or index where the numbers point.'
  }],
  ['leftover-markers', {
    category: 'quality',
    title: 'Resolve the TODO and FIXME markers left behind',
    body: 'Temporary markers were added during this session. Finish them or turn each into a tracked issue so they do not ship silently.'
  }]
];

const PATTERN_TIPS: Record<PatternTag, Tip> = {
  'security-sensitive': {
    category: 'security',
    title: 'Review the auth and secret handling you touched',
    body: 'This session worked on authentication or secrets. Check token lifetimes, permission checks on every route, and that no secret reaches logs.'
  },
  'testing': {
    category: 'testing',
    title: 'Cover the edge cases around the tests you wrote',
    body: 'Tests were part of this session. Add cases for empty input, failure paths and boundaries, which are the ones most often missed.'
  },
  'api-development': {
    category: 'documentation',
    title: 'Document the API endpoints you changed',
    body: 'Endpoints changed in this session. Record request and response shapes and error codes next to the code so clients do not have to read the handler.'
  },
  'database-work': {
    category: 'architecture',
    title: 'Double-check the schema and query changes',
    body: 'Database work happened in this session. Make sure migrations are reversible and new queries are backed by an index.'
  },
  'frontend-work': {
    category: 'quality',
    title: 'Check the UI changes for accessibility and states',
    body: 'Components changed in this session. Verify loading, empty and error states and keyboard navigation.'
  },
  'backend-work': {
    category: 'architecture',
    title: 'Keep the new server logic behind a clear boundary',
    body: 'Server-side code changed in this session. Keep request handling thin and move the logic into a service you can test directly.'
  },
  'devops': {
    category: 'tooling',
    title: 'Run the deployment changes through CI',
    body: 'Infrastructure or deployment changed in this session. Exercise it in CI or a staging environment before it reaches production.'
  },
  'machine-learning': {
    category: 'testing',
    title: 'Pin a baseline metric for the model work',
    body: 'Model or dataset work happened in this session. Record a baseline metric and seed so later changes can be compared.'
  }
};

const SESSION_TIPS: Record<SessionType, Tip> = {
  'bug-fixing': {
    category: 'testing',
    title: 'Add a regression test for the bug you fixed',
    body: 'Reproduce the bug in a test before moving on, and note the root cause next to the fix.'
  },
  'feature-development': {
    category: 'testing',
    title: 'Cover the new feature with tests',
    body: 'Write tests for the main path and at least one failure path of the feature built in this session.'
  },
  'refactoring': {
    category: 'quality',
    title: 'Confirm the refactor kept behavior unchanged',
    body: 'Run the full test suite and compare outputs for a few real inputs before and after the refactor.'
  },
  'project-setup': {
    category: 'tooling',
    title: 'Add linting and CI while the project is small',
    body: 'Set up a formatter, a linter and a CI job now; they are cheapest to adopt before the codebase grows.'
  },
  'testing': {
    category: 'testing',
    title: 'Check what the new tests do not cover',
    body: 'Look at coverage for the files touched in this session and add tests for the uncovered branches.'
  },
  'deployment': {
    category: 'tooling',
    title: 'Write down the rollback step for this release',
    body: 'Before the next deploy, document how to roll back and which signal tells you to.'
  },
  'general-development': {
    category: 'quality',
    title: 'Review this session\'s changes before moving on',
    body: 'Read through the diff from this session once more, looking for error handling, naming and missing tests.'
  }
};

function pickTip(features: FeatureSummary): Tip {
  const issue = ISSUE_TIPS.find(([tag]) => features.issues.includes(tag));
  if (issue) return issue[1];
  const pattern = features.patterns[0];
  if (pattern) return PATTERN_TIPS[pattern];
  return SESSION_TIPS[features.sessionType];
}

/**
 * Builds a suggestion from the feature summary alone, for when generation
 * is unavailable after a positive decision. Never empty.
 */
export function localSuggestion(features: FeatureSummary): SuggestionPayload {
  const tip = pickTip(features);
  const tech = [...features.languages, ...features.frameworks];
  const lines = [tip.body];
  if (tech.length > 0) lines.push(`Detected in this session: ${tech.join(', ')}.`);
  lines.push('_Offline tip: the suggestion service was unavailable._');
  return { category: tip.category, title: tip.title, body: lines.join('\n\n'), origin: 'fallback' };
}

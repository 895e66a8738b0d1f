import type OpenAI from 'openai';
import { DECISION_SYSTEM_PROMPT, SUGGESTION_SYSTEM_PROMPT } from '../prompts/system';
import type { DecisionRequest, GenerationRequest } from './capabilities';
import type { FeatureSummary } from '../types';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

const listOrNone = (items: readonly string[]) => items.length > 0 ? items.join(', ') : 'none detected';

export function describeFeatures(features: FeatureSummary): string {
  return [
    `Session type: ${features.sessionType}`,
    `Length: ${features.totalChars} chars over ${features.turnCount} turns`,
    `Languages: ${listOrNone(features.languages)}`,
    `Frameworks/tools: ${listOrNone(features.frameworks)}`,
    `Patterns: ${listOrNone(features.patterns)}`,
    `Potential issues: ${listOrNone(features.issues)}`,
    `Code blocks: ${features.codeBlockCount}`,
    `Error indicators: ${features.errorIndicatorCount}`
  ].join('\n');
}

export function buildDecisionMessages(request: DecisionRequest): ChatMessage[] {
  return [
    { role: 'system', content: DECISION_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `SESSION METRICS:\n${describeFeatures(request.features)}\n\nEND OF SESSION TRANSCRIPT:\n${request.excerpt}`
    }
  ];
}

export function buildSuggestionMessages(request: GenerationRequest): ChatMessage[] {
  return [
    { role: 'system', content: SUGGESTION_SYSTEM_PROMPT },
    {
      role: 'user',
      content: [
        `SESSION ANALYSIS:\n${describeFeatures(request.features)}`,
        `ALLOWED CATEGORIES: ${request.categories.join(', ')}`,
        `SESSION TRANSCRIPT:\n${request.transcript}`
      ].join('\n\n')
    }
  ];
}

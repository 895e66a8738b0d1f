import type OpenAI from 'openai';
import { CATEGORIES } from '../types';

export const DECISION_TOOL = 'record_decision';
export const SUGGESTION_TOOL = 'propose_suggestion';

export const decisionTools: OpenAI.Chat.Completions.ChatCompletionTool[] = [
  {
    type: 'function',
    function: {
      name: DECISION_TOOL,
      description: 'Record whether the finished session warrants a suggestion.',
      parameters: {
        type: 'object',
        properties: {
          recommendation: { type: 'boolean', description: 'true to suggest, false to stay silent' },
          rationale: { type: 'string', description: 'One sentence explaining the decision' }
        },
        required: ['recommendation', 'rationale'],
        additionalProperties: false
      }
    }
  }
];

export const suggestionTools: OpenAI.Chat.Completions.ChatCompletionTool[] = [
  {
    type: 'function',
    function: {
      name: SUGGESTION_TOOL,
      description: 'Deliver one targeted suggestion to the developer.',
      parameters: {
        type: 'object',
        properties: {
          category: { type: 'string', enum: [...CATEGORIES] },
          title: { type: 'string', maxLength: 80 },
          body: { type: 'string' }
        },
        required: ['category', 'title', 'body'],
        additionalProperties: false
      }
    }
  }
];

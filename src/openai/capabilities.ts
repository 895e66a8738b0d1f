import type OpenAI from 'openai';
import type { ZodType, ZodTypeDef } from 'zod';
import { buildDecisionMessages, buildSuggestionMessages } from '../engine/buildMessages';
import type {
  DecisionCapability, DecisionRequest, DecisionResponse,
  GenerationCapability, GenerationRequest, GenerationResponse
} from '../engine/capabilities';
import { DecisionResponseSchema, GenerationResponseSchema } from '../schemas/suggestion';
import { MalformedResponseError } from '../util/timeout';
import { createChatCompletion } from './client';
import { DECISION_TOOL, SUGGESTION_TOOL, decisionTools, suggestionTools } from './tools';

export function parseToolCall<T>(
  res: OpenAI.Chat.Completions.ChatCompletion,
  toolName: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  const tc = res.choices[0]?.message.tool_calls?.find(c => c.function.name === toolName);
  if (!tc) throw new MalformedResponseError(`model did not call ${toolName}`);

  let args: unknown;
  try {
    args = JSON.parse(tc.function.arguments);
  } catch {
    throw new MalformedResponseError(`${toolName} arguments are not valid JSON`);
  }

  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new MalformedResponseError(`${toolName} arguments rejected: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

export class OpenAIDecisionCapability implements DecisionCapability {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    readonly timeoutMs: number
  ) {}

  async decide(request: DecisionRequest, signal: AbortSignal): Promise<DecisionResponse> {
    const res = await createChatCompletion(this.client, {
      model: this.model,
      messages: buildDecisionMessages(request),
      tools: decisionTools,
      tool_choice: { type: 'function', function: { name: DECISION_TOOL } },
      temperature: 0
    }, { timeoutMs: this.timeoutMs, signal });
    return parseToolCall(res, DECISION_TOOL, DecisionResponseSchema);
  }
}

export class OpenAIGenerationCapability implements GenerationCapability {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    readonly timeoutMs: number
  ) {}

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResponse> {
    const res = await createChatCompletion(this.client, {
      model: this.model,
      messages: buildSuggestionMessages(request),
      tools: suggestionTools,
      tool_choice: { type: 'function', function: { name: SUGGESTION_TOOL } },
      temperature: 0.4
    }, { timeoutMs: this.timeoutMs, signal });
    return parseToolCall(res, SUGGESTION_TOOL, GenerationResponseSchema);
  }
}

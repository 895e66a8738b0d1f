import OpenAI from 'openai';
import { CFG } from '../config';
import { logger } from '../util/logger';

type ChatParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

export interface ClientOptions {
  apiKey?: string;
  baseURL?: string;
}

/**
 * Builds the client both capabilities share. Retries are off: a missed
 * suggestion beats holding up the host, and callers enforce their own timeout.
 */
export function createOpenAIClient(options: ClientOptions = {}): OpenAI | null {
  const apiKey = options.apiKey ?? CFG.OPENAI_API_KEY;
  if (!apiKey) {
    logger.warn('OpenAI', 'OPENAI_API_KEY is not set; inference capabilities are unavailable');
    return null;
  }
  return new OpenAI({
    apiKey,
    baseURL: options.baseURL ?? CFG.OPENAI_BASE_URL,
    maxRetries: 0
  });
}

// Wrapper for chat completions with usage logging
export async function createChatCompletion(
  client: OpenAI,
  params: ChatParams,
  request: { timeoutMs: number; signal: AbortSignal }
): Promise<OpenAI.Chat.Completions.ChatCompletion> {
  const started = Date.now();
  const result = await client.chat.completions.create(params, {
    timeout: request.timeoutMs,
    signal: request.signal,
    maxRetries: 0
  });

  if (result.usage) {
    logger.debug('OpenAI', `${params.model} tokens - input: ${result.usage.prompt_tokens}, output: ${result.usage.completion_tokens}, ${Date.now() - started}ms`);
  }
  return result;
}

#!/usr/bin/env node
import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { CFG, LOG_FILE, loadSettings } from '../config';
import { createPipeline, type SessionPipeline } from '../engine/pipeline';
import { loadTranscript, parseTranscript } from '../engine/transcript';
import type { SuggestionPayload, Transcript } from '../types';
import { configureLogger, describeError, logger } from '../util/logger';

// Claude Code sends more fields than these; only the ones we use are checked.
export const HookInputSchema = z.object({
  session_id: z.string().optional(),
  transcript_path: z.string().optional(),
  transcript: z.string().optional(),
  stop_hook_active: z.boolean().optional()
}).passthrough();

export type HookInput = z.infer<typeof HookInputSchema>;

export interface HookOutput {
  continue: true;
  suppressOutput: false;
  systemMessage: string;
  suggestion: Pick<SuggestionPayload, 'category' | 'title' | 'body'>;
}

export function readHookInput(raw: string): HookInput {
  try {
    const parsed = HookInputSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn('Hook', 'Hook input has unexpected field types, ignoring it');
  } catch {
    if (raw.trim() !== '') logger.warn('Hook', 'Hook input is not JSON, ignoring it');
  }
  return {};
}

const CATEGORY_LABELS: Record<SuggestionPayload['category'], string> = {
  quality: 'Code quality',
  security: 'Security',
  testing: 'Testing',
  documentation: 'Documentation',
  architecture: 'Architecture',
  performance: 'Performance',
  tooling: 'Tooling'
};

export function formatSuggestion(payload: SuggestionPayload): string {
  return `## Session guide: ${payload.title}\n\n**${CATEGORY_LABELS[payload.category]}**\n\n${payload.body}`;
}

export async function handleStopHook(input: HookInput, pipeline: SessionPipeline, now: Date = new Date()): Promise<HookOutput | null> {
  const sessionId = input.session_id ?? 'unknown';
  if (input.stop_hook_active) {
    logger.info('Hook', `Session ${sessionId}: stop hook already active, skipping`);
    return null;
  }

  let transcript: Transcript;
  if (input.transcript !== undefined) {
    transcript = parseTranscript(input.transcript);
  } else if (input.transcript_path) {
    transcript = loadTranscript(input.transcript_path);
  } else {
    logger.warn('Hook', `Session ${sessionId}: no transcript provided`);
    return null;
  }

  logger.info('Hook', `Processing stop hook for session ${sessionId}`);
  const payload = await pipeline.run(transcript, now);
  if (!payload) return null;

  return {
    continue: true,
    suppressOutput: false,
    systemMessage: formatSuggestion(payload),
    suggestion: { category: payload.category, title: payload.title, body: payload.body }
  };
}

function readStdin(): string {
  try {
    return readFileSync(0, 'utf-8');
  } catch {
    return '';
  }
}

async function main(): Promise<void> {
  // stdout is the hook protocol channel; logs go to the file only.
  configureLogger({ file: join(CFG.HOME_DIR, LOG_FILE), echo: false });

  const input = readHookInput(readStdin());
  const args = process.argv.slice(2);
  const resolved: HookInput = {
    ...input,
    session_id: input.session_id ?? process.env.SESSION_ID ?? args[0],
    transcript_path: input.transcript_path ?? process.env.TRANSCRIPT_PATH ?? args[1]
  };

  const output = await handleStopHook(resolved, createPipeline(loadSettings()));
  if (output) {
    process.stdout.write(JSON.stringify(output), () => process.exit(0));
  } else {
    process.exit(0);
  }
}

if (require.main === module) {
  main().catch(error => {
    // Never fail the host: expected failures already resolved to no output.
    logger.error('Hook', `Hook handler failed: ${describeError(error)}`);
    process.exit(0);
  });
}

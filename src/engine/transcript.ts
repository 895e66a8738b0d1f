import { readFileSync } from 'fs';
import { TranscriptLineSchema, type ContentBlock, type TranscriptLine } from '../schemas/transcript';
import type { Transcript, TranscriptTurn, TurnRole } from '../types';
import { describeError, logger } from '../util/logger';

export const TRUNCATION_MARKER = '[earlier transcript truncated]';

function toRole(value: string | undefined): TurnRole {
  switch (value) {
    case 'user':
    case 'assistant':
    case 'system':
    case 'tool':
      return value;
    default:
      return 'unknown';
  }
}

function blockText(block: ContentBlock): { role?: TurnRole; text: string } | null {
  switch (block.type) {
    case 'text':
      return block.text ? { text: block.text } : null;
    case 'tool_use':
      return { text: `(tool call ${block.name ?? 'unknown'}) ${JSON.stringify(block.input ?? {})}` };
    case 'tool_result': {
      const content = typeof block.content === 'string'
        ? block.content
        : (block.content ?? []).map(c => c.text ?? '').filter(Boolean).join('\n');
      return content ? { role: 'tool', text: content } : null;
    }
    default:
      // thinking, images and anything newer carry no reviewable text
      return null;
  }
}

function lineToTurns(line: TranscriptLine): TranscriptTurn[] {
  const role = toRole(line.message.role ?? line.type);
  const { content } = line.message;
  if (typeof content === 'string') {
    return content ? [{ role, text: content }] : [];
  }

  const turns: TranscriptTurn[] = [];
  for (const block of content) {
    const piece = blockText(block);
    if (!piece) continue;
    const pieceRole = piece.role ?? role;
    const last = turns[turns.length - 1];
    if (last && last.role === pieceRole) {
      last.text += '\n' + piece.text;
    } else {
      turns.push({ role: pieceRole, text: piece.text });
    }
  }
  return turns;
}

function tryParseJSON(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parses a session transcript. JSONL input (Claude Code's format) becomes one
 * or more turns per entry; anything else, including JSON lines with no
 * transcript entries, is a single plain-text turn.
 */
export function parseTranscript(raw: string): Transcript {
  if (raw.trim() === '') return [];

  const lines = raw.split(/\r?\n/).filter(l => l.trim() !== '');
  const first = tryParseJSON(lines[0].trim());
  if (typeof first !== 'object' || first === null) {
    return [{ role: 'unknown', text: raw }];
  }

  const turns: TranscriptTurn[] = [];
  let entries = 0;
  for (const line of lines) {
    const parsed = TranscriptLineSchema.safeParse(tryParseJSON(line));
    if (!parsed.success) continue;
    entries++;
    turns.push(...lineToTurns(parsed.data));
  }
  if (entries === 0) {
    logger.warn('Transcript', 'No transcript entries found in JSON input, reading it as plain text');
    return [{ role: 'unknown', text: raw }];
  }
  return turns;
}

/** Unreadable files read as an empty transcript. */
export function loadTranscript(path: string): Transcript {
  try {
    const raw = readFileSync(path, 'utf-8');
    const turns = parseTranscript(raw);
    logger.info('Transcript', `Read ${raw.length} chars, ${turns.length} turns from ${path}`);
    return turns;
  } catch (error) {
    logger.warn('Transcript', `Failed to read ${path}: ${describeError(error)}`);
    return [];
  }
}

export function renderTranscript(transcript: Transcript): string {
  return transcript.map(t => `[${t.role}] ${t.text}`).join('\n\n');
}

/** Keeps the last `maxChars` characters, marking the cut. */
export function tailExcerpt(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${TRUNCATION_MARKER}\n${text.slice(-maxChars)}`;
}

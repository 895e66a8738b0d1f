import { CATEGORIES, DEFAULT_CATEGORY, type Category, type SuggestionPayload } from '../types';
import type { GenerationResponse } from './capabilities';
import { MalformedResponseError } from '../util/timeout';

export const MAX_TITLE_CHARS = 80;

function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

/** Unknown or missing categories become the default instead of failing. */
export function normalizeCategory(raw: string): Category {
  const value = raw.trim().toLowerCase();
  return isCategory(value) ? value : DEFAULT_CATEGORY;
}

export function clip(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, max - 1).trimEnd() + '…';
}

export function cleanTitle(raw: string): string {
  const firstLine = raw.split('\n').map(l => l.trim()).find(l => l !== '') ?? '';
  const plain = firstLine.replace(/^[#*\-\s]+/, '').replace(/[*_`]+$/, '').replace(/\s+/g, ' ').trim();
  return clip(plain, MAX_TITLE_CHARS);
}

export function cleanBody(raw: string, maxChars: number): string {
  return clip(raw.trim().replace(/\n{3,}/g, '\n\n'), maxChars);
}

export function sanitize(raw: GenerationResponse, maxBodyChars: number): SuggestionPayload {
  const title = cleanTitle(raw.title);
  const body = cleanBody(raw.body, maxBodyChars);
  if (!title || !body) {
    throw new MalformedResponseError('suggestion is missing a title or body');
  }
  return { category: normalizeCategory(raw.category), title, body, origin: 'generated' };
}

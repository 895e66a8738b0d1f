import { z } from 'zod';

const positiveInt = (fallback: number) => z.number().int().positive().default(fallback).catch(fallback);
// setTimeout clamps larger delays to 1ms.
const MAX_TIMER_MS = 2_147_483_647;
const timeoutMs = (fallback: number) =>
  z.number().int().positive().max(MAX_TIMER_MS).default(fallback).catch(fallback);
const nonEmpty = (fallback: string) => z.string().min(1).default(fallback).catch(fallback);

export const SettingsSchema = z.object({
  enabled: z.boolean().default(true).catch(true),
  cooldownSeconds: z.number().int().nonnegative().default(300).catch(300),
  minSessionLength: z.number().int().nonnegative().default(100).catch(100),
  decisionModel: nonEmpty('gpt-4o-mini'),
  suggestionModel: nonEmpty('gpt-4o'),
  decisionTimeoutMs: timeoutMs(10000),
  suggestionTimeoutMs: timeoutMs(30000),
  decisionExcerptChars: positiveInt(4000),
  suggestionTranscriptChars: positiveInt(15000),
  maxBodyChars: positiveInt(1200)
});

export type Settings = z.infer<typeof SettingsSchema>;

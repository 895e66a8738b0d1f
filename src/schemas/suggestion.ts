import { z } from 'zod';

export const DecisionResponseSchema = z.object({
  recommendation: z.boolean(),
  rationale: z.string().default('')
});

// Category stays a free string here; the composer coerces unknown values.
export const GenerationResponseSchema = z.object({
  category: z.string().default(''),
  title: z.string(),
  body: z.string()
});

export const CooldownRecordSchema = z.object({
  lastSuggestedAt: z.number().finite().nonnegative()
});

export type DecisionResponse = z.infer<typeof DecisionResponseSchema>;
export type GenerationResponse = z.infer<typeof GenerationResponseSchema>;
export type CooldownRecord = z.infer<typeof CooldownRecordSchema>;

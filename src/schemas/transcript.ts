import { z } from 'zod';

const NestedTextSchema = z.object({ type: z.string(), text: z.string().optional() });

export const ContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  name: z.string().optional(),
  input: z.unknown().optional(),
  content: z.union([z.string(), z.array(NestedTextSchema)]).optional()
});

// One line of a Claude Code session transcript (JSONL). Entries without a
// message (summaries, snapshots) fail this schema and are skipped.
export const TranscriptLineSchema = z.object({
  type: z.string().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.union([z.string(), z.array(ContentBlockSchema)])
  })
});

export type ContentBlock = z.infer<typeof ContentBlockSchema>;
export type TranscriptLine = z.infer<typeof TranscriptLineSchema>;

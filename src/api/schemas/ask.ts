// ═══════════════════════════════════════════════════════════════════════════════
// ASK SCHEMAS — Question Request Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

export const MAX_QUESTION_LENGTH = 500;

export const AskRequestSchema = z.object({
  question: z.string()
    .trim()
    .min(1, 'Question cannot be empty')
    .max(MAX_QUESTION_LENGTH, `Question must be at most ${MAX_QUESTION_LENGTH} characters`),
});

export type AskRequest = z.infer<typeof AskRequestSchema>;

export interface AskResponse {
  kind: 'answers' | 'empty' | 'no-match' | 'diagnostic' | 'exit';
  answers: readonly string[];
  rule?: string;
  errorCode?: string;
}

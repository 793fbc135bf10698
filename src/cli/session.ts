// ═══════════════════════════════════════════════════════════════════════════════
// SESSION LOOP — One Question per Line, Answers per Line
// ═══════════════════════════════════════════════════════════════════════════════

import type { Dispatcher } from '../core/rules/dispatcher.js';
import { getLogger } from '../logging/index.js';

export const WELCOME_LINE = 'Welcome to the reference lookup! Ask me a question, or say "bye".';
export const FAREWELL_LINE = 'So long!';

export type WriteLine = (line: string) => void;

export interface SessionSummary {
  questions: number;
  /** True when the exit rule ended the session, false on end of input */
  exited: boolean;
}

const logger = getLogger({ component: 'session' });

/**
 * Reads questions until the exit rule matches or `lines` runs out. Every line
 * is dispatched, blank ones included.
 */
export async function runSession(
  lines: AsyncIterable<string>,
  write: WriteLine,
  dispatcher: Dispatcher
): Promise<SessionSummary> {
  write(WELCOME_LINE);

  let questions = 0;
  let exited = false;

  for await (const line of lines) {
    questions++;
    const result = await dispatcher.dispatch(line);

    if (result.kind === 'exit') {
      exited = true;
      break;
    }

    for (const answer of result.answers) {
      write(answer);
    }
  }

  write(FAREWELL_LINE);
  logger.info('Session ended', { questions, exited });
  return { questions, exited };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCHER — Question → First Matching Rule → Answers
// ═══════════════════════════════════════════════════════════════════════════════

import { prepareQuestion } from '../matching/tokenizer.js';
import { match } from '../matching/matcher.js';
import { getLogger } from '../../logging/index.js';
import type { RuleRegistry } from './registry.js';
import {
  NO_MATCH_ANSWER,
  NO_ANSWERS_ANSWER,
  type DispatchResult,
} from './types.js';

const logger = getLogger({ component: 'dispatcher' });

/**
 * Holds no per-question state; one instance can serve any number of callers.
 */
export class Dispatcher {
  constructor(private readonly registry: RuleRegistry) {}

  get rules(): RuleRegistry {
    return this.registry;
  }

  /**
   * Only the first matching rule is tried. A lookup failure becomes a single
   * diagnostic answer; an exception thrown by an action is not caught.
   */
  async dispatch(rawQuestion: string): Promise<DispatchResult> {
    const tokens = prepareQuestion(rawQuestion);

    for (const rule of this.registry.entries()) {
      const captured = match(rule.pattern, tokens);
      if (captured === null) continue;

      logger.debug('Rule matched', { rule: rule.name, captured });

      if (rule.kind === 'exit') {
        return { kind: 'exit', rule: rule.name };
      }

      const result = await rule.action.run(captured);
      if (!result.ok) {
        logger.warn('Lookup failed', {
          rule: rule.name,
          code: result.error.code,
          reason: result.error.message,
        });
        return {
          kind: 'diagnostic',
          rule: rule.name,
          answers: [result.error.message],
          error: result.error,
        };
      }

      if (result.value.length === 0) {
        return { kind: 'empty', rule: rule.name, answers: [NO_ANSWERS_ANSWER] };
      }
      return { kind: 'answers', rule: rule.name, answers: result.value };
    }

    logger.debug('No rule matched', { tokens });
    return { kind: 'no-match', answers: [NO_MATCH_ANSWER] };
  }
}

/**
 * The lines to show for a result; the exit signal has none.
 */
export function answersOf(result: DispatchResult): readonly string[] {
  return result.kind === 'exit' ? [] : result.answers;
}

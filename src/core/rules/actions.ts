// ═══════════════════════════════════════════════════════════════════════════════
// ACTIONS — Captured Subject → Fact Block → Answer Sentence
// ═══════════════════════════════════════════════════════════════════════════════

import { map, type AsyncResult } from '../../types/result.js';
import { extractField } from '../extraction/extractor.js';
import type { ExtractionTemplate } from '../extraction/templates.js';
import type { LookupError } from '../extraction/errors.js';
import { getLogger } from '../../logging/index.js';
import type { Action, CapturedArgs, DocumentProvider } from './types.js';

export type AnswerPhrase = (subject: string, value: string) => string;

const logger = getLogger({ component: 'actions' });

export function subjectFromArgs(args: CapturedArgs): string {
  return args.join(' ');
}

/**
 * Looks one field up in the subject's fact block and phrases it as a single
 * sentence. The extracted value is trimmed before phrasing.
 */
export class FactLookupAction implements Action {
  constructor(
    private readonly provider: DocumentProvider,
    private readonly template: ExtractionTemplate,
    private readonly phrase: AnswerPhrase
  ) {}

  async run(args: CapturedArgs): AsyncResult<string[], LookupError> {
    const subject = subjectFromArgs(args);
    const block = await this.provider.fetchFactBlock(subject);
    if (!block.ok) {
      return block;
    }

    logger.debug('Fact block retrieved', {
      subject,
      field: this.template.field,
      provider: this.provider.name,
      block: block.value,
    });

    return map(extractField(block.value, this.template), value => [
      this.phrase(subject, value.trim()),
    ]);
  }
}

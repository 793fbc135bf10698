// ═══════════════════════════════════════════════════════════════════════════════
// FIELD EXTRACTOR — Regex Over a Cleaned Fact Block
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, type Result } from '../../types/result.js';
import { clean } from '../matching/tokenizer.js';
import { fieldNotFound, type LookupError } from './errors.js';
import type { ExtractionTemplate } from './templates.js';

/**
 * Clean `text` and return the template's named group from the first match
 * anywhere in it. The input string is not modified.
 */
export function extractField(text: string, template: ExtractionTemplate): Result<string, LookupError> {
  const found = template.pattern.exec(clean(text));
  const value = found?.groups?.[template.field];

  if (value === undefined) {
    return err(fieldNotFound(template.label, template.field));
  }
  return ok(value);
}

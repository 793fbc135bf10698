// ═══════════════════════════════════════════════════════════════════════════════
// FACT BLOCK — Summary Box Text from Rendered Reference HTML
// ═══════════════════════════════════════════════════════════════════════════════

import * as cheerio from 'cheerio';
import { clean } from '../../core/matching/tokenizer.js';

export const SUMMARY_BOX_SELECTOR = '.infobox';

/**
 * Text of the first summary box in `html`, cleaned, or `null` when the page
 * has none.
 */
export function extractFactBlock(html: string, selector: string = SUMMARY_BOX_SELECTOR): string | null {
  const $ = cheerio.load(html);
  const box = $(selector).first();
  if (box.length === 0) {
    return null;
  }
  return clean(box.text());
}

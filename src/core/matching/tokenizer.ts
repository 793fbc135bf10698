// ═══════════════════════════════════════════════════════════════════════════════
// TOKENIZER — Question Tokens and Reference Text Cleanup
// ═══════════════════════════════════════════════════════════════════════════════

// Printable ASCII plus \t \n \r \v \f
const NON_PRINTABLE = /[^\x20-\x7E\t\n\r\v\f]/g;
const SPACE_RUNS = / +/g;
const NEWLINE_RUNS = /\n+/g;
const WHITESPACE = /\s+/;

/**
 * Split on whitespace. Casing and attached punctuation are kept as typed.
 */
export function tokenize(text: string): string[] {
  return text.split(WHITESPACE).filter(token => token.length > 0);
}

/**
 * Tokens folded to lower case, for comparison only. Never use these for
 * display: subject names must keep the user's casing.
 */
export function normalizeForMatching(text: string): string[] {
  return tokenize(text).map(token => token.toLowerCase());
}

export function stripQuestionMarks(text: string): string {
  return text.replace(/\?/g, '');
}

/**
 * The token sequence a question is matched with.
 */
export function prepareQuestion(raw: string): string[] {
  return tokenize(stripQuestionMarks(raw));
}

/**
 * Replace characters outside the printable ASCII set with a space, then
 * collapse runs of spaces and runs of newlines.
 */
export function clean(text: string): string {
  return text
    .replace(NON_PRINTABLE, ' ')
    .replace(SPACE_RUNS, ' ')
    .replace(NEWLINE_RUNS, '\n');
}

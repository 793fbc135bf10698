// ═══════════════════════════════════════════════════════════════════════════════
// WILDCARD MATCHER — Literal / Wildcard Token Patterns
// ═══════════════════════════════════════════════════════════════════════════════
//
// A pattern is a list of tokens. Each token is either a literal, compared
// case-insensitively with one input token, or the wildcard marker, which
// binds one or more consecutive input tokens.
//
// When several splits satisfy a pattern the longest binding for the leftmost
// wildcard wins ("take everything up to here").
//
// ═══════════════════════════════════════════════════════════════════════════════

export const WILDCARD = '%';

export type Pattern = readonly string[];

export function isWildcard(token: string): boolean {
  return token === WILDCARD;
}

export function countWildcards(pattern: Pattern): number {
  return pattern.filter(isWildcard).length;
}

function sameToken(literal: string, input: string): boolean {
  return literal.toLowerCase() === input.toLowerCase();
}

/**
 * Match `input` against `pattern`.
 *
 * Returns the tokens bound by the wildcards, in input order and with their
 * original casing, or `null` when the pattern does not match. A pattern
 * without wildcards returns `[]` on success.
 */
export function match(pattern: Pattern, input: readonly string[]): string[] | null {
  // (patternIndex, inputIndex) pairs already known not to match
  const failed = new Set<number>();
  const stride = input.length + 1;

  const matchFrom = (p: number, i: number): string[] | null => {
    const key = p * stride + i;
    if (failed.has(key)) return null;

    const result = step(p, i);
    if (result === null) failed.add(key);
    return result;
  };

  const step = (p: number, i: number): string[] | null => {
    if (p === pattern.length) {
      return i === input.length ? [] : null;
    }

    const head = pattern[p];
    if (!isWildcard(head)) {
      if (i >= input.length || !sameToken(head, input[i])) return null;
      return matchFrom(p + 1, i + 1);
    }

    // Every later literal needs one token and so does every later wildcard.
    const reserved = pattern.length - p - 1;
    for (let end = input.length - reserved; end > i; end--) {
      const rest = matchFrom(p + 1, end);
      if (rest !== null) {
        return [...input.slice(i, end), ...rest];
      }
    }
    return null;
  };

  return matchFrom(0, 0);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RULE ENGINE TYPES — Rules, Actions, Dispatch Results
// ═══════════════════════════════════════════════════════════════════════════════

import type { AsyncResult } from '../../types/result.js';
import type { Pattern } from '../matching/matcher.js';
import type { LookupError } from '../extraction/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENT PROVIDER (collaborator boundary)
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Resolves a subject's display name to a cleaned block of summary text.
 */
export interface DocumentProvider {
  readonly name: string;
  fetchFactBlock(subject: string): AsyncResult<string, LookupError>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ACTIONS & RULES
// ─────────────────────────────────────────────────────────────────────────────────

export type CapturedArgs = readonly string[];

export interface Action {
  /**
   * `ok([])` means the rule matched but there was nothing to say.
   */
  run(args: CapturedArgs): AsyncResult<string[], LookupError>;
}

export interface LookupRule {
  readonly kind: 'lookup';
  readonly name: string;
  readonly pattern: Pattern;
  readonly action: Action;
}

/**
 * Ends an interactive session. Carries no action.
 */
export interface ExitRule {
  readonly kind: 'exit';
  readonly name: string;
  readonly pattern: Pattern;
}

export type Rule = LookupRule | ExitRule;

// ─────────────────────────────────────────────────────────────────────────────────
// DISPATCH RESULTS
// ─────────────────────────────────────────────────────────────────────────────────

export const NO_MATCH_ANSWER = "I don't understand";
export const NO_ANSWERS_ANSWER = 'No answers';

export type DispatchResult =
  | { readonly kind: 'answers'; readonly rule: string; readonly answers: readonly string[] }
  | { readonly kind: 'empty'; readonly rule: string; readonly answers: readonly [typeof NO_ANSWERS_ANSWER] }
  | { readonly kind: 'no-match'; readonly answers: readonly [typeof NO_MATCH_ANSWER] }
  | { readonly kind: 'diagnostic'; readonly rule: string; readonly answers: readonly [string]; readonly error: LookupError }
  | { readonly kind: 'exit'; readonly rule: string };

export type DispatchKind = DispatchResult['kind'];

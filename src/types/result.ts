// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either a value or an expected failure. Lookups that can legitimately come
 * up empty (missing page, missing field) return one of these instead of
 * throwing.
 *
 * @example
 * ```typescript
 * const result = extractField(block, POPULATION_TEMPLATE);
 * if (result.ok) {
 *   console.log(result.value); // "2,048,472"
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Async Result type — Promise that resolves to a Result.
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSFORMATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map the value of an Ok Result.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  if (result.ok) {
    return ok(fn(result.value));
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON ERROR TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Standard application error with code and context.
 */
export interface AppError<C extends string = string> {
  readonly code: C;
  readonly message: string;
  readonly cause?: Error;
  readonly context?: Record<string, unknown>;
}

export function appError<C extends string>(
  code: C,
  message: string,
  options?: { cause?: Error; context?: Record<string, unknown> }
): AppError<C> {
  return {
    code,
    message,
    cause: options?.cause,
    context: options?.context,
  };
}

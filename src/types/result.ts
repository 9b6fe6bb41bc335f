// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Failure Values
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
 * Either a value or a failure. Upstream problems travel as `Err` values
 * instead of exceptions so callers decide how to surface them.
 *
 * @example
 * ```typescript
 * const parsed = tryCatch((): unknown => JSON.parse(body));
 * if (!parsed.ok) {
 *   return err(processingFailure('INVALID_JSON', ...));
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Promise that resolves to a Result.
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
// OPERATIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Unwrap the value from an Ok Result, or return a default.
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  if (result.ok) {
    return result.value;
  }
  return defaultValue;
}

/**
 * Wrap a function that might throw into a Result.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn());
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

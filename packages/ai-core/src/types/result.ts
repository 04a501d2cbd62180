/**
 * Result Type
 *
 * Explicit success/failure envelope for paths where a failure is an
 * expected branch (degradable stages, tool calls) rather than an exception.
 */

// ============================================================================
// Core Types
// ============================================================================

export interface Ok<T> {
  readonly _tag: "Ok";
  readonly value: T;
}

export interface Err<E> {
  readonly _tag: "Err";
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors & Guards
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { _tag: "Ok", value };
}

export function err<E>(error: E): Err<E> {
  return { _tag: "Err", error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === "Ok";
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === "Err";
}

// ============================================================================
// Transformations
// ============================================================================

/**
 * Map over the success value, leaving failures untouched.
 */
export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return isOk(result) ? ok(fn(result.value)) : result;
}

/**
 * Extract the success value or fall back to a default.
 */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return isOk(result) ? result.value : fallback;
}

/**
 * Run an async operation and capture a thrown error as Err.
 */
export async function tryCatchAsync<T, E>(
  operation: () => Promise<T>,
  onError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await operation());
  } catch (error) {
    return err(onError(error));
  }
}

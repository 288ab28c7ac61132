/**
 * @fileoverview Result type for explicit error handling
 *
 * Provider calls are wrapped in Results so stage boundaries can decide
 * explicitly which failures degrade the response and which propagate.
 */

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Wrap an async function in a Result
 */
export async function safeAsync<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(toError(e));
  }
}

// ============================================================================
// ASYNC HELPERS
// ============================================================================

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number, label = 'Operation') {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race an operation against a timer. A non-positive timeout disables the timer.
 * Synchronous throws from `operation` are captured like rejections.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  label?: string
): Promise<Result<T, Error>> {
  if (!(timeoutMs > 0)) {
    return safeAsync(operation);
  }

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(timeoutMs, label));
    }, timeoutMs);
  });

  try {
    const result = await Promise.race([operation(), timeoutPromise]);
    return Ok(result);
  } catch (e) {
    return Err(toError(e));
  } finally {
    clearTimeout(timeoutId);
  }
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

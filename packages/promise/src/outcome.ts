/**
 * Two-case result of invoking user code.
 */

export type Ok<T> = { ok: true; value: T }

export type Failed = { ok: false; error: unknown }

export type Outcome<T> = Ok<T> | Failed

/**
 * Call `fn` and capture what it returned or threw.
 */
export function attempt<R>(fn: () => R): Outcome<R> {
  try {
    return { ok: true, value: fn() }
  } catch (error) {
    return { ok: false, error }
  }
}

/**
 * APromise Error Classes
 */

/**
 * Rejection reason of a promise resolved with itself, directly or through a
 * chain that leads back to it.
 */
export class SelfResolutionError extends TypeError {
  constructor(message = `Promise cannot be resolved with itself`) {
    super(message)
    this.name = `SelfResolutionError`
  }
}

/**
 * Error for a rejection attempted with something other than an Error.
 *
 * `APromise.reject()` throws it. A non-Error handed over by an executor, a
 * foreign thenable or a throwing handler rejects the promise with it instead.
 */
export class InvalidRejectionError extends TypeError {
  /**
   * The value the promise was rejected with.
   */
  readonly reason: unknown

  constructor(reason: unknown) {
    super(`A promise was rejected with a non-error: ${String(reason)}`)
    this.name = `InvalidRejectionError`
    this.reason = reason
  }
}

/**
 * Error thrown when a value is requested from a promise that has not settled.
 */
export class NotSettledError extends Error {
  /**
   * How long the caller waited in milliseconds, when it waited with a timeout.
   */
  readonly timeout: number | undefined

  constructor(timeout?: number, message?: string) {
    super(
      message ??
        (timeout === undefined
          ? `Promise has not settled yet`
          : `Promise did not settle within ${timeout}ms`)
    )
    this.name = `NotSettledError`
    this.timeout = timeout
  }
}

/**
 * Normalize anything thrown or passed to a reject function into an Error.
 */
export function toRejectionReason(reason: unknown): Error {
  return reason instanceof Error ? reason : new InvalidRejectionError(reason)
}

/**
 * Shared helpers for APromise tests.
 */

import { APromise } from "../../src/index"

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Wait until every queued microtask (and so every scheduler tick on the
 * default dispatcher) has run.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

export interface Deferred<T> {
  promise: APromise<T>
  resolve: (value: T | PromiseLike<T>) => void
  reject: (reason: Error) => void
}

/**
 * A pending promise together with the functions that settle it.
 */
export function deferred<T>(): Deferred<T> {
  let resolve: Deferred<T>[`resolve`] = () => {}
  let reject: Deferred<T>[`reject`] = () => {}
  const promise = new APromise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

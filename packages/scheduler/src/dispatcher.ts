/**
 * Dispatchers decide which host hook a scheduler tick runs on.
 */

/**
 * Runs a zero-argument function at some later point (or right away).
 */
export interface Dispatcher {
  call(fn: () => void): void
}

/**
 * Runs each function on the microtask queue, the same hook native promise
 * reactions use.
 */
export class MicrotaskDispatcher implements Dispatcher {
  call(fn: () => void): void {
    queueMicrotask(fn)
  }
}

/**
 * Runs each function on the check phase of the event loop, after pending I/O
 * callbacks and microtasks.
 */
export class MacrotaskDispatcher implements Dispatcher {
  call(fn: () => void): void {
    setImmediate(fn)
  }
}

/**
 * Runs each function synchronously.
 *
 * Delivery is still flat: the scheduler only asks for one tick at a time, so
 * work queued while a drain is in progress joins that drain instead of
 * recursing.
 */
export class ImmediateDispatcher implements Dispatcher {
  call(fn: () => void): void {
    fn()
  }
}

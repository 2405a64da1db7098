/**
 * Diagnostic context stack.
 *
 * A context is entered around executor and handler invocations. Work queued on
 * it with `onExit()` runs when the context exits, or earlier when a waiter
 * drains it so that it does not wait on work it has queued itself.
 */

const stack: Array<Context> = []

export class Context {
  readonly parent: Context | undefined
  #callbacks: Array<() => void> = []

  constructor() {
    this.parent = Context.current()
  }

  /**
   * The innermost context that is currently running, if any.
   */
  static current(): Context | undefined {
    return stack.length > 0 ? stack[stack.length - 1] : undefined
  }

  /**
   * Run `fn` inside a fresh context.
   */
  static run<R>(fn: () => R): R {
    return new Context().run(fn)
  }

  get depth(): number {
    return stack.length
  }

  /**
   * Whether work is waiting for this context to exit.
   */
  get hasQueuedWork(): boolean {
    return this.#callbacks.length > 0
  }

  /**
   * Enter the context, run `fn`, then drain and leave the context.
   * The context is left on every exit path, including a throw.
   */
  run<R>(fn: () => R): R {
    stack.push(this)
    try {
      return fn()
    } finally {
      try {
        this.drainQueue()
      } finally {
        const index = stack.lastIndexOf(this)
        if (index !== -1) {
          stack.splice(index, 1)
        }
      }
    }
  }

  onExit(callback: () => void): void {
    this.#callbacks.push(callback)
  }

  /**
   * Run everything queued with `onExit()`, including callbacks queued while
   * draining.
   */
  drainQueue(): void {
    while (this.#callbacks.length > 0) {
      const callbacks = this.#callbacks
      this.#callbacks = []
      for (const callback of callbacks) {
        callback()
      }
    }
  }
}

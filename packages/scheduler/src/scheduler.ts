/**
 * Trampoline scheduler.
 *
 * Promise settlement never notifies subscribers on the caller's stack.
 * Notifications are queued here and drained in one flat loop per tick, so a
 * long chain of reactions costs queue entries rather than stack frames.
 */

import { MicrotaskDispatcher } from "./dispatcher"
import type { Dispatcher } from "./dispatcher"

/**
 * A zero-argument unit of deferred work.
 */
export type Task = () => void

/**
 * Something whose queued subscribers can be notified, i.e. a settled promise.
 */
export interface Settleable {
  settleSubscribers(): void
}

/**
 * Options for creating a Scheduler.
 */
export interface SchedulerOptions {
  /**
   * Host hook a tick runs on.
   * Defaults to a MicrotaskDispatcher.
   */
  dispatcher?: Dispatcher

  /**
   * Whether tasks are batched onto the trampoline queues.
   * When false every task goes straight to the dispatcher.
   * Defaults to true.
   */
  trampoline?: boolean

  /**
   * Sink for a rejection that reached a promise terminated with `done()`.
   * Defaults to logging the reason and rethrowing it on a fresh macrotask,
   * where the host reports it as an uncaught exception.
   */
  onFatalError?: (reason: Error) => void

  /**
   * Called for a rejected promise that still has no reaction once the late
   * queue runs. Unhandled rejections are not tracked when omitted.
   */
  onUnhandledRejection?: (reason: Error) => void
}

function reportFatalError(reason: Error): void {
  console.error(`[Scheduler] Rejection reached a terminal promise:`, reason)
  setImmediate(() => {
    throw reason
  })
}

/**
 * FIFO queue that reuses its backing array between drains.
 */
class TaskQueue<T> {
  #items: Array<T> = []
  #head = 0

  get length(): number {
    return this.#items.length - this.#head
  }

  push(item: T): void {
    this.#items.push(item)
  }

  shift(): T | undefined {
    if (this.#head >= this.#items.length) {
      return undefined
    }
    const item = this.#items[this.#head]
    this.#head++
    if (this.#head === this.#items.length) {
      this.#items = []
      this.#head = 0
    }
    return item
  }
}

type QueueEntry = Task | Settleable

function runEntry(entry: QueueEntry): void {
  if (typeof entry === `function`) {
    entry()
  } else {
    entry.settleSubscribers()
  }
}

/**
 * Scheduler - the trampoline every promise notification goes through.
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler({ dispatcher: new ImmediateDispatcher() })
 * scheduler.invoke(() => console.log(`later`))
 * ```
 */
export class Scheduler {
  readonly #dispatcher: Dispatcher
  readonly #onFatalError: (reason: Error) => void
  readonly #onUnhandledRejection: ((reason: Error) => void) | undefined
  readonly #normalQueue = new TaskQueue<QueueEntry>()
  readonly #lateQueue = new TaskQueue<QueueEntry>()
  #trampolineEnabled: boolean
  #isTickUsed = false

  constructor(opts: SchedulerOptions = {}) {
    this.#dispatcher = opts.dispatcher ?? new MicrotaskDispatcher()
    this.#trampolineEnabled = opts.trampoline ?? true
    this.#onFatalError = opts.onFatalError ?? reportFatalError
    this.#onUnhandledRejection = opts.onUnhandledRejection
  }

  get trampolineEnabled(): boolean {
    return this.#trampolineEnabled
  }

  /**
   * Whether a rejection without reactions should be reported later.
   */
  get tracksUnhandledRejections(): boolean {
    return this.#onUnhandledRejection !== undefined
  }

  enableTrampoline(): void {
    this.#trampolineEnabled = true
  }

  disableTrampoline(): void {
    this.#trampolineEnabled = false
  }

  haveItemsQueued(): boolean {
    return this.#isTickUsed || this.#normalQueue.length > 0
  }

  /**
   * Schedule a task for deferred execution.
   */
  invoke(task: Task): void {
    this.#enqueue(this.#normalQueue, task)
  }

  /**
   * Schedule a task to run after the normal queue of the same tick.
   */
  invokeLater(task: Task): void {
    this.#enqueue(this.#lateQueue, task)
  }

  /**
   * Schedule notification of a settled promise's subscribers.
   */
  settlePromises(promise: Settleable): void {
    this.#enqueue(this.#normalQueue, promise)
  }

  /**
   * Report a rejection that nothing downstream can handle.
   */
  fatalError(reason: Error): void {
    this.#onFatalError(reason)
  }

  notifyUnhandledRejection(reason: Error): void {
    this.#onUnhandledRejection?.(reason)
  }

  /**
   * Run every queued task now: the normal queue first, then the late queue.
   *
   * Tasks queued while draining run in the same drain. If a task throws, the
   * remaining tasks get a new tick and the error propagates.
   */
  drainQueues(): void {
    try {
      this.#drain(this.#normalQueue)
      this.#isTickUsed = false
      this.#drain(this.#lateQueue)
    } finally {
      this.#isTickUsed = false
      if (this.#normalQueue.length > 0 || this.#lateQueue.length > 0) {
        this.#queueTick()
      }
    }
  }

  #drain(queue: TaskQueue<QueueEntry>): void {
    let entry = queue.shift()
    while (entry !== undefined) {
      runEntry(entry)
      entry = queue.shift()
    }
  }

  #enqueue(queue: TaskQueue<QueueEntry>, entry: QueueEntry): void {
    if (!this.#trampolineEnabled) {
      this.#dispatcher.call(() => runEntry(entry))
      return
    }
    queue.push(entry)
    this.#queueTick()
  }

  #queueTick(): void {
    if (this.#isTickUsed) {
      return
    }
    this.#isTickUsed = true
    this.#dispatcher.call(() => this.drainQueues())
  }
}

/**
 * Runs generator-based coroutines on a fastq queue.
 *
 * A coroutine yields values it wants to wait for. Each yielded value is
 * awaited (promises and other thenables included) and its outcome is sent
 * back in with `next()` or `throw()` until the generator returns.
 */

import fastq from "fastq"
import type { queueAsPromised } from "fastq"
import type { Outcome } from "./outcome"
import type { Coroutine } from "./thenable"

/**
 * Options for creating a CoroutineRunner.
 */
export interface CoroutineRunnerOptions {
  /**
   * Maximum number of coroutines driven at the same time.
   * Defaults to unbounded.
   */
  concurrency?: number
}

async function settle(value: unknown): Promise<Outcome<unknown>> {
  try {
    return { ok: true, value: await value }
  } catch (error) {
    return { ok: false, error }
  }
}

async function drive(coroutine: Coroutine): Promise<unknown> {
  let result = coroutine.next()
  while (!result.done) {
    const step = await settle(result.value)
    result = step.ok ? coroutine.next(step.value) : coroutine.throw(step.error)
  }
  return result.value
}

export class CoroutineRunner {
  private queue: queueAsPromised<Coroutine, unknown>

  constructor(opts: CoroutineRunnerOptions = {}) {
    const concurrency = opts.concurrency ?? Infinity
    if (!(concurrency >= 1)) {
      throw new RangeError(`concurrency must be at least 1. Got: ${concurrency}`)
    }
    this.queue = fastq.promise(drive, concurrency)
  }

  /**
   * Number of coroutines waiting for a free slot.
   */
  get length(): number {
    return this.queue.length()
  }

  /**
   * Queue a coroutine and get a native promise for its return value.
   */
  run(coroutine: Coroutine): Promise<unknown> {
    return this.queue.push(coroutine)
  }

  /**
   * Whether no coroutine is running or waiting.
   */
  idle(): boolean {
    return this.queue.idle()
  }

  /**
   * Resolves once every queued coroutine has finished.
   */
  drained(): Promise<void> {
    return this.queue.drained()
  }
}

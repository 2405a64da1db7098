/**
 * APromise - a Promises/A+ promise driven by an explicit trampoline.
 *
 * A promise is pending, fulfilled or rejected, and may leave pending at most
 * once. A pending promise resolved with another pending promise does not
 * hold on to it: it hands its reactions over and *follows* the other
 * promise's ultimate target, so chains stay one level deep.
 */

import { Context, Scheduler } from "@aplus/scheduler"
import { CallbackStore } from "./callback-store"
import { all, forDict } from "./combinators"
import { CoroutineRunner } from "./coroutine-runner"
import {
  InvalidRejectionError,
  NotSettledError,
  SelfResolutionError,
  toRejectionReason,
} from "./error"
import { attempt } from "./outcome"
import { matchThenable } from "./thenable"
import type { Settleable } from "@aplus/scheduler"
import type { SettleCallback, ThenableMatch } from "./thenable"

/**
 * Observable state of a promise. A follower reports its target's state.
 */
export type PromiseState = `pending` | `fulfilled` | `rejected`

export type Executor<T> = (
  resolve: (value: T | PromiseLike<T>) => void,
  reject: (reason: Error) => void
) => void

export type FulfillHandler<T> = (value: T) => unknown

export type RejectHandler = (reason: Error) => unknown

/**
 * A handler for `thenAll()`/`doneAll()`: a fulfillment handler, a
 * `[onFulfilled, onRejected]` pair or a `{ success, failure }` record.
 */
export type HandlerSpec<T> =
  | FulfillHandler<T>
  | HandlerPair<T>
  | { success?: FulfillHandler<T>; failure?: RejectHandler }

export type HandlerPair<T> = readonly [
  FulfillHandler<T> | null | undefined,
  (RejectHandler | null | undefined)?,
]

/**
 * Options for waiting on a promise.
 */
export interface WaitOptions {
  /**
   * Maximum time to wait in milliseconds.
   */
  timeout?: number

  /**
   * Stops waiting when aborted.
   */
  signal?: AbortSignal
}

/**
 * Options for get().
 */
export interface GetOptions extends WaitOptions {
  /**
   * Wait for the promise to settle before reading it. Defaults to true.
   */
  wait?: boolean
}

/**
 * A subscriber: handlers plus the promise their outcome feeds.
 */
interface Reaction {
  promise: APromise<unknown>
  fulfill?(value: unknown): unknown
  reject?(reason: Error): unknown
}

type Slot =
  | { kind: `pending` }
  | { kind: `following`; target: APromise<unknown> }
  | { kind: `fulfilled`; value: unknown }
  | { kind: `rejected`; reason: Error }

type SettledSlot = Extract<Slot, { kind: `fulfilled` | `rejected` }>

/**
 * How many pass-through settlements may nest on the stack before the rest
 * go back through the scheduler.
 */
const MAX_SYNC_SETTLE_DEPTH = 100

let syncSettleDepth = 0

function isHandlerPair<T>(spec: HandlerSpec<T>): spec is HandlerPair<T> {
  return Array.isArray(spec)
}

function splitHandler<T>(
  spec: HandlerSpec<T>
): [FulfillHandler<T> | undefined, RejectHandler | undefined] {
  if (typeof spec === `function`) {
    return [spec, undefined]
  }
  if (isHandlerPair(spec)) {
    return [spec[0] ?? undefined, spec[1] ?? undefined]
  }
  return [spec.success, spec.failure]
}

/**
 * Resolve `waiter` to true when it settles, or to false once the timeout
 * expires or the signal aborts.
 */
function waitFor(waiter: Promise<void>, opts: WaitOptions): Promise<boolean> {
  const { timeout, signal } = opts
  if (timeout === undefined && !signal) {
    return waiter.then(() => true)
  }
  if (signal?.aborted) {
    return Promise.resolve(false)
  }

  return new Promise<boolean>((resolve) => {
    let timeoutId: ReturnType<typeof setTimeout> | undefined

    const finish = (settled: boolean): void => {
      if (timeoutId !== undefined) clearTimeout(timeoutId)
      signal?.removeEventListener(`abort`, abortHandler)
      resolve(settled)
    }
    const abortHandler = (): void => finish(false)

    if (timeout !== undefined) {
      timeoutId = setTimeout(() => finish(false), timeout)
    }
    signal?.addEventListener(`abort`, abortHandler, { once: true })
    void waiter.then(() => finish(true))
  })
}

/**
 * APromise - a Promises/A+ promise.
 *
 * @example
 * ```typescript
 * const answer = new APromise<number>((resolve) => resolve(42))
 * answer.then((value) => console.log(value))
 *
 * const total = await APromise.all([answer, 8]).then(([a, b]) => a + b)
 * ```
 */
export class APromise<T> implements PromiseLike<T>, Settleable {
  /**
   * Trampoline every promise schedules its notifications on.
   */
  static scheduler = new Scheduler()

  /**
   * Runner that drives coroutines adopted by `resolve()`.
   */
  static coroutineRunner = new CoroutineRunner()

  #slot: Slot = { kind: `pending` }
  readonly #callbacks = new CallbackStore<Reaction>()
  readonly #trace = Context.current()
  #isFinal = false
  #isAsyncGuaranteed = false
  #isWaiting = false
  #rejectionHandled = false
  #native: Promise<T> | undefined
  #waiter: Promise<void> | undefined

  constructor(executor?: Executor<T>) {
    if (executor) {
      this.#runExecutor(executor)
    }
  }

  /**
   * Convert a value into a promise.
   *
   * APromise instances are returned as they are. Thenables are adopted and
   * anything else gives a promise already fulfilled with the value.
   */
  static resolve<T>(value: T): APromise<Awaited<T>> {
    if (value instanceof APromise) {
      return value
    }
    const promise = new APromise<Awaited<T>>()
    promise.#resolveWith(value)
    return promise
  }

  /**
   * Create a promise already rejected with `reason`.
   *
   * @throws {InvalidRejectionError} if `reason` is not an Error
   */
  static reject<T = never>(reason: Error): APromise<T> {
    if (!(reason instanceof Error)) {
      throw new InvalidRejectionError(reason)
    }
    const promise = new APromise<T>()
    promise.#reject(reason)
    return promise
  }

  /**
   * Whether `value` would be adopted by `resolve()` rather than used as a
   * plain value.
   */
  static isThenable(value: unknown): boolean {
    if (value instanceof APromise) {
      return true
    }
    const match = attempt(() => matchThenable(value))
    return match.ok && match.value !== undefined
  }

  /**
   * Wrap `fn` so every call runs inside a fresh diagnostic context.
   */
  static safe<A extends Array<unknown>, R>(
    fn: (...args: A) => R
  ): (...args: A) => R {
    return (...args) => Context.run(() => fn(...args))
  }

  /**
   * Turn a list of values and promises into a promise of the list of values.
   */
  static all<T extends ReadonlyArray<unknown> | []>(
    values: T
  ): APromise<{ -readonly [P in keyof T]: Awaited<T[P]> }> {
    return all(values)
  }

  /**
   * Turn a mapping of values and promises into a promise of the mapping of
   * values. Maps resolve to Maps and plain objects to plain objects.
   */
  static forDict<K, V>(mapping: ReadonlyMap<K, V>): APromise<Map<K, Awaited<V>>>
  static forDict<T extends Record<string, unknown>>(
    mapping: T
  ): APromise<{ [P in keyof T]: Awaited<T[P]> }>
  static forDict(
    mapping: ReadonlyMap<unknown, unknown> | Record<string, unknown>
  ): APromise<unknown> {
    return forDict(mapping)
  }

  get state(): PromiseState {
    return this.#settledSlot()?.kind ?? `pending`
  }

  get isPending(): boolean {
    return this.#settledSlot() === undefined
  }

  get isFulfilled(): boolean {
    return this.#settledSlot()?.kind === `fulfilled`
  }

  get isRejected(): boolean {
    return this.#settledSlot()?.kind === `rejected`
  }

  /**
   * Whether a caller is currently suspended in `wait()` or `get()`.
   */
  get isWaiting(): boolean {
    return this.#isWaiting
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?:
      | ((value: T) => TResult1 | PromiseLike<TResult1>)
      | undefined
      | null,
    onrejected?:
      | ((reason: Error) => TResult2 | PromiseLike<TResult2>)
      | undefined
      | null
  ): APromise<TResult1 | TResult2> {
    const promise = new APromise<TResult1 | TResult2>()
    this.#subscribe({
      promise,
      fulfill: onfulfilled ?? undefined,
      reject: onrejected ?? undefined,
    })
    return promise
  }

  catch<TResult = never>(
    onrejected?:
      | ((reason: Error) => TResult | PromiseLike<TResult>)
      | undefined
      | null
  ): APromise<T | TResult> {
    return this.then(undefined, onrejected)
  }

  /**
   * Terminate a chain. A rejection that is not handled by `onrejected` (or
   * that `onrejected` throws) goes to the scheduler's fatal error sink.
   */
  done(
    onfulfilled?: FulfillHandler<T> | null,
    onrejected?: RejectHandler | null
  ): void {
    const promise = new APromise<unknown>()
    promise.#isFinal = true
    this.#subscribe({
      promise,
      fulfill: onfulfilled ?? undefined,
      reject: onrejected ?? undefined,
    })
  }

  /**
   * Call `then()` once per handler and return the resulting promises.
   */
  thenAll(handlers: ReadonlyArray<HandlerSpec<T>> = []): Array<APromise<unknown>> {
    return handlers.map((handler) => {
      const [onfulfilled, onrejected] = splitHandler(handler)
      return this.then(onfulfilled, onrejected)
    })
  }

  /**
   * Call `done()` once per handler.
   */
  doneAll(handlers: ReadonlyArray<HandlerSpec<T>> = []): void {
    for (const handler of handlers) {
      const [onfulfilled, onrejected] = splitHandler(handler)
      this.done(onfulfilled, onrejected)
    }
  }

  /**
   * Read the settled value without waiting.
   *
   * @throws the rejection reason if the promise was rejected
   * @throws {NotSettledError} if the promise is still pending
   */
  value(): T {
    const slot = this.#settledSlot()
    if (!slot) {
      throw new NotSettledError()
    }
    if (slot.kind === `rejected`) {
      throw slot.reason
    }
    return slot.value as T
  }

  /**
   * The rejection reason, or undefined unless the promise was rejected.
   */
  reason(): Error | undefined {
    const slot = this.#settledSlot()
    return slot?.kind === `rejected` ? slot.reason : undefined
  }

  /**
   * Wait until the promise settles.
   *
   * Work queued on the context the promise was created in is drained first,
   * since the promise may be waiting on it.
   *
   * @returns true once settled, false if the timeout expired or the signal
   *          aborted first
   */
  async wait(opts: WaitOptions = {}): Promise<boolean> {
    if (!this.isPending) {
      return true
    }

    const waiter = this.#ensureWaiter()
    this.#trace?.drainQueue()
    if (!this.isPending) {
      return true
    }

    this.#isWaiting = true
    try {
      return await waitFor(waiter, opts)
    } finally {
      this.#isWaiting = false
    }
  }

  /**
   * Wait for the promise (unless `wait` is false) and read its value.
   *
   * @throws the rejection reason if the promise was rejected
   * @throws {NotSettledError} if the promise did not settle in time
   */
  async get(opts: GetOptions = {}): Promise<T> {
    const { wait = true, ...waitOptions } = opts
    if (wait || waitOptions.timeout !== undefined) {
      await this.wait(waitOptions)
    }
    if (this.isPending) {
      throw new NotSettledError(waitOptions.timeout)
    }
    return this.value()
  }

  /**
   * A native Promise that settles with this promise, created on first use.
   */
  toNative(): Promise<T> {
    if (!this.#native) {
      this.#native = new Promise<T>((resolve, reject) => {
        this.then(resolve, reject)
      })
    }
    return this.#native
  }

  /**
   * Yields the promise while it is pending and returns its value, so a
   * coroutine can consume it with `yield*`.
   */
  *[Symbol.iterator](): Generator<APromise<T>, T, unknown> {
    while (this.isPending) {
      yield this
    }
    return this.value()
  }

  toString(): string {
    const slot = this.#settledSlot()
    if (!slot) {
      return `APromise { <pending> }`
    }
    return slot.kind === `fulfilled`
      ? `APromise { <fulfilled>: ${String(slot.value)} }`
      : `APromise { <rejected>: ${String(slot.reason)} }`
  }

  /**
   * Notify every registered reaction in registration order.
   * Called by the scheduler once the promise has settled.
   *
   * @internal
   */
  settleSubscribers(): void {
    const slot = this.#slot
    if (slot.kind !== `fulfilled` && slot.kind !== `rejected`) {
      return
    }
    this.#isAsyncGuaranteed = true
    for (const reaction of this.#callbacks.drain()) {
      this.#settleReaction(reaction, slot)
    }
  }

  static #tryConvert(value: unknown): APromise<unknown> | undefined {
    if (value instanceof APromise) {
      return value
    }
    const match = matchThenable(value)
    return match ? APromise.#adopt(match) : undefined
  }

  static #adopt(match: ThenableMatch): APromise<unknown> {
    const promise = new APromise<unknown>()
    switch (match.kind) {
      case `future`: {
        const { future } = match
        promise.#native = future
        promise.#runExecutor((resolve, reject) => {
          void future.then(resolve, reject)
        })
        return promise
      }
      case `done`:
      case `then`: {
        // Foreign code runs on the trampoline, never on the resolver's stack.
        const { method, target } = match
        APromise.scheduler.invoke(() =>
          promise.#runExecutor((resolve, reject) =>
            method.call(
              target,
              (value) =>
                value === target
                  ? reject(new SelfResolutionError())
                  : resolve(value),
              reject
            )
          )
        )
        return promise
      }
      case `coroutine`:
        return APromise.#adopt({
          kind: `future`,
          future: APromise.coroutineRunner.run(match.coroutine),
        })
    }
  }

  #runExecutor(
    executor: (resolve: SettleCallback, reject: SettleCallback) => unknown
  ): void {
    let resolved = false
    const resolve = (value: unknown): void => {
      if (resolved) return
      resolved = true
      this.#resolveWith(value)
    }
    const reject = (reason: unknown): void => {
      if (resolved) return
      resolved = true
      this.#reject(toRejectionReason(reason))
    }

    const outcome = attempt(() => Context.run(() => executor(resolve, reject)))
    if (!outcome.ok) {
      reject(outcome.error)
    }
  }

  #resolveWith(value: unknown): void {
    if (this.#slot.kind !== `pending`) {
      return
    }
    if (value === this) {
      this.#reject(new SelfResolutionError())
      return
    }

    const converted = attempt(() => APromise.#tryConvert(value))
    if (!converted.ok) {
      this.#reject(toRejectionReason(converted.error))
      return
    }
    if (converted.value === undefined) {
      this.#fulfill(value)
      return
    }

    const target = converted.value.#target()
    if (target === this) {
      this.#reject(new SelfResolutionError())
      return
    }

    const slot = target.#slot
    switch (slot.kind) {
      case `fulfilled`:
        this.#fulfill(slot.value)
        return
      case `rejected`:
        this.#reject(slot.reason)
        return
      default:
        this.#follow(target)
    }
  }

  #fulfill(value: unknown): void {
    if (value === this) {
      this.#reject(new SelfResolutionError())
      return
    }
    if (this.#slot.kind !== `pending`) {
      return
    }
    this.#slot = { kind: `fulfilled`, value }
    this.#scheduleSettlement()
  }

  #reject(reason: Error): void {
    if (this.#slot.kind !== `pending`) {
      return
    }
    this.#slot = { kind: `rejected`, reason }

    if (this.#callbacks.length === 0) {
      if (this.#isFinal) {
        APromise.scheduler.fatalError(reason)
      } else {
        this.#ensurePossibleRejectionHandled(reason)
      }
      return
    }
    this.#scheduleSettlement()
  }

  #scheduleSettlement(): void {
    if (this.#callbacks.length === 0) {
      return
    }
    if (this.#isAsyncGuaranteed && syncSettleDepth < MAX_SYNC_SETTLE_DEPTH) {
      syncSettleDepth++
      try {
        this.settleSubscribers()
      } finally {
        syncSettleDepth--
      }
    } else {
      APromise.scheduler.settlePromises(this)
    }
  }

  #ensurePossibleRejectionHandled(reason: Error): void {
    const scheduler = APromise.scheduler
    if (!scheduler.tracksUnhandledRejections) {
      return
    }
    scheduler.invokeLater(() => {
      if (!this.#rejectionHandled) {
        scheduler.notifyUnhandledRejection(reason)
      }
    })
  }

  /**
   * Hand every registered reaction over to `target` and follow it.
   */
  #follow(target: APromise<unknown>): void {
    if (this.#rejectionHandled) {
      target.#rejectionHandled = true
    }
    if (this.#isFinal) {
      // A terminal promise stays pending so a rejection still reaches it.
      target.#callbacks.add({ promise: this })
      target.#rejectionHandled = true
      return
    }
    for (const reaction of this.#callbacks.drain()) {
      target.#callbacks.add(reaction)
    }
    this.#slot = { kind: `following`, target }
  }

  /**
   * Walk the following links to the promise that will actually settle, and
   * point this promise straight at it.
   */
  #target(): APromise<unknown> {
    let target: APromise<unknown> = this
    let slot = this.#slot
    while (slot.kind === `following`) {
      target = slot.target
      slot = target.#slot
    }

    const own = this.#slot
    if (own.kind === `following` && own.target !== target) {
      this.#slot = { kind: `following`, target }
    }
    return target
  }

  #settledSlot(): SettledSlot | undefined {
    const slot = this.#target().#slot
    return slot.kind === `fulfilled` || slot.kind === `rejected`
      ? slot
      : undefined
  }

  #subscribe(reaction: Reaction): void {
    const target = this.#target()
    target.#rejectionHandled = true

    const slot = target.#slot
    if (slot.kind === `fulfilled` || slot.kind === `rejected`) {
      APromise.scheduler.invoke(() => target.#settleReaction(reaction, slot))
    } else {
      target.#callbacks.add(reaction)
    }
  }

  #settleReaction(reaction: Reaction, slot: SettledSlot): void {
    const { promise } = reaction
    if (slot.kind === `fulfilled`) {
      const { fulfill } = reaction
      const { value } = slot
      if (fulfill) {
        this.#settleFromHandler(promise, () => fulfill(value))
      } else {
        this.#passThrough(promise, slot)
      }
    } else {
      const { reject } = reaction
      const { reason } = slot
      if (reject) {
        this.#settleFromHandler(promise, () => reject(reason))
      } else {
        this.#passThrough(promise, slot)
      }
    }
  }

  #settleFromHandler(promise: APromise<unknown>, invoke: () => unknown): void {
    const outcome = attempt(() => Context.run(invoke))
    if (outcome.ok) {
      promise.#resolveWith(outcome.value)
    } else {
      promise.#reject(toRejectionReason(outcome.error))
    }
  }

  #passThrough(promise: APromise<unknown>, slot: SettledSlot): void {
    if (this.#isAsyncGuaranteed) {
      promise.#isAsyncGuaranteed = true
    }
    if (slot.kind === `fulfilled`) {
      promise.#fulfill(slot.value)
    } else {
      promise.#reject(slot.reason)
    }
  }

  #ensureWaiter(): Promise<void> {
    if (!this.#waiter) {
      this.#waiter = new Promise<void>((resolve) => {
        this.#subscribe({
          promise: new APromise<unknown>(),
          fulfill: (value) => {
            this.#absorb({ kind: `fulfilled`, value })
            resolve()
          },
          reject: (reason) => {
            this.#absorb({ kind: `rejected`, reason })
            resolve()
          },
        })
      })
    }
    return this.#waiter
  }

  /**
   * Copy the followed target's outcome into this promise's own slot.
   */
  #absorb(slot: SettledSlot): void {
    if (this.#slot.kind === `following`) {
      this.#slot = slot
    }
  }
}

/**
 * Tests for the APromise state machine, resolution and chaining.
 */

import { Context, ImmediateDispatcher, Scheduler } from "@aplus/scheduler"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import {
  APromise,
  InvalidRejectionError,
  NotSettledError,
  SelfResolutionError,
} from "../src/index"
import { deferred, flush } from "./support/test-helpers"

const defaultScheduler = APromise.scheduler

beforeEach(() => {
  APromise.scheduler = new Scheduler()
})

afterEach(() => {
  APromise.scheduler = defaultScheduler
})

// ============================================================================
// State
// ============================================================================

describe(`APromise state`, () => {
  it(`should start pending without an executor`, () => {
    const promise = new APromise<number>()

    expect(promise.state).toBe(`pending`)
    expect(promise.isPending).toBe(true)
    expect(promise.isFulfilled).toBe(false)
    expect(promise.isRejected).toBe(false)
  })

  it(`should fulfill synchronously from the executor`, () => {
    const promise = new APromise<number>((resolve) => resolve(5))

    expect(promise.state).toBe(`fulfilled`)
    expect(promise.value()).toBe(5)
  })

  it(`should reject when the executor throws`, () => {
    const error = new Error(`executor failed`)
    const promise = new APromise<number>(() => {
      throw error
    })

    expect(promise.isRejected).toBe(true)
    expect(promise.reason()).toBe(error)
  })

  it(`should keep the first resolution`, () => {
    const promise = new APromise<number>((resolve, reject) => {
      resolve(1)
      resolve(2)
      reject(new Error(`ignored`))
    })

    expect(promise.value()).toBe(1)
  })

  it(`should ignore a throw after the executor resolved`, () => {
    const promise = new APromise<number>((resolve) => {
      resolve(1)
      throw new Error(`ignored`)
    })

    expect(promise.value()).toBe(1)
  })

  it(`should run the executor inside a context`, () => {
    let seen: Context | undefined
    new APromise<void>(() => {
      seen = Context.current()
    })

    expect(seen).toBeInstanceOf(Context)
    expect(Context.current()).toBeUndefined()
  })

  it(`should throw NotSettledError when reading a pending value`, () => {
    expect(() => new APromise<number>().value()).toThrow(NotSettledError)
  })

  it(`should throw the reason when reading a rejected value`, () => {
    const error = new Error(`bad`)
    expect(() => APromise.reject(error).value()).toThrow(error)
  })

  it(`should have no reason unless rejected`, () => {
    expect(APromise.resolve(1).reason()).toBeUndefined()
    expect(new APromise<number>().reason()).toBeUndefined()
  })

  it(`should describe itself`, () => {
    expect(String(new APromise<number>())).toBe(`APromise { <pending> }`)
    expect(String(APromise.resolve(5))).toBe(`APromise { <fulfilled>: 5 }`)
    expect(String(APromise.reject(new Error(`bad`)))).toBe(
      `APromise { <rejected>: Error: bad }`
    )
  })
})

// ============================================================================
// Resolution
// ============================================================================

describe(`APromise resolution`, () => {
  it(`should return an APromise from resolve() unchanged`, () => {
    const promise = APromise.resolve(1)
    expect(APromise.resolve(promise)).toBe(promise)
  })

  it(`should follow a pending promise until it settles`, () => {
    const inner = deferred<number>()
    const outer = new APromise<number>((resolve) => resolve(inner.promise))

    expect(outer.isPending).toBe(true)
    inner.resolve(7)

    expect(outer.isFulfilled).toBe(true)
    expect(outer.value()).toBe(7)
  })

  it(`should take the outcome of an already settled promise`, () => {
    const error = new Error(`inner failed`)
    const outer = new APromise<number>((resolve) =>
      resolve(APromise.reject<number>(error))
    )

    expect(outer.reason()).toBe(error)
  })

  it(`should reject a promise resolved with itself`, () => {
    const self = deferred<unknown>()
    self.resolve(self.promise)

    expect(self.promise.isRejected).toBe(true)
    expect(self.promise.reason()).toBeInstanceOf(SelfResolutionError)
  })

  it(`should reject a resolution cycle through another promise`, () => {
    const a = deferred<unknown>()
    const b = deferred<unknown>()

    a.resolve(b.promise)
    b.resolve(a.promise)

    expect(b.promise.reason()).toBeInstanceOf(SelfResolutionError)
    expect(a.promise.reason()).toBeInstanceOf(SelfResolutionError)
  })

  it(`should throw from reject() when given a non-error`, () => {
    expect(() => Reflect.apply(APromise.reject, APromise, [`nope`])).toThrow(
      InvalidRejectionError
    )
  })

  it(`should reject with InvalidRejectionError when an executor rejects with a non-error`, () => {
    const promise = new APromise<number>((_resolve, reject) => {
      Reflect.apply(reject, undefined, [`nope`])
    })

    const reason = promise.reason()
    expect(reason).toBeInstanceOf(InvalidRejectionError)
    expect(reason?.message).toBe(`A promise was rejected with a non-error: nope`)
  })
})

// ============================================================================
// then()
// ============================================================================

describe(`APromise then`, () => {
  it(`should call handlers asynchronously in registration order`, async () => {
    const promise = APromise.resolve(`x`)
    const seen: Array<string> = []

    promise.then((value) => seen.push(`first:${value}`))
    promise.then((value) => seen.push(`second:${value}`))
    expect(seen).toEqual([])

    await flush()
    expect(seen).toEqual([`first:x`, `second:x`])
  })

  it(`should notify handlers registered while pending in order`, async () => {
    const source = deferred<number>()
    const seen: Array<number> = []

    for (let index = 0; index < 3; index++) {
      source.promise.then((value) => seen.push(value + index))
    }
    source.resolve(10)

    await flush()
    expect(seen).toEqual([10, 11, 12])
  })

  it(`should keep registration order when a follower hands over its handlers`, async () => {
    const outer = deferred<number>()
    const inner = deferred<number>()
    const seen: Array<string> = []

    outer.promise.then((value) => seen.push(`outer-1:${value}`))
    inner.promise.then((value) => seen.push(`inner-1:${value}`))
    outer.promise.then((value) => seen.push(`outer-2:${value}`))
    outer.resolve(inner.promise)
    inner.promise.then((value) => seen.push(`inner-2:${value}`))
    inner.resolve(3)

    await flush()
    expect(seen).toEqual([`inner-1:3`, `outer-1:3`, `outer-2:3`, `inner-2:3`])
  })

  it(`should resolve the next promise with the handler result`, async () => {
    const next = APromise.resolve(2).then((value) => value * 3)

    expect(next.isPending).toBe(true)
    expect(await next).toBe(6)
  })

  it(`should chain a promise returned by a handler`, async () => {
    const next = APromise.resolve(1).then((value) => APromise.resolve(value + 1))
    expect(await next).toBe(2)
  })

  it(`should chain a native promise returned by a handler`, async () => {
    const next = APromise.resolve(1).then((value) => Promise.resolve(value + 10))
    expect(await next).toBe(11)
  })

  it(`should reject the next promise when a handler throws`, async () => {
    const error = new Error(`boom`)
    const next = APromise.resolve(1).then(() => {
      throw error
    })

    await flush()
    expect(next.reason()).toBe(error)
  })

  it(`should wrap a non-error thrown by a handler`, async () => {
    const next = APromise.resolve(1).then(() => {
      throw `plain`
    })

    await flush()
    const reason = next.reason()
    expect(reason).toBeInstanceOf(InvalidRejectionError)
    expect(reason instanceof InvalidRejectionError && reason.reason).toBe(`plain`)
  })

  it(`should pass values and rejections through missing handlers`, async () => {
    const fulfilled = APromise.resolve(4).then(undefined, () => 0)
    const rejected = APromise.reject<number>(new Error(`boom`))
      .then((value) => value + 1)
      .catch((error) => error.message)

    expect(await fulfilled).toBe(4)
    expect(await rejected).toBe(`boom`)
  })

  it(`should fulfill the next promise with the rejection handler result`, async () => {
    const next = APromise.reject(new Error(`boom`)).catch(() => `recovered`)
    expect(await next).toBe(`recovered`)
  })

  it(`should settle a long chain of handlers`, async () => {
    let promise = APromise.resolve(0)
    for (let index = 0; index < 10_000; index++) {
      promise = promise.then((value) => value + 1)
    }

    expect(await promise).toBe(10_000)
  })

  it(`should settle a long chain of pass-through promises`, async () => {
    let promise = APromise.resolve(0)
    for (let index = 0; index < 10_000; index++) {
      promise = promise.then()
    }

    expect(await promise).toBe(0)
  })

  it(`should deliver on the dispatcher the scheduler runs on`, () => {
    APromise.scheduler = new Scheduler({
      dispatcher: new ImmediateDispatcher(),
    })
    const seen: Array<number> = []

    APromise.resolve(1).then((value) => seen.push(value))

    expect(seen).toEqual([1])
  })
})

// ============================================================================
// Context exit failures
// ============================================================================

describe(`APromise context exit failures`, () => {
  it(`should reject the dependent when work queued by a handler throws on exit`, () => {
    APromise.scheduler = new Scheduler({
      dispatcher: new ImmediateDispatcher(),
    })
    const source = deferred<number>()
    const error = new Error(`exit failed`)

    const first = source.promise.then((value) => {
      Context.current()?.onExit(() => {
        throw error
      })
      return value
    })
    const second = source.promise.then((value) => value + 1)

    expect(() => source.resolve(1)).not.toThrow()
    expect(first.reason()).toBe(error)
    expect(second.value()).toBe(2)
  })

  it(`should reject the promise when work queued by the executor throws on exit`, () => {
    const error = new Error(`exit failed`)
    const create = (): APromise<number> =>
      new APromise<number>(() => {
        Context.current()?.onExit(() => {
          throw error
        })
      })

    expect(create).not.toThrow()
    expect(create().reason()).toBe(error)
  })

  it(`should keep the executor's resolution when exit work throws afterwards`, () => {
    const promise = new APromise<number>((resolve) => {
      Context.current()?.onExit(() => {
        throw new Error(`ignored`)
      })
      resolve(4)
    })

    expect(promise.value()).toBe(4)
  })
})

// ============================================================================
// done()
// ============================================================================

describe(`APromise done`, () => {
  it(`should call the fulfillment handler`, async () => {
    const onFulfilled = vi.fn()
    APromise.resolve(`v`).done(onFulfilled)

    await flush()
    expect(onFulfilled).toHaveBeenCalledWith(`v`)
  })

  it(`should send an unhandled rejection to the fatal error sink`, async () => {
    const onFatalError = vi.fn()
    APromise.scheduler = new Scheduler({ onFatalError })
    const error = new Error(`lost`)

    APromise.reject(error).done()

    await flush()
    expect(onFatalError).toHaveBeenCalledWith(error)
  })

  it(`should not report a rejection the handler deals with`, async () => {
    const onFatalError = vi.fn()
    const onRejected = vi.fn()
    APromise.scheduler = new Scheduler({ onFatalError })
    const error = new Error(`handled`)

    APromise.reject(error).done(undefined, onRejected)

    await flush()
    expect(onRejected).toHaveBeenCalledWith(error)
    expect(onFatalError).not.toHaveBeenCalled()
  })

  it(`should report an error thrown by a handler`, async () => {
    const onFatalError = vi.fn()
    APromise.scheduler = new Scheduler({ onFatalError })
    const error = new Error(`handler failed`)

    APromise.resolve(1).done(() => {
      throw error
    })

    await flush()
    expect(onFatalError).toHaveBeenCalledWith(error)
  })

  it(`should report a later rejection of a promise the handler returned`, async () => {
    const onFatalError = vi.fn()
    APromise.scheduler = new Scheduler({ onFatalError })
    const inner = deferred<number>()
    const error = new Error(`inner failed`)

    APromise.resolve(1).done(() => inner.promise)
    await flush()
    expect(onFatalError).not.toHaveBeenCalled()

    inner.reject(error)
    await flush()
    expect(onFatalError).toHaveBeenCalledWith(error)
  })
})

// ============================================================================
// Unhandled rejections
// ============================================================================

describe(`APromise unhandled rejections`, () => {
  it(`should report a rejection nobody subscribes to`, async () => {
    const onUnhandledRejection = vi.fn()
    APromise.scheduler = new Scheduler({ onUnhandledRejection })
    const error = new Error(`unhandled`)

    APromise.reject(error)

    await flush()
    expect(onUnhandledRejection).toHaveBeenCalledWith(error)
  })

  it(`should not report a rejection handled in the same tick`, async () => {
    const onUnhandledRejection = vi.fn()
    APromise.scheduler = new Scheduler({ onUnhandledRejection })

    APromise.reject(new Error(`handled`)).catch(() => `ok`)

    await flush()
    expect(onUnhandledRejection).not.toHaveBeenCalled()
  })
})

// ============================================================================
// Handler collections
// ============================================================================

describe(`APromise handler collections`, () => {
  it(`should accept every handler form in thenAll()`, async () => {
    const results = APromise.resolve(2).thenAll([
      (value) => value * 2,
      [(value) => value + 1, () => 0],
      { success: (value) => `${value}!` },
    ])

    await flush()
    expect(results.map((result) => result.value())).toEqual([4, 3, `2!`])
  })

  it(`should use the rejection handlers in thenAll()`, async () => {
    const results = APromise.reject<number>(new Error(`boom`)).thenAll([
      { failure: (error) => error.message },
      [null, (error) => `pair:${error.message}`],
    ])

    await flush()
    expect(results.map((result) => result.value())).toEqual([
      `boom`,
      `pair:boom`,
    ])
  })

  it(`should return no promises for no handlers`, () => {
    expect(APromise.resolve(1).thenAll()).toEqual([])
  })

  it(`should call every handler in doneAll()`, async () => {
    const first = vi.fn()
    const second = vi.fn()

    APromise.resolve(`v`).doneAll([first, { success: second }])

    await flush()
    expect(first).toHaveBeenCalledWith(`v`)
    expect(second).toHaveBeenCalledWith(`v`)
  })
})

// ============================================================================
// Interop
// ============================================================================

describe(`APromise interop`, () => {
  it(`should be awaitable`, async () => {
    expect(await APromise.resolve(`awaited`)).toBe(`awaited`)
    await expect(APromise.reject(new Error(`bad`)).toNative()).rejects.toThrow(
      `bad`
    )
  })

  it(`should expose a single native promise`, async () => {
    const promise = APromise.resolve(3)
    const native = promise.toNative()

    expect(native).toBeInstanceOf(Promise)
    expect(promise.toNative()).toBe(native)
    expect(await native).toBe(3)
  })

  it(`should run a safe() function inside a fresh context`, () => {
    const wrapped = APromise.safe((a: number, b: number) => [
      Context.current() !== undefined,
      a + b,
    ])

    expect(wrapped(1, 2)).toEqual([true, 3])
    expect(Context.current()).toBeUndefined()
  })
})

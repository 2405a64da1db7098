/**
 * Capability probing for foreign future-like values.
 *
 * Each shape a value can be adopted through is one matcher. Matchers are
 * tried in priority order and the first match wins; instances of APromise
 * itself are checked by the caller before any matcher runs.
 */

/**
 * Resolve/reject pair handed to a foreign `done` or `then` method.
 */
export type SettleCallback = (value: unknown) => void

export type ThenableMethod = (
  onFulfilled: SettleCallback,
  onRejected: SettleCallback
) => unknown

export type Coroutine = Generator<unknown, unknown, unknown>

export type ThenableMatch =
  | { kind: `future`; future: Promise<unknown> }
  | { kind: `done`; target: object; method: ThenableMethod }
  | { kind: `then`; target: object; method: ThenableMethod }
  | { kind: `coroutine`; coroutine: Coroutine }

export type ThenableKind = ThenableMatch[`kind`]

export interface ThenableMatcher {
  readonly kind: ThenableKind
  match(value: object): ThenableMatch | undefined
}

function isCallable(value: unknown): value is ThenableMethod {
  return typeof value === `function`
}

const futureMatcher: ThenableMatcher = {
  kind: `future`,
  match(value) {
    return value instanceof Promise ? { kind: `future`, future: value } : undefined
  },
}

const doneMatcher: ThenableMatcher = {
  kind: `done`,
  match(value) {
    const method: unknown = Reflect.get(value, `done`)
    return isCallable(method) ? { kind: `done`, target: value, method } : undefined
  },
}

const thenMatcher: ThenableMatcher = {
  kind: `then`,
  match(value) {
    const method: unknown = Reflect.get(value, `then`)
    return isCallable(method) ? { kind: `then`, target: value, method } : undefined
  },
}

function isCoroutine(value: object): value is Coroutine {
  return (
    Object.prototype.toString.call(value) === `[object Generator]` &&
    isCallable(Reflect.get(value, `next`)) &&
    isCallable(Reflect.get(value, `throw`))
  )
}

const coroutineMatcher: ThenableMatcher = {
  kind: `coroutine`,
  match(value) {
    return isCoroutine(value) ? { kind: `coroutine`, coroutine: value } : undefined
  },
}

/**
 * Matchers in the order they are tried.
 */
export const THENABLE_MATCHERS: ReadonlyArray<ThenableMatcher> = [
  futureMatcher,
  doneMatcher,
  thenMatcher,
  coroutineMatcher,
]

/**
 * Find the first shape `value` can be adopted through.
 *
 * Reading a `done` or `then` property may run a getter; whatever it throws
 * propagates to the caller.
 */
export function matchThenable(value: unknown): ThenableMatch | undefined {
  if ((typeof value !== `object` && typeof value !== `function`) || value === null) {
    return undefined
  }
  for (const matcher of THENABLE_MATCHERS) {
    const match = matcher.match(value)
    if (match) {
      return match
    }
  }
  return undefined
}

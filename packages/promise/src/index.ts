/**
 * @aplus/promise
 *
 * Promises/A+ promises with chain collapsing, a trampoline scheduler and
 * adoption of foreign future-like values.
 *
 * @packageDocumentation
 */

// Main class
export { APromise } from "./promise"

// Combinators
export { all, forDict } from "./combinators"

// Building blocks
export { CallbackStore, MAX_SUBSCRIBERS } from "./callback-store"
export { CoroutineRunner } from "./coroutine-runner"
export { CountdownLatch } from "./latch"
export { attempt } from "./outcome"
export { THENABLE_MATCHERS, matchThenable } from "./thenable"

// Types
export type {
  Executor,
  FulfillHandler,
  GetOptions,
  HandlerPair,
  HandlerSpec,
  PromiseState,
  RejectHandler,
  WaitOptions,
} from "./promise"
export type { CoroutineRunnerOptions } from "./coroutine-runner"
export type { Failed, Ok, Outcome } from "./outcome"
export type {
  Coroutine,
  ThenableKind,
  ThenableMatch,
  ThenableMatcher,
} from "./thenable"

// Errors
export {
  InvalidRejectionError,
  NotSettledError,
  SelfResolutionError,
} from "./error"

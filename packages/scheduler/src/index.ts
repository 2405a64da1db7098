/**
 * @aplus/scheduler
 *
 * Trampoline scheduler and diagnostic context used by @aplus/promise.
 *
 * @packageDocumentation
 */

// Scheduler
export { Scheduler } from "./scheduler"

// Dispatchers
export {
  ImmediateDispatcher,
  MacrotaskDispatcher,
  MicrotaskDispatcher,
} from "./dispatcher"

// Context
export { Context } from "./context"

// Types
export type { SchedulerOptions, Settleable, Task } from "./scheduler"
export type { Dispatcher } from "./dispatcher"

export { Lockstep } from './lockstep.js'
export { LockstepError, DoubleWaitError, EmitTimeoutError, WaitTimeoutError } from './errors.js'
export { ThrowingFailureReporter, ConsoleFailureReporter, testContextReporter } from './reporters.js'
export type { FailureReporter, LogSink } from './reporters.js'
export { AsyncLock, AsyncCondition, runWithLock } from './lock_manager.js'
export { DeadlineTimer, MAX_TIMER_DELAY_MS, deadlineAfter, monotonicNow } from './timing.js'
export { messageList } from './logging.js'
export { DEFAULT_TIMEOUT, LockstepOptionsSchema, MessageNameSchema, TimeoutSecondsSchema } from './types.js'
export type { LockstepOptions } from './types.js'

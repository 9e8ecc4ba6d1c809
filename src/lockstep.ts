import { v7 as uuidv7 } from 'uuid'

import { DoubleWaitError, EmitTimeoutError, WaitTimeoutError } from './errors.js'
import { AsyncCondition, AsyncLock } from './lock_manager.js'
import { formatTraceLine, messageList } from './logging.js'
import { ConsoleFailureReporter, type FailureReporter } from './reporters.js'
import { DeadlineTimer, deadlineAfter } from './timing.js'
import { LockstepOptionsSchema, MessageNameSchema, TimeoutSecondsSchema, type LockstepOptions } from './types.js'

/**
 * Rendezvous registry for ordering steps across concurrent test tasks.
 *
 * `emit(m)` resolves once a `wait()` that declared `m` has been matched by it,
 * and `wait(...ms)` resolves once every name it declared has been emitted.
 *
 *   await ls.wait('x', 'y') // x and y may be emitted in either order
 *
 *   await ls.wait('x')
 *   await ls.wait('y')      // x must be emitted before y
 *
 * Failures (timeouts, double waits) go to the FailureReporter, whose fatal()
 * never returns; with the default reporters the pending promise rejects.
 */
export class Lockstep {
  reporter: FailureReporter

  // configuration options
  timeout: number // seconds, applied to each emit()/wait() call from its start
  verbose: boolean

  // shared runtime state, only touched while holding `lock`
  private pending: Set<string> // names declared by an unresolved wait() and not yet emitted
  lock: AsyncLock
  condition: AsyncCondition

  constructor(reporter: FailureReporter = new ConsoleFailureReporter(), options: LockstepOptions = {}) {
    const parsed = LockstepOptionsSchema.parse(options)

    this.reporter = reporter
    this.timeout = parsed.timeout
    this.verbose = parsed.verbose

    this.pending = new Set()
    this.lock = new AsyncLock(1)
    this.condition = new AsyncCondition()
  }

  setTimeout(timeout_seconds: number): void {
    this.timeout = TimeoutSecondsSchema.parse(timeout_seconds)
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose
  }

  // Sorted snapshot of the names currently awaited but not yet emitted
  pendingMessages(): string[] {
    return Array.from(this.pending).sort()
  }

  async emit(message: string): Promise<void> {
    const name = MessageNameSchema.parse(message)
    const call_id = uuidv7()
    this.reporter.helper?.()
    this.logf(call_id, `Emitting ${name}`)

    await this.lock.acquire()
    try {
      const timeout_seconds = this.timeout
      const deadline = deadlineAfter(timeout_seconds)
      for (;;) {
        if (this.pending.has(name)) {
          this.logf(call_id, `Emitted ${name}`)
          this.pending.delete(name)
          this.condition.broadcast()
          return
        }

        if (!(await this.waitWithLock(deadline))) {
          this.logf(call_id, `Timed out after ${timeout_seconds}s`)
          this.reporter.fatal(new EmitTimeoutError(name, timeout_seconds))
        }
      }
    } finally {
      this.lock.release()
    }
  }

  async wait(...messages: string[]): Promise<void> {
    const names = messages.map((message) => MessageNameSchema.parse(message))
    const call_id = uuidv7()
    this.reporter.helper?.()
    this.logf(call_id, `Waiting for ${messageList(names)}`)

    const outstanding = new Set<string>()

    await this.lock.acquire()
    try {
      // all names are checked before any is registered, so a double wait leaves nothing behind
      for (const name of names) {
        if (this.pending.has(name) || outstanding.has(name)) {
          this.reporter.fatal(new DoubleWaitError(name))
        }
        outstanding.add(name)
      }
      for (const name of outstanding) {
        this.pending.add(name)
      }
      this.condition.broadcast()

      const timeout_seconds = this.timeout
      const deadline = deadlineAfter(timeout_seconds)
      for (;;) {
        for (const name of outstanding) {
          if (!this.pending.has(name)) {
            this.logf(call_id, `Wait satisfied for ${name}`)
            outstanding.delete(name)
            this.condition.broadcast()
          }
        }

        if (outstanding.size === 0) {
          return
        }

        if (!(await this.waitWithLock(deadline))) {
          this.logf(call_id, `Timed out after ${timeout_seconds}s`)
          this.reporter.fatal(new WaitTimeoutError(outstanding, timeout_seconds))
        }
      }
    } finally {
      this.lock.release()
    }
  }

  // Blocks on the condition until the next broadcast or the deadline, whichever
  // comes first. Must be called holding `lock`; returns holding it again.
  // Returns false if the deadline fired.
  private async waitWithLock(deadline: number): Promise<boolean> {
    const timer = new DeadlineTimer(deadline, () => {
      this.condition.broadcast()
    })
    try {
      await this.condition.wait(this.lock)
    } finally {
      timer.clear()
    }
    return !timer.timed_out
  }

  private logf(call_id: string, text: string): void {
    if (this.verbose) {
      this.reporter.log(formatTraceLine(call_id, text))
    }
  }
}

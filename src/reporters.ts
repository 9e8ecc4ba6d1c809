import type { TestContext } from 'node:test'

import type { LockstepError } from './errors.js'

export interface FailureReporter {
  /** Report a fatal failure. Must not return: throw, or otherwise unwind the calling task. */
  fatal(error: LockstepError): never

  /** Sink for verbose trace lines. */
  log(message: string): void

  /** Marks the current frame as a helper for failure attribution. Optional and purely cosmetic. */
  helper?(): void
}

export type LogSink = (message: string) => void

// Fails by throwing, which rejects the pending emit()/wait() promise
export class ThrowingFailureReporter implements FailureReporter {
  private sink: LogSink | null

  constructor(sink: LogSink | null = null) {
    this.sink = sink
  }

  fatal(error: LockstepError): never {
    throw error
  }

  log(message: string): void {
    this.sink?.(message)
  }
}

export class ConsoleFailureReporter extends ThrowingFailureReporter {
  constructor() {
    super((message) => {
      console.log(`[lockstep] ${message}`)
    })
  }
}

// Routes traces to the running node:test test's diagnostics; the thrown error fails whichever test awaits the call
export const testContextReporter = (t: TestContext): FailureReporter => ({
  fatal(error: LockstepError): never {
    throw error
  },
  log(message: string): void {
    t.diagnostic(message)
  },
})

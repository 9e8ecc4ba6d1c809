import { messageList } from './logging.js'

// Base class for every failure the registry hands to its FailureReporter
export class LockstepError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LockstepError'
  }
}

// A wait() declared a name that an unresolved wait() (possibly the same call) already declared
export class DoubleWaitError extends LockstepError {
  message_name: string

  constructor(message_name: string) {
    super(`Double wait for ${message_name}`)
    this.name = 'DoubleWaitError'
    this.message_name = message_name
  }
}

// An emit() was never claimed by a matching wait() before its deadline
export class EmitTimeoutError extends LockstepError {
  message_name: string
  timeout_seconds: number

  constructor(message_name: string, timeout_seconds: number) {
    super(`Timeout emitting ${message_name}`)
    this.name = 'EmitTimeoutError'
    this.message_name = message_name
    this.timeout_seconds = timeout_seconds
  }
}

// A wait() still had unmatched names at its deadline; outstanding lists all of them, sorted
export class WaitTimeoutError extends LockstepError {
  outstanding: string[]
  timeout_seconds: number

  constructor(outstanding: Iterable<string>, timeout_seconds: number) {
    const names = Array.from(outstanding).sort()
    super(`Timeout waiting for ${messageList(names)}`)
    this.name = 'WaitTimeoutError'
    this.outstanding = names
    this.timeout_seconds = timeout_seconds
  }
}

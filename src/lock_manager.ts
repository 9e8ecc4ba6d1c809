// ─── AsyncLock ───────────────────────────────────────────────────────────────

// Counting lock with FIFO hand-off: release() passes the permit straight to the
// oldest queued waiter, so a fresh acquire() in the same tick cannot slip in.
export class AsyncLock {
  size: number
  in_use: number
  waiters: Array<() => void>

  constructor(size: number = 1) {
    this.size = size
    this.in_use = 0
    this.waiters = []
  }

  async acquire(): Promise<void> {
    if (this.in_use < this.size) {
      this.in_use += 1
      return
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve)
    })
  }

  release(): void {
    const next = this.waiters.shift()
    if (next) {
      next()
      return
    }
    this.in_use = Math.max(0, this.in_use - 1)
  }
}

export const runWithLock = async <T>(lock: AsyncLock, fn: () => Promise<T>): Promise<T> => {
  await lock.acquire()
  try {
    return await fn()
  } finally {
    lock.release()
  }
}

// ─── AsyncCondition ──────────────────────────────────────────────────────────

// Condition variable over an AsyncLock. There is no targeted signal: every
// broadcast() wakes all current waiters and each one re-checks its own state.
export class AsyncCondition {
  waiters: Array<() => void>

  constructor() {
    this.waiters = []
  }

  // Caller must hold `lock`. It is released while suspended and held again on return.
  async wait(lock: AsyncLock): Promise<void> {
    const woken = new Promise<void>((resolve) => {
      this.waiters.push(resolve)
    })
    lock.release()
    await woken
    await lock.acquire()
  }

  broadcast(): void {
    const waiters = this.waiters.splice(0)
    for (const resolve of waiters) {
      resolve()
    }
  }
}

// setTimeout clamps longer delays to 1ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647

export const monotonicNow = (): number => performance.now()

export const deadlineAfter = (timeout_seconds: number): number => monotonicNow() + timeout_seconds * 1000

// One-shot timer bound to an absolute deadline (monotonicNow() milliseconds).
// Deadlines past MAX_TIMER_DELAY_MS are reached in several hops.
// Firing sets timed_out before running on_fire, so anything woken by on_fire
// already observes the flag.
export class DeadlineTimer {
  deadline: number
  timed_out: boolean
  private on_fire: () => void
  private timer: ReturnType<typeof setTimeout> | null

  constructor(deadline: number, on_fire: () => void) {
    this.deadline = deadline
    this.timed_out = false
    this.on_fire = on_fire
    this.timer = null
    this.arm()
  }

  get active(): boolean {
    return this.timer !== null
  }

  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }

  private arm(): void {
    const remaining_ms = Math.max(0, this.deadline - monotonicNow())
    const is_final_hop = remaining_ms <= MAX_TIMER_DELAY_MS
    this.timer = setTimeout(
      () => {
        if (!is_final_hop) {
          this.arm()
          return
        }
        this.timer = null
        this.timed_out = true
        this.on_fire()
      },
      Math.min(remaining_ms, MAX_TIMER_DELAY_MS)
    )
  }
}

import type pino from "pino"
import { formatCountdown } from "../lib/time"

export type RefreshState = "idle" | "fetching" | "rendered" | "errored"
export type RefreshTrigger = "start" | "timer" | "manual"

type TimerHandle = ReturnType<typeof setTimeout>
type IntervalHandle = ReturnType<typeof setInterval>

export interface RefreshSchedulerOptions<T> {
  intervalMs: number
  countdownTickMs: number
  load: () => Promise<T>
  onSuccess: (result: T, completedAt: number) => void
  onError: (error: unknown) => void
  onStateChange?: (state: RefreshState) => void
  onCountdown?: (label: string) => void
  logger: pino.Logger
  now?: () => number
  setTimeoutImpl?: typeof setTimeout
  clearTimeoutImpl?: typeof clearTimeout
  setIntervalImpl?: typeof setInterval
  clearIntervalImpl?: typeof clearInterval
}

/**
 * Drives the fetch cycle on a fixed cadence. Outcomes are applied in issue
 * order: a cycle that settles after a newer cycle has already applied its
 * outcome is dropped.
 */
export class RefreshScheduler<T> {
  private readonly now: () => number
  private readonly setTimeoutImpl: typeof setTimeout
  private readonly clearTimeoutImpl: typeof clearTimeout
  private readonly setIntervalImpl: typeof setInterval
  private readonly clearIntervalImpl: typeof clearInterval

  private running = false
  private issued = 0
  private applied = 0
  private currentState: RefreshState = "idle"
  private tickHandle: TimerHandle | null = null
  private countdownHandle: IntervalHandle | null = null
  private nextAt: number | null = null
  private completedAt: number | null = null

  constructor(private readonly options: RefreshSchedulerOptions<T>) {
    this.now = options.now ?? (() => Date.now())
    this.setTimeoutImpl = options.setTimeoutImpl ?? setTimeout
    this.clearTimeoutImpl = options.clearTimeoutImpl ?? clearTimeout
    this.setIntervalImpl = options.setIntervalImpl ?? setInterval
    this.clearIntervalImpl = options.clearIntervalImpl ?? clearInterval
  }

  get state(): RefreshState {
    return this.currentState
  }

  get isRunning(): boolean {
    return this.running
  }

  get nextRefreshAt(): number | null {
    return this.nextAt
  }

  get lastCompletedAt(): number | null {
    return this.completedAt
  }

  countdownLabel(): string {
    return formatCountdown(this.nextAt, this.now())
  }

  start(): Promise<void> {
    if (this.running) {
      return Promise.resolve()
    }

    this.running = true
    this.startCountdown()
    return this.runCycle("start")
  }

  stop(): void {
    if (!this.running) {
      return
    }

    this.running = false
    this.issued += 1
    this.applied = this.issued
    if (this.tickHandle !== null) {
      this.clearTimeoutImpl(this.tickHandle)
      this.tickHandle = null
    }
    if (this.countdownHandle !== null) {
      this.clearIntervalImpl(this.countdownHandle)
      this.countdownHandle = null
    }
    this.nextAt = null
    this.setState("idle")
    this.options.logger.info("refresh scheduler stopped")
  }

  /** Skips the remaining wait: re-arms the countdown and fetches immediately. */
  refreshNow(): Promise<void> {
    if (!this.running) {
      return this.start()
    }
    return this.runCycle("manual")
  }

  private async runCycle(trigger: RefreshTrigger): Promise<void> {
    this.issued += 1
    const sequence = this.issued
    const startedAt = this.now()

    this.arm()
    this.setState("fetching")
    this.options.logger.debug({ sequence, trigger }, "refresh started")

    try {
      let result: T
      try {
        result = await this.options.load()
      } catch (error) {
        if (!this.claim(sequence)) {
          this.options.logger.debug({ sequence, applied: this.applied, error }, "discarding superseded refresh failure")
          return
        }
        this.fail(sequence, trigger, error)
        return
      }

      if (!this.claim(sequence)) {
        this.options.logger.debug({ sequence, applied: this.applied }, "discarding superseded refresh result")
        return
      }

      const completedAt = this.now()
      this.completedAt = completedAt
      try {
        this.options.onSuccess(result, completedAt)
      } catch (error) {
        this.fail(sequence, trigger, error)
        return
      }

      this.settle(sequence, "rendered")
      this.options.logger.info({ sequence, trigger, durationMs: completedAt - startedAt }, "refresh completed")
    } finally {
      if (this.running && sequence === this.issued) {
        this.arm()
      }
    }
  }

  private fail(sequence: number, trigger: RefreshTrigger, error: unknown): void {
    this.options.logger.error({ sequence, trigger, error }, "refresh failed")
    this.options.onError(error)
    this.settle(sequence, "errored")
  }

  /** A newer cycle still in flight keeps the state at `fetching`. */
  private settle(sequence: number, next: RefreshState): void {
    if (sequence === this.issued) {
      this.setState(next)
    }
  }

  private claim(sequence: number): boolean {
    if (!this.running || sequence <= this.applied) {
      return false
    }
    this.applied = sequence
    return true
  }

  private arm(): void {
    if (this.tickHandle !== null) {
      this.clearTimeoutImpl(this.tickHandle)
    }

    this.nextAt = this.now() + this.options.intervalMs
    this.tickHandle = this.setTimeoutImpl(() => {
      this.tickHandle = null
      this.runCycle("timer").catch((error: unknown) => {
        this.options.logger.error({ error }, "refresh cycle threw outside its handler")
      })
    }, this.options.intervalMs)
    this.emitCountdown()
  }

  private startCountdown(): void {
    if (this.countdownHandle !== null) {
      this.clearIntervalImpl(this.countdownHandle)
    }

    this.countdownHandle = this.setIntervalImpl(() => this.emitCountdown(), this.options.countdownTickMs)
    this.emitCountdown()
  }

  private emitCountdown(): void {
    this.options.onCountdown?.(this.countdownLabel())
  }

  private setState(next: RefreshState): void {
    if (this.currentState === next) {
      return
    }
    this.currentState = next
    this.options.onStateChange?.(next)
  }
}

import { systemClock, type Clock, type TimerHandle } from './clock.js'

export type InvalidatorState = 'idle' | 'pending' | 'firing'

export interface DebouncedInvalidatorOptions {
  debounceMs: number
  /** Runs once per collapsed burst */
  onFire: () => void
  clock?: Clock
}

/**
 * Collapses bursts of raw change signals into one refresh.
 *
 * idle --signal--> pending --quiet for debounceMs--> firing --> idle
 *
 * A signal while pending restarts the window. A signal raised from inside
 * `onFire` opens a new window once firing has finished.
 */
export class DebouncedInvalidator {
  private currentState: InvalidatorState = 'idle'
  private timer: TimerHandle | null = null
  private signalledWhileFiring = false
  private fired = 0
  private disposed = false
  private debounceMs: number
  private onFire: () => void
  private clock: Clock

  constructor(options: DebouncedInvalidatorOptions) {
    this.debounceMs = options.debounceMs
    this.onFire = options.onFire
    this.clock = options.clock ?? systemClock
  }

  get state(): InvalidatorState {
    return this.currentState
  }

  /** Number of completed fire cycles */
  get fireCount(): number {
    return this.fired
  }

  signal(): void {
    if (this.disposed) return

    if (this.currentState === 'firing') {
      this.signalledWhileFiring = true
      return
    }

    this.currentState = 'pending'
    this.restartTimer()
  }

  /** Fire now if a window is open */
  flush(): void {
    if (this.currentState !== 'pending') return
    this.clearTimer()
    this.fire()
  }

  dispose(): void {
    this.disposed = true
    this.clearTimer()
    this.currentState = 'idle'
  }

  private restartTimer(): void {
    this.clearTimer()
    this.timer = this.clock.setTimeout(() => {
      this.timer = null
      this.fire()
    }, this.debounceMs)
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      this.clock.clearTimeout(this.timer)
      this.timer = null
    }
  }

  private fire(): void {
    this.currentState = 'firing'
    try {
      this.onFire()
    } catch (err) {
      console.error('[DebouncedInvalidator] Refresh failed:', err)
    } finally {
      this.fired += 1
      this.currentState = 'idle'
    }

    if (this.signalledWhileFiring) {
      this.signalledWhileFiring = false
      this.signal()
    }
  }
}

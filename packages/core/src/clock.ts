export type TimerHandle = ReturnType<typeof setTimeout>

/**
 * Time source for debounce windows, timeouts and progress throttling.
 */
export interface Clock {
  now(): number
  setTimeout(callback: () => void, ms: number): TimerHandle
  clearTimeout(handle: TimerHandle): void
}

// Globals are looked up on every call so fake timers installed after import still apply
export const systemClock: Clock = {
  now: () => Date.now(),
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle),
}

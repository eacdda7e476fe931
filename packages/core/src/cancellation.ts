export type CancelReason = 'superseded' | 'timeout' | 'disposed'

/**
 * Cooperative cancellation for one job.
 *
 * Raising the flag aborts {@link signal}; backends poll it between units of
 * work. A call already inside the backend may still run to completion, in
 * which case its result is dropped by the worker.
 */
export class CancelFlag {
  private controller = new AbortController()
  private raisedReason: CancelReason | null = null

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get isRaised(): boolean {
    return this.raisedReason !== null
  }

  /** First reason the flag was raised with */
  get reason(): CancelReason | null {
    return this.raisedReason
  }

  raise(reason: CancelReason): void {
    if (this.raisedReason !== null) return
    this.raisedReason = reason
    const error = new Error(`Job ${reason}`)
    error.name = 'AbortError'
    this.controller.abort(error)
  }
}

/**
 * Throw the signal's abort reason when it has been raised.
 * Backends call this at their cooperative checkpoints.
 */
export function throwIfAborted(signal: AbortSignal): void {
  if (!signal.aborted) return
  if (signal.reason instanceof Error) throw signal.reason
  const error = new Error('Operation was aborted')
  error.name = 'AbortError'
  throw error
}

import type { ErrorKind } from './errors.js'
import type { JobKind } from './job-kind.js'

export type NotificationEvent =
  | { type: 'data-ready'; kind: JobKind }
  | { type: 'progress'; kind: JobKind; fraction: number }
  | { type: 'failed'; kind: JobKind; error: ErrorKind; message: string }

interface Waiter {
  resolve: () => void
}

/**
 * Single-consumer queue between the engine and the interactive loop.
 *
 * Events carry no payload: consumers re-read the cache on `data-ready`,
 * so repeated `data-ready` and `progress` events for one kind
 * collapse while undelivered. `failed` events are always kept.
 */
export class NotificationChannel {
  private queue: NotificationEvent[] = []
  private waiters: Waiter[] = []
  private closed = false

  push(event: NotificationEvent): void {
    if (this.closed) return

    if (event.type === 'data-ready') {
      const duplicate = this.queue.some((queued) => queued.type === 'data-ready' && queued.kind === event.kind)
      if (duplicate) return
    } else if (event.type === 'progress') {
      const index = this.queue.findIndex((queued) => queued.type === 'progress' && queued.kind === event.kind)
      if (index >= 0) {
        this.queue[index] = event
        return
      }
    }

    this.queue.push(event)
    this.wakeWaiters()
  }

  /** Take every pending event, oldest first */
  drain(): NotificationEvent[] {
    const events = this.queue
    this.queue = []
    return events
  }

  get pending(): number {
    return this.queue.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Resolve once at least one event is pending, the channel closes or the
   * signal aborts.
   */
  wait(signal?: AbortSignal): Promise<void> {
    if (this.queue.length > 0 || this.closed || signal?.aborted) {
      return Promise.resolve()
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort)
          resolve()
        },
      }
      const onAbort = () => {
        this.waiters = this.waiters.filter((item) => item !== waiter)
        resolve()
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }

  /**
   * Yield drained batches until the signal aborts, or until the channel is
   * closed and everything queued before closing has been delivered.
   */
  async *stream(signal?: AbortSignal): AsyncGenerator<NotificationEvent[]> {
    while (!signal?.aborted) {
      await this.wait(signal)
      const batch = this.drain()
      if (batch.length > 0) {
        yield batch
      }
      if (this.closed && this.queue.length === 0) break
    }
  }

  /** Stop accepting events and release waiting consumers */
  close(): void {
    this.closed = true
    this.wakeWaiters()
  }

  private wakeWaiters(): void {
    const waiters = this.waiters
    this.waiters = []
    for (const waiter of waiters) {
      waiter.resolve()
    }
  }
}

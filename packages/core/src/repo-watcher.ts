import type { AsyncSubscription, Event, Options } from '@parcel/watcher'
import { realpathSync } from 'node:fs'
import { resolve } from 'node:path'
import { systemClock, type Clock, type TimerHandle } from './clock.js'

/**
 * Resolve symlinks so event paths match the watched root
 * (on macOS /var is a link to /private/var).
 */
function getRealPath(path: string): string {
  try {
    return realpathSync(resolve(path))
  } catch {
    // Path does not exist yet
    return resolve(path)
  }
}

export type WatchEventType = 'create' | 'update' | 'delete'

export interface WatchEvent {
  type: WatchEventType
  path: string
}

export type SubscribeFn = (
  dir: string,
  callback: (err: Error | null, events: Event[]) => unknown,
  options?: Options
) => Promise<AsyncSubscription>

/** Object storage and reflogs are skipped; ref and index writes still signal */
export const DEFAULT_IGNORE = ['node_modules', '.git/objects', '.git/logs', '**/.DS_Store']

export interface RepositoryWatcherOptions {
  /** Called once per event batch and once per polling tick */
  onSignal: (events: WatchEvent[]) => void
  ignore?: string[]
  /** 0 disables polling */
  pollIntervalMs?: number
  clock?: Clock
  /** Defaults to `@parcel/watcher`'s subscribe */
  subscribe?: SubscribeFn
}

/**
 * Repository watcher
 *
 * Watches the working tree and the `.git` directory with a single native
 * subscription and forwards raw change signals. Debouncing is left to the
 * invalidator downstream.
 */
export class RepositoryWatcher {
  private repoDir: string
  private subscription: AsyncSubscription | null = null
  private pollTimer: TimerHandle | null = null
  private initPromise: Promise<void> | null = null
  private started = false
  private ignore: string[]
  private pollIntervalMs: number
  private clock: Clock

  constructor(
    repoDir: string,
    private options: RepositoryWatcherOptions
  ) {
    this.repoDir = getRealPath(repoDir)
    this.ignore = [...DEFAULT_IGNORE, ...(options.ignore ?? [])]
    this.pollIntervalMs = options.pollIntervalMs ?? 0
    this.clock = options.clock ?? systemClock
  }

  get root(): string {
    return this.repoDir
  }

  get isStarted(): boolean {
    return this.started
  }

  async start(): Promise<void> {
    if (this.started) return
    if (this.initPromise) return this.initPromise

    this.initPromise = this.doStart()
    try {
      await this.initPromise
    } finally {
      this.initPromise = null
    }
  }

  private async doStart(): Promise<void> {
    const subscribe = this.options.subscribe ?? (await import('@parcel/watcher')).subscribe

    this.subscription = await subscribe(
      this.repoDir,
      (err, events) => {
        if (err) {
          console.error('[RepositoryWatcher] Error:', err)
          return
        }
        this.handleEvents(events)
      },
      { ignore: this.ignore }
    )

    this.started = true
    this.schedulePoll()
  }

  private handleEvents(events: Event[]): void {
    if (events.length === 0) return
    const watchEvents: WatchEvent[] = events.map((e) => ({ type: e.type, path: e.path }))
    this.emit(watchEvents)
  }

  private emit(events: WatchEvent[]): void {
    try {
      this.options.onSignal(events)
    } catch (err) {
      console.error('[RepositoryWatcher] Signal handler error:', err)
    }
  }

  private schedulePoll(): void {
    if (this.pollIntervalMs <= 0 || !this.started) return
    this.pollTimer = this.clock.setTimeout(() => {
      this.pollTimer = null
      this.emit([])
      this.schedulePoll()
    }, this.pollIntervalMs)
  }

  async close(): Promise<void> {
    this.started = false
    if (this.pollTimer !== null) {
      this.clock.clearTimeout(this.pollTimer)
      this.pollTimer = null
    }

    if (this.subscription) {
      const subscription = this.subscription
      this.subscription = null
      await subscription.unsubscribe()
    }
  }
}

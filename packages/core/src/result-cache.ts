import { EventEmitter } from 'node:events'
import { systemClock, type Clock } from './clock.js'
import type { JobKind, JobResult } from './job-kind.js'

export type CacheEntry = JobResult & {
  readonly fingerprint: string
  readonly generation: number
  readonly completedAt: number
}

export type CacheEntryOf<K extends JobKind> = Extract<CacheEntry, { kind: K }>

function isEntryOf<K extends JobKind>(entry: CacheEntry, kind: K): entry is CacheEntryOf<K> {
  return entry.kind === kind
}

/**
 * Last good result per (kind, parameter fingerprint).
 *
 * - Entries are frozen and replaced whole, so a read during a refresh returns
 *   the previous entry intact.
 * - A commit older than the stored generation is ignored.
 * - No eviction: the key space is bounded by what the UI can show.
 */
export class ResultCache {
  private entries = new Map<string, CacheEntry>()
  /** Fingerprint most recently committed per kind */
  private latestByKind = new Map<JobKind, string>()
  private emitter = new EventEmitter()

  constructor(private clock: Pick<Clock, 'now'> = systemClock) {}

  get<K extends JobKind>(kind: K, fingerprint: string): CacheEntryOf<K> | undefined {
    const entry = this.entries.get(fingerprint)
    if (!entry || !isEntryOf(entry, kind)) return undefined
    return entry
  }

  /** Entry the view for `kind` currently shows, whatever its parameters */
  latest<K extends JobKind>(kind: K): CacheEntryOf<K> | undefined {
    const fingerprint = this.latestByKind.get(kind)
    return fingerprint === undefined ? undefined : this.get(kind, fingerprint)
  }

  has(kind: JobKind): boolean {
    return this.latestByKind.has(kind)
  }

  /**
   * Store a result computed at `generation`.
   * @returns false when a newer entry already holds the key
   */
  commit(result: JobResult, fingerprint: string, generation: number): boolean {
    const existing = this.entries.get(fingerprint)
    if (existing && generation < existing.generation) {
      return false
    }

    const entry: CacheEntry = Object.freeze({
      ...result,
      fingerprint,
      generation,
      completedAt: this.clock.now(),
    })
    this.entries.set(fingerprint, entry)
    this.latestByKind.set(result.kind, fingerprint)
    this.emitter.emit('commit', entry)
    return true
  }

  get size(): number {
    return this.entries.size
  }

  /** Subscribe to successful commits. Returns unsubscribe function. */
  onCommit(listener: (entry: CacheEntry) => void): () => void {
    this.emitter.on('commit', listener)
    return () => {
      this.emitter.off('commit', listener)
    }
  }
}

import type { CredentialsCallback, MutationOp, RepositoryBackend } from './backend/types.js'
import { CancelFlag } from './cancellation.js'
import { systemClock, type Clock } from './clock.js'
import { EngineConfigSchema, type EngineConfig } from './config.js'
import { isSurfacedError, JobError } from './errors.js'
import { GenerationCounter, type GenerationBumpReason } from './generation.js'
import {
  createJobRequest,
  REFRESHABLE_KINDS,
  type JobKind,
  type JobRequest,
  type JobSpecInput,
} from './job-kind.js'
import { ExclusiveLock, Semaphore } from './mutex.js'
import { NotificationChannel } from './notification-channel.js'
import { ResultCache } from './result-cache.js'
import { JobWorker, type JobOutcome } from './worker.js'

export interface QueryEngineOptions {
  backend: RepositoryBackend
  config?: Partial<EngineConfig>
  clock?: Clock
  /** Asked by fetch and push when the remote wants authentication */
  credentials?: CredentialsCallback
}

interface InFlightSlot {
  running: boolean
  startedGeneration: number
  flag: CancelFlag | null
  /** Latest request that arrived while a job was running; replaces older ones */
  pending: JobRequest | null
}

/** Read-only view of a slot */
export interface SlotState {
  running: boolean
  startedGeneration: number
  pending: JobRequest | null
}

/**
 * Asynchronous query engine.
 *
 * Owns the generation counter, the result cache, the per-kind in-flight slots
 * and the notification channel. One instance per repository; pass it by
 * reference to whoever needs it.
 *
 * - At most one job per kind runs at a time; a submission for a busy kind
 *   supersedes the running job (its result is dropped) and runs next.
 * - Results are committed at the generation observed on completion.
 * - Failures keep the previous cache entry and surface as `failed` events,
 *   except cancellation, which stays internal.
 */
export class QueryEngine {
  readonly config: EngineConfig
  readonly generation = new GenerationCounter()
  readonly cache: ResultCache
  readonly notifications = new NotificationChannel()

  private slots = new Map<JobKind, InFlightSlot>()
  /** Most recent submission per kind, re-issued on invalidation */
  private lastRequests = new Map<JobKind, JobRequest>()
  /** Running mutations and their cancel flags */
  private mutations = new Map<CancelFlag, Promise<void>>()
  private idleWaiters: Array<() => void> = []
  private worker: JobWorker
  private disposed = false

  constructor(options: QueryEngineOptions) {
    this.config = EngineConfigSchema.parse(options.config ?? {})
    const clock = options.clock ?? systemClock
    this.cache = new ResultCache(clock)
    this.worker = new JobWorker({
      backend: options.backend,
      lock: new ExclusiveLock(),
      pool: new Semaphore(this.config.maxConcurrentJobs),
      clock,
      networkTimeoutMs: this.config.networkTimeoutMs,
      progressIntervalMs: this.config.progressIntervalMs,
      credentials: options.credentials,
      onProgress: (kind, fraction) => {
        this.notifications.push({ type: 'progress', kind, fraction })
      },
    })
  }

  /**
   * Request fresh data for a view. Fire-and-forget: watch the notification
   * channel and read the cache.
   *
   * Throws a ZodError when the parameters are invalid for the kind.
   */
  submit(input: JobSpecInput): JobRequest {
    const request = createJobRequest(input, this.generation.current)
    if (this.disposed) return request

    this.lastRequests.set(request.kind, request)
    this.dispatch(request)
    return request
  }

  /**
   * Run a mutating operation, then treat the repository as changed.
   * The generation moves whether or not the operation succeeded.
   */
  async mutate(op: MutationOp): Promise<void> {
    if (this.disposed) {
      throw new JobError('cancelled', 'Engine is disposed')
    }

    const flag = new CancelFlag()
    const running = this.worker.mutate(op, flag)
    this.mutations.set(flag, running)
    try {
      await running
    } finally {
      this.mutations.delete(flag)
      if (!this.disposed) this.invalidate('mutation')
    }
  }

  /**
   * Bump the generation once and re-issue every refreshable kind requested so
   * far, with its most recent parameters. A job of such a kind that is still
   * running is superseded, so its pre-change result is never committed.
   * @returns the new generation
   */
  invalidate(reason: GenerationBumpReason = 'manual'): number {
    const generation = this.generation.bump(reason)
    if (this.disposed) return generation

    for (const [kind, last] of this.lastRequests) {
      if (!REFRESHABLE_KINDS.has(kind)) continue
      this.dispatch(Object.freeze({ ...last, requestedAt: generation }))
    }
    return generation
  }

  isRunning(kind: JobKind): boolean {
    return this.slots.get(kind)?.running ?? false
  }

  slotState(kind: JobKind): SlotState | undefined {
    const slot = this.slots.get(kind)
    if (!slot) return undefined
    return { running: slot.running, startedGeneration: slot.startedGeneration, pending: slot.pending }
  }

  get isIdle(): boolean {
    for (const slot of this.slots.values()) {
      if (slot.running) return false
    }
    return true
  }

  /** Resolve once no job is running or pending */
  whenIdle(): Promise<void> {
    if (this.isIdle) return Promise.resolve()
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve)
    })
  }

  /**
   * Cancel running work, drop pending requests and ignore later submissions.
   * Resolves once every job and mutation has settled.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true

    for (const slot of this.slots.values()) {
      slot.pending = null
      slot.flag?.raise('disposed')
    }
    for (const flag of this.mutations.keys()) {
      flag.raise('disposed')
    }
    this.notifications.close()
    await Promise.allSettled([this.whenIdle(), ...this.mutations.values()])
  }

  private dispatch(request: JobRequest): void {
    const slot = this.slotFor(request.kind)
    if (slot.running) {
      slot.pending = request
      slot.flag?.raise('superseded')
      return
    }
    this.start(slot, request)
  }

  private start(slot: InFlightSlot, request: JobRequest): void {
    const flag = new CancelFlag()
    slot.running = true
    slot.flag = flag
    slot.startedGeneration = this.generation.current

    this.worker
      .execute(request, flag)
      .then((outcome) => this.complete(slot, request, outcome))
      .catch((err: unknown) => {
        console.error(`[QueryEngine] Failed to complete ${request.kind}:`, err)
        slot.running = false
        slot.flag = null
        this.resolveIdleWaiters()
      })
  }

  private complete(slot: InFlightSlot, request: JobRequest, outcome: JobOutcome): void {
    slot.running = false
    slot.flag = null

    if (this.disposed) {
      slot.pending = null
    } else if (outcome.ok) {
      const committed = this.cache.commit(outcome.result, request.fingerprint, this.generation.current)
      if (committed) {
        this.notifications.push({ type: 'data-ready', kind: request.kind })
      }
      // Fetch and push move refs
      if (request.kind === 'fetch' || request.kind === 'push') {
        this.invalidate(request.kind)
      }
    } else if (isSurfacedError(outcome.error.kind)) {
      this.notifications.push({
        type: 'failed',
        kind: request.kind,
        error: outcome.error.kind,
        message: outcome.error.message,
      })
    }

    const pending = slot.pending
    slot.pending = null
    if (pending && !this.disposed) {
      this.start(slot, pending)
      return
    }
    this.resolveIdleWaiters()
  }

  private slotFor(kind: JobKind): InFlightSlot {
    let slot = this.slots.get(kind)
    if (!slot) {
      slot = { running: false, startedGeneration: this.generation.current, flag: null, pending: null }
      this.slots.set(kind, slot)
    }
    return slot
  }

  private resolveIdleWaiters(): void {
    if (!this.isIdle) return
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) {
      resolve()
    }
  }
}

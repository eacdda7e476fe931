import type { BackendCallContext, CredentialsCallback, MutationOp, RepositoryBackend } from './backend/types.js'
import type { CancelFlag } from './cancellation.js'
import type { Clock } from './clock.js'
import { GitCommandError, JobError, toJobError } from './errors.js'
import { NETWORK_KINDS, PROGRESS_KINDS, type JobKind, type JobRequest, type JobResult } from './job-kind.js'
import type { ExclusiveLock, Release, Semaphore } from './mutex.js'
import { ProgressThrottle } from './progress.js'

export interface JobWorkerOptions {
  backend: RepositoryBackend
  /** Serializes write-capable backend calls */
  lock: ExclusiveLock
  /** Bounds backend calls running at the same time */
  pool: Semaphore
  clock: Clock
  networkTimeoutMs: number
  progressIntervalMs: number
  credentials?: CredentialsCallback
  onProgress: (kind: JobKind, fraction: number) => void
}

export type JobOutcome = { ok: true; result: JobResult } | { ok: false; error: JobError }

/**
 * Runs one backend call per job and turns whatever happens into a
 * {@link JobOutcome}. Never throws.
 */
export class JobWorker {
  constructor(private options: JobWorkerOptions) {}

  async execute(request: JobRequest, flag: CancelFlag): Promise<JobOutcome> {
    let releasePool: Release | null = null
    let releaseLock: Release | null = null

    try {
      releasePool = await this.options.pool.acquire()
      if (flag.isRaised) return cancelled(request.kind)

      if (NETWORK_KINDS.has(request.kind)) {
        releaseLock = await this.acquireExclusive(request.kind)
        if (flag.isRaised) return cancelled(request.kind)
      }

      const ctx = this.createContext(request.kind, flag)
      const call = this.call(request, ctx)
      if (releaseLock) {
        // The exclusive scope lasts until the call settles, even past a timeout
        const release = releaseLock
        releaseLock = null
        void call.then(release, release)
      }
      const result = NETWORK_KINDS.has(request.kind)
        ? await this.withTimeout(call, flag, request.kind)
        : await call

      // Completed after the flag went up: drop the result
      if (flag.isRaised) return cancelled(request.kind)
      return { ok: true, result }
    } catch (error) {
      return { ok: false, error: this.classify(error, flag) }
    } finally {
      releaseLock?.()
      releasePool?.()
    }
  }

  /**
   * Run a mutating operation inside the exclusive scope.
   * Rejects with a {@link JobError}.
   */
  async mutate(op: MutationOp, flag: CancelFlag): Promise<void> {
    const releasePool = await this.options.pool.acquire()
    let releaseLock: Release | null = null
    try {
      releaseLock = await this.acquireExclusive(op.type)
      await this.options.backend.mutate(op, { signal: flag.signal, onProgress: () => {} })
    } catch (error) {
      throw this.classify(error, flag)
    } finally {
      releaseLock?.()
      releasePool()
    }
  }

  private createContext(kind: JobKind, flag: CancelFlag): BackendCallContext {
    if (!PROGRESS_KINDS.has(kind)) {
      return { signal: flag.signal, onProgress: () => {} }
    }
    const throttle = new ProgressThrottle(this.options.progressIntervalMs, this.options.clock, (fraction) => {
      if (!flag.isRaised) this.options.onProgress(kind, fraction)
    })
    return { signal: flag.signal, onProgress: (fraction) => throttle.report(fraction) }
  }

  private async call(request: JobRequest, ctx: BackendCallContext): Promise<JobResult> {
    const { backend, credentials } = this.options
    switch (request.kind) {
      case 'status':
        return { kind: 'status', payload: await backend.status(ctx) }
      case 'diff':
        return { kind: 'diff', payload: await backend.diff(request.params, ctx) }
      case 'blame':
        return { kind: 'blame', payload: await backend.blame(request.params, ctx) }
      case 'log':
        return { kind: 'log', payload: await backend.log(request.params, ctx) }
      case 'tags':
        return { kind: 'tags', payload: await backend.tags(ctx) }
      case 'branches':
        return { kind: 'branches', payload: await backend.branches(ctx) }
      case 'remotes':
        return { kind: 'remotes', payload: await backend.remotes(ctx) }
      case 'fetch':
        return { kind: 'fetch', payload: await backend.fetch(request.params, credentials, ctx) }
      case 'push':
        return { kind: 'push', payload: await backend.push(request.params, credentials, ctx) }
      case 'stash-list':
        return { kind: 'stash-list', payload: await backend.stashList(ctx) }
      case 'submodules':
        return { kind: 'submodules', payload: await backend.submodules(ctx) }
    }
  }

  private async acquireExclusive(label: string): Promise<Release> {
    const release = this.options.lock.tryAcquire()
    if (release) return release

    console.debug(`[JobWorker] ${label} is waiting for the exclusive scope`)
    return this.options.lock.acquire()
  }

  private withTimeout<T>(call: Promise<T>, flag: CancelFlag, kind: JobKind): Promise<T> {
    const { clock, networkTimeoutMs } = this.options
    return new Promise<T>((resolve, reject) => {
      const timer = clock.setTimeout(() => {
        flag.raise('timeout')
        reject(new JobError('timeout', `${kind} timed out after ${networkTimeoutMs}ms`))
      }, networkTimeoutMs)

      call.then(
        (value) => {
          clock.clearTimeout(timer)
          resolve(value)
        },
        (error: unknown) => {
          clock.clearTimeout(timer)
          reject(error)
        }
      )
    })
  }

  private classify(error: unknown, flag: CancelFlag): JobError {
    if (error instanceof JobError && error.kind === 'timeout') return error
    if (flag.reason === 'timeout') {
      return new JobError('timeout', `Operation timed out after ${this.options.networkTimeoutMs}ms`, { cause: error })
    }
    if (flag.isRaised) {
      return new JobError('cancelled', `Job ${flag.reason ?? 'cancelled'}`, { cause: error })
    }
    if (!(error instanceof JobError) && !(error instanceof GitCommandError)) {
      console.error('[JobWorker] Unexpected backend error:', error)
    }
    return toJobError(error)
  }
}

function cancelled(kind: JobKind): JobOutcome {
  return { ok: false, error: new JobError('cancelled', `${kind} was cancelled`) }
}

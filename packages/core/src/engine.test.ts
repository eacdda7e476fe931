import { afterEach, describe, expect, it, vi } from 'vitest'
import { deferred, emptyDiff, FakeBackend, flushMicrotasks } from './__tests__/test-utils.js'
import type { FetchSummary, FileDiff, StatusEntry } from './backend/types.js'
import { QueryEngine } from './engine.js'
import { GitCommandError, JobError } from './errors.js'
import type { GenerationBump } from './generation.js'
import { DebouncedInvalidator } from './invalidator.js'

const THREE_CHANGES: StatusEntry[] = [
  { path: 'README.md', index: ' ', worktree: 'M' },
  { path: 'src/app.ts', index: 'A', worktree: ' ' },
  { path: 'notes.txt', index: '?', worktree: '?' },
]

afterEach(() => {
  vi.useRealTimers()
  vi.restoreAllMocks()
})

describe('QueryEngine', () => {
  describe('submit()', () => {
    it('commits the result and announces it', async () => {
      const backend = new FakeBackend()
      backend.status.mockResolvedValueOnce(THREE_CHANGES)
      const engine = new QueryEngine({ backend })

      const request = engine.submit({ kind: 'status' })
      await engine.whenIdle()

      expect(request.fingerprint).toBe('status:{}')
      expect(engine.cache.get('status', request.fingerprint)?.payload).toEqual(THREE_CHANGES)
      expect(engine.notifications.drain()).toEqual([{ type: 'data-ready', kind: 'status' }])
    })

    it('runs one job per kind and lets the latest submission supersede', async () => {
      const backend = new FakeBackend()
      const first = deferred<FileDiff>()
      const second = deferred<FileDiff>()
      backend.diff.mockImplementationOnce(() => first.promise).mockImplementationOnce(() => second.promise)
      const engine = new QueryEngine({ backend })

      const a = engine.submit({ kind: 'diff', params: { path: 'a.txt' } })
      await flushMicrotasks()
      const b = engine.submit({ kind: 'diff', params: { path: 'b.txt' } })
      await flushMicrotasks()

      expect(backend.diff).toHaveBeenCalledTimes(1)
      expect(engine.slotState('diff')?.pending?.fingerprint).toBe(b.fingerprint)
      expect(backend.diff.mock.calls[0]?.[1].signal.aborted).toBe(true)

      first.resolve(emptyDiff('a.txt'))
      await flushMicrotasks()
      expect(backend.diff).toHaveBeenCalledTimes(2)
      expect(backend.diff.mock.calls[1]?.[0]).toEqual({ path: 'b.txt', staged: false, contextLines: 3 })

      second.resolve(emptyDiff('b.txt'))
      await engine.whenIdle()

      expect(engine.cache.get('diff', a.fingerprint)).toBeUndefined()
      expect(engine.cache.latest('diff')?.payload.path).toBe('b.txt')
      expect(engine.notifications.drain()).toEqual([{ type: 'data-ready', kind: 'diff' }])
    })

    it('keeps only the newest of several queued submissions', async () => {
      const backend = new FakeBackend()
      const running = deferred<FileDiff>()
      backend.diff.mockImplementationOnce(() => running.promise)
      const engine = new QueryEngine({ backend })

      engine.submit({ kind: 'diff', params: { path: 'a.txt' } })
      await flushMicrotasks()
      engine.submit({ kind: 'diff', params: { path: 'b.txt' } })
      engine.submit({ kind: 'diff', params: { path: 'c.txt' } })
      running.resolve(emptyDiff('a.txt'))
      await engine.whenIdle()

      expect(backend.diff).toHaveBeenCalledTimes(2)
      expect(backend.diff.mock.calls[1]?.[0].path).toBe('c.txt')
      expect(engine.cache.latest('diff')?.payload.path).toBe('c.txt')
    })

    it('drops submissions superseded before they reach the backend', async () => {
      const backend = new FakeBackend()
      const engine = new QueryEngine({ backend })

      engine.submit({ kind: 'diff', params: { path: 'a.txt' } })
      engine.submit({ kind: 'diff', params: { path: 'c.txt' } })
      await engine.whenIdle()

      expect(backend.diff).toHaveBeenCalledTimes(1)
      expect(backend.diff.mock.calls[0]?.[0].path).toBe('c.txt')
      expect(engine.cache.latest('diff')?.payload.path).toBe('c.txt')
    })

    it('throws on parameters that do not fit the kind', () => {
      const engine = new QueryEngine({ backend: new FakeBackend() })
      expect(() => engine.submit({ kind: 'diff', params: { path: '' } })).toThrow()
      expect(engine.isIdle).toBe(true)
    })

    it('serves the previous entry while a refresh is running', async () => {
      const backend = new FakeBackend()
      backend.status.mockResolvedValueOnce(THREE_CHANGES)
      const engine = new QueryEngine({ backend })
      engine.submit({ kind: 'status' })
      await engine.whenIdle()

      const refresh = deferred<StatusEntry[]>()
      backend.status.mockImplementationOnce(() => refresh.promise)
      engine.invalidate('watcher')
      await flushMicrotasks()

      expect(engine.isRunning('status')).toBe(true)
      expect(engine.cache.latest('status')).toMatchObject({ generation: 0, payload: THREE_CHANGES })

      refresh.resolve([])
      await engine.whenIdle()
      expect(engine.cache.latest('status')).toMatchObject({ generation: 1, payload: [] })
    })
  })

  describe('mutate()', () => {
    it('moves the generation and refreshes what the views show', async () => {
      const backend = new FakeBackend()
      const engine = new QueryEngine({ backend })
      for (let i = 0; i < 5; i++) engine.invalidate()

      backend.status.mockResolvedValueOnce(THREE_CHANGES)
      engine.submit({ kind: 'status' })
      await engine.whenIdle()
      expect(engine.cache.latest('status')).toMatchObject({ generation: 5, payload: THREE_CHANGES })

      backend.status.mockResolvedValueOnce([])
      await engine.mutate({ type: 'commit', message: 'Add files' })
      await engine.whenIdle()

      expect(backend.mutate).toHaveBeenCalledWith({ type: 'commit', message: 'Add files' }, expect.anything())
      expect(engine.generation.current).toBe(6)
      expect(engine.cache.latest('status')).toMatchObject({ generation: 6, payload: [] })
    })

    it('moves the generation when the operation fails', async () => {
      const backend = new FakeBackend()
      backend.mutate.mockRejectedValueOnce(
        new GitCommandError(['merge', '--no-edit', 'feature'], 1, 'CONFLICT (content): Merge conflict in a.txt\n')
      )
      const engine = new QueryEngine({ backend })

      await expect(engine.mutate({ type: 'merge', branch: 'feature' })).rejects.toMatchObject({
        kind: 'backend-failure',
        message: 'git merge exited with code 1: CONFLICT (content): Merge conflict in a.txt',
      })
      expect(engine.generation.current).toBe(1)
    })

    it('waits for a running fetch to leave the exclusive scope', async () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
      const backend = new FakeBackend()
      const fetching = deferred<FetchSummary>()
      backend.fetch.mockImplementationOnce(() => fetching.promise)
      const engine = new QueryEngine({ backend })

      engine.submit({ kind: 'fetch' })
      await flushMicrotasks()
      const mutation = engine.mutate({ type: 'stage', paths: ['a.txt'] })
      await flushMicrotasks()

      expect(backend.mutate).not.toHaveBeenCalled()
      expect(debug).toHaveBeenCalledWith('[JobWorker] stage is waiting for the exclusive scope')

      fetching.resolve({ remote: 'origin', updatedRefs: [] })
      await mutation
      await engine.whenIdle()
      expect(backend.mutate).toHaveBeenCalledTimes(1)
      // fetch completion, then the mutation
      expect(engine.generation.current).toBe(2)
    })

    it('keeps the exclusive scope until a timed-out fetch settles', async () => {
      vi.useFakeTimers()
      vi.spyOn(console, 'debug').mockImplementation(() => {})
      const backend = new FakeBackend()
      const fetching = deferred<FetchSummary>()
      backend.fetch.mockImplementationOnce(() => fetching.promise)
      const engine = new QueryEngine({ backend, config: { networkTimeoutMs: 100 } })

      engine.submit({ kind: 'fetch' })
      await flushMicrotasks()
      await vi.advanceTimersByTimeAsync(100)
      await flushMicrotasks()
      expect(engine.isRunning('fetch')).toBe(false)

      const mutation = engine.mutate({ type: 'stage', paths: ['a.txt'] })
      await flushMicrotasks()
      expect(backend.mutate).not.toHaveBeenCalled()

      fetching.reject(new Error('aborted'))
      await mutation
      expect(backend.mutate).toHaveBeenCalledTimes(1)
    })

    it('refreshes a kind whose first run was still going', async () => {
      const backend = new FakeBackend()
      const first = deferred<StatusEntry[]>()
      backend.status.mockImplementationOnce(() => first.promise)
      const engine = new QueryEngine({ backend })

      engine.submit({ kind: 'status' })
      await flushMicrotasks()
      await engine.mutate({ type: 'stage', paths: ['a.txt'] })
      first.resolve([{ path: 'a.txt', index: ' ', worktree: 'M' }])
      await engine.whenIdle()

      expect(backend.status).toHaveBeenCalledTimes(2)
      expect(engine.cache.latest('status')).toMatchObject({ generation: 1, payload: [] })
    })
  })

  describe('invalidate()', () => {
    it('re-issues committed kinds with their last parameters', async () => {
      const backend = new FakeBackend()
      const engine = new QueryEngine({ backend })
      engine.submit({ kind: 'status' })
      engine.submit({ kind: 'log', params: { limit: 10 } })
      await engine.whenIdle()

      const generation = engine.invalidate('watcher')
      await engine.whenIdle()

      expect(generation).toBe(1)
      expect(backend.status).toHaveBeenCalledTimes(2)
      expect(backend.log).toHaveBeenCalledTimes(2)
      expect(backend.log.mock.calls[1]?.[0]).toEqual({ limit: 10, skip: 0 })
      expect(backend.tags).not.toHaveBeenCalled()
      expect(engine.cache.latest('log')?.generation).toBe(1)
    })

    it('retries a kind whose only run failed', async () => {
      const backend = new FakeBackend()
      backend.tags.mockRejectedValueOnce(new GitCommandError(['for-each-ref'], 128, 'fatal: bad object\n'))
      const engine = new QueryEngine({ backend })
      engine.submit({ kind: 'tags' })
      await engine.whenIdle()
      expect(engine.cache.has('tags')).toBe(false)

      engine.invalidate('watcher')
      await engine.whenIdle()

      expect(backend.tags).toHaveBeenCalledTimes(2)
      expect(engine.cache.latest('tags')).toMatchObject({ generation: 1, payload: [] })
    })

    it('turns a burst of watcher signals into one refresh', async () => {
      vi.useFakeTimers()
      const backend = new FakeBackend()
      const engine = new QueryEngine({ backend })
      engine.submit({ kind: 'status' })
      await engine.whenIdle()

      const invalidator = new DebouncedInvalidator({
        debounceMs: 300,
        onFire: () => {
          engine.invalidate('watcher')
        },
      })
      for (let i = 0; i < 8; i++) {
        invalidator.signal()
        await vi.advanceTimersByTimeAsync(50)
      }
      expect(engine.generation.current).toBe(0)

      await vi.advanceTimersByTimeAsync(300)
      await engine.whenIdle()

      expect(engine.generation.current).toBe(1)
      expect(backend.status).toHaveBeenCalledTimes(2)
      expect(engine.cache.latest('status')?.generation).toBe(1)
    })

    it('does not repeat fetch or push', async () => {
      const backend = new FakeBackend()
      const engine = new QueryEngine({ backend })
      engine.submit({ kind: 'fetch', params: { remote: 'upstream' } })
      await engine.whenIdle()
      expect(backend.fetch).toHaveBeenCalledTimes(1)

      engine.invalidate()
      await engine.whenIdle()
      expect(backend.fetch).toHaveBeenCalledTimes(1)
    })

    it('follows a successful fetch with a refresh', async () => {
      const backend = new FakeBackend()
      const engine = new QueryEngine({ backend })
      const bumps: GenerationBump[] = []
      engine.generation.onBump((bump) => bumps.push(bump))

      engine.submit({ kind: 'branches' })
      await engine.whenIdle()
      engine.submit({ kind: 'fetch' })
      await engine.whenIdle()

      expect(bumps).toEqual([{ generation: 1, reason: 'fetch' }])
      expect(backend.branches).toHaveBeenCalledTimes(2)
      expect(engine.cache.latest('branches')?.generation).toBe(1)
    })
  })

  describe('failures', () => {
    it('keeps the previous entry and reports the error', async () => {
      const backend = new FakeBackend()
      backend.status.mockResolvedValueOnce(THREE_CHANGES)
      const engine = new QueryEngine({ backend })
      engine.submit({ kind: 'status' })
      await engine.whenIdle()
      engine.notifications.drain()

      backend.status.mockRejectedValueOnce(
        new GitCommandError(['status', '--porcelain=v1'], 128, 'fatal: index file corrupt\n')
      )
      engine.invalidate()
      await engine.whenIdle()

      expect(engine.cache.latest('status')).toMatchObject({ generation: 0, payload: THREE_CHANGES })
      expect(engine.notifications.drain()).toEqual([
        {
          type: 'failed',
          kind: 'status',
          error: 'backend-failure',
          message: 'git status exited with code 128: fatal: index file corrupt',
        },
      ])
    })

    it('times out a fetch that does not answer', async () => {
      vi.useFakeTimers()
      const backend = new FakeBackend()
      backend.fetch.mockImplementationOnce(() => new Promise<FetchSummary>(() => {}))
      const engine = new QueryEngine({ backend, config: { networkTimeoutMs: 2000 } })

      engine.submit({ kind: 'fetch' })
      await flushMicrotasks()
      await vi.advanceTimersByTimeAsync(1999)
      expect(engine.isRunning('fetch')).toBe(true)

      await vi.advanceTimersByTimeAsync(1)
      await flushMicrotasks()

      expect(engine.isRunning('fetch')).toBe(false)
      expect(backend.fetch.mock.calls[0]?.[2].signal.aborted).toBe(true)
      expect(engine.cache.has('fetch')).toBe(false)
      expect(engine.generation.current).toBe(0)
      expect(engine.notifications.drain()).toEqual([
        { type: 'failed', kind: 'fetch', error: 'timeout', message: 'fetch timed out after 2000ms' },
      ])
    })

    it('surfaces missing credentials', async () => {
      const backend = new FakeBackend()
      backend.push.mockRejectedValueOnce(new JobError('credentials-required', 'origin requires authentication'))
      const engine = new QueryEngine({ backend })

      engine.submit({ kind: 'push', params: { branch: 'main' } })
      await engine.whenIdle()

      expect(engine.notifications.drain()).toEqual([
        { type: 'failed', kind: 'push', error: 'credentials-required', message: 'origin requires authentication' },
      ])
      expect(engine.generation.current).toBe(0)
    })
  })

  it('limits backend calls to maxConcurrentJobs', async () => {
    const backend = new FakeBackend()
    const status = deferred<StatusEntry[]>()
    backend.status.mockImplementationOnce(() => status.promise)
    const engine = new QueryEngine({ backend, config: { maxConcurrentJobs: 1 } })

    engine.submit({ kind: 'status' })
    engine.submit({ kind: 'tags' })
    await flushMicrotasks()
    expect(backend.tags).not.toHaveBeenCalled()

    status.resolve([])
    await engine.whenIdle()
    expect(backend.tags).toHaveBeenCalledTimes(1)
  })

  describe('dispose()', () => {
    it('cancels running work and ignores later submissions', async () => {
      const backend = new FakeBackend()
      const status = deferred<StatusEntry[]>()
      backend.status.mockImplementationOnce(() => status.promise)
      const engine = new QueryEngine({ backend })

      engine.submit({ kind: 'status' })
      await flushMicrotasks()
      const disposing = engine.dispose()

      expect(backend.status.mock.calls[0]?.[0].signal.aborted).toBe(true)
      expect(engine.notifications.isClosed).toBe(true)

      status.resolve(THREE_CHANGES)
      await disposing

      engine.submit({ kind: 'tags' })
      expect(engine.cache.has('status')).toBe(false)
      expect(backend.tags).not.toHaveBeenCalled()
      await expect(engine.mutate({ type: 'checkout', branch: 'main' })).rejects.toMatchObject({ kind: 'cancelled' })
    })

    it('waits for a running mutation', async () => {
      const backend = new FakeBackend()
      const committing = deferred<void>()
      backend.mutate.mockImplementationOnce(() => committing.promise)
      const engine = new QueryEngine({ backend })

      const mutation = engine.mutate({ type: 'commit', message: 'Add files' })
      await flushMicrotasks()
      let disposed = false
      const disposing = engine.dispose().then(() => {
        disposed = true
      })
      await flushMicrotasks()

      expect(backend.mutate.mock.calls[0]?.[1].signal.aborted).toBe(true)
      expect(disposed).toBe(false)

      committing.resolve()
      await mutation
      await disposing
      expect(disposed).toBe(true)
      expect(engine.generation.current).toBe(0)
    })
  })
})

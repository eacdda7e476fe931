import type { AsyncSubscription, Event, Options } from '@parcel/watcher'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { cleanupTempDir, createTempDir } from './__tests__/test-utils.js'
import { DEFAULT_IGNORE, RepositoryWatcher, type SubscribeFn, type WatchEvent } from './repo-watcher.js'

type Callback = (err: Error | null, events: Event[]) => unknown

function createFakeSubscribe() {
  const unsubscribe = vi.fn(async () => {})
  let callback: Callback | null = null
  let options: Options | undefined
  const subscribe: SubscribeFn = async (_dir, cb, opts): Promise<AsyncSubscription> => {
    callback = cb
    options = opts
    return { unsubscribe }
  }
  return {
    subscribe,
    unsubscribe,
    emit: (err: Error | null, events: Event[]) => callback?.(err, events),
    options: () => options,
  }
}

describe('RepositoryWatcher', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createTempDir()
  })

  afterEach(async () => {
    vi.useRealTimers()
    vi.restoreAllMocks()
    await cleanupTempDir(tempDir)
  })

  it('forwards event batches and skips empty ones', async () => {
    const fake = createFakeSubscribe()
    const batches: WatchEvent[][] = []
    const watcher = new RepositoryWatcher(tempDir, {
      onSignal: (events) => batches.push(events),
      ignore: ['dist'],
      subscribe: fake.subscribe,
    })

    await watcher.start()
    fake.emit(null, [])
    fake.emit(null, [{ type: 'update', path: `${watcher.root}/.git/index` }])

    expect(watcher.isStarted).toBe(true)
    expect(fake.options()).toEqual({ ignore: [...DEFAULT_IGNORE, 'dist'] })
    expect(batches).toEqual([[{ type: 'update', path: `${watcher.root}/.git/index` }]])

    await watcher.close()
    expect(fake.unsubscribe).toHaveBeenCalledTimes(1)
    expect(watcher.isStarted).toBe(false)
  })

  it('logs subscription errors without signalling', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const fake = createFakeSubscribe()
    const onSignal = vi.fn()
    const watcher = new RepositoryWatcher(tempDir, { onSignal, subscribe: fake.subscribe })
    const failure = new Error('watch limit reached')

    await watcher.start()
    fake.emit(failure, [])

    expect(onSignal).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledWith('[RepositoryWatcher] Error:', failure)
    await watcher.close()
  })

  it('signals on every polling tick until closed', async () => {
    vi.useFakeTimers()
    const fake = createFakeSubscribe()
    const onSignal = vi.fn()
    const watcher = new RepositoryWatcher(tempDir, { onSignal, pollIntervalMs: 1000, subscribe: fake.subscribe })

    await watcher.start()
    vi.advanceTimersByTime(2500)
    expect(onSignal.mock.calls).toEqual([[[]], [[]]])

    await watcher.close()
    vi.advanceTimersByTime(5000)
    expect(onSignal).toHaveBeenCalledTimes(2)
  })

  it('starts once when start is called concurrently', async () => {
    const fake = createFakeSubscribe()
    const subscribe = vi.fn(fake.subscribe)
    const watcher = new RepositoryWatcher(tempDir, { onSignal: () => {}, subscribe })

    await Promise.all([watcher.start(), watcher.start()])

    expect(subscribe).toHaveBeenCalledTimes(1)
    await watcher.close()
  })
})

export type Release = () => void

/**
 * Counting semaphore. Waiters are served in arrival order.
 */
export class Semaphore {
  private available: number
  private queue: Array<(release: Release) => void> = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}`)
    }
    this.available = capacity
  }

  get inUse(): number {
    return this.capacity - this.available
  }

  get waiting(): number {
    return this.queue.length
  }

  /** Take a permit without waiting, or null when none is free */
  tryAcquire(): Release | null {
    if (this.available === 0) return null
    this.available -= 1
    return this.createRelease()
  }

  acquire(): Promise<Release> {
    const release = this.tryAcquire()
    if (release) return Promise.resolve(release)
    return new Promise((resolve) => {
      this.queue.push(resolve)
    })
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await task()
    } finally {
      release()
    }
  }

  private createRelease(): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.queue.shift()
      if (next) {
        // Hand the permit straight to the next waiter
        next(this.createRelease())
      } else {
        this.available += 1
      }
    }
  }
}

/**
 * Exclusive scope around backend calls that write repository state
 * (index, refs, working tree).
 */
export class ExclusiveLock {
  private semaphore = new Semaphore(1)

  get isHeld(): boolean {
    return this.semaphore.inUse > 0
  }

  tryAcquire(): Release | null {
    return this.semaphore.tryAcquire()
  }

  acquire(): Promise<Release> {
    return this.semaphore.acquire()
  }
}

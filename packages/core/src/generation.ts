import { EventEmitter } from 'node:events'

export type GenerationBumpReason = 'mutation' | 'fetch' | 'push' | 'watcher' | 'manual'

export interface GenerationBump {
  generation: number
  reason: GenerationBumpReason
}

/**
 * Logical snapshot counter of repository state.
 *
 * Strictly increasing and never reused for the lifetime of the owning engine.
 */
export class GenerationCounter {
  private value: number
  private emitter = new EventEmitter()

  constructor(initial = 0) {
    this.value = initial
  }

  get current(): number {
    return this.value
  }

  bump(reason: GenerationBumpReason): number {
    this.value += 1
    const event: GenerationBump = { generation: this.value, reason }
    this.emitter.emit('bump', event)
    return this.value
  }

  /** Subscribe to increments. Returns unsubscribe function. */
  onBump(listener: (event: GenerationBump) => void): () => void {
    this.emitter.on('bump', listener)
    return () => {
      this.emitter.off('bump', listener)
    }
  }
}

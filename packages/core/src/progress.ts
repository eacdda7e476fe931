import type { Clock } from './clock.js'

/**
 * Rate limiter for progress reports of a single job.
 *
 * The first report always passes; later ones pass once `intervalMs` has
 * elapsed since the last emitted report, or when the job reports completion.
 */
export class ProgressThrottle {
  private lastEmittedAt: number | null = null
  private lastFraction = -1

  constructor(
    private intervalMs: number,
    private clock: Pick<Clock, 'now'>,
    private emit: (fraction: number) => void
  ) {}

  report(fraction: number): void {
    const clamped = Number.isFinite(fraction) ? Math.min(1, Math.max(0, fraction)) : 0
    if (clamped === this.lastFraction) return

    const now = this.clock.now()
    const due = this.lastEmittedAt === null || now - this.lastEmittedAt >= this.intervalMs
    if (!due && clamped < 1) return

    this.lastEmittedAt = now
    this.lastFraction = clamped
    this.emit(clamped)
  }
}

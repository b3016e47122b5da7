/**
 * Reaper: periodic sweep evicting registry entries whose timeout expired.
 *
 * Expiry only matters for future lookups; in-flight handlers are not told.
 * Timers are injectable so tests can drive it with fake clocks.
 */

export const DEFAULT_REAPER_INTERVAL_MS = 5_000

export interface ReaperOptions {
  /** Called once per tick. Returns how many entries were evicted. */
  sweep: () => number
  intervalMs?: number
  onSwept?: (evicted: number) => void
  setInterval?: typeof globalThis.setInterval
  clearInterval?: typeof globalThis.clearInterval
}

export class Reaper {
  private timer: ReturnType<typeof setInterval> | null = null
  private intervalMs: number
  private sweep: () => number
  private onSwept?: (evicted: number) => void
  private _setInterval: typeof globalThis.setInterval
  private _clearInterval: typeof globalThis.clearInterval

  constructor(options: ReaperOptions) {
    this.sweep = options.sweep
    this.intervalMs = options.intervalMs ?? DEFAULT_REAPER_INTERVAL_MS
    this.onSwept = options.onSwept
    this._setInterval = options.setInterval ?? globalThis.setInterval
    this._clearInterval = options.clearInterval ?? globalThis.clearInterval
  }

  get running(): boolean {
    return this.timer !== null
  }

  /** No-op when already running. */
  start(): void {
    if (this.timer) return
    this.timer = this._setInterval(() => this.tick(), this.intervalMs)
  }

  stop(): void {
    if (!this.timer) return
    this._clearInterval(this.timer)
    this.timer = null
  }

  tick(): number {
    const evicted = this.sweep()
    if (evicted > 0) this.onSwept?.(evicted)
    return evicted
  }
}

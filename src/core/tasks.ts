/**
 * Tracked one-shot timers for work that outlives the handler call, such as
 * deleting a response after a delay. `clear()` cancels whatever is pending.
 */

import type { Logger } from 'pino'
import { silentLogger } from './logger.js'

export interface ScheduledTasksOptions {
  logger?: Logger
  setTimeout?: typeof globalThis.setTimeout
  clearTimeout?: typeof globalThis.clearTimeout
}

export class ScheduledTasks {
  private readonly timers = new Set<ReturnType<typeof setTimeout>>()
  private readonly logger: Logger

  constructor(private options: ScheduledTasksOptions = {}) {
    this.logger = options.logger ?? silentLogger()
  }

  get pending(): number {
    return this.timers.size
  }

  /** Run `task` after `delayMs`. Failures are logged. */
  schedule(delayMs: number, task: () => Promise<void>): void {
    const set = this.options.setTimeout ?? setTimeout
    const timer: ReturnType<typeof setTimeout> = set(() => {
      this.timers.delete(timer)
      task().catch((err: unknown) => {
        this.logger.error({ err }, 'scheduled task failed')
      })
    }, delayMs)
    this.timers.add(timer)
  }

  clear(): void {
    const clear = this.options.clearTimeout ?? clearTimeout
    for (const timer of this.timers) clear(timer)
    this.timers.clear()
  }
}

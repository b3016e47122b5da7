/**
 * WaitForExecutor: hand the next matching component interaction back to
 * the code that sent the message, instead of to a callback.
 *
 *   const waiter = new WaitForExecutor({ authors: [userId], timeoutMs: 30_000 })
 *   const id = client.register(undefined, waiter)
 *   const ctx = await waiter.waitFor()
 *
 * Once a context was delivered (or the wait timed out) the executor closes
 * and the registry drops it on its next interaction.
 */

import { ExecutorClosed } from '../core/errors.js'
import type { ComponentContext } from './context.js'
import type { IComponentExecutor } from './executor.js'

export const NOT_READY_MESSAGE = "The bot isn't ready for that yet"
export const NOT_ALLOWED_MESSAGE = 'You are not allowed to use this component'

export class WaitForTimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`No matching interaction within ${timeoutMs}ms`)
    this.name = 'WaitForTimeoutError'
  }
}

export interface WaitForOptions {
  /** User ids allowed to trigger it. Empty/absent = anyone. */
  authors?: Iterable<string>
  timeoutMs: number
  ephemeralDefault?: boolean
  setTimeout?: typeof globalThis.setTimeout
  clearTimeout?: typeof globalThis.clearTimeout
}

export class WaitForExecutor implements IComponentExecutor {
  readonly customIds: readonly string[] = []
  readonly prefixIds: readonly string[] = []

  private readonly authors: ReadonlySet<string>
  private readonly timeoutMs: number
  private readonly ephemeralDefault: boolean
  private readonly _setTimeout: typeof globalThis.setTimeout
  private readonly _clearTimeout: typeof globalThis.clearTimeout
  private waiting: ((ctx: ComponentContext) => void) | null = null
  private _finished = false

  constructor(options: WaitForOptions) {
    this.authors = new Set(options.authors ?? [])
    this.timeoutMs = options.timeoutMs
    this.ephemeralDefault = options.ephemeralDefault ?? false
    this._setTimeout = options.setTimeout ?? globalThis.setTimeout
    this._clearTimeout = options.clearTimeout ?? globalThis.clearTimeout
  }

  get finished(): boolean {
    return this._finished
  }

  /** Resolve with the next accepted context; reject with WaitForTimeoutError. */
  waitFor(): Promise<ComponentContext> {
    if (this.waiting || this._finished) {
      return Promise.reject(new Error('This executor is already being waited for'))
    }

    return new Promise<ComponentContext>((resolve, reject) => {
      const timer = this._setTimeout(() => {
        this.finish()
        reject(new WaitForTimeoutError(this.timeoutMs))
      }, this.timeoutMs)

      this.waiting = (ctx) => {
        this._clearTimeout(timer)
        this.finish()
        resolve(ctx)
      }
    })
  }

  async execute(ctx: ComponentContext): Promise<void> {
    ctx.setEphemeralDefault(this.ephemeralDefault)

    if (this._finished) throw new ExecutorClosed()

    if (!this.waiting) {
      await ctx.createInitialResponse({ content: NOT_READY_MESSAGE, ephemeral: true })
      return
    }

    if (this.authors.size > 0 && !this.authors.has(ctx.interaction.user.id)) {
      await ctx.createInitialResponse({ content: NOT_ALLOWED_MESSAGE, ephemeral: true })
      return
    }

    this.waiting(ctx)
  }

  private finish(): void {
    this._finished = true
    this.waiting = null
  }
}

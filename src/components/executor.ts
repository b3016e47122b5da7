/**
 * Component executors: route a component interaction to a callback.
 *
 * ComponentExecutor is a keyed table: exact ids are checked against the
 * context's match segment, prefix ids against the full custom id (longest
 * prefix wins). One executor can be registered with the client under all of
 * its ids at once so they share a single timeout.
 */

import { DuplicateCustomIdError, RoutingError } from '../core/errors.js'
import type { Executor } from '../core/interaction-client.js'
import type { ComponentContext } from './context.js'

export type ComponentCallback = (ctx: ComponentContext) => Promise<void>

export interface IComponentExecutor extends Executor<ComponentContext> {
  /** Exact-match ids this executor handles. */
  readonly customIds: readonly string[]
  /** Prefix-match ids this executor handles. */
  readonly prefixIds: readonly string[]
}

export interface ComponentExecutorOptions {
  /** Whether responses created by callbacks default to ephemeral. */
  ephemeralDefault?: boolean
}

export class ComponentExecutor implements IComponentExecutor {
  private readonly exact = new Map<string, ComponentCallback>()
  private readonly prefix = new Map<string, ComponentCallback>()
  private readonly ephemeralDefault: boolean

  constructor(options: ComponentExecutorOptions = {}) {
    this.ephemeralDefault = options.ephemeralDefault ?? false
  }

  get customIds(): string[] {
    return [...this.exact.keys()]
  }

  get prefixIds(): string[] {
    return [...this.prefix.keys()]
  }

  add(customId: string, callback: ComponentCallback, options: { prefixMatch?: boolean } = {}): this {
    if (this.exact.has(customId)) throw new DuplicateCustomIdError(customId, 'exact')
    if (this.prefix.has(customId)) throw new DuplicateCustomIdError(customId, 'prefix')

    if (options.prefixMatch) this.prefix.set(customId, callback)
    else this.exact.set(customId, callback)
    return this
  }

  /** No-op for unknown ids. */
  remove(customId: string): this {
    this.exact.delete(customId)
    this.prefix.delete(customId)
    return this
  }

  async execute(ctx: ComponentContext): Promise<void> {
    ctx.setEphemeralDefault(this.ephemeralDefault)

    const callback = this.exact.get(ctx.idMatch) ?? this.longestPrefix(ctx.interaction.customId)
    if (!callback) throw new RoutingError(ctx.interaction.customId)

    await callback(ctx)
  }

  private longestPrefix(customId: string): ComponentCallback | undefined {
    let best: { length: number; callback: ComponentCallback } | undefined
    for (const [prefix, callback] of this.prefix) {
      if (customId.startsWith(prefix) && (!best || prefix.length > best.length)) {
        best = { length: prefix.length, callback }
      }
    }
    return best?.callback
  }
}

/**
 * Interaction client: the executor registry plus both ingress adapters.
 *
 * Holds two disjoint tables keyed by custom-id match segment:
 *   exact: looked up first
 *   prefix: fallback, longest registered prefix of the full custom id wins
 *
 * Each entry pairs a Timeout with an executor. Dispatch checks expiry, records
 * a use (evicting on exhaustion), builds a fresh context and runs the executor.
 * A Reaper evicts entries that expire by time while nobody is clicking.
 *
 * Table writes (register, unregister, eviction on exhaustion, reaper sweep)
 * are all synchronous, so no two of them can interleave on the event loop and
 * a lookup never observes a half-applied change.
 */

import type { Logger } from 'pino'
import type { BaseContext, DeliveryMode } from './context.js'
import { generateCustomId, splitCustomId } from './custom-id.js'
import { Deferred } from './deferred.js'
import {
  CustomIdNotFoundError,
  DuplicateCustomIdError,
  ExecutorClosed,
  InteractionStateError,
  InvalidCustomIdError,
  UsesDepletedError,
} from './errors.js'
import { InteractionError } from './interaction-error.js'
import { silentLogger } from './logger.js'
import { Reaper } from './reaper.js'
import { buildTimedOutResponse } from './responses.js'
import { ScheduledTasks } from './tasks.js'
import { DEFAULT_TIMEOUT_MS, SlidingTimeout, type Timeout } from './timeouts.js'
import type {
  Interaction,
  InteractionResponder,
  InteractionResponse,
  PullTransport,
  PushTransport,
} from './types.js'

// ==================== Types ====================

export interface Executor<C> {
  execute(ctx: C): Promise<void>
}

export interface RegistryEntry<E> {
  timeout: Timeout
  executor: E
}

export interface RegisterOptions {
  /** Defaults to a fresh sliding timeout (2 minutes, unlimited uses). */
  timeout?: Timeout
  /** Match ids that start with this one (lower priority than exact ids). */
  prefixMatch?: boolean
}

export interface InteractionClientOptions {
  responder: InteractionResponder
  /** Gateway-style source; responses go out over REST. */
  push?: PushTransport
  /** HTTP-style source; responses are returned from the listener. */
  pull?: PullTransport
  logger?: Logger
  /** Factory for the timeout used when a registration doesn't pass one. */
  defaultTimeout?: () => Timeout
  reaperIntervalMs?: number
  /**
   * Pull requests whose handler hasn't answered within this window are
   * deferred automatically so the platform's response deadline is met.
   * null = wait indefinitely.
   */
  pullDeferAfterMs?: number | null
}

export const DEFAULT_PULL_DEFER_AFTER_MS = 2_500

// ==================== Client ====================

export abstract class InteractionClient<
  I extends Interaction,
  C extends BaseContext<I>,
  E extends Executor<C>,
> {
  protected readonly responder: InteractionResponder
  protected readonly push?: PushTransport
  protected readonly pull?: PullTransport
  protected readonly logger: Logger

  private readonly exact = new Map<string, RegistryEntry<E>>()
  private readonly prefix = new Map<string, RegistryEntry<E>>()
  private readonly defaultTimeout: () => Timeout
  private readonly pullDeferAfterMs: number | null
  private readonly reaper: Reaper
  private readonly tasks: ScheduledTasks
  private detachTransports: Array<() => void> | null = null

  /** Content of the ephemeral reply sent when no live executor matches. */
  protected abstract readonly timedOutMessage: string

  protected abstract createContext(interaction: I, delivery: DeliveryMode): C

  /** Subscribe to the configured transports; returns the matching detach functions. */
  protected abstract attachTransports(): Array<() => void>

  constructor(options: InteractionClientOptions) {
    this.responder = options.responder
    this.push = options.push
    this.pull = options.pull
    this.logger = options.logger ?? silentLogger()
    this.defaultTimeout = options.defaultTimeout ?? (() => new SlidingTimeout(DEFAULT_TIMEOUT_MS))
    this.pullDeferAfterMs = options.pullDeferAfterMs === undefined
      ? DEFAULT_PULL_DEFER_AFTER_MS
      : options.pullDeferAfterMs
    this.reaper = new Reaper({
      sweep: () => this.sweep(),
      intervalMs: options.reaperIntervalMs,
      onSwept: (evicted) => this.logger.debug({ evicted }, 'reaper evicted expired executors'),
    })
    this.tasks = new ScheduledTasks({ logger: this.logger })
  }

  // ==================== Lifecycle ====================

  get isOpen(): boolean {
    return this.detachTransports !== null
  }

  /** Start the reaper and subscribe to transports. Idempotent. */
  open(): void {
    if (this.detachTransports) return

    this.reaper.start()
    this.detachTransports = this.attachTransports()
    this.logger.debug('interaction client opened')
  }

  /** Stop the reaper, cancel delayed deletes and detach from transports. Idempotent. */
  close(): void {
    if (!this.detachTransports) return

    this.reaper.stop()
    this.tasks.clear()
    for (const detach of this.detachTransports) detach()
    this.detachTransports = null
    this.logger.debug('interaction client closed')
  }

  // ==================== Registry ====================

  /**
   * Register an executor under a custom id (random UUID when omitted).
   * Returns the effective custom id to put on the component or modal.
   */
  register(customId: string | undefined, executor: E, options: RegisterOptions = {}): string {
    const { match, customId: effective } = generateCustomId(customId)
    if (!match) throw new InvalidCustomIdError(effective)

    const ids = options.prefixMatch ? { exact: [], prefix: [match] } : { exact: [match], prefix: [] }
    this.addEntry(ids, { timeout: options.timeout ?? this.newDefaultTimeout(), executor })
    return effective
  }

  /** Exact match on the match segment first, then the longest registered prefix. */
  lookup(customId: string): RegistryEntry<E> | undefined {
    const exact = this.exact.get(splitCustomId(customId).match)
    if (exact) return exact

    let best: { prefix: string; entry: RegistryEntry<E> } | undefined
    for (const [prefix, entry] of this.prefix) {
      if (customId.startsWith(prefix) && (!best || prefix.length > best.prefix.length)) {
        best = { prefix, entry }
      }
    }
    return best?.entry
  }

  unregister(customId: string): void {
    const { match } = splitCustomId(customId)
    if (this.exact.delete(match) || this.prefix.delete(match)) return
    throw new CustomIdNotFoundError(customId)
  }

  /** Registered exact and prefix match keys. */
  registeredIds(): { exact: string[]; prefix: string[] } {
    return { exact: [...this.exact.keys()], prefix: [...this.prefix.keys()] }
  }

  /** Evict every entry whose timeout has expired. Returns how many keys were removed. */
  sweep(): number {
    let evicted = 0
    for (const table of [this.exact, this.prefix]) {
      for (const [key, entry] of table) {
        if (!entry.timeout.hasExpired) continue
        table.delete(key)
        evicted++
      }
    }
    return evicted
  }

  /** Shared pieces every context built by this client gets. */
  protected contextDeps(): { responder: InteractionResponder; tasks: ScheduledTasks; logger: Logger } {
    return { responder: this.responder, tasks: this.tasks, logger: this.logger }
  }

  protected newDefaultTimeout(): Timeout {
    return this.defaultTimeout()
  }

  /** Insert one entry under several keys, all-or-nothing. */
  protected addEntry(ids: { exact: Iterable<string>; prefix: Iterable<string> }, entry: RegistryEntry<E>): void {
    const exact = [...ids.exact]
    const prefix = [...ids.prefix]
    const seen = new Set<string>()

    for (const key of [...exact, ...prefix]) {
      if (!key) throw new InvalidCustomIdError(key)
      if (this.exact.has(key)) throw new DuplicateCustomIdError(key, 'exact')
      if (this.prefix.has(key)) throw new DuplicateCustomIdError(key, 'prefix')
      if (seen.has(key)) throw new DuplicateCustomIdError(key, prefix.includes(key) ? 'prefix' : 'exact')
      seen.add(key)
    }

    for (const key of exact) this.exact.set(key, entry)
    for (const key of prefix) this.prefix.set(key, entry)
  }

  /** Remove every key that points at `entry`. */
  private evict(entry: RegistryEntry<E>): void {
    for (const table of [this.exact, this.prefix]) {
      for (const [key, value] of table) {
        if (value === entry) table.delete(key)
      }
    }
  }

  /** Look up an entry that is still alive; expired ones are evicted on the way. */
  private resolveLive(customId: string): RegistryEntry<E> | undefined {
    const entry = this.lookup(customId)
    if (!entry) return undefined

    if (entry.timeout.hasExpired) {
      this.evict(entry)
      return undefined
    }

    let exhausted: boolean
    try {
      exhausted = entry.timeout.incrementUses()
    } catch (err) {
      // The clock can cross the deadline between the check and the use.
      if (!(err instanceof UsesDepletedError)) throw err
      this.evict(entry)
      return undefined
    }

    if (exhausted) this.evict(entry)
    return entry
  }

  // ==================== Ingress: push ====================

  /**
   * Handle an interaction from a push transport. Errors from the executor
   * propagate to the caller.
   */
  async onPushEvent(interaction: I): Promise<void> {
    const entry = this.resolveLive(interaction.customId)
    if (!entry) {
      await this.responder.createInteractionResponse(interaction, buildTimedOutResponse(this.timedOutMessage))
      return
    }

    const ctx = this.createContext(interaction, { kind: 'push' })
    await this.invoke(entry, ctx)
  }

  /** Transport-facing wrapper: nothing above the subscription can catch. */
  protected dispatchPush(interaction: I): void {
    this.onPushEvent(interaction).catch((err: unknown) => {
      this.logger.error({ err, customId: interaction.customId }, 'interaction handler failed')
    })
  }

  // ==================== Ingress: pull ====================

  /**
   * Handle an interaction from a pull transport and return the response body.
   * The executor runs in the background; this resolves as soon as it produces
   * an initial response (or rejects with the error it threw first).
   */
  async onPullRequest(interaction: I): Promise<InteractionResponse> {
    const entry = this.resolveLive(interaction.customId)
    if (!entry) return buildTimedOutResponse(this.timedOutMessage)

    const response = new Deferred<InteractionResponse>()
    const ctx = this.createContext(interaction, { kind: 'pull', response })
    void this.runPull(entry, ctx, response)

    const timer = this.pullDeferAfterMs === null
      ? null
      : setTimeout(() => this.autoDefer(ctx), this.pullDeferAfterMs)

    try {
      return await response.promise
    } finally {
      if (timer) clearTimeout(timer)
    }
  }

  private async runPull(entry: RegistryEntry<E>, ctx: C, response: Deferred<InteractionResponse>): Promise<void> {
    try {
      await this.invoke(entry, ctx)
    } catch (err) {
      if (!response.reject(err)) {
        this.logger.error({ err, customId: ctx.interaction.customId }, 'interaction handler failed after responding')
      }
    }
  }

  private autoDefer(ctx: C): void {
    if (ctx.state !== 'fresh') return

    this.logger.warn({ customId: ctx.interaction.customId }, 'handler has not responded in time, deferring')
    ctx.defer().catch((err: unknown) => {
      // Lost the race against the handler's own response.
      if (err instanceof InteractionStateError) return
      this.logger.error({ err, customId: ctx.interaction.customId }, 'auto-defer failed')
    })
  }

  // ==================== Execution ====================

  private async invoke(entry: RegistryEntry<E>, ctx: C): Promise<void> {
    try {
      await entry.executor.execute(ctx)
    } catch (err) {
      if (err instanceof ExecutorClosed) {
        this.evict(entry)
        this.logger.debug({ customId: ctx.interaction.customId }, 'executor closed, evicted')
        await ctx.respondIfUnanswered({ content: this.timedOutMessage, ephemeral: true })
        return
      }

      if (err instanceof InteractionError) {
        await err.send(ctx)
        return
      }

      throw err
    }
  }
}

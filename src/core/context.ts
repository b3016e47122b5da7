/**
 * Interaction context: the per-invocation response correlator.
 *
 * Every incoming interaction gets a fresh context. It tracks whether the
 * interaction was deferred or answered and makes sure exactly one initial
 * response goes out, whichever transport delivered the interaction:
 *
 *   push: state changes call the REST callback endpoint directly.
 *   pull: state changes resolve a one-shot promise that the ingress
 *         adapter is awaiting; the value becomes the HTTP response body.
 *
 * Everything after the initial response (edits, followups, deletes) goes
 * through REST in both modes.
 *
 * State: fresh → deferred → responded, or fresh → responded. All calls that
 * produce a response run under one lock held for the whole round-trip, so two
 * handler branches can never both see `fresh`.
 */

import { InteractionResponseType } from 'discord-api-types/v10'
import type { APIMessage } from 'discord-api-types/v10'
import type { Logger } from 'pino'
import { splitCustomId } from './custom-id.js'
import type { Deferred } from './deferred.js'
import { DeleteAfterError, InteractionStateError, NoResponseError } from './errors.js'
import { silentLogger } from './logger.js'
import {
  buildEditPayload,
  buildMessagePayload,
  resolveFlags,
  toMessageOptions,
  type MessageInput,
} from './responses.js'
import { ScheduledTasks } from './tasks.js'
import type {
  Interaction,
  InteractionResponder,
  InteractionResponse,
  ResponseState,
} from './types.js'

// ==================== Types ====================

export type DeliveryMode =
  | { kind: 'push' }
  | { kind: 'pull'; response: Deferred<InteractionResponse> }

export interface ContextOptions<I extends Interaction> {
  interaction: I
  responder: InteractionResponder
  delivery: DeliveryMode
  ephemeralDefault?: boolean
  /** Where delayed deletes are scheduled; the client shares one across contexts. */
  tasks?: ScheduledTasks
  logger?: Logger
}

export interface DeferOptions {
  /** Defer as an update of the message the component is attached to. */
  update?: boolean
  ephemeral?: boolean
  flags?: number
}

export interface InitialResponseOptions {
  /** Update the source message instead of creating a new one. */
  update?: boolean
}

/** Interaction tokens stay valid for 15 minutes. */
export const INTERACTION_LIFETIME_MS = 15 * 60 * 1000

/** A delayed delete must land at least this long before the token dies. */
export const DELETE_AFTER_MARGIN_MS = 10_000

const DISCORD_EPOCH = 1420070400000n

/** Creation time encoded in a snowflake id. */
export function snowflakeTimestamp(id: string): number {
  return Number((BigInt(id) >> 22n) + DISCORD_EPOCH)
}

// ==================== Context ====================

export class BaseContext<I extends Interaction = Interaction> {
  readonly interaction: I
  readonly idMatch: string
  readonly idMetadata: string

  protected readonly responder: InteractionResponder
  protected ephemeralDefault: boolean
  protected readonly logger: Logger

  private readonly delivery: DeliveryMode
  private _hasBeenDeferred = false
  private _hasResponded = false
  private lastResponseId: string | undefined
  private responseLock = Promise.resolve()
  private readonly tasks: ScheduledTasks

  constructor(options: ContextOptions<I>) {
    this.interaction = options.interaction
    this.responder = options.responder
    this.delivery = options.delivery
    this.ephemeralDefault = options.ephemeralDefault ?? false
    this.logger = options.logger ?? silentLogger()
    this.tasks = options.tasks ?? new ScheduledTasks({ logger: this.logger })

    const { match, metadata } = splitCustomId(options.interaction.customId)
    this.idMatch = match
    this.idMetadata = metadata
  }

  // ==================== State ====================

  get state(): ResponseState {
    if (this._hasResponded) return 'responded'
    if (this._hasBeenDeferred) return 'deferred'
    return 'fresh'
  }

  get hasBeenDeferred(): boolean {
    return this._hasBeenDeferred
  }

  get hasResponded(): boolean {
    return this._hasResponded
  }

  get deliveryKind(): DeliveryMode['kind'] {
    return this.delivery.kind
  }

  get createdAt(): Date {
    return new Date(snowflakeTimestamp(this.interaction.id))
  }

  /** After this the token is dead and every REST call will 404. */
  get expiresAt(): Date {
    return new Date(this.createdAt.getTime() + INTERACTION_LIFETIME_MS)
  }

  setEphemeralDefault(state: boolean): this {
    this.ephemeralDefault = state
    return this
  }

  // ==================== Initial response ====================

  async defer(options: DeferOptions = {}): Promise<void> {
    const flags = resolveFlags(options, { ephemeralDefault: this.ephemeralDefault, isCreate: !options.update })

    await this.withLock(async () => {
      if (this.state !== 'fresh') throw new InteractionStateError('already-responded', this.state)

      await this.deliverInitial({
        type: options.update
          ? InteractionResponseType.DeferredMessageUpdate
          : InteractionResponseType.DeferredChannelMessageWithSource,
        ...(flags !== 0 ? { data: { flags } } : {}),
      })
      this._hasBeenDeferred = true
    })
  }

  async createInitialResponse(message: MessageInput, options: InitialResponseOptions = {}): Promise<void> {
    await this.withLock(() => this.createInitialResponseUnlocked(message, options))
  }

  async editInitialResponse(message: MessageInput): Promise<APIMessage> {
    return this.withLock(() => this.editInitialResponseUnlocked(message))
  }

  async deleteInitialResponse(): Promise<void> {
    await this.withLock(async () => {
      if (this.state === 'fresh') throw new InteractionStateError('not-responded', this.state)

      await this.responder.deleteOriginalResponse(this.interaction)
      // A deleted deferral still counts as answered so followups keep working.
      this._hasResponded = true
    })
  }

  async fetchInitialResponse(): Promise<APIMessage> {
    return this.responder.fetchOriginalResponse(this.interaction)
  }

  // ==================== Followups ====================

  async createFollowup(message: MessageInput): Promise<APIMessage> {
    return this.withLock(() => this.createFollowupUnlocked(message))
  }

  /**
   * Answer however the current state allows: a followup once responded, an
   * edit after a deferral, otherwise the initial response.
   */
  async respond(message: MessageInput): Promise<APIMessage | undefined> {
    return this.withLock(async () => {
      if (this._hasResponded) return this.createFollowupUnlocked(message)
      if (this._hasBeenDeferred) return this.editInitialResponseUnlocked(message)

      await this.createInitialResponseUnlocked(message, {})
      return undefined
    })
  }

  /**
   * Create the initial response, or edit the deferral, unless something was
   * already sent. Returns whether a response went out.
   */
  async respondIfUnanswered(message: MessageInput): Promise<boolean> {
    return this.withLock(async () => {
      if (this._hasResponded) return false

      if (this._hasBeenDeferred) await this.editInitialResponseUnlocked(message)
      else await this.createInitialResponseUnlocked(message, {})
      return true
    })
  }

  async editLastResponse(message: MessageInput): Promise<APIMessage> {
    return this.withLock(async () => {
      if (this.lastResponseId !== undefined) {
        return this.responder.editFollowup(
          this.interaction,
          this.lastResponseId,
          buildEditPayload(toMessageOptions(message)),
        )
      }

      if (this.state !== 'fresh') return this.editInitialResponseUnlocked(message)
      throw new NoResponseError('edit')
    })
  }

  async deleteLastResponse(): Promise<void> {
    await this.withLock(async () => {
      if (this.lastResponseId !== undefined) {
        await this.responder.deleteFollowup(this.interaction, this.lastResponseId)
        return
      }

      if (this.state === 'fresh') throw new NoResponseError('delete')

      await this.responder.deleteOriginalResponse(this.interaction)
      this._hasResponded = true
    })
  }

  async fetchLastResponse(): Promise<APIMessage> {
    if (this.lastResponseId !== undefined) {
      return this.responder.fetchFollowup(this.interaction, this.lastResponseId)
    }

    if (this.state !== 'fresh') return this.fetchInitialResponse()
    throw new NoResponseError('fetch')
  }

  // ==================== Internals ====================

  /** Send (push) or hand back (pull) the initial response. Caller holds the lock. */
  protected async deliverInitial(response: InteractionResponse): Promise<void> {
    if (this.delivery.kind === 'pull') {
      this.delivery.response.resolve(response)
      return
    }

    await this.responder.createInteractionResponse(this.interaction, response)
  }

  /** Caller holds the lock. Marks the context responded on success. */
  protected async deliverInitialFromFresh(response: InteractionResponse): Promise<void> {
    if (this._hasResponded) throw new InteractionStateError('already-responded', this.state)
    if (this._hasBeenDeferred) throw new InteractionStateError('must-edit', this.state)

    await this.deliverInitial(response)
    this._hasResponded = true
  }

  private async createInitialResponseUnlocked(message: MessageInput, options: InitialResponseOptions): Promise<void> {
    const opts = toMessageOptions(message)
    this.checkDeleteAfter(opts.deleteAfterMs)
    const flags = resolveFlags(opts, { ephemeralDefault: this.ephemeralDefault, isCreate: !options.update })

    await this.deliverInitialFromFresh({
      type: options.update
        ? InteractionResponseType.UpdateMessage
        : InteractionResponseType.ChannelMessageWithSource,
      data: buildMessagePayload(opts, flags),
    })
    if (opts.deleteAfterMs !== undefined) this.scheduleDelete(opts.deleteAfterMs, () => this.deleteInitialResponse())
  }

  private async editInitialResponseUnlocked(message: MessageInput): Promise<APIMessage> {
    if (this.state === 'fresh') throw new InteractionStateError('not-responded', this.state)

    const opts = toMessageOptions(message)
    this.checkDeleteAfter(opts.deleteAfterMs)
    const result = await this.responder.editOriginalResponse(this.interaction, buildEditPayload(opts))
    this._hasResponded = true
    if (opts.deleteAfterMs !== undefined) this.scheduleDelete(opts.deleteAfterMs, () => this.deleteInitialResponse())
    return result
  }

  private async createFollowupUnlocked(message: MessageInput): Promise<APIMessage> {
    if (!this._hasResponded) throw new InteractionStateError('not-responded', this.state)

    const opts = toMessageOptions(message)
    this.checkDeleteAfter(opts.deleteAfterMs)
    const flags = resolveFlags(opts, { ephemeralDefault: this.ephemeralDefault, isCreate: true })
    const result = await this.responder.createFollowup(this.interaction, buildMessagePayload(opts, flags))
    this.lastResponseId = result.id
    if (opts.deleteAfterMs !== undefined) {
      this.scheduleDelete(opts.deleteAfterMs, () => this.responder.deleteFollowup(this.interaction, result.id))
    }
    return result
  }

  private checkDeleteAfter(deleteAfterMs: number | undefined): void {
    if (deleteAfterMs === undefined) return

    const remainingMs = this.expiresAt.getTime() - Date.now()
    if (deleteAfterMs + DELETE_AFTER_MARGIN_MS > remainingMs) throw new DeleteAfterError(deleteAfterMs, remainingMs)
  }

  private scheduleDelete(deleteAfterMs: number, remove: () => Promise<void>): void {
    this.tasks.schedule(deleteAfterMs, async () => {
      try {
        await remove()
      } catch (err) {
        if (!isNotFound(err)) throw err
        this.logger.debug({ err, deleteAfterMs }, 'response already gone before scheduled delete')
      }
    })
  }

  /** Serialize response-producing calls for this interaction. */
  protected async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.responseLock
    let release!: () => void
    this.responseLock = new Promise<void>((r) => { release = r })
    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'statusCode' in err && err.statusCode === 404
}

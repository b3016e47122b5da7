/**
 * Pull transport: Discord's HTTP interactions endpoint.
 *
 * Verifies the ed25519 signature, answers PINGs, and hands component and
 * modal interactions to the registered listener, whose result is the HTTP
 * response body.
 */

import { Hono } from 'hono'
import { InteractionResponseType } from 'discord-api-types/v10'
import type { KeyObject } from 'node:crypto'
import type { Logger } from 'pino'
import { silentLogger } from '../../core/logger.js'
import type { InteractionKind, InteractionResponse, PullListeners, PullTransport } from '../../core/types.js'
import { parseInteraction, type ParsedInteraction } from './handler.js'
import { importPublicKey, SIGNATURE_HEADER, TIMESTAMP_HEADER, verifyInteractionSignature } from './verify.js'

export interface InteractionServerOptions {
  /** Application public key, hex. */
  publicKey: string
  logger?: Logger
}

export type HandleResult =
  | { status: 200; body: InteractionResponse }
  | { status: 400 | 401 | 500 | 503; body: { error: string } }

export class InteractionServer implements PullTransport {
  private listeners: Partial<PullListeners> = {}
  private publicKey: KeyObject
  private logger: Logger

  constructor(options: InteractionServerOptions) {
    this.publicKey = importPublicKey(options.publicKey)
    this.logger = options.logger?.child({ module: 'interaction-server' }) ?? silentLogger()
  }

  setListener<K extends InteractionKind>(kind: K, listener: PullListeners[K] | undefined): void {
    this.listeners[kind] = listener
  }

  /** Verify, parse and dispatch one request. */
  async handle(body: string, signature: string, timestamp: string): Promise<HandleResult> {
    if (!verifyInteractionSignature(this.publicKey, signature, timestamp, body)) {
      this.logger.warn('rejected interaction with invalid signature')
      return { status: 401, body: { error: 'invalid request signature' } }
    }

    let raw: unknown
    try {
      raw = JSON.parse(body)
    } catch {
      return { status: 400, body: { error: 'invalid JSON body' } }
    }

    const interaction = parseInteraction(raw)
    if (!interaction) return { status: 400, body: { error: 'unsupported interaction' } }
    if (interaction.kind === 'ping') return { status: 200, body: { type: InteractionResponseType.Pong } }

    const pending = this.dispatch(interaction)
    if (!pending) {
      this.logger.warn({ kind: interaction.kind }, 'no listener for interaction')
      return { status: 503, body: { error: `no ${interaction.kind} listener` } }
    }

    try {
      return { status: 200, body: await pending }
    } catch (err) {
      this.logger.error({ err, customId: interaction.customId }, 'interaction handler failed')
      return { status: 500, body: { error: 'interaction handler failed' } }
    }
  }

  /** Hono sub-app handling `POST /`; mount it at the configured path. */
  routes(): Hono {
    const app = new Hono()

    app.post('/', async (c) => {
      const result = await this.handle(
        await c.req.text(),
        c.req.header(SIGNATURE_HEADER) ?? '',
        c.req.header(TIMESTAMP_HEADER) ?? '',
      )
      return c.json(result.body, result.status)
    })

    return app
  }

  private dispatch(interaction: Exclude<ParsedInteraction, { kind: 'ping' }>): Promise<InteractionResponse> | undefined {
    if (interaction.kind === 'component') return this.listeners.component?.(interaction)
    return this.listeners.modal?.(interaction)
  }
}

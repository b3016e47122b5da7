/**
 * Push transport fed by whatever gateway connection the host owns.
 *
 *   gateway.dispatch(payload) // raw INTERACTION_CREATE `d`
 *
 * Parsed interactions are emitted to the subscribed clients; listeners run
 * synchronously and are expected to handle their own errors.
 */

import { EventEmitter } from 'node:events'
import type { Logger } from 'pino'
import { silentLogger } from '../../core/logger.js'
import type { InteractionKind, PushListeners, PushTransport } from '../../core/types.js'
import { parseInteraction } from './handler.js'

export type DispatchResult = InteractionKind | 'ignored'

export class InteractionGateway implements PushTransport {
  private emitter = new EventEmitter()
  private logger: Logger

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger?.child({ module: 'gateway' }) ?? silentLogger()
  }

  subscribe<K extends InteractionKind>(kind: K, listener: PushListeners[K]): () => void {
    this.emitter.on(kind, listener)
    return () => {
      this.emitter.off(kind, listener)
    }
  }

  listenerCount(kind: InteractionKind): number {
    return this.emitter.listenerCount(kind)
  }

  /** Route one raw interaction payload. */
  dispatch(raw: unknown): DispatchResult {
    const interaction = parseInteraction(raw)
    if (!interaction || interaction.kind === 'ping') {
      this.logger.debug('ignoring unsupported interaction payload')
      return 'ignored'
    }

    if (!this.emitter.emit(interaction.kind, interaction)) {
      this.logger.debug({ kind: interaction.kind, customId: interaction.customId }, 'no subscriber for interaction')
    }
    return interaction.kind
  }
}

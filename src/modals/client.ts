import type { DeliveryMode } from '../core/context.js'
import { InteractionClient, type InteractionClientOptions } from '../core/interaction-client.js'
import { NeverTimeout } from '../core/timeouts.js'
import type { ModalInteraction } from '../core/types.js'
import { ModalContext } from './context.js'
import type { IModal } from './modal.js'

export const MODAL_TIMED_OUT_MESSAGE = 'This modal has timed-out.'

/** Registry and dispatcher for modal submissions. */
export class ModalClient extends InteractionClient<ModalInteraction, ModalContext, IModal> {
  protected readonly timedOutMessage = MODAL_TIMED_OUT_MESSAGE

  constructor(options: InteractionClientOptions) {
    super({ ...options, logger: options.logger?.child({ module: 'modals' }) })
  }

  /** Register a modal that never times out, for modals opened from persistent components. */
  setConstantId(customId: string, modal: IModal, options: { prefixMatch?: boolean } = {}): this {
    this.register(customId, modal, { timeout: new NeverTimeout(), prefixMatch: options.prefixMatch })
    return this
  }

  removeConstantId(customId: string): this {
    this.unregister(customId)
    return this
  }

  protected createContext(interaction: ModalInteraction, delivery: DeliveryMode): ModalContext {
    return new ModalContext({ interaction, delivery, ...this.contextDeps() })
  }

  protected attachTransports(): Array<() => void> {
    const detach: Array<() => void> = []
    const { push, pull } = this

    if (push) detach.push(push.subscribe('modal', (interaction) => this.dispatchPush(interaction)))
    if (pull) {
      pull.setListener('modal', (interaction) => this.onPullRequest(interaction))
      detach.push(() => pull.setListener('modal', undefined))
    }
    return detach
  }
}

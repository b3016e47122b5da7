import { InteractionResponseType } from 'discord-api-types/v10'
import { BaseContext } from '../core/context.js'
import type { ComponentInteraction, ModalResponseData } from '../core/types.js'

/** Context for a message component (button or select) interaction. */
export class ComponentContext extends BaseContext<ComponentInteraction> {
  /** Values picked in a select menu. Empty for buttons. */
  get selectedValues(): string[] {
    return this.interaction.values
  }

  /**
   * Answer by opening a modal. Only valid as the initial response; the modal's
   * submission arrives as a separate interaction.
   */
  async createModalResponse(data: ModalResponseData): Promise<void> {
    await this.withLock(() => this.deliverInitialFromFresh({ type: InteractionResponseType.Modal, data }))
  }
}

import { BaseContext } from '../core/context.js'
import type { ModalFieldPayload, ModalInteraction } from '../core/types.js'

/** Context for a modal submission. */
export class ModalContext extends BaseContext<ModalInteraction> {
  get fields(): readonly ModalFieldPayload[] {
    return this.interaction.fields
  }
}

import type { BaseContext } from './context.js'
import type { MessageOptions } from './responses.js'

/**
 * Error whose content is shown to the user instead of propagating.
 *
 * Throw it from a component or modal callback; the client catches it and
 * answers the interaction with it (ephemeral unless told otherwise).
 */
export class InteractionError extends Error {
  readonly response: MessageOptions

  constructor(content: string | MessageOptions) {
    const response = typeof content === 'string' ? { content } : content
    super(response.content ?? '')
    this.name = 'InteractionError'
    this.response = { ephemeral: true, ...response }
  }

  /** Answer `ctx` with this error through whichever path its state allows. */
  async send(ctx: BaseContext): Promise<void> {
    await ctx.respond(this.response)
  }
}

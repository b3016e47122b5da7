import { InteractionResponseType, MessageFlags } from 'discord-api-types/v10'
import type { APIActionRowComponent, APIAllowedMentions, APIEmbed, APIMessageActionRowComponent } from 'discord-api-types/v10'
import type { InteractionResponse, MessagePayload } from './types.js'

/** What handlers pass to respond/create/edit/followup. A bare string is content. */
export interface MessageOptions {
  content?: string
  embeds?: APIEmbed[]
  components?: APIActionRowComponent<APIMessageActionRowComponent>[]
  allowedMentions?: APIAllowedMentions
  /** Shorthand for toggling the ephemeral flag on top of `flags`. */
  ephemeral?: boolean
  flags?: number
  tts?: boolean
  /** Delete the message this many ms after it was sent. */
  deleteAfterMs?: number
}

export type MessageInput = string | MessageOptions

export function toMessageOptions(input: MessageInput): MessageOptions {
  return typeof input === 'string' ? { content: input } : input
}

/**
 * Resolve message flags.
 *
 * Without explicit flags, ephemeral is on when asked for, or when the context
 * defaults to ephemeral and this call creates a new message.
 */
export function resolveFlags(
  options: { flags?: number; ephemeral?: boolean },
  context: { ephemeralDefault: boolean; isCreate: boolean },
): number {
  const { flags, ephemeral } = options

  if (flags === undefined) {
    if (ephemeral === true || (ephemeral === undefined && context.isCreate && context.ephemeralDefault)) {
      return MessageFlags.Ephemeral
    }
    return 0
  }

  if (ephemeral === true) return flags | MessageFlags.Ephemeral
  if (ephemeral === false) return flags & ~MessageFlags.Ephemeral
  return flags
}

/** Body for creates and followups (flags allowed). */
export function buildMessagePayload(options: MessageOptions, flags: number): MessagePayload {
  const payload = buildEditPayload(options)
  if (flags !== 0) payload.flags = flags
  if (options.tts !== undefined) payload.tts = options.tts
  return payload
}

/** Body for edits: flags and tts cannot change after creation. */
export function buildEditPayload(options: MessageOptions): MessagePayload {
  const payload: MessagePayload = {}
  if (options.content !== undefined) payload.content = options.content
  if (options.embeds !== undefined) payload.embeds = options.embeds
  if (options.components !== undefined) payload.components = options.components
  if (options.allowedMentions !== undefined) payload.allowed_mentions = options.allowedMentions
  return payload
}

/** Ephemeral content-only response used when no live handler is found. */
export function buildTimedOutResponse(content: string): InteractionResponse {
  return {
    type: InteractionResponseType.ChannelMessageWithSource,
    data: { content, flags: MessageFlags.Ephemeral },
  }
}

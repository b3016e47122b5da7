import { describe, it, expect } from 'vitest'
import { InteractionResponseType, MessageFlags } from 'discord-api-types/v10'
import { buildEditPayload, buildMessagePayload, buildTimedOutResponse, resolveFlags } from './responses.js'

const SUPPRESS_EMBEDS = MessageFlags.SuppressEmbeds

describe('resolveFlags', () => {
  it('is 0 by default', () => {
    expect(resolveFlags({}, { ephemeralDefault: false, isCreate: true })).toBe(0)
  })

  it('applies the ephemeral default to creates only', () => {
    expect(resolveFlags({}, { ephemeralDefault: true, isCreate: true })).toBe(MessageFlags.Ephemeral)
    expect(resolveFlags({}, { ephemeralDefault: true, isCreate: false })).toBe(0)
  })

  it('lets an explicit ephemeral override the default', () => {
    expect(resolveFlags({ ephemeral: false }, { ephemeralDefault: true, isCreate: true })).toBe(0)
    expect(resolveFlags({ ephemeral: true }, { ephemeralDefault: false, isCreate: false })).toBe(MessageFlags.Ephemeral)
  })

  it('toggles the ephemeral bit on explicit flags', () => {
    const ctx = { ephemeralDefault: false, isCreate: true }
    expect(resolveFlags({ flags: SUPPRESS_EMBEDS, ephemeral: true }, ctx)).toBe(SUPPRESS_EMBEDS | MessageFlags.Ephemeral)
    expect(resolveFlags({ flags: SUPPRESS_EMBEDS | MessageFlags.Ephemeral, ephemeral: false }, ctx)).toBe(SUPPRESS_EMBEDS)
  })

  it('leaves explicit flags untouched without ephemeral', () => {
    expect(resolveFlags({ flags: SUPPRESS_EMBEDS }, { ephemeralDefault: true, isCreate: true })).toBe(SUPPRESS_EMBEDS)
  })
})

describe('payload builders', () => {
  it('maps options to wire names and drops undefined fields', () => {
    expect(buildEditPayload({ content: 'hi', allowedMentions: { parse: [] }, ephemeral: true })).toEqual({
      content: 'hi',
      allowed_mentions: { parse: [] },
    })
  })

  it('adds non-zero flags and tts to creates', () => {
    expect(buildMessagePayload({ content: 'hi', tts: true }, MessageFlags.Ephemeral)).toEqual({
      content: 'hi',
      flags: MessageFlags.Ephemeral,
      tts: true,
    })
    expect(buildMessagePayload({ content: 'hi' }, 0)).toEqual({ content: 'hi' })
  })

  it('builds an ephemeral timed-out response', () => {
    expect(buildTimedOutResponse('This message has timed-out.')).toEqual({
      type: InteractionResponseType.ChannelMessageWithSource,
      data: { content: 'This message has timed-out.', flags: 64 },
    })
  })
})

import { ComponentType, InteractionType } from 'discord-api-types/v10'

let nextId = 1

export function resetCounters() {
  nextId = 1
}

const SNOWFLAKE_2024 = '1191168914227200000'

function base(type: InteractionType, overrides?: Record<string, unknown>) {
  const n = nextId++
  return {
    id: SNOWFLAKE_2024,
    application_id: 'app-1',
    type,
    token: `token-${n}`,
    version: 1,
    guild_id: 'guild-1',
    channel_id: 'channel-1',
    locale: 'en-US',
    member: { user: { id: 'user-1', username: 'alice', global_name: 'Alice' } },
    ...overrides,
  }
}

export function pingPayload() {
  return { id: SNOWFLAKE_2024, application_id: 'app-1', type: InteractionType.Ping, token: 'token-ping', version: 1 }
}

export function buttonPayload(customId: string, overrides?: Record<string, unknown>) {
  return base(InteractionType.MessageComponent, {
    message: { id: 'message-1' },
    data: { custom_id: customId, component_type: ComponentType.Button },
    ...overrides,
  })
}

export function selectPayload(customId: string, values: string[]) {
  return base(InteractionType.MessageComponent, {
    message: { id: 'message-1' },
    data: { custom_id: customId, component_type: ComponentType.StringSelect, values },
  })
}

export function modalPayload(customId: string, components: unknown[]) {
  return base(InteractionType.ModalSubmit, { data: { custom_id: customId, components } })
}

export function textRow(customId: string, value: string) {
  return { type: ComponentType.ActionRow, components: [{ type: ComponentType.TextInput, custom_id: customId, value }] }
}

export function selectLabel(customId: string, values: string[]) {
  return { type: 18, id: 2, component: { type: ComponentType.StringSelect, custom_id: customId, values } }
}

export function commandPayload() {
  return base(InteractionType.ApplicationCommand, { data: { id: 'cmd-1', name: 'ping', type: 1 } })
}

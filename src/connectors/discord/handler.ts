/**
 * Raw Discord interaction payload → typed interaction.
 *
 * Handles PING, MESSAGE_COMPONENT and MODAL_SUBMIT. Anything else (commands,
 * autocomplete) or a payload that doesn't match the expected shape yields null.
 */

import { z } from 'zod'
import { ComponentType, InteractionType } from 'discord-api-types/v10'
import {
  LABEL_COMPONENT_TYPE,
  type ComponentInteraction,
  type ModalFieldPayload,
  type ModalInteraction,
} from '../../core/types.js'

export type ParsedInteraction = { kind: 'ping' } | ComponentInteraction | ModalInteraction

// ==================== Schemas ====================

const userSchema = z.object({
  id: z.string(),
  username: z.string(),
  global_name: z.string().nullish(),
})

const baseSchema = z.object({
  id: z.string(),
  application_id: z.string(),
  token: z.string(),
  guild_id: z.string().optional(),
  channel_id: z.string().optional(),
  locale: z.string().optional(),
  member: z.object({ user: userSchema }).optional(),
  user: userSchema.optional(),
  message: z.object({ id: z.string() }).optional(),
})

const componentDataSchema = z.object({
  custom_id: z.string(),
  component_type: z.nativeEnum(ComponentType),
  values: z.array(z.string()).optional(),
})

const submittedInputSchema = z.object({
  type: z.nativeEnum(ComponentType),
  custom_id: z.string(),
  value: z.string().optional(),
  values: z.array(z.string()).optional(),
})

const submittedRowSchema = z.object({
  type: z.literal(ComponentType.ActionRow),
  components: z.array(submittedInputSchema),
})

const submittedLabelSchema = z.object({
  type: z.literal(LABEL_COMPONENT_TYPE),
  component: submittedInputSchema,
})

const modalDataSchema = z.object({
  custom_id: z.string(),
  components: z.array(z.unknown()),
})

// ==================== Parser ====================

export function parseInteraction(raw: unknown): ParsedInteraction | null {
  const typed = z.object({ type: z.number() }).safeParse(raw)
  if (!typed.success) return null
  if (typed.data.type === InteractionType.Ping) return { kind: 'ping' }

  const base = baseSchema.safeParse(raw)
  if (!base.success) return null

  const b = base.data
  const rawUser = b.member?.user ?? b.user
  if (!rawUser) return null

  const common = {
    id: b.id,
    applicationId: b.application_id,
    token: b.token,
    user: {
      id: rawUser.id,
      username: rawUser.username,
      ...(rawUser.global_name ? { globalName: rawUser.global_name } : {}),
    },
    guildId: b.guild_id,
    channelId: b.channel_id,
    locale: b.locale,
    messageId: b.message?.id,
  }

  const data = z.object({ data: z.unknown() }).safeParse(raw)
  if (!data.success) return null

  if (typed.data.type === InteractionType.MessageComponent) {
    const component = componentDataSchema.safeParse(data.data.data)
    if (!component.success) return null

    return {
      ...common,
      kind: 'component',
      customId: component.data.custom_id,
      componentType: component.data.component_type,
      values: component.data.values ?? [],
    }
  }

  if (typed.data.type === InteractionType.ModalSubmit) {
    const modal = modalDataSchema.safeParse(data.data.data)
    if (!modal.success) return null

    return {
      ...common,
      kind: 'modal',
      customId: modal.data.custom_id,
      fields: flattenModalFields(modal.data.components),
    }
  }

  return null
}

/** Pull the inputs out of action rows and labels. Other top-level components are skipped. */
export function flattenModalFields(components: unknown[]): ModalFieldPayload[] {
  const inputs: z.infer<typeof submittedInputSchema>[] = []

  for (const component of components) {
    const row = submittedRowSchema.safeParse(component)
    if (row.success) {
      inputs.push(...row.data.components)
      continue
    }

    const label = submittedLabelSchema.safeParse(component)
    if (label.success) inputs.push(label.data.component)
  }

  return inputs.map((input) => ({
    customId: input.custom_id,
    type: input.type,
    ...(input.values !== undefined
      ? { value: input.values }
      : input.value !== undefined ? { value: input.value } : {}),
  }))
}

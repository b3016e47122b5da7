import type {
  APIActionRowComponent,
  APIAllowedMentions,
  APIEmbed,
  APIMessage,
  APIMessageActionRowComponent,
  APIStringSelectComponent,
  APITextInputComponent,
  ComponentType,
  InteractionResponseType,
} from 'discord-api-types/v10'
import type { Logger } from 'pino'
import type { Config } from './config.js'

// ==================== Plugins ====================

export interface Plugin {
  name: string
  start(ctx: BotContext): Promise<void>
  stop(): Promise<void>
}

export interface BotContext {
  config: Config
  logger: Logger
}

// ==================== Interactions ====================

/** Enough of an interaction to talk to its webhook endpoints. */
export interface InteractionRef {
  id: string
  applicationId: string
  token: string
}

export interface InteractionUser {
  id: string
  username: string
  globalName?: string
}

interface InteractionBase extends InteractionRef {
  customId: string
  user: InteractionUser
  guildId?: string
  channelId?: string
  locale?: string
  /** Message the component is attached to (or the modal was opened from). */
  messageId?: string
}

export interface ComponentInteraction extends InteractionBase {
  kind: 'component'
  componentType: ComponentType
  /** Selected values for select menus; empty for buttons. */
  values: string[]
}

/** One submitted modal field as reported by the platform. */
export interface ModalFieldPayload {
  customId: string
  type: ComponentType
  /** string for text inputs, string[] for selects; absent when not filled. */
  value?: string | string[]
}

export interface ModalInteraction extends InteractionBase {
  kind: 'modal'
  fields: ModalFieldPayload[]
}

export type Interaction = ComponentInteraction | ModalInteraction

export type InteractionKind = Interaction['kind']

// ==================== Responses ====================

export type ResponseState = 'fresh' | 'deferred' | 'responded'

/** Message body shared by initial responses, edits and followups. */
export interface MessagePayload {
  content?: string
  embeds?: APIEmbed[]
  components?: APIActionRowComponent<APIMessageActionRowComponent>[]
  allowed_mentions?: APIAllowedMentions
  flags?: number
  tts?: boolean
}

/** Component type id of a modal label wrapping one input. */
export const LABEL_COMPONENT_TYPE = 18

export type ModalComponentPayload =
  | { type: ComponentType.ActionRow; components: [APITextInputComponent] }
  | {
    type: typeof LABEL_COMPONENT_TYPE
    label: string
    description?: string
    component: APIStringSelectComponent | APITextInputComponent
  }

export interface ModalResponseData {
  custom_id: string
  title: string
  components: ModalComponentPayload[]
}

export type InteractionResponse =
  | {
    type: InteractionResponseType.ChannelMessageWithSource | InteractionResponseType.UpdateMessage
    data: MessagePayload
  }
  | {
    type: InteractionResponseType.DeferredChannelMessageWithSource | InteractionResponseType.DeferredMessageUpdate
    data?: { flags?: number }
  }
  | { type: InteractionResponseType.Modal; data: ModalResponseData }
  | { type: InteractionResponseType.Pong }

/** Outbound REST surface a context needs. Implemented by DiscordRestClient. */
export interface InteractionResponder {
  createInteractionResponse(interaction: InteractionRef, response: InteractionResponse): Promise<void>
  fetchOriginalResponse(interaction: InteractionRef): Promise<APIMessage>
  editOriginalResponse(interaction: InteractionRef, body: MessagePayload): Promise<APIMessage>
  deleteOriginalResponse(interaction: InteractionRef): Promise<void>
  createFollowup(interaction: InteractionRef, body: MessagePayload): Promise<APIMessage>
  fetchFollowup(interaction: InteractionRef, messageId: string): Promise<APIMessage>
  editFollowup(interaction: InteractionRef, messageId: string, body: MessagePayload): Promise<APIMessage>
  deleteFollowup(interaction: InteractionRef, messageId: string): Promise<void>
}

// ==================== Transports ====================

export interface PushListeners {
  component: (interaction: ComponentInteraction) => void
  modal: (interaction: ModalInteraction) => void
}

/** Event stream delivering interactions; responses go out over REST. */
export interface PushTransport {
  /** Returns an unsubscribe function. */
  subscribe<K extends InteractionKind>(kind: K, listener: PushListeners[K]): () => void
}

export interface PullListeners {
  component: (interaction: ComponentInteraction) => Promise<InteractionResponse>
  modal: (interaction: ModalInteraction) => Promise<InteractionResponse>
}

/** Request/response transport: the listener's return value is the response. */
export interface PullTransport {
  setListener<K extends InteractionKind>(kind: K, listener: PullListeners[K] | undefined): void
}

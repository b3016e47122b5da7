import { z } from 'zod'
import type { APIMessage } from 'discord-api-types/v10'
import type {
  InteractionRef,
  InteractionResponder,
  InteractionResponse,
  MessagePayload,
} from '../../core/types.js'

export interface DiscordRestClientOptions {
  /** Bot token. The interaction webhook routes work without one. */
  token?: string
  baseUrl?: string
  /** Injectable for testing */
  fetchFn?: typeof globalThis.fetch
}

export class DiscordApiError extends Error {
  constructor(
    public method: string,
    /** Route template; never contains the interaction token. */
    public route: string,
    public statusCode: number,
    public body: unknown,
    public retryAfter?: number,
  ) {
    super(`Discord API error [${method} ${route}]: ${statusCode} ${errorMessage(body)}`)
    this.name = 'DiscordApiError'
  }
}

const errorBodySchema = z.object({
  message: z.string().optional(),
  code: z.number().optional(),
  retry_after: z.number().optional(),
})

function errorMessage(body: unknown): string {
  const parsed = errorBodySchema.safeParse(body)
  return (parsed.success && parsed.data.message) || 'Unknown error'
}

interface Route {
  method: 'GET' | 'POST' | 'PATCH' | 'DELETE'
  /** Template used in errors and logs. */
  route: string
  path: string
}

/** REST client for the interaction callback and webhook message endpoints. */
export class DiscordRestClient implements InteractionResponder {
  private token?: string
  private baseUrl: string
  private fetchFn: typeof globalThis.fetch
  private maxAttempts = 3

  constructor(options: DiscordRestClientOptions = {}) {
    this.token = options.token
    this.baseUrl = options.baseUrl ?? 'https://discord.com/api/v10'
    this.fetchFn = options.fetchFn ?? globalThis.fetch
  }

  // ==================== Initial response ====================

  async createInteractionResponse(interaction: InteractionRef, response: InteractionResponse): Promise<void> {
    await this.send({
      method: 'POST',
      route: '/interactions/:id/:token/callback',
      path: `/interactions/${interaction.id}/${interaction.token}/callback`,
    }, response)
  }

  async fetchOriginalResponse(interaction: InteractionRef): Promise<APIMessage> {
    return this.json<APIMessage>(original('GET', interaction))
  }

  async editOriginalResponse(interaction: InteractionRef, body: MessagePayload): Promise<APIMessage> {
    return this.json<APIMessage>(original('PATCH', interaction), body)
  }

  async deleteOriginalResponse(interaction: InteractionRef): Promise<void> {
    await this.send(original('DELETE', interaction))
  }

  // ==================== Followups ====================

  async createFollowup(interaction: InteractionRef, body: MessagePayload): Promise<APIMessage> {
    return this.json<APIMessage>({
      method: 'POST',
      route: '/webhooks/:applicationId/:token',
      path: `/webhooks/${interaction.applicationId}/${interaction.token}`,
    }, body)
  }

  async fetchFollowup(interaction: InteractionRef, messageId: string): Promise<APIMessage> {
    return this.json<APIMessage>(followup('GET', interaction, messageId))
  }

  async editFollowup(interaction: InteractionRef, messageId: string, body: MessagePayload): Promise<APIMessage> {
    return this.json<APIMessage>(followup('PATCH', interaction, messageId), body)
  }

  async deleteFollowup(interaction: InteractionRef, messageId: string): Promise<void> {
    await this.send(followup('DELETE', interaction, messageId))
  }

  // ==================== Transport ====================

  private async json<T>(route: Route, body?: unknown): Promise<T> {
    const res = await this.send(route, body)
    return (await res.json()) as T
  }

  /** Perform a request, retrying on 429 up to maxAttempts. Throws DiscordApiError otherwise. */
  private async send(route: Route, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = {}
    if (body !== undefined) headers['Content-Type'] = 'application/json'
    if (this.token) headers.Authorization = `Bot ${this.token}`

    let attempts = 0

    while (true) {
      attempts++
      const res = await this.fetchFn(`${this.baseUrl}${route.path}`, {
        method: route.method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
      })

      if (res.status >= 200 && res.status < 300) return res

      const errorBody: unknown = await res.json()
      const parsed = errorBodySchema.safeParse(errorBody)
      const retryAfter = parsed.success ? parsed.data.retry_after : undefined

      if (res.status === 429 && retryAfter !== undefined && attempts < this.maxAttempts) {
        await sleep(retryAfter * 1000)
        continue
      }

      throw new DiscordApiError(route.method, route.route, res.status, errorBody, retryAfter)
    }
  }
}

function original(method: Route['method'], interaction: InteractionRef): Route {
  return {
    method,
    route: '/webhooks/:applicationId/:token/messages/@original',
    path: `/webhooks/${interaction.applicationId}/${interaction.token}/messages/@original`,
  }
}

function followup(method: Route['method'], interaction: InteractionRef, messageId: string): Route {
  return {
    method,
    route: '/webhooks/:applicationId/:token/messages/:messageId',
    path: `/webhooks/${interaction.applicationId}/${interaction.token}/messages/${messageId}`,
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

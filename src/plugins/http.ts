import { Hono } from 'hono'
import { serve } from '@hono/node-server'
import type { Plugin, BotContext } from '../core/types.js'
import type { InteractionServer } from '../connectors/discord/index.js'

/** Builds the HTTP app: health check plus the interactions endpoint. */
export function createHttpApp(interactions: InteractionServer, path: string): Hono {
  const app = new Hono()

  app.get('/health', (c) => c.json({ ok: true }))
  app.route(path, interactions.routes())

  return app
}

export class HttpPlugin implements Plugin {
  name = 'http'
  private server: ReturnType<typeof serve> | null = null
  private logger: BotContext['logger'] | null = null

  constructor(private interactions: InteractionServer) {}

  async start(ctx: BotContext) {
    const app = createHttpApp(this.interactions, ctx.config.server.path)
    const logger = ctx.logger.child({ module: 'http' })
    this.logger = logger

    this.server = serve({ fetch: app.fetch, port: ctx.config.server.port }, (info) => {
      logger.info({ port: info.port, path: ctx.config.server.path }, 'http plugin listening')
    })
  }

  async stop() {
    if (!this.server) return
    this.server.close()
    this.server = null
    this.logger?.info('http plugin stopped')
  }
}

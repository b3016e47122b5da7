import type { Logger } from 'pino'
import { ComponentClient } from './components/index.js'
import { DiscordRestClient, InteractionGateway, InteractionServer } from './connectors/discord/index.js'
import type { Config } from './core/config.js'
import type { InteractionClientOptions } from './core/interaction-client.js'
import { createLogger } from './core/logger.js'
import { SlidingTimeout } from './core/timeouts.js'
import type { Plugin } from './core/types.js'
import { ModalClient } from './modals/index.js'
import { HttpPlugin } from './plugins/http.js'

export interface BotDeps {
  logger?: Logger
  /** Injectable for testing */
  fetchFn?: typeof globalThis.fetch
  /** Plugins to run. Defaults to the HTTP plugin serving the interactions endpoint. */
  plugins?: Plugin[]
}

export interface Bot {
  rest: DiscordRestClient
  gateway: InteractionGateway
  interactions: InteractionServer
  components: ComponentClient
  modals: ModalClient
  start(): Promise<void>
  stop(): Promise<void>
}

/** Wire the REST client, both transports and both registries together. */
export function createBot(config: Config, deps: BotDeps = {}): Bot {
  const logger = deps.logger ?? createLogger()

  const rest = new DiscordRestClient({
    token: config.token,
    baseUrl: config.discord.apiBaseUrl,
    fetchFn: deps.fetchFn,
  })
  const gateway = new InteractionGateway({ logger })
  const interactions = new InteractionServer({ publicKey: config.discord.publicKey, logger })

  const clientOptions: InteractionClientOptions = {
    responder: rest,
    push: gateway,
    pull: interactions,
    logger,
    defaultTimeout: () => new SlidingTimeout(config.interactions.defaultTimeoutMs),
    reaperIntervalMs: config.interactions.reaperIntervalMs,
    pullDeferAfterMs: config.interactions.pullDeferAfterMs,
  }
  const components = new ComponentClient(clientOptions)
  const modals = new ModalClient(clientOptions)

  const plugins: Plugin[] = deps.plugins ?? [new HttpPlugin(interactions)]

  return {
    rest,
    gateway,
    interactions,
    components,
    modals,

    async start() {
      components.open()
      modals.open()
      for (const plugin of plugins) {
        await plugin.start({ config, logger })
        logger.info({ plugin: plugin.name }, 'plugin started')
      }
    },

    async stop() {
      for (const plugin of [...plugins].reverse()) {
        await plugin.stop()
      }
      modals.close()
      components.close()
      logger.info('bot stopped')
    },
  }
}

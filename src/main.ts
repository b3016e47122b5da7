import { createBot } from './bot.js'
import { loadConfig } from './core/config.js'
import { createLogger } from './core/logger.js'

async function main() {
  const logger = createLogger()
  const config = await loadConfig()
  const bot = createBot(config, { logger })

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) return
    stopping = true
    logger.info({ signal }, 'shutting down')
    await bot.stop()
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'shutdown failed')
        process.exit(1)
      })
    })
  }

  await bot.start()
  logger.info('switchboard started')
}

main().catch((err: unknown) => {
  console.error('fatal:', err)
  process.exit(1)
})

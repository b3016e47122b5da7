export * from './core/custom-id.js'
export * from './core/timeouts.js'
export * from './core/errors.js'
export * from './core/types.js'
export * from './core/responses.js'
export { Deferred } from './core/deferred.js'
export { BaseContext, DELETE_AFTER_MARGIN_MS, INTERACTION_LIFETIME_MS, snowflakeTimestamp } from './core/context.js'
export type { ContextOptions, DeferOptions, DeliveryMode, InitialResponseOptions } from './core/context.js'
export { InteractionClient, DEFAULT_PULL_DEFER_AFTER_MS } from './core/interaction-client.js'
export type { Executor, InteractionClientOptions, RegisterOptions, RegistryEntry } from './core/interaction-client.js'
export { InteractionError } from './core/interaction-error.js'
export { Reaper, DEFAULT_REAPER_INTERVAL_MS } from './core/reaper.js'
export type { ReaperOptions } from './core/reaper.js'
export { ScheduledTasks } from './core/tasks.js'
export type { ScheduledTasksOptions } from './core/tasks.js'
export { loadConfig, defaultInteractionsConfig } from './core/config.js'
export type { Config, InteractionsConfig } from './core/config.js'
export { createLogger, resolveLogLevel, silentLogger } from './core/logger.js'
export * from './components/index.js'
export * from './modals/index.js'
export * from './connectors/discord/index.js'
export { HttpPlugin, createHttpApp } from './plugins/http.js'
export { createBot } from './bot.js'
export type { Bot, BotDeps } from './bot.js'

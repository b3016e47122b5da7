import { pino, type Logger, type LevelWithSilent } from 'pino'

export type { Logger }

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export function resolveLogLevel(raw: string | undefined): LevelWithSilent {
  const level = raw?.trim().toLowerCase()
  return LEVELS.find((l) => l === level) ?? 'info'
}

export function createLogger(level: LevelWithSilent = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  return pino({ name: 'switchboard', level })
}

/** Logger that drops everything. Default for library use and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

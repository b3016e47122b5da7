import { z } from 'zod'
import { readFile } from 'fs/promises'
import { resolve } from 'path'

const CONFIG_DIR = resolve('data/config')

// ==================== Individual Schemas ====================

const discordSchema = z.object({
  /** Application public key (hex) used to verify HTTP interaction signatures. */
  publicKey: z.string().regex(/^[0-9a-fA-F]{64}$/, 'Expected a 32-byte hex public key'),
  apiBaseUrl: z.string().url().default('https://discord.com/api/v10'),
})

const serverSchema = z.object({
  port: z.number().int().positive().default(3000),
  path: z.string().startsWith('/').default('/interactions'),
})

const interactionsSchema = z.object({
  /** Sliding timeout applied to registrations that don't pass one. */
  defaultTimeoutMs: z.number().int().positive().default(120_000),
  reaperIntervalMs: z.number().int().positive().default(5_000),
  /** Pull requests not answered within this window are deferred automatically. null = never. */
  pullDeferAfterMs: z.number().int().positive().nullable().default(2_500),
})

// ==================== Unified Config Type ====================

export type Config = {
  discord: z.infer<typeof discordSchema>
  server: z.infer<typeof serverSchema>
  interactions: z.infer<typeof interactionsSchema>
  /** Bot token from DISCORD_TOKEN. Interaction webhooks work without it. */
  token?: string
}

export type InteractionsConfig = Config['interactions']

// ==================== Loader ====================

async function loadJsonFile(dir: string, filename: string): Promise<unknown> {
  try {
    const raw = await readFile(resolve(dir, filename), 'utf-8')
    return JSON.parse(raw)
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {} // File not found → use defaults from Zod schema
    }
    throw err
  }
}

export async function loadConfig(
  dir: string = CONFIG_DIR,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  const [discordRaw, serverRaw, interactionsRaw] = await Promise.all([
    loadJsonFile(dir, 'discord.json'),
    loadJsonFile(dir, 'server.json'),
    loadJsonFile(dir, 'interactions.json'),
  ])

  return {
    discord: discordSchema.parse(discordRaw),
    server: serverSchema.parse(serverRaw),
    interactions: interactionsSchema.parse(interactionsRaw),
    token: env.DISCORD_TOKEN || undefined,
  }
}

export function defaultInteractionsConfig(): InteractionsConfig {
  return interactionsSchema.parse({})
}

import { z } from 'zod'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export const RoomConfigSchema = z.object({
  /** Participants a room admits at once. Unlimited when unset. */
  maxParticipants: z.number().int().positive().optional(),
  /** Period of the tick loop; 0 disables it. */
  tickIntervalMs: z.number().int().nonnegative().default(0),
  /** Period of the sync loop; 0 disables it. */
  syncIntervalMs: z.number().int().nonnegative().default(0),
  /** How long an empty room waits before it is destroyed. */
  emptyGracePeriodMs: z.number().int().nonnegative().default(30_000),
  /** Resolvers of one handler running at the same time. */
  resolverConcurrency: z.number().int().positive().default(8),
  pathHashing: z.boolean().default(true),
  maxDynamicKeys: z.number().int().positive().default(4096),
})

export type RoomConfig = z.output<typeof RoomConfigSchema>
export type RoomConfigInput = z.input<typeof RoomConfigSchema>

export const ServerConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info'),
  room: RoomConfigSchema,
})

export type ServerConfig = z.output<typeof ServerConfigSchema>

/**
 * Merge room config layers, later layers winning, and validate the result.
 *
 * @example
 * ```typescript
 * resolveRoomConfig(managerDefaults, { maxParticipants: 4 })
 * ```
 */
export function resolveRoomConfig(...layers: (RoomConfigInput | undefined)[]): RoomConfig {
  const merged: RoomConfigInput = {}
  for (const layer of layers) {
    if (!layer) continue
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(merged, { [key]: value })
    }
  }
  return RoomConfigSchema.parse(merged)
}

function numberEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name]
  if (!value) {
    return undefined
  }
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`)
  }
  return parsed
}

const ENV_FIELDS: Record<string, keyof RoomConfigInput> = {
  ROOMSTATE_TICK_INTERVAL_MS: 'tickIntervalMs',
  ROOMSTATE_SYNC_INTERVAL_MS: 'syncIntervalMs',
  ROOMSTATE_EMPTY_GRACE_MS: 'emptyGracePeriodMs',
  ROOMSTATE_MAX_PARTICIPANTS: 'maxParticipants',
  ROOMSTATE_RESOLVER_CONCURRENCY: 'resolverConcurrency',
}

/**
 * Read server defaults from the environment.
 * @throws Error naming the variable when a value is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const room: Record<string, number> = {}
  for (const [name, key] of Object.entries(ENV_FIELDS)) {
    const value = numberEnv(env, name)
    if (value !== undefined) room[key] = value
  }

  const result = ServerConfigSchema.safeParse({ logLevel: env.ROOMSTATE_LOG_LEVEL || undefined, room })
  if (!result.success) {
    const issue = result.error.issues[0]
    const key = issue.path[issue.path.length - 1]
    const name =
      key === 'logLevel'
        ? 'ROOMSTATE_LOG_LEVEL'
        : Object.keys(ENV_FIELDS).find((envName) => ENV_FIELDS[envName] === key)
    throw new Error(`Invalid env var ${name ?? String(key)}: ${issue.message}`, { cause: result.error })
  }
  return result.data
}

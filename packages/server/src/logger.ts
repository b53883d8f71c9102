import { type Level, type Logger, pino } from 'pino'

export type { Logger }

export type LogLevel = Level | 'silent'

export interface LoggerOptions {
  /** Minimum level to write. Defaults to 'info'. */
  level?: LogLevel
  /** Logger name. Defaults to 'roomstate'. */
  name?: string
}

/**
 * Create the root logger. Rooms log through a child bound to their `roomId`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' })
 * const manager = new RoomManager({ logger })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'roomstate',
    level: options.level ?? 'info',
  })
}

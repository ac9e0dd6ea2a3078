/**
 * @file Debug Logging
 *
 * Every component takes a `debug` option that is either a boolean or a custom
 * sink. `false` silences the component, `true` writes to the console with a
 * scoped, timestamped prefix.
 *
 * @example
 * ```typescript
 * const logger = createLogger(true, 'OfflineQueue')
 * logger.info('Enqueued UPDATE /api/v1/notes/1')
 * // [OfflineQueue 2024-01-01T00:00:00.000Z] Enqueued UPDATE /api/v1/notes/1
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Custom log sink.
 */
export interface LogSink {
  (level: LogLevel, message: string, data?: Record<string, unknown>): void
}

/**
 * The value accepted by `debug` options.
 */
export type DebugOption = boolean | LogSink

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
}

const CONSOLE_METHODS: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
}

/**
 * Create a logger for a component.
 *
 * A custom sink receives the scope as `data.scope`.
 */
export function createLogger(debug: DebugOption | undefined, scope: string): Logger {
  const sink = createSink(debug, scope)

  return {
    debug: (message, data) => sink('debug', message, data),
    info: (message, data) => sink('info', message, data),
    warn: (message, data) => sink('warn', message, data),
    error: (message, data) => sink('error', message, data),
  }
}

function createSink(debug: DebugOption | undefined, scope: string): LogSink {
  if (!debug) {
    return () => {}
  }

  if (typeof debug === 'function') {
    return (level, message, data) => debug(level, message, { scope, ...data })
  }

  return (level, message, data) => {
    const prefix = `[${scope} ${new Date().toISOString()}]`
    const method = CONSOLE_METHODS[level]
    if (data) {
      console[method](prefix, message, data)
    } else {
      console[method](prefix, message)
    }
  }
}

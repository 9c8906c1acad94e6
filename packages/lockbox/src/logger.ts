/**
 * Structured diagnostics for lockbox.
 *
 * @remarks
 * This is the operator-facing diagnostic channel: JSON lines on stderr, kept
 * apart from the user-facing messages the CLI prints. Anything that could
 * carry secret material is redacted by key before it is serialized.
 */

import pino from 'pino'
import type { DestinationStream, Logger } from 'pino'

export type { Logger }

/** Log levels accepted in configuration. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/** All accepted log levels, most verbose first. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

/** Type guard for {@link LogLevel}. */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value)
}

/** Options for {@link createLogger}. */
export interface CreateLoggerOptions {
  level?: LogLevel | undefined
  name?: string | undefined
  /** Where to write. Defaults to stderr. */
  destination?: DestinationStream | undefined
}

const REDACTED_KEYS = ['password', 'credential', 'token', 'value', 'key', 'secret']

/** Create a structured pino logger writing to stderr. */
export function createLogger(options?: CreateLoggerOptions): Logger {
  return pino(
    {
      name: options?.name ?? 'lockbox',
      level: options?.level ?? 'warn',
      serializers: {
        err: pino.stdSerializers.err,
      },
      redact: {
        paths: [...REDACTED_KEYS, ...REDACTED_KEYS.map((key) => `*.${key}`)],
        censor: '[REDACTED]',
      },
    },
    options?.destination ?? pino.destination(2),
  )
}

/** A logger that discards everything; the default for library callers. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

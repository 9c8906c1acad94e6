import {
  Lockbox,
  PasswordSession,
  ValidationError,
  createLogger,
  isLogLevel,
  loadConfig,
  resolveConfig,
} from 'lockbox'
import type { ConfigEnv, Logger, ResolvedConfig, RetryOptions, TransportFactory } from 'lockbox'
import { createStdinTerminal } from './prompt.js'
import type { Terminal } from './prompt.js'

/**
 * Options every command accepts.
 *
 * @internal
 */
export const GLOBAL_OPTIONS = {
  'config-dir': { type: 'string' },
  'log-level': { type: 'string' },
} as const

/** Parsed values of {@link GLOBAL_OPTIONS}. */
export interface GlobalValues {
  'config-dir'?: string | undefined
  'log-level'?: string | undefined
}

/**
 * Collaborators a command uses. Defaults talk to the real process and the
 * configured secret store; tests substitute their own.
 *
 * @internal
 */
export interface CommandDeps {
  env?: ConfigEnv | undefined
  terminal?: Terminal | undefined
  logger?: Logger | undefined
  transportFactory?: TransportFactory | undefined
  retry?: RetryOptions | undefined
}

/** Everything a command needs for one invocation. */
export interface CommandContext {
  config: ResolvedConfig
  logger: Logger
  terminal: Terminal
  session: PasswordSession
  lockbox: Lockbox
}

/**
 * Resolve configuration and wire a {@link Lockbox}, run `fn`, then drop every
 * cached key and release stdin.
 *
 * @internal
 */
export async function withContext<T>(
  values: GlobalValues,
  deps: CommandDeps,
  fn: (ctx: CommandContext) => Promise<T>,
): Promise<T> {
  const levelFlag = values['log-level']
  if (levelFlag !== undefined && !isLogLevel(levelFlag)) {
    throw new ValidationError(
      '--log-level must be one of debug, info, warn, error, silent',
      'log-level',
    )
  }

  const configDir = values['config-dir']
  const file = await loadConfig(configDir)
  const config = resolveConfig(file, deps.env ?? process.env, {
    configDir,
    logLevel: levelFlag,
  })
  const logger = deps.logger ?? createLogger({ level: config.logLevel })
  const terminal = deps.terminal ?? createStdinTerminal()
  const session = new PasswordSession()
  const lockbox = Lockbox.open({
    config,
    session,
    prompt: () => terminal.readSecret('Key store password: '),
    logger,
    transportFactory: deps.transportFactory,
    retry: deps.retry,
  })

  try {
    return await fn({ config, logger, terminal, session, lockbox })
  } finally {
    session.clear()
    terminal.close()
  }
}

/**
 * Ask for a new password, with confirmation when interactive.
 *
 * @internal
 */
export async function readNewPassword(terminal: Terminal, label: string): Promise<string> {
  const password = await terminal.readSecret(`${label}: `)
  if (password.length === 0) {
    throw new ValidationError('Password must not be empty', 'password')
  }
  if (terminal.interactive) {
    const confirmation = await terminal.readSecret(`Confirm ${label.toLowerCase()}: `)
    if (confirmation !== password) {
      throw new ValidationError('Passwords do not match', 'password')
    }
  }
  return password
}

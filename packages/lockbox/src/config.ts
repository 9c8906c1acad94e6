/**
 * Configuration loading, validation, and defaults for lockbox.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { FilesystemError, ValidationError } from './errors.js'
import { DEFAULT_ITERATIONS, kdfParams } from './crypto/kdf.js'
import type { KdfParams } from './crypto/kdf.js'
import { isLogLevel } from './logger.js'
import type { LogLevel } from './logger.js'
import { validateNamespace } from './store/validation.js'
import type { KvVersion, StoreConnection } from './store/types.js'
import { isNotFound, writeFileAtomic } from './util/fs.js'

/** Name of the config file inside the config directory. */
export const CONFIG_FILE_NAME = 'config.json'

/** Default namespace applied at the boundary when none is given. */
export const DEFAULT_NAMESPACE = 'shared'

/** Lowest iteration count accepted from a config file. */
export const MIN_CONFIG_ITERATIONS = 10_000

/**
 * Remote store section of the config file.
 * @public
 */
export interface StoreConfig {
  address: string
  mount: string
  kvVersion: KvVersion
  timeoutMs: number
  namespace?: string | undefined
}

/**
 * The config file as stored on disk.
 * @public
 */
export interface LockboxConfig {
  version: 1
  store: StoreConfig
  defaultNamespace: string
  /** Where the key store lives. `~` expands to the home directory. */
  dataDir?: string | undefined
  backup: {
    /** Default backup directory; `<dataDir>/backups` when absent. */
    directory?: string | undefined
    concurrency: number
  }
  kdf: { iterations: number }
  logLevel: LogLevel
}

/**
 * Fully merged configuration handed to the core. Immutable.
 * @public
 */
export interface ResolvedConfig {
  readonly configDir: string
  readonly store: Readonly<StoreConnection>
  readonly defaultNamespace: string
  readonly dataDir: string
  readonly keyStorePath: string
  readonly backup: Readonly<{ directory: string; concurrency: number }>
  readonly kdf: Readonly<KdfParams>
  readonly logLevel: LogLevel
}

/** Values from CLI flags; highest precedence. */
export interface ConfigOverrides {
  configDir?: string | undefined
  logLevel?: LogLevel | undefined
  defaultNamespace?: string | undefined
}

/** Environment variables consulted by {@link resolveConfig}. */
export type ConfigEnv = Readonly<Record<string, string | undefined>>

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'lockbox')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'lockbox')
  }
  return path.join(os.homedir(), '.config', 'lockbox')
}

/** Return the platform-appropriate default data directory. */
export function getDefaultDataDir(): string {
  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA
    if (localAppData !== undefined) {
      return path.join(localAppData, 'lockbox')
    }
    return path.join(os.homedir(), 'AppData', 'Local', 'lockbox')
  }
  return path.join(os.homedir(), '.local', 'share', 'lockbox')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): LockboxConfig {
  return {
    version: 1,
    store: {
      address: 'http://127.0.0.1:8200',
      mount: 'secret',
      kvVersion: 2,
      timeoutMs: 10_000,
    },
    defaultNamespace: DEFAULT_NAMESPACE,
    backup: { concurrency: 4 },
    kdf: { iterations: DEFAULT_ITERATIONS },
    logLevel: 'warn',
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function invalid(message: string, field: string): ValidationError {
  return new ValidationError(`Config ${message}`, field)
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0
}

function validateAddress(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw invalid(`${field} must be a string`, field)
  }
  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw invalid(`${field} must be a URL`, field)
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw invalid(`${field} must be an http or https URL`, field)
  }
  return value.replace(/\/+$/, '')
}

/**
 * Validates the store section.
 */
function validateStore(store: unknown): StoreConfig {
  if (!isObject(store)) {
    throw invalid('store must be an object', 'store')
  }
  const address = validateAddress(store.address, 'store.address')
  if (typeof store.mount !== 'string' || !/^[A-Za-z0-9._-]+(\/[A-Za-z0-9._-]+)*$/.test(store.mount)) {
    throw invalid('store.mount must be a non-empty mount path', 'store.mount')
  }
  const kvVersion = store.kvVersion
  if (kvVersion !== 1 && kvVersion !== 2) {
    throw invalid('store.kvVersion must be 1 or 2', 'store.kvVersion')
  }
  if (!isPositiveInteger(store.timeoutMs)) {
    throw invalid('store.timeoutMs must be a positive integer', 'store.timeoutMs')
  }

  const result: StoreConfig = {
    address,
    mount: store.mount,
    kvVersion: kvVersion satisfies KvVersion,
    timeoutMs: store.timeoutMs,
  }
  if (store.namespace !== undefined) {
    if (typeof store.namespace !== 'string' || store.namespace.trim() === '') {
      throw invalid('store.namespace must be a non-empty string', 'store.namespace')
    }
    result.namespace = store.namespace
  }
  return result
}

/**
 * Validate an unknown value as a {@link LockboxConfig}, throwing on invalid
 * structure.
 *
 * @throws {@link ValidationError} naming the offending field
 */
export function validateConfig(config: unknown): LockboxConfig {
  if (!isObject(config)) {
    throw invalid('must be an object', 'config')
  }

  if (config.version !== 1) {
    throw invalid('version must be 1', 'version')
  }

  const store = validateStore(config.store)

  if (typeof config.defaultNamespace !== 'string') {
    throw invalid('defaultNamespace must be a string', 'defaultNamespace')
  }
  const defaultNamespace = validateNamespace(config.defaultNamespace)

  if (!isObject(config.backup)) {
    throw invalid('backup must be an object', 'backup')
  }
  if (!isPositiveInteger(config.backup.concurrency) || config.backup.concurrency > 64) {
    throw invalid('backup.concurrency must be an integer from 1 to 64', 'backup.concurrency')
  }

  if (!isObject(config.kdf)) {
    throw invalid('kdf must be an object', 'kdf')
  }
  const iterations = config.kdf.iterations
  if (!isPositiveInteger(iterations) || iterations < MIN_CONFIG_ITERATIONS) {
    throw invalid(
      `kdf.iterations must be an integer of at least ${String(MIN_CONFIG_ITERATIONS)}`,
      'kdf.iterations',
    )
  }
  kdfParams(iterations)

  if (!isLogLevel(config.logLevel)) {
    throw invalid('logLevel must be one of debug, info, warn, error, silent', 'logLevel')
  }

  const result: LockboxConfig = {
    version: 1,
    store,
    defaultNamespace,
    backup: { concurrency: config.backup.concurrency },
    kdf: { iterations },
    logLevel: config.logLevel,
  }

  if (config.dataDir !== undefined) {
    if (typeof config.dataDir !== 'string' || config.dataDir.trim() === '') {
      throw invalid('dataDir must be a non-empty string', 'dataDir')
    }
    result.dataDir = config.dataDir
  }
  if (config.backup.directory !== undefined) {
    if (typeof config.backup.directory !== 'string' || config.backup.directory.trim() === '') {
      throw invalid('backup.directory must be a non-empty string', 'backup.directory')
    }
    result.backup.directory = config.backup.directory
  }

  return result
}

/**
 * Load the lockbox config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 */
export async function loadConfig(configDir?: string): Promise<LockboxConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, CONFIG_FILE_NAME)

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch (err) {
    if (isNotFound(err)) {
      return defaultConfig()
    }
    throw new FilesystemError(`Failed to read config file at ${configPath}`, configPath, 'read')
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ValidationError(`Failed to parse config file at ${configPath}`, 'config')
  }

  return validateConfig(parsed)
}

/**
 * Write `config` to `<configDir>/config.json` (mode 0600).
 *
 * @returns The path written
 */
export async function saveConfig(configDir: string, config: LockboxConfig): Promise<string> {
  const validated = validateConfig(config)
  const configPath = path.join(configDir, CONFIG_FILE_NAME)
  await writeFileAtomic(configPath, `${JSON.stringify(validated, null, 2)}\n`)
  return configPath
}

function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir()
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2))
  }
  return value
}

/**
 * Merge the config file, environment and CLI overrides into one frozen
 * {@link ResolvedConfig}. Precedence: overrides, then environment
 * (`VAULT_ADDR`, `VAULT_NAMESPACE`, `LOCKBOX_NAMESPACE`, `LOCKBOX_LOG_LEVEL`),
 * then the file.
 *
 * @throws {@link ValidationError} if an environment value or override is invalid
 */
export function resolveConfig(
  file: LockboxConfig,
  env: ConfigEnv = process.env,
  overrides: ConfigOverrides = {},
): ResolvedConfig {
  const configDir = path.resolve(overrides.configDir ?? getDefaultConfigDir())

  const store: StoreConnection = { ...file.store }
  const envAddress = env.VAULT_ADDR
  if (envAddress !== undefined && envAddress !== '') {
    store.address = validateAddress(envAddress, 'VAULT_ADDR')
  }
  const envStoreNamespace = env.VAULT_NAMESPACE
  if (envStoreNamespace !== undefined && envStoreNamespace !== '') {
    store.namespace = envStoreNamespace
  }

  let defaultNamespace = file.defaultNamespace
  const envNamespace = env.LOCKBOX_NAMESPACE
  if (envNamespace !== undefined && envNamespace !== '') {
    defaultNamespace = envNamespace
  }
  if (overrides.defaultNamespace !== undefined) {
    defaultNamespace = overrides.defaultNamespace
  }
  validateNamespace(defaultNamespace)

  let logLevel = file.logLevel
  const envLevel = env.LOCKBOX_LOG_LEVEL
  if (envLevel !== undefined && envLevel !== '') {
    if (!isLogLevel(envLevel)) {
      throw new ValidationError(
        'LOCKBOX_LOG_LEVEL must be one of debug, info, warn, error, silent',
        'LOCKBOX_LOG_LEVEL',
      )
    }
    logLevel = envLevel
  }
  if (overrides.logLevel !== undefined) {
    logLevel = overrides.logLevel
  }

  const dataDir = path.resolve(expandHome(file.dataDir ?? getDefaultDataDir()))
  const backupDir = path.resolve(
    expandHome(file.backup.directory ?? path.join(dataDir, 'backups')),
  )

  return Object.freeze({
    configDir,
    store: Object.freeze(store),
    defaultNamespace,
    dataDir,
    keyStorePath: path.join(dataDir, 'keys', 'root-credential.enc'),
    backup: Object.freeze({ directory: backupDir, concurrency: file.backup.concurrency }),
    kdf: Object.freeze(kdfParams(file.kdf.iterations)),
    logLevel,
  })
}

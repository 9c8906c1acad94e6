/**
 * lockbox: encrypted root-credential storage and namespace backups for a
 * KV secret store.
 *
 * @packageDocumentation
 */

export {
  LockboxError,
  InvalidPasswordError,
  CorruptKeyStoreError,
  CorruptBackupError,
  KeyStoreNotFoundError,
  AlreadyInitializedError,
  AuthenticationError,
  StoreUnreachableError,
  SecretStoreError,
  SecretNotFoundError,
  BackupIncompleteError,
  PartialRestoreError,
  ValidationError,
  ConfirmationRequiredError,
  FilesystemError,
  UserAbortedError,
  describeError,
} from './errors.js'
export type {
  BackupFailure,
  PathFailure,
  RestoreFailure,
  NamespaceRestoreResult,
} from './errors.js'

export {
  CONFIG_FILE_NAME,
  DEFAULT_NAMESPACE,
  defaultConfig,
  getDefaultConfigDir,
  getDefaultDataDir,
  loadConfig,
  resolveConfig,
  saveConfig,
  validateConfig,
} from './config.js'
export type {
  ConfigEnv,
  ConfigOverrides,
  LockboxConfig,
  ResolvedConfig,
  StoreConfig,
} from './config.js'

export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logger.js'
export type { Logger, LogLevel, CreateLoggerOptions } from './logger.js'

export {
  BLOB_FORMAT_VERSION,
  DEFAULT_ITERATIONS,
  KDF_ALGORITHM,
  deriveKey,
  generateSalt,
  kdfParams,
  parseBlob,
  serializeBlob,
} from './crypto/index.js'
export type { BlobKind, BlobMetadata, EncryptedBlob, KdfParams } from './crypto/index.js'

export { PasswordSession } from './session.js'
export type { PasswordPrompt } from './session.js'

export { SecureKeyStore } from './key-store/index.js'
export type {
  SecureKeyStoreOptions,
  ReinitAuthorization,
  InitializeOptions,
  UnlockWithSessionOptions,
  ExportKeyOptions,
  ImportKeyOptions,
  KeyStoreInfo,
} from './key-store/index.js'

export {
  SecretStoreClient,
  VaultHttpTransport,
  isValidNamespace,
  isValidSecretPath,
  validateNamespace,
  validateSecretPath,
} from './store/index.js'
export type {
  SecretStoreClientOptions,
  VaultHttpTransportOptions,
  SecretStoreTransport,
  TransportFactory,
  StoreConnection,
  KvVersion,
  BulkReport,
  BulkReadResult,
} from './store/index.js'

export {
  BackupEngine,
  assertRestoreComplete,
  readBackupFile,
  inspectBackup,
  snapshotSize,
} from './backup/index.js'
export type {
  BackupEngineOptions,
  BackupSnapshot,
  BackupInfo,
  CreateBackupOptions,
  RestoreOptions,
  RestoreReport,
  UnlockBackupOptions,
} from './backup/index.js'

export type { RetryOptions } from './util/async.js'

export { Lockbox } from './lockbox.js'
export type { LockboxOptions } from './lockbox.js'

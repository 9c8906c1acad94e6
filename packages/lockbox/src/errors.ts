/**
 * Error hierarchy for lockbox.
 *
 * @remarks
 * Messages may name a namespace, a secret path or a file, but never a secret
 * value, a password, a derived key or the root credential.
 *
 * @packageDocumentation
 */

import type { RestoreReport } from './backup/types.js'

/** Base error for all lockbox errors. */
export class LockboxError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LockboxError'
  }
}

// --- Key Store and Backup Integrity ---

/**
 * Thrown when a derived key fails authenticated decryption.
 *
 * @remarks
 * A wrong password and a tampered ciphertext or tag are indistinguishable at
 * this point, and the message deliberately does not try to tell them apart.
 */
export class InvalidPasswordError extends LockboxError {
  /**
   * How many passwords were tried before giving up.
   */
  readonly attempts: number

  constructor(message: string, attempts = 1) {
    super(message)
    this.name = 'InvalidPasswordError'
    this.attempts = attempts
  }
}

/**
 * Thrown when the key-store file is structurally damaged (truncated, not
 * JSON, missing fields, bad encodings) or its cleartext metadata disagrees
 * with the authenticated copy.
 */
export class CorruptKeyStoreError extends LockboxError {
  /**
   * The absolute path of the damaged key-store file.
   */
  readonly path: string

  constructor(message: string, filePath: string) {
    super(message)
    this.name = 'CorruptKeyStoreError'
    this.path = filePath
  }
}

/**
 * Thrown when a backup file is structurally damaged or its decrypted snapshot
 * does not match the format.
 */
export class CorruptBackupError extends LockboxError {
  constructor(message: string) {
    super(message)
    this.name = 'CorruptBackupError'
  }
}

/**
 * Thrown when an operation needs the key store but none has been created.
 */
export class KeyStoreNotFoundError extends LockboxError {
  /**
   * Where the key store was expected.
   */
  readonly path: string

  constructor(message: string, filePath: string) {
    super(message)
    this.name = 'KeyStoreNotFoundError'
    this.path = filePath
  }
}

/**
 * Thrown by `initialize()` when a key store already exists and no re-init
 * authorization was given.
 */
export class AlreadyInitializedError extends LockboxError {
  readonly path: string

  constructor(message: string, filePath: string) {
    super(message)
    this.name = 'AlreadyInitializedError'
    this.path = filePath
  }
}

// --- Remote Secret Store Failures ---

/**
 * Thrown when the remote secret store rejects the root credential.
 * Fatal for the current invocation.
 */
export class AuthenticationError extends LockboxError {
  /** HTTP status returned by the store, when there was one. */
  readonly status: number | undefined

  constructor(message: string, status?: number) {
    super(message)
    this.name = 'AuthenticationError'
    this.status = status
  }
}

/**
 * Thrown on network failures, timeouts and server-side unavailability.
 */
export class StoreUnreachableError extends LockboxError {
  /** Always `true`: the operator may retry. */
  readonly retryable = true

  /** HTTP status, when the store answered with one (429, 5xx). */
  readonly status: number | undefined

  constructor(message: string, status?: number) {
    super(message)
    this.name = 'StoreUnreachableError'
    this.status = status
  }
}

/**
 * Thrown when the store answers with a status that has no more specific
 * mapping (e.g. 400 for a malformed request).
 */
export class SecretStoreError extends LockboxError {
  readonly status: number

  constructor(message: string, status: number) {
    super(message)
    this.name = 'SecretStoreError'
    this.status = status
  }
}

/**
 * Thrown when a requested secret does not exist. This is an expected outcome
 * and is not logged as an error.
 */
export class SecretNotFoundError extends LockboxError {
  readonly namespace: string
  readonly path: string

  constructor(message: string, namespace: string, secretPath: string) {
    super(message)
    this.name = 'SecretNotFoundError'
    this.namespace = namespace
    this.path = secretPath
  }
}

// --- Aggregate Failures ---

/** One secret that could not be read while assembling a backup. */
export interface BackupFailure {
  namespace: string
  path: string
  reason: string
}

/**
 * Thrown by backup creation when any enumerated secret could not be read.
 * No backup file is written in that case.
 */
export class BackupIncompleteError extends LockboxError {
  readonly failures: BackupFailure[]

  /** Number of secrets that were read successfully before giving up. */
  readonly succeededCount: number

  constructor(message: string, failures: BackupFailure[], succeededCount: number) {
    super(message)
    this.name = 'BackupIncompleteError'
    this.failures = failures
    this.succeededCount = succeededCount
  }
}

/** A secret path an operation could not complete, with the reason. */
export interface PathFailure {
  path: string
  reason: string
}

/** A failed write during restore. */
export type RestoreFailure = PathFailure

/** Per-namespace outcome of a restore. */
export interface NamespaceRestoreResult {
  /** Destination namespace. */
  namespace: string
  /** Snapshot namespaces that were mapped onto this destination. */
  sources: string[]
  /** Paths written (or, in a dry run, that would be written). */
  succeeded: string[]
  /** Paths that were not written, with the reason. */
  failed: RestoreFailure[]
}

/**
 * Thrown when a restore report contains failed paths.
 */
export class PartialRestoreError extends LockboxError {
  /** The full report, including every namespace that was restored cleanly. */
  readonly report: RestoreReport

  constructor(message: string, report: RestoreReport) {
    super(message)
    this.name = 'PartialRestoreError'
    this.report = report
  }
}

// --- Input and Infrastructure Failures ---

/**
 * Thrown when a namespace, secret path or other operator input is malformed.
 */
export class ValidationError extends LockboxError {
  /** Which input was rejected (e.g. `'namespace'`, `'path'`). */
  readonly field: string

  constructor(message: string, field: string) {
    super(message)
    this.name = 'ValidationError'
    this.field = field
  }
}

/**
 * Thrown when a destructive operation is attempted without the required
 * explicit confirmation.
 */
export class ConfirmationRequiredError extends LockboxError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfirmationRequiredError'
  }
}

/**
 * Thrown when a filesystem operation fails due to a permission or access
 * problem (e.g. the data directory is not writable, or a lock is held).
 */
export class FilesystemError extends LockboxError {
  /**
   * The absolute path of the file or directory that caused the error.
   */
  readonly path: string

  /**
   * The permission level that was required but not available
   * (e.g. `'read'`, `'write'`, `'lock'`).
   */
  readonly permission: string

  constructor(message: string, filePath: string, permission: string) {
    super(message)
    this.name = 'FilesystemError'
    this.path = filePath
    this.permission = permission
  }
}

/**
 * Thrown when the operator cancels an interactive prompt (Ctrl-C, EOF).
 */
export class UserAbortedError extends LockboxError {
  constructor(message = 'Aborted by user') {
    super(message)
    this.name = 'UserAbortedError'
  }
}

/**
 * One-line `Name: message` description of an error, for per-path failure
 * reports.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err)
}

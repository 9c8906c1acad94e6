/**
 * Backup and restore types for lockbox.
 */

import type { BlobMetadata } from '../crypto/blob.js'
import type { KdfParams } from '../crypto/kdf.js'
import type { NamespaceRestoreResult } from '../errors.js'

/**
 * The decrypted content of a backup: namespace → (path → value).
 * @public
 */
export interface BackupSnapshot {
  formatVersion: 1
  namespaces: Map<string, Map<string, string>>
}

/** Options for `BackupEngine.create()`. */
export interface CreateBackupOptions {
  /**
   * Write the backup here (atomically, mode 0600) once every secret has been
   * read. Nothing is written when creation fails.
   */
  outputPath?: string | undefined
}

/** Options for `BackupEngine.unlock()`. */
export interface UnlockBackupOptions {
  /** Wrong passwords accepted before giving up (default 3). */
  maxAttempts?: number | undefined
}

/** Options for `BackupEngine.restore()`. */
export interface RestoreOptions {
  /** Write every snapshot namespace into this one namespace instead. */
  targetNamespace?: string | undefined
  /** Stage and report without writing anything. */
  dryRun?: boolean | undefined
  /** Overrides the engine's write concurrency for this restore. */
  concurrency?: number | undefined
}

/**
 * Outcome of a restore, per destination namespace.
 * @public
 */
export interface RestoreReport {
  dryRun: boolean
  /** Cleartext metadata of the backup that was restored. */
  metadata: BlobMetadata
  namespaces: NamespaceRestoreResult[]
}

/** Cleartext facts about a backup file; needs no password. */
export interface BackupInfo {
  path: string
  formatVersion: number
  createdAt: string
  namespaces: string[]
  kdf: KdfParams
}

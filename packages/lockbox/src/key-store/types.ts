/**
 * Key store types for lockbox.
 */

import type { KdfParams } from '../crypto/kdf.js'

/**
 * Authorization to replace an existing key store: either proof of the old
 * password, or an explicit acknowledgement that the old credential is lost.
 * @public
 */
export type ReinitAuthorization = { oldPassword: string } | { destructive: true }

/** Options for `SecureKeyStore.initialize()`. */
export interface InitializeOptions {
  /** Replace an existing key store. */
  force?: ReinitAuthorization | undefined
}

/** Options for `SecureKeyStore.unlockWithSession()`. */
export interface UnlockWithSessionOptions {
  /** Maximum password attempts before giving up (default 3). */
  maxAttempts?: number | undefined
}

/** Options for `SecureKeyStore.exportEncryptedKey()`. */
export interface ExportKeyOptions {
  /** Replace an existing file at the destination. */
  overwrite?: boolean | undefined
}

/** Options for `SecureKeyStore.importEncryptedKey()`. */
export interface ImportKeyOptions {
  /** Replace an existing key store. */
  force?: boolean | undefined
}

/** Cleartext facts about a key store. */
export interface KeyStoreInfo {
  path: string
  formatVersion: number
  /** ISO-8601 timestamp of the last write. */
  createdAt: string
  kdf: KdfParams
}

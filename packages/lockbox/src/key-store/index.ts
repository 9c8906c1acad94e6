/**
 * Key store barrel export.
 */

export { SecureKeyStore } from './key-store.js'
export type { SecureKeyStoreOptions } from './key-store.js'
export type {
  ReinitAuthorization,
  InitializeOptions,
  UnlockWithSessionOptions,
  ExportKeyOptions,
  ImportKeyOptions,
  KeyStoreInfo,
} from './types.js'

/**
 * Key derivation and blob codec barrel export.
 */

export {
  DEFAULT_ITERATIONS,
  KDF_ALGORITHM,
  KEY_LENGTH,
  MAX_ITERATIONS,
  SALT_BYTES,
  deriveKey,
  generateSalt,
  kdfParams,
} from './kdf.js'
export type { KdfParams } from './kdf.js'
export { BLOB_FORMAT_VERSION, parseBlob, serializeBlob } from './blob.js'
export type { BlobKind, BlobMetadata, EncryptedBlob } from './blob.js'

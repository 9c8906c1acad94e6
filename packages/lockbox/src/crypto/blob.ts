/**
 * Encrypted blob codec using `jose` flattened JWE with `dir` + `A256GCM`.
 *
 * @remarks
 * A blob is the on-disk form of every encrypted artifact (the key store and
 * backup files). The JWE protected header carries an authenticated copy of
 * the cleartext fields (format version, kind, KDF parameters, salt and
 * metadata), so editing any of them in the file is detected on decryption.
 *
 * File format (JSON, snake_case keys, binary fields base64url):
 *   format_version, kind, kdf, salt, nonce, ciphertext, auth_tag, protected,
 *   metadata: { created_at, namespaces? }
 */

import { FlattenedEncrypt, flattenedDecrypt, errors } from 'jose'
import { InvalidPasswordError } from '../errors.js'
import { KDF_ALGORITHM, KEY_LENGTH, MAX_ITERATIONS, SALT_BYTES } from './kdf.js'
import type { FlattenedDecryptResult } from 'jose'
import type { KdfParams } from './kdf.js'

const ALGORITHM = 'dir'
const ENCRYPTION = 'A256GCM'
const NONCE_BYTES = 12
const TAG_BYTES = 16
const BASE64URL = /^[A-Za-z0-9_-]*$/

/** Current blob format version. */
export const BLOB_FORMAT_VERSION = 1

/** What a blob holds. */
export type BlobKind = 'key-store' | 'backup'

/**
 * Cleartext metadata kept beside the ciphertext for triage without a
 * password.
 * @public
 */
export interface BlobMetadata {
  /** ISO-8601 creation timestamp. */
  createdAt: string
  /** Namespaces contained in a backup. Absent for the key store. */
  namespaces?: string[] | undefined
}

/**
 * An encrypted artifact with its cleartext parameters.
 * @public
 */
export interface EncryptedBlob {
  formatVersion: typeof BLOB_FORMAT_VERSION
  kind: BlobKind
  kdf: KdfParams
  /** base64url salt used to derive the key. */
  salt: string
  /** base64url AES-GCM IV. */
  nonce: string
  /** base64url ciphertext. */
  ciphertext: string
  /** base64url GCM authentication tag. */
  authTag: string
  /** base64url JWE protected header (authenticated). */
  protected: string
  metadata: BlobMetadata
}

/**
 * Raised for structural problems: unparseable files, missing or malformed
 * fields, or cleartext that disagrees with the authenticated header. Callers
 * rewrap it as the corruption error matching the artifact.
 * @internal
 */
export class BlobFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BlobFormatError'
  }
}

/** Inputs for {@link sealBlob}. */
export interface SealOptions {
  kind: BlobKind
  key: Uint8Array
  salt: Uint8Array
  kdf: KdfParams
  plaintext: Uint8Array
  metadata: BlobMetadata
}

function encode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url')
}

function headerPayload(
  kind: BlobKind,
  kdf: KdfParams,
  salt: string,
  metadata: BlobMetadata,
): Record<string, unknown> {
  const meta: Record<string, unknown> = { created_at: metadata.createdAt }
  if (metadata.namespaces !== undefined) {
    meta.namespaces = metadata.namespaces
  }
  return {
    format_version: BLOB_FORMAT_VERSION,
    kind,
    kdf: { algorithm: kdf.algorithm, iterations: kdf.iterations, key_length: kdf.keyLength },
    salt,
    metadata: meta,
  }
}

/**
 * Encrypt `plaintext` under `key`. A fresh random IV is generated for every
 * call.
 */
export async function sealBlob(options: SealOptions): Promise<EncryptedBlob> {
  const salt = encode(options.salt)
  const jwe = await new FlattenedEncrypt(options.plaintext)
    .setProtectedHeader({
      alg: ALGORITHM,
      enc: ENCRYPTION,
      lbx: headerPayload(options.kind, options.kdf, salt, options.metadata),
    })
    .encrypt(options.key)

  if (jwe.iv === undefined || jwe.tag === undefined || jwe.protected === undefined) {
    throw new BlobFormatError('Encryption produced an incomplete JWE')
  }

  return {
    formatVersion: BLOB_FORMAT_VERSION,
    kind: options.kind,
    kdf: options.kdf,
    salt,
    nonce: jwe.iv,
    ciphertext: jwe.ciphertext,
    authTag: jwe.tag,
    protected: jwe.protected,
    metadata: options.metadata,
  }
}

/**
 * Authenticate and decrypt a blob.
 *
 * @throws {@link InvalidPasswordError} if the tag does not verify (wrong key
 *   or tampered nonce, ciphertext, tag or protected header)
 * @throws {@link BlobFormatError} if the JWE is malformed or the cleartext
 *   fields disagree with the authenticated header
 */
export async function openBlob(blob: EncryptedBlob, key: Uint8Array): Promise<Uint8Array> {
  let result: FlattenedDecryptResult
  try {
    result = await flattenedDecrypt(
      {
        protected: blob.protected,
        iv: blob.nonce,
        ciphertext: blob.ciphertext,
        tag: blob.authTag,
      },
      key,
      { keyManagementAlgorithms: [ALGORITHM], contentEncryptionAlgorithms: [ENCRYPTION] },
    )
  } catch (err) {
    if (err instanceof errors.JWEDecryptionFailed) {
      throw new InvalidPasswordError('Invalid password or damaged data')
    }
    const code = err instanceof errors.JOSEError ? err.code : 'UNKNOWN'
    throw new BlobFormatError(`Malformed encrypted payload (${code})`)
  }

  const expected = JSON.stringify(headerPayload(blob.kind, blob.kdf, blob.salt, blob.metadata))
  const actual = JSON.stringify(result.protectedHeader?.lbx)
  if (expected !== actual) {
    throw new BlobFormatError('Cleartext metadata does not match the authenticated header')
  }

  return result.plaintext
}

/** Decode the salt of a blob. */
export function blobSalt(blob: EncryptedBlob): Uint8Array {
  return new Uint8Array(Buffer.from(blob.salt, 'base64url'))
}

/** Serialize a blob to its on-disk JSON form. */
export function serializeBlob(blob: EncryptedBlob): string {
  const metadata: Record<string, unknown> = { created_at: blob.metadata.createdAt }
  if (blob.metadata.namespaces !== undefined) {
    metadata.namespaces = blob.metadata.namespaces
  }
  const file = {
    format_version: blob.formatVersion,
    kind: blob.kind,
    kdf: {
      algorithm: blob.kdf.algorithm,
      iterations: blob.kdf.iterations,
      key_length: blob.kdf.keyLength,
    },
    salt: blob.salt,
    nonce: blob.nonce,
    ciphertext: blob.ciphertext,
    auth_tag: blob.authTag,
    protected: blob.protected,
    metadata,
  }
  return JSON.stringify(file, null, 2) + '\n'
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireBase64url(value: unknown, field: string, byteLength?: number): string {
  if (typeof value !== 'string' || !BASE64URL.test(value)) {
    throw new BlobFormatError(`${field} must be a base64url string`)
  }
  if (byteLength !== undefined && Buffer.from(value, 'base64url').byteLength !== byteLength) {
    throw new BlobFormatError(`${field} must decode to ${String(byteLength)} bytes`)
  }
  return value
}

function parseKdf(value: unknown): KdfParams {
  if (!isObject(value)) {
    throw new BlobFormatError('kdf must be an object')
  }
  if (value.algorithm !== KDF_ALGORITHM) {
    throw new BlobFormatError(`Unsupported KDF algorithm: ${String(value.algorithm)}`)
  }
  const { iterations } = value
  if (
    typeof iterations !== 'number' ||
    !Number.isSafeInteger(iterations) ||
    iterations < 1 ||
    iterations > MAX_ITERATIONS
  ) {
    throw new BlobFormatError('kdf.iterations is out of range')
  }
  if (value.key_length !== KEY_LENGTH) {
    throw new BlobFormatError(`kdf.key_length must be ${String(KEY_LENGTH)}`)
  }
  return { algorithm: KDF_ALGORITHM, iterations, keyLength: KEY_LENGTH }
}

function parseMetadata(value: unknown): BlobMetadata {
  if (!isObject(value)) {
    throw new BlobFormatError('metadata must be an object')
  }
  if (typeof value.created_at !== 'string' || Number.isNaN(Date.parse(value.created_at))) {
    throw new BlobFormatError('metadata.created_at must be an ISO-8601 timestamp')
  }
  const metadata: BlobMetadata = { createdAt: value.created_at }
  if (value.namespaces !== undefined) {
    const { namespaces } = value
    if (!Array.isArray(namespaces)) {
      throw new BlobFormatError('metadata.namespaces must be an array')
    }
    const names: string[] = []
    for (const name of namespaces) {
      if (typeof name !== 'string') {
        throw new BlobFormatError('metadata.namespaces must contain strings')
      }
      names.push(name)
    }
    metadata.namespaces = names
  }
  return metadata
}

/**
 * Parse the on-disk JSON form of a blob. Validates structure only; nothing is
 * decrypted.
 *
 * @throws {@link BlobFormatError} on any structural problem
 */
export function parseBlob(text: string): EncryptedBlob {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new BlobFormatError('File is not valid JSON')
  }
  if (!isObject(raw)) {
    throw new BlobFormatError('File must contain a JSON object')
  }
  if (raw.format_version !== BLOB_FORMAT_VERSION) {
    throw new BlobFormatError(`Unsupported format_version: ${String(raw.format_version)}`)
  }
  const { kind } = raw
  if (kind !== 'key-store' && kind !== 'backup') {
    throw new BlobFormatError(`Unknown blob kind: ${String(kind)}`)
  }

  const salt = requireBase64url(raw.salt, 'salt')
  if (Buffer.from(salt, 'base64url').byteLength < SALT_BYTES) {
    throw new BlobFormatError(`salt must be at least ${String(SALT_BYTES)} bytes`)
  }

  return {
    formatVersion: BLOB_FORMAT_VERSION,
    kind,
    kdf: parseKdf(raw.kdf),
    salt,
    nonce: requireBase64url(raw.nonce, 'nonce', NONCE_BYTES),
    ciphertext: requireBase64url(raw.ciphertext, 'ciphertext'),
    authTag: requireBase64url(raw.auth_tag, 'auth_tag', TAG_BYTES),
    protected: requireBase64url(raw.protected, 'protected'),
    metadata: parseMetadata(raw.metadata),
  }
}

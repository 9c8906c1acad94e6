/**
 * Password-based key derivation.
 */

import * as crypto from 'node:crypto'
import { promisify } from 'node:util'
import { ValidationError } from '../errors.js'

const pbkdf2 = promisify(crypto.pbkdf2)

/** The only supported derivation function. */
export const KDF_ALGORITHM = 'pbkdf2-sha256'

/** Derived key length in bytes (AES-256). */
export const KEY_LENGTH = 32

/** Salt length for new blobs. */
export const SALT_BYTES = 16

/** Default work factor; tuned to take 100ms+ on commodity hardware. */
export const DEFAULT_ITERATIONS = 600_000

/** Upper bound accepted when reading parameters back from a file. */
export const MAX_ITERATIONS = 10_000_000

/**
 * Parameters of a key derivation. Stored in clear alongside each blob so that
 * the work factor can be raised without breaking existing files.
 * @public
 */
export interface KdfParams {
  algorithm: typeof KDF_ALGORITHM
  iterations: number
  keyLength: typeof KEY_LENGTH
}

/** Build KDF parameters, defaulting the iteration count. */
export function kdfParams(iterations: number = DEFAULT_ITERATIONS): KdfParams {
  assertIterations(iterations)
  return { algorithm: KDF_ALGORITHM, iterations, keyLength: KEY_LENGTH }
}

function assertIterations(iterations: number): void {
  if (!Number.isSafeInteger(iterations) || iterations < 1 || iterations > MAX_ITERATIONS) {
    throw new ValidationError(
      `KDF iterations must be an integer between 1 and ${String(MAX_ITERATIONS)}`,
      'kdf.iterations',
    )
  }
}

/** Generate a fresh random salt. */
export function generateSalt(): Uint8Array {
  return new Uint8Array(crypto.randomBytes(SALT_BYTES))
}

/**
 * Derive a 32-byte key from a password and salt.
 *
 * Deterministic in `(password, salt, params)`. A wrong password is not an
 * error here; it produces a key that fails authenticated decryption later.
 */
export async function deriveKey(
  password: string,
  salt: Uint8Array,
  params: KdfParams,
): Promise<Uint8Array> {
  if (salt.byteLength < SALT_BYTES) {
    throw new ValidationError(`Salt must be at least ${String(SALT_BYTES)} bytes`, 'salt')
  }
  assertIterations(params.iterations)
  const derived = await pbkdf2(
    Buffer.from(password, 'utf8'),
    salt,
    params.iterations,
    params.keyLength,
    'sha256',
  )
  return new Uint8Array(derived)
}

/**
 * Per-invocation cache of derived keys.
 */

import { deriveKey } from './crypto/kdf.js'
import type { KdfParams } from './crypto/kdf.js'

/**
 * Supplies the operator's password. Implementations must not echo it or
 * write it anywhere.
 * @public
 */
export type PasswordPrompt = () => Promise<string>

/**
 * Holds keys derived during one command invocation so the operator is asked
 * for the password once, not for every secret operation.
 *
 * @remarks
 * A session is an explicit object passed to whatever needs a key; there is no
 * process-wide instance. Keys live in memory only and are indexed by the salt
 * and KDF parameters they were derived with. The password itself is dropped
 * as soon as the key is derived. Call {@link PasswordSession.clear} when the
 * invocation ends.
 *
 * @example
 * ```ts
 * const session = new PasswordSession()
 * try {
 *   const credential = await keyStore.unlockWithSession(session, prompt)
 * } finally {
 *   session.clear()
 * }
 * ```
 *
 * @public
 */
export class PasswordSession {
  readonly #keys = new Map<string, Uint8Array>()

  /**
   * Return the key for `salt`/`params`, prompting and deriving it on first
   * use.
   */
  async obtainKey(
    salt: Uint8Array,
    params: KdfParams,
    prompt: PasswordPrompt,
  ): Promise<Uint8Array> {
    const id = cacheId(salt, params)
    const cached = this.#keys.get(id)
    if (cached !== undefined) {
      return cached
    }
    const password = await prompt()
    const key = await deriveKey(password, salt, params)
    this.#keys.set(id, key)
    return key
  }

  /** Whether a key for `salt`/`params` is cached. */
  has(salt: Uint8Array, params: KdfParams): boolean {
    return this.#keys.has(cacheId(salt, params))
  }

  /**
   * Drop (and zero) one cached key, e.g. after it failed to decrypt.
   */
  forget(salt: Uint8Array, params: KdfParams): void {
    const id = cacheId(salt, params)
    const key = this.#keys.get(id)
    if (key !== undefined) {
      key.fill(0)
      this.#keys.delete(id)
    }
  }

  /** Zero and drop every cached key. */
  clear(): void {
    for (const key of this.#keys.values()) {
      key.fill(0)
    }
    this.#keys.clear()
  }

  /** The number of cached keys. */
  get size(): number {
    return this.#keys.size
  }
}

function cacheId(salt: Uint8Array, params: KdfParams): string {
  return `${params.algorithm}:${String(params.iterations)}:${Buffer.from(salt).toString('hex')}`
}

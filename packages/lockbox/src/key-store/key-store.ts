/**
 * Encrypted at-rest storage for the root credential.
 *
 * @remarks
 * The credential is stored as a single {@link EncryptedBlob} in a JSON file
 * with mode 0600 inside a 0700 directory. Every replacement of the file goes
 * through an exclusive lock and an atomic temp-file rename, so concurrent
 * invocations cannot lose an update and a crash cannot truncate the only
 * copy of the credential.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import {
  AlreadyInitializedError,
  CorruptKeyStoreError,
  FilesystemError,
  InvalidPasswordError,
  KeyStoreNotFoundError,
  ValidationError,
} from '../errors.js'
import { BlobFormatError, blobSalt, openBlob, parseBlob, sealBlob, serializeBlob } from '../crypto/blob.js'
import type { EncryptedBlob } from '../crypto/blob.js'
import { deriveKey, generateSalt, kdfParams } from '../crypto/kdf.js'
import type { KdfParams } from '../crypto/kdf.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import type { PasswordPrompt, PasswordSession } from '../session.js'
import { pathExists, readFileIfExists, withFileLock, writeFileAtomic } from '../util/fs.js'
import type { FileLockOptions } from '../util/fs.js'
import type {
  ExportKeyOptions,
  ImportKeyOptions,
  InitializeOptions,
  KeyStoreInfo,
  UnlockWithSessionOptions,
} from './types.js'

const DEFAULT_MAX_ATTEMPTS = 3

/** Options for constructing a {@link SecureKeyStore}. */
export interface SecureKeyStoreOptions {
  /** Absolute path of the key-store file. */
  path: string
  /** KDF parameters for newly written blobs. Defaults to {@link kdfParams}. */
  kdf?: KdfParams | undefined
  logger?: Logger | undefined
  lock?: FileLockOptions | undefined
}

/**
 * Persists and retrieves the root credential as an encrypted blob.
 * @public
 */
export class SecureKeyStore {
  /** Absolute path of the key-store file. */
  readonly path: string
  readonly #kdf: KdfParams
  readonly #logger: Logger
  readonly #lock: FileLockOptions | undefined

  constructor(options: SecureKeyStoreOptions) {
    this.path = path.resolve(options.path)
    this.#kdf = options.kdf ?? kdfParams()
    this.#logger = (options.logger ?? silentLogger()).child({ component: 'key-store' })
    this.#lock = options.lock
  }

  /** Whether a key store has been initialized at {@link SecureKeyStore.path}. */
  exists(): Promise<boolean> {
    return pathExists(this.path)
  }

  /**
   * Encrypt `credential` under `password` and write a new key store.
   *
   * @throws {@link AlreadyInitializedError} if a key store exists and
   *   `options.force` was not given
   * @throws {@link InvalidPasswordError} if `options.force.oldPassword` does
   *   not unlock the existing key store
   */
  async initialize(
    password: string,
    credential: string,
    options?: InitializeOptions,
  ): Promise<EncryptedBlob> {
    if (credential.length === 0) {
      throw new ValidationError('Root credential must not be empty', 'credential')
    }
    if (password.length === 0) {
      throw new ValidationError('Password must not be empty', 'password')
    }

    return withFileLock(
      this.path,
      async () => {
        const existing = await readFileIfExists(this.path)
        if (existing !== undefined) {
          const force = options?.force
          if (force === undefined) {
            throw new AlreadyInitializedError(
              `A key store already exists at ${this.path}`,
              this.path,
            )
          }
          if ('oldPassword' in force) {
            await this.#open(this.#parse(existing), force.oldPassword)
          } else {
            this.#logger.warn({ path: this.path }, 'destructively replacing existing key store')
          }
        }

        const blob = await this.#seal(password, credential)
        await writeFileAtomic(this.path, serializeBlob(blob))
        this.#logger.info({ path: this.path }, 'key store initialized')
        return blob
      },
      this.#lock,
    )
  }

  /**
   * Decrypt and return the root credential.
   *
   * @throws {@link InvalidPasswordError} if authentication fails
   * @throws {@link CorruptKeyStoreError} if the file is structurally damaged
   * @throws {@link KeyStoreNotFoundError} if no key store exists
   */
  async unlock(password: string): Promise<string> {
    const blob = await this.readBlob()
    return this.#open(blob, password)
  }

  /**
   * Unlock using a {@link PasswordSession}, re-prompting on a wrong password
   * up to `maxAttempts` times.
   */
  async unlockWithSession(
    session: PasswordSession,
    prompt: PasswordPrompt,
    options?: UnlockWithSessionOptions,
  ): Promise<string> {
    const maxAttempts = options?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    const blob = await this.readBlob()
    const salt = blobSalt(blob)

    for (let attempt = 1; ; attempt++) {
      const key = await session.obtainKey(salt, blob.kdf, prompt)
      try {
        return await this.#decrypt(blob, key)
      } catch (err) {
        if (!(err instanceof InvalidPasswordError)) {
          throw err
        }
        session.forget(salt, blob.kdf)
        if (attempt >= maxAttempts) {
          throw new InvalidPasswordError(
            `Invalid password (${String(attempt)} attempts)`,
            attempt,
          )
        }
      }
    }
  }

  /**
   * Re-encrypt the credential under a new password, with fresh salt and nonce,
   * and atomically replace the key store.
   */
  async changePassword(oldPassword: string, newPassword: string): Promise<EncryptedBlob> {
    if (newPassword.length === 0) {
      throw new ValidationError('Password must not be empty', 'password')
    }
    return withFileLock(
      this.path,
      async () => {
        const current = await this.readBlob()
        const credential = await this.#open(current, oldPassword)
        const blob = await this.#seal(newPassword, credential)
        await writeFileAtomic(this.path, serializeBlob(blob))
        this.#logger.info({ path: this.path }, 'key store password changed')
        return blob
      },
      this.#lock,
    )
  }

  /**
   * Copy the encrypted key store verbatim to `destinationPath`. Nothing is
   * decrypted; the copy is as safe to move off-box as the original.
   */
  async exportEncryptedKey(destinationPath: string, options?: ExportKeyOptions): Promise<void> {
    const destination = path.resolve(destinationPath)
    if (destination === this.path) {
      throw new ValidationError('Export destination is the key store itself', 'destination')
    }
    const text = await this.#readText()
    this.#parse(text)

    if (options?.overwrite !== true && (await pathExists(destination))) {
      throw new FilesystemError(
        `Refusing to overwrite existing file: ${destination}`,
        destination,
        'write',
      )
    }
    await writeFileAtomic(destination, text)
    this.#logger.info({ destination }, 'encrypted key store exported')
  }

  /**
   * Install a previously exported key store. The file is validated
   * structurally; it is not decrypted.
   */
  async importEncryptedKey(sourcePath: string, options?: ImportKeyOptions): Promise<EncryptedBlob> {
    const source = path.resolve(sourcePath)
    let text: string
    try {
      text = await fs.readFile(source, 'utf8')
    } catch {
      throw new FilesystemError(`Cannot read ${source}`, source, 'read')
    }
    const blob = this.#parse(text, source)

    return withFileLock(
      this.path,
      async () => {
        if (options?.force !== true && (await pathExists(this.path))) {
          throw new AlreadyInitializedError(
            `A key store already exists at ${this.path}`,
            this.path,
          )
        }
        await writeFileAtomic(this.path, text)
        this.#logger.info({ source }, 'encrypted key store imported')
        return blob
      },
      this.#lock,
    )
  }

  /** Cleartext facts about the key store; needs no password. */
  async inspect(): Promise<KeyStoreInfo> {
    const blob = await this.readBlob()
    return {
      path: this.path,
      formatVersion: blob.formatVersion,
      createdAt: blob.metadata.createdAt,
      kdf: blob.kdf,
    }
  }

  /**
   * Read and structurally validate the key-store file.
   *
   * @throws {@link KeyStoreNotFoundError} if no key store exists
   * @throws {@link CorruptKeyStoreError} if the file is damaged
   */
  async readBlob(): Promise<EncryptedBlob> {
    return this.#parse(await this.#readText())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  async #readText(): Promise<string> {
    const text = await readFileIfExists(this.path)
    if (text === undefined) {
      throw new KeyStoreNotFoundError(
        `No key store at ${this.path}; run "lockbox secure init" first`,
        this.path,
      )
    }
    return text
  }

  #parse(text: string, filePath: string = this.path): EncryptedBlob {
    let blob: EncryptedBlob
    try {
      blob = parseBlob(text)
    } catch (err) {
      if (err instanceof BlobFormatError) {
        this.#logger.error({ path: filePath, reason: err.message }, 'key store is damaged')
        throw new CorruptKeyStoreError(`Key store is damaged: ${filePath}`, filePath)
      }
      throw err
    }
    if (blob.kind !== 'key-store') {
      this.#logger.error({ path: filePath, kind: blob.kind }, 'file is not a key store')
      throw new CorruptKeyStoreError(`Not a key store file: ${filePath}`, filePath)
    }
    return blob
  }

  async #seal(password: string, credential: string): Promise<EncryptedBlob> {
    const salt = generateSalt()
    const key = await deriveKey(password, salt, this.#kdf)
    try {
      return await sealBlob({
        kind: 'key-store',
        key,
        salt,
        kdf: this.#kdf,
        plaintext: new TextEncoder().encode(credential),
        metadata: { createdAt: new Date().toISOString() },
      })
    } finally {
      key.fill(0)
    }
  }

  async #open(blob: EncryptedBlob, password: string): Promise<string> {
    const key = await deriveKey(password, blobSalt(blob), blob.kdf)
    try {
      return await this.#decrypt(blob, key)
    } finally {
      key.fill(0)
    }
  }

  async #decrypt(blob: EncryptedBlob, key: Uint8Array): Promise<string> {
    let plaintext: Uint8Array
    try {
      plaintext = await openBlob(blob, key)
    } catch (err) {
      if (err instanceof InvalidPasswordError) {
        // Wrong password and tampered ciphertext look the same from here.
        this.#logger.warn({ path: this.path, reason: 'auth-tag-mismatch' }, 'unlock failed')
        throw new InvalidPasswordError('Invalid password')
      }
      if (err instanceof BlobFormatError) {
        this.#logger.error({ path: this.path, reason: err.message }, 'key store is damaged')
        throw new CorruptKeyStoreError(`Key store is damaged: ${this.path}`, this.path)
      }
      throw err
    }

    const credential = new TextDecoder('utf-8', { fatal: true }).decode(plaintext)
    if (credential.length === 0) {
      throw new CorruptKeyStoreError(`Key store holds an empty credential: ${this.path}`, this.path)
    }
    return credential
  }
}

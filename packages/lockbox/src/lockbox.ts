/**
 * Wires the key store, secret store and backup engine for one invocation.
 */

import type { ResolvedConfig } from './config.js'
import { BackupEngine } from './backup/engine.js'
import type { RetryOptions } from './util/async.js'
import { SecureKeyStore } from './key-store/key-store.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'
import type { PasswordPrompt, PasswordSession } from './session.js'
import { SecretStoreClient } from './store/client.js'
import { VaultHttpTransport } from './store/http-transport.js'
import type { SecretStoreTransport, TransportFactory } from './store/types.js'

/** Options for {@link Lockbox.open}. */
export interface LockboxOptions {
  config: ResolvedConfig
  /** Session that caches the derived key for this invocation. */
  session: PasswordSession
  /** Asks the operator for the key-store password. */
  prompt: PasswordPrompt
  logger?: Logger | undefined
  /** Builds the transport from the unlocked credential. Defaults to HTTP. */
  transportFactory?: TransportFactory | undefined
  /** Retry policy for backup reads. */
  retry?: RetryOptions | undefined
}

/**
 * Entry point for lockbox. Holds the resolved configuration and unlocks the
 * root credential the first time a remote operation needs it.
 *
 * @example
 * ```ts
 * const session = new PasswordSession()
 * const lockbox = Lockbox.open({ config, session, prompt })
 * try {
 *   const client = await lockbox.client()
 *   await client.put(config.defaultNamespace, 'db/password', value)
 * } finally {
 *   session.clear()
 * }
 * ```
 *
 * @public
 */
export class Lockbox {
  /** The local key store at `config.keyStorePath`. */
  readonly keyStore: SecureKeyStore
  readonly config: ResolvedConfig
  readonly #options: LockboxOptions
  readonly #logger: Logger
  #client: Promise<SecretStoreClient> | undefined

  private constructor(options: LockboxOptions) {
    this.#options = options
    this.config = options.config
    this.#logger = options.logger ?? silentLogger()
    this.keyStore = new SecureKeyStore({
      path: options.config.keyStorePath,
      kdf: options.config.kdf,
      logger: this.#logger,
    })
  }

  /** Create a lockbox for one invocation. Nothing is read until needed. */
  static open(options: LockboxOptions): Lockbox {
    return new Lockbox(options)
  }

  /**
   * The secret store client, unlocking the key store through the session on
   * first use.
   */
  client(): Promise<SecretStoreClient> {
    if (this.#client === undefined) {
      const pending = this.#connect()
      // A failed unlock must not be cached; the next call prompts again.
      void pending.catch(() => {
        if (this.#client === pending) {
          this.#client = undefined
        }
      })
      this.#client = pending
    }
    return this.#client
  }

  /** A backup engine over {@link Lockbox.client}. */
  async backups(): Promise<BackupEngine> {
    const client = await this.client()
    return new BackupEngine(client, {
      concurrency: this.config.backup.concurrency,
      kdf: this.config.kdf,
      retry: this.#options.retry,
      logger: this.#logger,
    })
  }

  async #connect(): Promise<SecretStoreClient> {
    const credential = await this.keyStore.unlockWithSession(
      this.#options.session,
      this.#options.prompt,
    )
    const factory = this.#options.transportFactory ?? this.#httpTransport
    const transport = factory(credential)
    this.#logger.debug({ store: transport.description }, 'connected to secret store')
    return new SecretStoreClient(transport, {
      defaultNamespace: this.config.defaultNamespace,
      concurrency: this.config.backup.concurrency,
      logger: this.#logger,
    })
  }

  readonly #httpTransport = (credential: string): SecretStoreTransport =>
    new VaultHttpTransport({ ...this.config.store, token: credential })
}

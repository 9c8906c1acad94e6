/**
 * Pre-configured Lockbox for consumer tests.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { Lockbox, PasswordSession, kdfParams } from 'lockbox'
import type { ResolvedConfig } from 'lockbox'
import { InMemorySecretStore } from './in-memory-secret-store.js'

/** Password of the key store created by {@link TestLockbox.create}. */
export const TEST_PASSWORD = 'test-password'

/** Root credential sealed in the key store created by {@link TestLockbox.create}. */
export const TEST_CREDENTIAL = 'test-token'

/** Iterations used by test key stores and backups. */
export const TEST_ITERATIONS = 1000

/**
 * Options for creating a {@link TestLockbox}.
 * @public
 */
export interface TestLockboxOptions {
  /** Namespace used when none is given. Defaults to `shared`. */
  defaultNamespace?: string | undefined
  /** Skip creating the key store. */
  uninitialized?: boolean | undefined
}

/**
 * A pre-configured lockbox for consumer test workflows.
 *
 * @remarks
 * `TestLockbox` keeps its key store in a fresh temporary directory, uses fast
 * KDF parameters and talks to an {@link InMemorySecretStore}.
 *
 * @example
 * ```ts
 * const t = await TestLockbox.create()
 * t.store.seed('shared', { 'db/password': 'test-secret' })
 * const client = await t.open().client()
 * await t.cleanup()
 * ```
 *
 * @public
 */
export class TestLockbox {
  /** Resolved configuration pointing into {@link TestLockbox.dir}. */
  readonly config: ResolvedConfig

  /** The in-memory secret store. */
  readonly store: InMemorySecretStore

  /** Temporary directory holding the key store and backups. */
  readonly dir: string

  private constructor(config: ResolvedConfig, store: InMemorySecretStore, dir: string) {
    this.config = config
    this.store = store
    this.dir = dir
  }

  /**
   * Create a new TestLockbox with an initialized key store.
   * @public
   */
  static async create(options?: TestLockboxOptions): Promise<TestLockbox> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lockbox-test-'))
    const config: ResolvedConfig = {
      configDir: path.join(dir, 'config'),
      store: { address: 'http://127.0.0.1:8200', mount: 'secret', kvVersion: 2, timeoutMs: 1000 },
      defaultNamespace: options?.defaultNamespace ?? 'shared',
      dataDir: dir,
      keyStorePath: path.join(dir, 'keys', 'root-credential.enc'),
      backup: { directory: path.join(dir, 'backups'), concurrency: 4 },
      kdf: kdfParams(TEST_ITERATIONS),
      logLevel: 'silent',
    }

    const testLockbox = new TestLockbox(Object.freeze(config), new InMemorySecretStore(), dir)
    if (options?.uninitialized !== true) {
      await testLockbox.open().keyStore.initialize(TEST_PASSWORD, TEST_CREDENTIAL)
    }
    return testLockbox
  }

  /**
   * Open a lockbox over the test store. The prompt answers with
   * {@link TEST_PASSWORD} unless `prompt` is given.
   * @public
   */
  open(prompt: () => Promise<string> = () => Promise.resolve(TEST_PASSWORD)): Lockbox {
    return Lockbox.open({
      config: this.config,
      session: new PasswordSession(),
      prompt,
      transportFactory: this.store.factory(TEST_CREDENTIAL),
      retry: { attempts: 3, baseDelayMs: 1 },
    })
  }

  /**
   * Delete the temporary directory.
   * @public
   */
  async cleanup(): Promise<void> {
    await fs.rm(this.dir, { recursive: true, force: true })
  }
}

/**
 * Namespace-scoped facade over the remote secret store.
 */

import {
  AuthenticationError,
  ConfirmationRequiredError,
  LockboxError,
  SecretNotFoundError,
  ValidationError,
  describeError,
} from '../errors.js'
import type { PathFailure } from '../errors.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import { settleWithConcurrency } from '../util/async.js'
import type { Settled } from '../util/async.js'
import type { BulkReadResult, BulkReport, SecretStoreTransport } from './types.js'
import {
  isValidNamespace,
  validateNamespace,
  validatePrefix,
  validateSecretPath,
} from './validation.js'

const DEFAULT_CONCURRENCY = 4

/** Options for {@link SecretStoreClient}. */
export interface SecretStoreClientOptions {
  /** Namespace that {@link SecretStoreClient.deleteNamespace} refuses to delete. */
  defaultNamespace?: string | undefined
  /** Maximum store calls in flight during bulk operations. */
  concurrency?: number | undefined
  logger?: Logger | undefined
}

function byPath(a: PathFailure, b: PathFailure): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0
}

function toReport(namespace: string, outcomes: [string, Settled<unknown>][]): BulkReport {
  const report: BulkReport = { namespace, succeeded: [], failed: [] }
  for (const [secretPath, result] of outcomes) {
    if (result.ok) {
      report.succeeded.push(secretPath)
    } else {
      report.failed.push({ path: secretPath, reason: describeError(result.error) })
    }
  }
  return report
}

/**
 * Stateless proxy for secret operations within a namespace.
 *
 * @remarks
 * The client holds nothing but its transport (and, through it, the decrypted
 * credential for the lifetime of the process). It never retries: transport
 * errors such as `AuthenticationError` and `StoreUnreachableError` reach the
 * caller unchanged. The namespace is always an explicit argument.
 *
 * @public
 */
export class SecretStoreClient {
  readonly #transport: SecretStoreTransport
  readonly #defaultNamespace: string | undefined
  readonly #concurrency: number
  readonly #logger: Logger

  constructor(transport: SecretStoreTransport, options?: SecretStoreClientOptions) {
    this.#transport = transport
    this.#defaultNamespace = options?.defaultNamespace
    this.#concurrency = options?.concurrency ?? DEFAULT_CONCURRENCY
    this.#logger = (options?.logger ?? silentLogger()).child({ component: 'secret-store' })
  }

  /** Write `value` at `namespace/path`, replacing any existing value. */
  async put(namespace: string, secretPath: string, value: string): Promise<void> {
    const storePath = this.#storePath(namespace, secretPath)
    await this.#transport.write(storePath, value)
    this.#logger.debug({ namespace, path: secretPath }, 'secret written')
  }

  /**
   * Read the value at `namespace/path`.
   *
   * @throws {@link SecretNotFoundError} if nothing is stored there
   */
  async get(namespace: string, secretPath: string): Promise<string> {
    const value = await this.#transport.read(this.#storePath(namespace, secretPath))
    if (value === undefined) {
      throw new SecretNotFoundError(
        `Secret not found: ${namespace}/${secretPath}`,
        namespace,
        secretPath,
      )
    }
    return value
  }

  /**
   * Lazily enumerate every secret path under `namespace`, optionally only
   * those starting with `prefix`. Folders are walked depth-first with their
   * children in lexicographic order. Each call starts a fresh walk.
   */
  async *list(namespace: string, prefix?: string): AsyncGenerator<string, void, undefined> {
    validateNamespace(namespace)
    const filter = prefix === undefined ? '' : validatePrefix(prefix)
    const slash = filter.lastIndexOf('/')
    const start = slash === -1 ? '' : filter.slice(0, slash)

    for await (const secretPath of this.#walk(namespace, start)) {
      if (secretPath.startsWith(filter)) {
        yield secretPath
      }
    }
  }

  /**
   * Delete the value at `namespace/path`. Deleting a missing secret is not
   * an error.
   */
  async delete(namespace: string, secretPath: string): Promise<void> {
    await this.#transport.delete(this.#storePath(namespace, secretPath))
    this.#logger.debug({ namespace, path: secretPath }, 'secret deleted')
  }

  /**
   * Namespaces visible to the credential: the top-level folders of the
   * store, sorted.
   */
  async listNamespaces(): Promise<string[]> {
    const entries = await this.#transport.list('')
    const names = new Set<string>()
    for (const entry of entries) {
      if (entry.endsWith('/')) {
        const name = entry.slice(0, -1)
        if (isValidNamespace(name)) {
          names.add(name)
        }
      }
    }
    return [...names].sort()
  }

  /**
   * Write several secrets of one namespace. Each path succeeds or fails on
   * its own; nothing is rolled back.
   */
  async putMany(namespace: string, secrets: Readonly<Record<string, string>>): Promise<BulkReport> {
    validateNamespace(namespace)
    const values = new Map(Object.entries(secrets))
    const paths = [...values.keys()].sort()
    const report = toReport(
      namespace,
      await this.#each(paths, (secretPath) =>
        this.put(namespace, secretPath, values.get(secretPath) ?? ''),
      ),
    )
    this.#logger.info(
      { namespace, succeeded: report.succeeded.length, failed: report.failed.length },
      'secrets written',
    )
    return report
  }

  /**
   * Read several secrets of one namespace. Absent paths are listed in
   * `missing`, other failures in `failed`.
   */
  async getMany(namespace: string, paths: readonly string[]): Promise<BulkReadResult> {
    validateNamespace(namespace)
    const result: BulkReadResult = { namespace, values: new Map(), missing: [], failed: [] }
    const outcomes = await this.#each([...new Set(paths)], (secretPath) =>
      this.get(namespace, secretPath),
    )
    for (const [secretPath, outcome] of outcomes) {
      if (outcome.ok) {
        result.values.set(secretPath, outcome.value)
      } else if (outcome.error instanceof SecretNotFoundError) {
        result.missing.push(secretPath)
      } else {
        result.failed.push({ path: secretPath, reason: describeError(outcome.error) })
      }
    }
    return result
  }

  /**
   * Copy every secret of `source` into `target`, overwriting what is there.
   * Failed reads and writes are both reported against the path.
   */
  async copyNamespace(source: string, target: string): Promise<BulkReport> {
    validateNamespace(source)
    validateNamespace(target)
    if (source === target) {
      throw new ValidationError(`Cannot copy namespace "${source}" onto itself`, 'namespace')
    }

    const paths: string[] = []
    for await (const secretPath of this.list(source)) {
      paths.push(secretPath)
    }
    const read = await this.getMany(source, paths)
    const report = toReport(
      target,
      await this.#each([...read.values.keys()], (secretPath) =>
        this.put(target, secretPath, read.values.get(secretPath) ?? ''),
      ),
    )
    report.failed.push(
      ...read.failed,
      ...read.missing.map((secretPath) => ({
        path: secretPath,
        reason: 'deleted from the source during the copy',
      })),
    )
    report.failed.sort(byPath)

    this.#logger.info(
      { source, target, succeeded: report.succeeded.length, failed: report.failed.length },
      'namespace copied',
    )
    return report
  }

  /**
   * Delete every secret in `namespace`. `confirmation` must repeat the
   * namespace name exactly, and the default namespace cannot be deleted.
   *
   * @returns Which paths were deleted and which were not
   * @throws {@link ConfirmationRequiredError} if the confirmation does not match
   */
  async deleteNamespace(namespace: string, confirmation: string): Promise<BulkReport> {
    validateNamespace(namespace)
    if (confirmation !== namespace) {
      throw new ConfirmationRequiredError(
        `Deleting namespace "${namespace}" requires confirming its exact name`,
      )
    }
    if (namespace === this.#defaultNamespace) {
      throw new ValidationError(`Refusing to delete the default namespace "${namespace}"`, 'namespace')
    }

    const paths: string[] = []
    for await (const secretPath of this.list(namespace)) {
      paths.push(secretPath)
    }
    const report = toReport(
      namespace,
      await this.#each(paths, (secretPath) => this.delete(namespace, secretPath)),
    )
    if (report.failed.length > 0) {
      this.#logger.warn(
        { namespace, deleted: report.succeeded.length, failed: report.failed.length },
        'namespace partially deleted',
      )
    } else {
      this.#logger.info({ namespace, count: report.succeeded.length }, 'namespace deleted')
    }
    return report
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /**
   * Run `fn` for every path with bounded concurrency. Once the store rejects
   * the credential the remaining paths are not attempted.
   */
  async #each<T>(
    paths: readonly string[],
    fn: (secretPath: string) => Promise<T>,
  ): Promise<[string, Settled<T>][]> {
    const state: { rejected?: AuthenticationError } = {}
    const settled = await settleWithConcurrency(paths, this.#concurrency, async (secretPath) => {
      if (state.rejected !== undefined) {
        throw new LockboxError('skipped after the store rejected the credential')
      }
      try {
        return await fn(secretPath)
      } catch (err) {
        if (err instanceof AuthenticationError) {
          state.rejected = err
        }
        throw err
      }
    })
    return paths.flatMap((secretPath, index): [string, Settled<T>][] => {
      const result = settled[index]
      return result === undefined ? [] : [[secretPath, result]]
    })
  }

  #storePath(namespace: string, secretPath: string): string {
    return `${validateNamespace(namespace)}/${validateSecretPath(secretPath)}`
  }

  async *#walk(namespace: string, folder: string): AsyncGenerator<string, void, undefined> {
    const storeFolder = folder === '' ? namespace : `${namespace}/${folder}`
    const entries = [...(await this.#transport.list(storeFolder))].sort()
    for (const entry of entries) {
      const child = folder === '' ? entry : `${folder}/${entry}`
      if (entry.endsWith('/')) {
        yield* this.#walk(namespace, child.slice(0, -1))
      } else {
        yield child
      }
    }
  }
}

/**
 * Creation and restoration of encrypted namespace snapshots.
 */

import {
  AuthenticationError,
  BackupIncompleteError,
  CorruptBackupError,
  InvalidPasswordError,
  LockboxError,
  PartialRestoreError,
  ValidationError,
  describeError,
} from '../errors.js'
import type { BackupFailure, NamespaceRestoreResult, RestoreFailure } from '../errors.js'
import { BlobFormatError, blobSalt, openBlob, sealBlob, serializeBlob } from '../crypto/blob.js'
import type { BlobMetadata, EncryptedBlob } from '../crypto/blob.js'
import { deriveKey, generateSalt, kdfParams } from '../crypto/kdf.js'
import type { KdfParams } from '../crypto/kdf.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import type { PasswordPrompt } from '../session.js'
import type { SecretStoreClient } from '../store/client.js'
import { isValidNamespace, isValidSecretPath, validateNamespace } from '../store/validation.js'
import { retryUnreachable, settleWithConcurrency } from '../util/async.js'
import type { RetryOptions } from '../util/async.js'
import { writeFileAtomic } from '../util/fs.js'
import { parseSnapshot, serializeSnapshot, snapshotNamespaces, snapshotSize } from './snapshot.js'
import type {
  BackupSnapshot,
  CreateBackupOptions,
  RestoreOptions,
  RestoreReport,
  UnlockBackupOptions,
} from './types.js'

const DEFAULT_CONCURRENCY = 4
const DEFAULT_MAX_ATTEMPTS = 3

/** Options for constructing a {@link BackupEngine}. */
export interface BackupEngineOptions {
  /** Maximum store calls in flight during bulk reads and writes. */
  concurrency?: number | undefined
  /** Backoff for reads that fail with `StoreUnreachableError`. */
  retry?: RetryOptions | undefined
  /** KDF parameters for new backups. Defaults to {@link kdfParams}. */
  kdf?: KdfParams | undefined
  logger?: Logger | undefined
}

interface SecretRef {
  namespace: string
  path: string
}

interface StagedNamespace {
  namespace: string
  sources: string[]
  entries: Map<string, string>
  problems: RestoreFailure[]
}

function byPath(a: RestoreFailure, b: RestoreFailure): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0
}

/**
 * Produces and consumes encrypted snapshots of whole namespaces.
 *
 * @remarks
 * A backup is all or nothing: a single unreadable secret fails creation and
 * no file is written. Restore has no rollback. Each destination namespace is
 * staged first, and a namespace that fails staging is not written at all;
 * individual write failures after that are reported per path.
 *
 * @public
 */
export class BackupEngine {
  readonly #client: SecretStoreClient
  readonly #concurrency: number
  readonly #retry: RetryOptions | undefined
  readonly #kdf: KdfParams
  readonly #logger: Logger

  constructor(client: SecretStoreClient, options?: BackupEngineOptions) {
    this.#client = client
    this.#concurrency = options?.concurrency ?? DEFAULT_CONCURRENCY
    this.#retry = options?.retry
    this.#kdf = options?.kdf ?? kdfParams()
    this.#logger = (options?.logger ?? silentLogger()).child({ component: 'backup' })
  }

  /**
   * Snapshot `namespaces` and encrypt the result under `password`.
   *
   * @throws {@link BackupIncompleteError} if any secret could not be read
   * @throws {@link AuthenticationError} as soon as the store rejects the credential
   */
  async create(
    namespaces: readonly string[],
    password: string,
    options?: CreateBackupOptions,
  ): Promise<EncryptedBlob> {
    if (password.length === 0) {
      throw new ValidationError('Password must not be empty', 'password')
    }
    const snapshot = await this.snapshot(namespaces)
    return this.encrypt(snapshot, password, options)
  }

  /**
   * Encrypt an already assembled snapshot under `password`, writing it to
   * `options.outputPath` when given.
   */
  async encrypt(
    snapshot: BackupSnapshot,
    password: string,
    options?: CreateBackupOptions,
  ): Promise<EncryptedBlob> {
    if (password.length === 0) {
      throw new ValidationError('Password must not be empty', 'password')
    }
    const names = snapshotNamespaces(snapshot)
    const salt = generateSalt()
    const key = await deriveKey(password, salt, this.#kdf)
    let blob: EncryptedBlob
    try {
      blob = await sealBlob({
        kind: 'backup',
        key,
        salt,
        kdf: this.#kdf,
        plaintext: serializeSnapshot(snapshot),
        metadata: { createdAt: new Date().toISOString(), namespaces: names },
      })
    } finally {
      key.fill(0)
    }

    if (options?.outputPath !== undefined) {
      await writeFileAtomic(options.outputPath, serializeBlob(blob))
      this.#logger.info({ path: options.outputPath }, 'backup written')
    }
    this.#logger.info({ namespaces: names, count: snapshotSize(snapshot) }, 'backup created')
    return blob
  }

  /**
   * Read every secret of `namespaces` into memory.
   *
   * @throws {@link BackupIncompleteError} if any secret could not be read
   */
  async snapshot(namespaces: readonly string[]): Promise<BackupSnapshot> {
    const names = normalizeNamespaces(namespaces)
    const refs: SecretRef[] = []
    for (const namespace of names) {
      const paths = await retryUnreachable(() => this.#collect(namespace), this.#retry)
      this.#logger.debug({ namespace, count: paths.length }, 'namespace enumerated')
      for (const secretPath of paths) {
        refs.push({ namespace, path: secretPath })
      }
    }

    const state: { rejected?: AuthenticationError } = {}
    const results = await settleWithConcurrency(refs, this.#concurrency, async (ref) => {
      if (state.rejected !== undefined) {
        throw state.rejected
      }
      try {
        return await retryUnreachable(
          () => this.#client.get(ref.namespace, ref.path),
          this.#retry,
        )
      } catch (err) {
        if (err instanceof AuthenticationError) {
          state.rejected = err
        }
        throw err
      }
    })
    for (const result of results) {
      if (!result.ok && result.error instanceof AuthenticationError) {
        this.#logger.error({ reason: result.error.name }, 'backup aborted: credential rejected')
        throw result.error
      }
    }

    const snapshot: BackupSnapshot = { formatVersion: 1, namespaces: new Map() }
    for (const namespace of names) {
      snapshot.namespaces.set(namespace, new Map())
    }
    const failures: BackupFailure[] = []
    results.forEach((result, index) => {
      const ref = refs[index]
      if (ref === undefined) {
        return
      }
      if (result.ok) {
        snapshot.namespaces.get(ref.namespace)?.set(ref.path, result.value)
        return
      }
      failures.push({ namespace: ref.namespace, path: ref.path, reason: describeError(result.error) })
    })

    if (failures.length > 0) {
      this.#logger.error(
        { failed: failures.length, total: refs.length },
        'backup aborted: secrets could not be read',
      )
      throw new BackupIncompleteError(
        `Backup incomplete: ${String(failures.length)} of ${String(refs.length)} secrets could not be read`,
        failures,
        refs.length - failures.length,
      )
    }
    return snapshot
  }

  /**
   * Decrypt and parse a backup blob without writing anything.
   *
   * @throws {@link InvalidPasswordError} if the password does not authenticate
   * @throws {@link CorruptBackupError} if the blob or snapshot is damaged
   */
  async decrypt(blob: EncryptedBlob, password: string): Promise<BackupSnapshot> {
    if (blob.kind !== 'backup') {
      throw new CorruptBackupError(`Not a backup: blob kind is "${blob.kind}"`)
    }
    const key = await deriveKey(password, blobSalt(blob), blob.kdf)
    let plaintext: Uint8Array
    try {
      plaintext = await openBlob(blob, key)
    } catch (err) {
      if (err instanceof InvalidPasswordError) {
        this.#logger.warn({ reason: 'auth-tag-mismatch' }, 'backup decryption failed')
        throw new InvalidPasswordError('Invalid password or damaged backup')
      }
      if (err instanceof BlobFormatError) {
        this.#logger.error({ reason: err.message }, 'backup is damaged')
        throw new CorruptBackupError(`Backup is damaged: ${err.message}`)
      }
      throw err
    } finally {
      key.fill(0)
    }

    const snapshot = parseSnapshot(plaintext)
    const expected = [...(blob.metadata.namespaces ?? [])].sort()
    const actual = snapshotNamespaces(snapshot)
    if (JSON.stringify(expected) !== JSON.stringify(actual)) {
      throw new CorruptBackupError('Backup namespaces do not match its metadata')
    }
    return snapshot
  }

  /**
   * Decrypt a backup with a password from `prompt`, asking again after each
   * wrong one until `maxAttempts` have failed.
   *
   * @throws {@link InvalidPasswordError} carrying the number of attempts
   * @throws {@link CorruptBackupError} at once, without re-prompting
   */
  async unlock(
    blob: EncryptedBlob,
    prompt: PasswordPrompt,
    options?: UnlockBackupOptions,
  ): Promise<BackupSnapshot> {
    const maxAttempts = options?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    for (let attempt = 1; ; attempt++) {
      const password = await prompt()
      try {
        return await this.decrypt(blob, password)
      } catch (err) {
        if (!(err instanceof InvalidPasswordError)) {
          throw err
        }
        if (attempt >= maxAttempts) {
          throw new InvalidPasswordError(
            `Invalid password or damaged backup (${String(attempt)} attempts)`,
            attempt,
          )
        }
      }
    }
  }

  /**
   * Write the contents of a backup back to the store.
   *
   * @returns A report per destination namespace. Failed paths are reported,
   *   not thrown; see {@link assertRestoreComplete}.
   */
  async restore(
    blob: EncryptedBlob,
    password: string,
    options?: RestoreOptions,
  ): Promise<RestoreReport> {
    if (options?.targetNamespace !== undefined) {
      validateNamespace(options.targetNamespace)
    }
    const snapshot = await this.decrypt(blob, password)
    return this.restoreSnapshot(snapshot, blob.metadata, options)
  }

  /**
   * Write an already decrypted snapshot back to the store. `metadata` is the
   * cleartext metadata of the backup it came from.
   */
  async restoreSnapshot(
    snapshot: BackupSnapshot,
    metadata: BlobMetadata,
    options?: RestoreOptions,
  ): Promise<RestoreReport> {
    const target =
      options?.targetNamespace === undefined
        ? undefined
        : validateNamespace(options.targetNamespace)
    const dryRun = options?.dryRun === true
    const concurrency = options?.concurrency ?? this.#concurrency

    const staged = stage(snapshot, target)
    this.#logger.debug(
      { namespaces: staged.map((s) => s.namespace), dryRun },
      'restore staged',
    )

    const results: NamespaceRestoreResult[] = []
    const state: { rejected?: AuthenticationError } = {}

    for (const entry of staged) {
      const paths = [...entry.entries.keys()]
      if (entry.problems.length > 0) {
        const reported = new Set(entry.problems.map((p) => p.path))
        const failed = [
          ...entry.problems,
          ...paths
            .filter((p) => !reported.has(p))
            .map((p) => ({ path: p, reason: 'not written: namespace failed validation' })),
        ].sort(byPath)
        this.#logger.warn(
          { namespace: entry.namespace, problems: entry.problems.length },
          'namespace skipped: staging failed',
        )
        results.push({ namespace: entry.namespace, sources: entry.sources, succeeded: [], failed })
        continue
      }
      if (dryRun) {
        results.push({ namespace: entry.namespace, sources: entry.sources, succeeded: paths, failed: [] })
        continue
      }

      const settled = await settleWithConcurrency(paths, concurrency, async (secretPath) => {
        if (state.rejected !== undefined) {
          throw new LockboxError('skipped after the store rejected the credential')
        }
        try {
          await this.#client.put(entry.namespace, secretPath, entry.entries.get(secretPath) ?? '')
        } catch (err) {
          if (err instanceof AuthenticationError) {
            state.rejected = err
          }
          throw err
        }
      })

      const succeeded: string[] = []
      const failed: RestoreFailure[] = []
      settled.forEach((result, index) => {
        const secretPath = paths[index]
        if (secretPath === undefined) {
          return
        }
        if (result.ok) {
          succeeded.push(secretPath)
        } else {
          failed.push({ path: secretPath, reason: describeError(result.error) })
        }
      })
      if (failed.length > 0) {
        this.#logger.warn(
          { namespace: entry.namespace, failed: failed.length, succeeded: succeeded.length },
          'restore partially failed',
        )
      }
      results.push({ namespace: entry.namespace, sources: entry.sources, succeeded, failed })
    }

    this.#logger.info(
      {
        namespaces: results.length,
        succeeded: results.reduce((n, r) => n + r.succeeded.length, 0),
        failed: results.reduce((n, r) => n + r.failed.length, 0),
        dryRun,
      },
      'restore finished',
    )
    return { dryRun, metadata, namespaces: results }
  }

  async #collect(namespace: string): Promise<string[]> {
    const paths: string[] = []
    for await (const secretPath of this.#client.list(namespace)) {
      paths.push(secretPath)
    }
    return paths
  }
}

/** Validate, de-duplicate and sort the namespaces of a backup request. */
function normalizeNamespaces(namespaces: readonly string[]): string[] {
  if (namespaces.length === 0) {
    throw new ValidationError('At least one namespace is required', 'namespace')
  }
  return [...new Set(namespaces.map((ns) => validateNamespace(ns)))].sort()
}

/**
 * Group snapshot secrets by destination namespace, recording everything that
 * would make a namespace unsafe to write.
 */
function stage(snapshot: BackupSnapshot, target: string | undefined): StagedNamespace[] {
  const staged = new Map<string, StagedNamespace>()

  for (const source of snapshotNamespaces(snapshot)) {
    const destination = target ?? source
    let entry = staged.get(destination)
    if (entry === undefined) {
      entry = { namespace: destination, sources: [], entries: new Map(), problems: [] }
      staged.set(destination, entry)
    }
    entry.sources.push(source)

    const validNamespace = isValidNamespace(destination)
    for (const [secretPath, value] of snapshot.namespaces.get(source) ?? []) {
      if (!validNamespace) {
        entry.problems.push({ path: secretPath, reason: `invalid namespace "${destination}"` })
      } else if (!isValidSecretPath(secretPath)) {
        entry.problems.push({ path: secretPath, reason: 'invalid secret path' })
      }
      const existing = entry.entries.get(secretPath)
      if (existing !== undefined && existing !== value) {
        entry.problems.push({
          path: secretPath,
          reason: `conflicting values from namespaces ${entry.sources.join(', ')}`,
        })
      }
      entry.entries.set(secretPath, value)
    }
  }

  return [...staged.values()].sort((a, b) =>
    a.namespace < b.namespace ? -1 : a.namespace > b.namespace ? 1 : 0,
  )
}

/**
 * Throw if a restore report contains failed paths.
 *
 * @throws {@link PartialRestoreError}
 */
export function assertRestoreComplete(report: RestoreReport): void {
  const failed = report.namespaces.reduce((n, r) => n + r.failed.length, 0)
  if (failed > 0) {
    throw new PartialRestoreError(
      `Restore incomplete: ${String(failed)} secrets were not written`,
      report,
    )
  }
}

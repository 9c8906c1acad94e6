/**
 * In-memory secret store for testing.
 */

import { AuthenticationError, SecretStoreError, StoreUnreachableError } from 'lockbox'
import type { SecretStoreTransport, TransportFactory } from 'lockbox'

/**
 * Kind of failure an {@link InMemorySecretStore} can be told to produce.
 * @public
 */
export type InjectedFault = 'unreachable' | 'auth' | 'error'

function faultError(fault: InjectedFault, storePath: string): Error {
  switch (fault) {
    case 'unreachable':
      return new StoreUnreachableError(`Secret store unavailable (HTTP 503) for ${storePath}`, 503)
    case 'auth':
      return new AuthenticationError(
        `Secret store rejected the credential (HTTP 403) for ${storePath}`,
        403,
      )
    case 'error':
      return new SecretStoreError(`Secret store returned HTTP 400 for ${storePath}`, 400)
  }
}

/**
 * A fully in-memory `SecretStoreTransport` with fault injection.
 *
 * @remarks
 * Secrets are kept in a plain `Map` keyed by full store path
 * (`<namespace>/<secret path>`). Reads, writes and deletes of chosen paths can be made
 * to fail, permanently or for a number of attempts, and the whole store can
 * be told to reject the credential.
 *
 * @example
 * ```ts
 * const store = new InMemorySecretStore()
 * store.seed('myapp', { 'db/password': 'test-secret' })
 * store.failWrites('myapp/db/password')
 * ```
 *
 * @public
 */
export class InMemorySecretStore implements SecretStoreTransport {
  readonly description = 'in-memory secret store'
  readonly #data = new Map<string, string>()
  readonly #readFaults = new Map<string, { fault: InjectedFault; remaining: number }>()
  readonly #writeFaults = new Map<string, { fault: InjectedFault; remaining: number }>()
  readonly #deleteFaults = new Map<string, { fault: InjectedFault; remaining: number }>()
  readonly #reads = new Map<string, number>()
  #rejectAll = false

  /** Credentials passed to {@link InMemorySecretStore.factory}, in order. */
  readonly credentials: string[] = []

  /**
   * A transport factory that hands out this store and records the credential.
   * When `expectedCredential` is given, any other credential is rejected.
   */
  factory(expectedCredential?: string): TransportFactory {
    return (credential) => {
      this.credentials.push(credential)
      if (expectedCredential !== undefined && credential !== expectedCredential) {
        this.#rejectAll = true
      }
      return this
    }
  }

  /** @public */
  read(storePath: string): Promise<string | undefined> {
    this.#reads.set(storePath, (this.#reads.get(storePath) ?? 0) + 1)
    const failure = this.#check(this.#readFaults, storePath)
    if (failure !== undefined) {
      return Promise.reject(failure)
    }
    return Promise.resolve(this.#data.get(storePath))
  }

  /** @public */
  write(storePath: string, value: string): Promise<void> {
    const failure = this.#check(this.#writeFaults, storePath)
    if (failure !== undefined) {
      return Promise.reject(failure)
    }
    this.#data.set(storePath, value)
    return Promise.resolve()
  }

  /** @public */
  list(folder: string): Promise<string[]> {
    if (this.#rejectAll) {
      return Promise.reject(faultError('auth', folder))
    }
    const prefix = folder === '' ? '' : `${folder}/`
    const children = new Set<string>()
    for (const key of this.#data.keys()) {
      if (!key.startsWith(prefix)) {
        continue
      }
      const rest = key.slice(prefix.length)
      const slash = rest.indexOf('/')
      children.add(slash === -1 ? rest : `${rest.slice(0, slash)}/`)
    }
    return Promise.resolve([...children])
  }

  /** @public */
  delete(storePath: string): Promise<void> {
    const failure = this.#check(this.#deleteFaults, storePath)
    if (failure !== undefined) {
      return Promise.reject(failure)
    }
    this.#data.delete(storePath)
    return Promise.resolve()
  }

  /**
   * Store `entries` (secret path → value) under `namespace`.
   * @public
   */
  seed(namespace: string, entries: Record<string, string>): void {
    for (const [secretPath, value] of Object.entries(entries)) {
      this.#data.set(`${namespace}/${secretPath}`, value)
    }
  }

  /**
   * The secrets of one namespace as secret path → value.
   * @public
   */
  entries(namespace: string): Record<string, string> {
    const prefix = `${namespace}/`
    const result: Record<string, string> = {}
    for (const [key, value] of [...this.#data.entries()].sort(([a], [b]) => (a < b ? -1 : 1))) {
      if (key.startsWith(prefix)) {
        result[key.slice(prefix.length)] = value
      }
    }
    return result
  }

  /**
   * Make reads of `storePath` fail with `fault`, for `times` attempts
   * (default: every attempt).
   * @public
   */
  failReads(storePath: string, fault: InjectedFault = 'unreachable', times = Infinity): void {
    this.#readFaults.set(storePath, { fault, remaining: times })
  }

  /**
   * Make writes of `storePath` fail with `fault`, for `times` attempts
   * (default: every attempt).
   * @public
   */
  failWrites(storePath: string, fault: InjectedFault = 'error', times = Infinity): void {
    this.#writeFaults.set(storePath, { fault, remaining: times })
  }

  /**
   * Make deletes of `storePath` fail with `fault`, for `times` attempts
   * (default: every attempt).
   * @public
   */
  failDeletes(storePath: string, fault: InjectedFault = 'error', times = Infinity): void {
    this.#deleteFaults.set(storePath, { fault, remaining: times })
  }

  /**
   * Reject every subsequent operation with `AuthenticationError`.
   * @public
   */
  rejectCredential(reject = true): void {
    this.#rejectAll = reject
  }

  /**
   * How many times `storePath` has been read.
   * @public
   */
  readCount(storePath: string): number {
    return this.#reads.get(storePath) ?? 0
  }

  /**
   * Remove all stored secrets and injected faults. Useful for test teardown.
   * @public
   */
  clear(): void {
    this.#data.clear()
    this.#readFaults.clear()
    this.#writeFaults.clear()
    this.#deleteFaults.clear()
    this.#reads.clear()
    this.#rejectAll = false
  }

  /**
   * The number of secrets currently stored.
   * @public
   */
  get size(): number {
    return this.#data.size
  }

  #check(
    faults: Map<string, { fault: InjectedFault; remaining: number }>,
    storePath: string,
  ): Error | undefined {
    if (this.#rejectAll) {
      return faultError('auth', storePath)
    }
    const entry = faults.get(storePath)
    if (entry === undefined || entry.remaining <= 0) {
      return undefined
    }
    entry.remaining -= 1
    return faultError(entry.fault, storePath)
  }
}

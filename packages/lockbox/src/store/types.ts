/**
 * Remote secret store abstraction types.
 */

import type { PathFailure } from '../errors.js'

/**
 * Factory that builds a transport once the root credential is known.
 * @public
 */
export type TransportFactory = (credential: string) => SecretStoreTransport

/**
 * Raw key/value access to the remote secret store.
 *
 * @remarks
 * Paths are full store paths (`<namespace>/<secret path>`), without the
 * mount. Implementations throw `AuthenticationError` when the credential is
 * rejected and `StoreUnreachableError` on network or availability failures.
 *
 * @public
 */
export interface SecretStoreTransport {
  /** Human-readable description of the endpoint, safe to log. */
  readonly description: string

  /**
   * Read one value.
   * @returns The value, or `undefined` if nothing is stored at `path`
   */
  read(path: string): Promise<string | undefined>

  /**
   * Write one value, replacing whatever is stored at `path`.
   */
  write(path: string, value: string): Promise<void>

  /**
   * List the direct children of a folder. Sub-folders carry a trailing `/`.
   * @param folder - Folder path without trailing slash; `''` for the root
   * @returns Child names, or `[]` if the folder does not exist
   */
  list(folder: string): Promise<string[]>

  /**
   * Delete one value. Deleting a missing path is not an error.
   */
  delete(path: string): Promise<void>
}

/** KV secrets engine version of the mount. */
export type KvVersion = 1 | 2

/**
 * Connection settings for the remote store.
 * @public
 */
export interface StoreConnection {
  /** Base URL, e.g. `https://vault.example.com:8200`. */
  address: string
  /** KV mount point, e.g. `secret`. */
  mount: string
  kvVersion: KvVersion
  /** Request timeout. */
  timeoutMs: number
  /** Vault Enterprise namespace header, if any. */
  namespace?: string | undefined
}

/**
 * Per-path outcome of a bulk write or delete within one namespace.
 * @public
 */
export interface BulkReport {
  namespace: string
  /** Paths that were written or deleted. */
  succeeded: string[]
  failed: PathFailure[]
}

/**
 * Outcome of reading several secrets of one namespace.
 * @public
 */
export interface BulkReadResult {
  namespace: string
  /** Values found, in the order the paths were requested. */
  values: Map<string, string>
  /** Requested paths with nothing stored. */
  missing: string[]
  failed: PathFailure[]
}

/**
 * HTTP transport for a HashiCorp-Vault-compatible KV secrets engine.
 *
 * @remarks
 * KV v2 layout (default):
 *   read/write  `/v1/<mount>/data/<path>`
 *   list        `/v1/<mount>/metadata/<folder>/?list=true`
 *   delete      `/v1/<mount>/metadata/<path>` (all versions, no soft delete)
 *
 * KV v1 uses `/v1/<mount>/<path>` for everything. Each secret is stored as a
 * single `value` field.
 */

import { AuthenticationError, SecretStoreError, StoreUnreachableError } from '../errors.js'
import type { SecretStoreTransport, StoreConnection } from './types.js'

/** Options for {@link VaultHttpTransport}. */
export interface VaultHttpTransportOptions extends StoreConnection {
  /** Bearer token sent as `X-Vault-Token`. */
  token: string
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function encodePath(storePath: string): string {
  return storePath
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join('/')
}

/**
 * Talks to the remote store over HTTP(S) using the global `fetch`.
 * @public
 */
export class VaultHttpTransport implements SecretStoreTransport {
  readonly description: string
  readonly #options: VaultHttpTransportOptions
  readonly #base: string

  constructor(options: VaultHttpTransportOptions) {
    this.#options = options
    this.#base = `${options.address.replace(/\/+$/, '')}/v1/${encodePath(options.mount)}`
    this.description = `${options.address} (mount "${options.mount}", kv v${String(options.kvVersion)})`
  }

  async read(storePath: string): Promise<string | undefined> {
    const response = await this.#send('GET', this.#dataUrl(storePath), storePath)
    if (response.status === 404) {
      return undefined
    }
    this.#check(response, storePath)
    const body = await this.#json(response, storePath)
    const data = this.#options.kvVersion === 2 && isObject(body.data) ? body.data.data : body.data
    if (!isObject(data) || typeof data.value !== 'string') {
      throw new SecretStoreError(
        `Secret at ${storePath} has no string "value" field`,
        response.status,
      )
    }
    return data.value
  }

  async write(storePath: string, value: string): Promise<void> {
    const payload = this.#options.kvVersion === 2 ? { data: { value } } : { value }
    const response = await this.#send(
      'POST',
      this.#dataUrl(storePath),
      storePath,
      JSON.stringify(payload),
    )
    this.#check(response, storePath)
  }

  async list(folder: string): Promise<string[]> {
    const encoded = encodePath(folder)
    const prefix = this.#options.kvVersion === 2 ? `${this.#base}/metadata` : this.#base
    const url = encoded.length > 0 ? `${prefix}/${encoded}/?list=true` : `${prefix}/?list=true`
    const response = await this.#send('GET', url, folder === '' ? '/' : folder)
    if (response.status === 404) {
      return []
    }
    this.#check(response, folder)
    const body = await this.#json(response, folder)
    const keys = isObject(body.data) ? body.data.keys : undefined
    if (!Array.isArray(keys)) {
      throw new SecretStoreError(`Listing of ${folder} has no "keys" array`, response.status)
    }
    return keys.filter((key): key is string => typeof key === 'string')
  }

  async delete(storePath: string): Promise<void> {
    const url =
      this.#options.kvVersion === 2
        ? `${this.#base}/metadata/${encodePath(storePath)}`
        : this.#dataUrl(storePath)
    const response = await this.#send('DELETE', url, storePath)
    if (response.status === 404) {
      return
    }
    this.#check(response, storePath)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  #dataUrl(storePath: string): string {
    const encoded = encodePath(storePath)
    return this.#options.kvVersion === 2
      ? `${this.#base}/data/${encoded}`
      : `${this.#base}/${encoded}`
  }

  async #send(method: string, url: string, storePath: string, body?: string): Promise<Response> {
    const headers: Record<string, string> = { 'X-Vault-Token': this.#options.token }
    if (this.#options.namespace !== undefined) {
      headers['X-Vault-Namespace'] = this.#options.namespace
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.#options.timeoutMs),
    }
    if (body !== undefined) {
      init.body = body
    }

    try {
      return await fetch(url, init)
    } catch (err) {
      const reason = err instanceof Error ? err.name : 'Error'
      throw new StoreUnreachableError(
        `Secret store at ${this.#options.address} unreachable (${reason}) while accessing ${storePath}`,
      )
    }
  }

  #check(response: Response, storePath: string): void {
    if (response.ok) {
      return
    }
    const { status } = response
    if (status === 401 || status === 403) {
      throw new AuthenticationError(
        `Secret store rejected the credential (HTTP ${String(status)}) for ${storePath}`,
        status,
      )
    }
    if (status === 429 || status >= 500) {
      throw new StoreUnreachableError(
        `Secret store unavailable (HTTP ${String(status)}) for ${storePath}`,
        status,
      )
    }
    throw new SecretStoreError(
      `Secret store returned HTTP ${String(status)} for ${storePath}`,
      status,
    )
  }

  async #json(response: Response, storePath: string): Promise<Record<string, unknown>> {
    let body: unknown
    try {
      body = await response.json()
    } catch {
      throw new SecretStoreError(`Secret store sent invalid JSON for ${storePath}`, response.status)
    }
    if (!isObject(body)) {
      throw new SecretStoreError(`Secret store sent an unexpected body for ${storePath}`, response.status)
    }
    return body
  }
}

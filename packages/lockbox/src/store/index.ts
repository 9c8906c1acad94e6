/**
 * Remote secret store barrel export.
 */

export { SecretStoreClient } from './client.js'
export type { SecretStoreClientOptions } from './client.js'
export { VaultHttpTransport } from './http-transport.js'
export type { VaultHttpTransportOptions } from './http-transport.js'
export type {
  SecretStoreTransport,
  TransportFactory,
  StoreConnection,
  KvVersion,
  BulkReport,
  BulkReadResult,
} from './types.js'
export {
  isValidNamespace,
  isValidSecretPath,
  validateNamespace,
  validateSecretPath,
  validatePrefix,
} from './validation.js'

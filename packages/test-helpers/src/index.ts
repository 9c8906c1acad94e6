/**
 * Test utilities for lockbox consumers.
 *
 * @packageDocumentation
 */

export { InMemorySecretStore } from './in-memory-secret-store.js'
export type { InjectedFault } from './in-memory-secret-store.js'
export { TestLockbox, TEST_PASSWORD, TEST_CREDENTIAL, TEST_ITERATIONS } from './test-lockbox.js'
export type { TestLockboxOptions } from './test-lockbox.js'

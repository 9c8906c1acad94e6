import { describe, it, expect, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import { InvalidPasswordError, KeyStoreNotFoundError } from 'lockbox'
import { TEST_CREDENTIAL, TEST_ITERATIONS, TEST_PASSWORD, TestLockbox } from '../../src/index.js'

describe('TestLockbox', () => {
  let t: TestLockbox | undefined

  afterEach(async () => {
    await t?.cleanup()
    t = undefined
  })

  it('creates an initialized key store with fast parameters', async () => {
    t = await TestLockbox.create()
    const keyStore = t.open().keyStore
    expect(await keyStore.unlock(TEST_PASSWORD)).toBe(TEST_CREDENTIAL)
    expect((await keyStore.inspect()).kdf.iterations).toBe(TEST_ITERATIONS)
    expect(t.config.keyStorePath.startsWith(t.dir)).toBe(true)
    expect(Object.isFrozen(t.config)).toBe(true)
  })

  it('connects to the in-memory store with the sealed credential', async () => {
    t = await TestLockbox.create({ defaultNamespace: 'myapp' })
    t.store.seed('myapp', { key: 'test-secret' })

    const client = await t.open().client()

    expect(await client.get(t.config.defaultNamespace, 'key')).toBe('test-secret')
    expect(t.store.credentials).toEqual([TEST_CREDENTIAL])
  })

  it('passes a custom prompt through', async () => {
    t = await TestLockbox.create()
    await expect(t.open(() => Promise.resolve('wrong')).client()).rejects.toThrow(
      InvalidPasswordError,
    )
  })

  it('can start without a key store', async () => {
    t = await TestLockbox.create({ uninitialized: true })
    await expect(t.open().client()).rejects.toThrow(KeyStoreNotFoundError)
  })

  it('removes its directory on cleanup', async () => {
    const created = await TestLockbox.create()
    await created.cleanup()
    await expect(fs.access(created.dir)).rejects.toThrow()
  })
})

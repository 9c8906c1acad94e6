import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>()
  return { ...actual, rename: vi.fn(actual.rename) }
})

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { SecureKeyStore } from '../../../src/key-store/key-store.js'
import { kdfParams } from '../../../src/crypto/kdf.js'
import { makeTempDir, removeTempDir } from '../../helpers/store.js'

const mockFs = vi.mocked(fs)

describe('SecureKeyStore atomic replacement', () => {
  let dir: string
  let storePath: string
  let keyStore: SecureKeyStore

  beforeEach(async () => {
    dir = await makeTempDir()
    storePath = path.join(dir, 'root-credential.enc')
    keyStore = new SecureKeyStore({ path: storePath, kdf: kdfParams(1000) })
    await keyStore.initialize('correct-horse', 'root-token-123')
  })

  afterEach(async () => {
    await removeTempDir(dir)
  })

  it('keeps the old key store intact when the rename fails', async () => {
    const before = await fs.readFile(storePath, 'utf8')
    mockFs.rename.mockRejectedValueOnce(
      Object.assign(new Error('simulated crash'), { code: 'EIO' }),
    )

    await expect(keyStore.changePassword('correct-horse', 'battery-staple')).rejects.toThrow(
      'simulated crash',
    )

    expect(await fs.readFile(storePath, 'utf8')).toBe(before)
    expect(await keyStore.unlock('correct-horse')).toBe('root-token-123')
  })

  it('removes the temporary file after a failed rename', async () => {
    mockFs.rename.mockRejectedValueOnce(new Error('simulated crash'))

    await expect(keyStore.changePassword('correct-horse', 'battery-staple')).rejects.toThrow(
      'simulated crash',
    )

    expect(await fs.readdir(dir)).toEqual(['root-credential.enc'])
  })
})

import { describe, it, expect } from 'vitest'
import {
  BlobFormatError,
  openBlob,
  parseBlob,
  sealBlob,
  serializeBlob,
} from '../../../src/crypto/blob.js'
import type { EncryptedBlob } from '../../../src/crypto/blob.js'
import { kdfParams } from '../../../src/crypto/kdf.js'
import { InvalidPasswordError } from '../../../src/errors.js'

const KDF = kdfParams(1000)

/** Returns a random 32-byte key suitable for A256GCM. */
function makeKey(): Uint8Array {
  return crypto.getRandomValues(new Uint8Array(32))
}

function seal(key: Uint8Array, plaintext = 'root-token-123'): Promise<EncryptedBlob> {
  return sealBlob({
    kind: 'backup',
    key,
    salt: new Uint8Array(16).fill(3),
    kdf: KDF,
    plaintext: new TextEncoder().encode(plaintext),
    metadata: { createdAt: '2024-05-01T12:00:00.000Z', namespaces: ['myapp'] },
  })
}

/** The serialized file as a plain record. */
function fileOf(blob: EncryptedBlob): Record<string, unknown> {
  const value: unknown = JSON.parse(serializeBlob(blob))
  if (typeof value !== 'object' || value === null) {
    throw new Error('expected an object')
  }
  return Object.fromEntries(Object.entries(value))
}

/** Flip one bit of a base64url field. */
function flipBit(value: string, byteIndex = 0): string {
  const bytes = Buffer.from(value, 'base64url')
  bytes[byteIndex] = (bytes[byteIndex] ?? 0) ^ 0x01
  return bytes.toString('base64url')
}

describe('sealBlob / openBlob', () => {
  it('roundtrip: decrypted plaintext matches the original', async () => {
    const key = makeKey()
    const blob = await seal(key)
    const plaintext = await openBlob(blob, key)
    expect(new TextDecoder().decode(plaintext)).toBe('root-token-123')
  })

  it('records the cleartext parameters on the blob', async () => {
    const blob = await seal(makeKey())
    expect(blob.formatVersion).toBe(1)
    expect(blob.kind).toBe('backup')
    expect(blob.kdf).toEqual(KDF)
    expect(blob.salt).toBe(Buffer.alloc(16, 3).toString('base64url'))
    expect(Buffer.from(blob.nonce, 'base64url')).toHaveLength(12)
    expect(Buffer.from(blob.authTag, 'base64url')).toHaveLength(16)
    expect(blob.metadata).toEqual({
      createdAt: '2024-05-01T12:00:00.000Z',
      namespaces: ['myapp'],
    })
  })

  it('uses a fresh nonce for every encryption', async () => {
    const key = makeKey()
    const a = await seal(key)
    const b = await seal(key)
    expect(a.nonce).not.toBe(b.nonce)
    expect(a.ciphertext).not.toBe(b.ciphertext)
  })

  it('rejects the wrong key with InvalidPasswordError', async () => {
    const blob = await seal(makeKey())
    await expect(openBlob(blob, makeKey())).rejects.toThrow(InvalidPasswordError)
  })

  it('detects a flipped bit in the ciphertext', async () => {
    const key = makeKey()
    const blob = await seal(key)
    for (const index of [0, 5, 13]) {
      const tampered = { ...blob, ciphertext: flipBit(blob.ciphertext, index) }
      await expect(openBlob(tampered, key)).rejects.toThrow(InvalidPasswordError)
    }
  })

  it('detects a flipped bit in the tag', async () => {
    const key = makeKey()
    const blob = await seal(key)
    const tampered = { ...blob, authTag: flipBit(blob.authTag, 15) }
    await expect(openBlob(tampered, key)).rejects.toThrow(InvalidPasswordError)
  })

  it('detects a modified nonce', async () => {
    const key = makeKey()
    const blob = await seal(key)
    const tampered = { ...blob, nonce: flipBit(blob.nonce, 4) }
    await expect(openBlob(tampered, key)).rejects.toThrow(InvalidPasswordError)
  })

  it('detects a rewritten protected header', async () => {
    const key = makeKey()
    const blob = await seal(key)
    const header: unknown = JSON.parse(Buffer.from(blob.protected, 'base64url').toString('utf8'))
    const rewritten = JSON.stringify({
      ...(typeof header === 'object' && header !== null ? header : {}),
      lbx: { forged: true },
    })
    const tampered = { ...blob, protected: Buffer.from(rewritten).toString('base64url') }
    await expect(openBlob(tampered, key)).rejects.toThrow(InvalidPasswordError)
  })

  it('rejects cleartext metadata that disagrees with the authenticated header', async () => {
    const key = makeKey()
    const blob = await seal(key)
    const edited = {
      ...blob,
      metadata: { createdAt: '2030-01-01T00:00:00.000Z', namespaces: ['myapp'] },
    }
    await expect(openBlob(edited, key)).rejects.toThrow(BlobFormatError)
  })

  it('rejects cleartext KDF parameters that disagree with the authenticated header', async () => {
    const key = makeKey()
    const blob = await seal(key)
    await expect(openBlob({ ...blob, kdf: kdfParams(2000) }, key)).rejects.toThrow(
      BlobFormatError,
    )
  })
})

describe('serializeBlob / parseBlob', () => {
  it('writes snake_case fields in a fixed order', async () => {
    const blob = await seal(makeKey())
    const text = serializeBlob(blob)
    expect(Object.keys(fileOf(blob))).toEqual([
      'format_version',
      'kind',
      'kdf',
      'salt',
      'nonce',
      'ciphertext',
      'auth_tag',
      'protected',
      'metadata',
    ])
    expect(text).toContain('"key_length": 32')
    expect(text).toContain('"created_at": "2024-05-01T12:00:00.000Z"')
    expect(text.endsWith('}\n')).toBe(true)
  })

  it('parses what it serializes', async () => {
    const key = makeKey()
    const blob = await seal(key)
    const parsed = parseBlob(serializeBlob(blob))
    expect(parsed).toEqual(blob)
    expect(new TextDecoder().decode(await openBlob(parsed, key))).toBe('root-token-123')
  })

  it('rejects text that is not JSON', () => {
    expect(() => parseBlob('not json')).toThrow('File is not valid JSON')
  })

  it('rejects an unknown kind', async () => {
    const file = fileOf(await seal(makeKey()))
    expect(() => parseBlob(JSON.stringify({ ...file, kind: 'other' }))).toThrow(
      'Unknown blob kind: other',
    )
  })

  it('rejects a nonce of the wrong length', async () => {
    const file = fileOf(await seal(makeKey()))
    const nonce = Buffer.alloc(8).toString('base64url')
    expect(() => parseBlob(JSON.stringify({ ...file, nonce }))).toThrow(
      'nonce must decode to 12 bytes',
    )
  })

  it('rejects an unsupported KDF', async () => {
    const file = fileOf(await seal(makeKey()))
    const kdf = { algorithm: 'scrypt', iterations: 1000, key_length: 32 }
    expect(() => parseBlob(JSON.stringify({ ...file, kdf }))).toThrow(
      'Unsupported KDF algorithm: scrypt',
    )
  })

  it('rejects non-base64url ciphertext', async () => {
    const file = fileOf(await seal(makeKey()))
    expect(() => parseBlob(JSON.stringify({ ...file, ciphertext: 'a+b/c=' }))).toThrow(
      'ciphertext must be a base64url string',
    )
  })

  it('rejects an unsupported format version', async () => {
    const file = fileOf(await seal(makeKey()))
    expect(() => parseBlob(JSON.stringify({ ...file, format_version: 2 }))).toThrow(
      'Unsupported format_version: 2',
    )
  })
})

import { describe, it, expect } from 'vitest'
import {
  parseSnapshot,
  serializeSnapshot,
  snapshotNamespaces,
  snapshotSize,
} from '../../../src/backup/snapshot.js'
import type { BackupSnapshot } from '../../../src/backup/types.js'
import { CorruptBackupError } from '../../../src/errors.js'

function snapshotOf(entries: Record<string, Record<string, string>>): BackupSnapshot {
  const namespaces = new Map<string, Map<string, string>>()
  for (const [name, secrets] of Object.entries(entries)) {
    namespaces.set(name, new Map(Object.entries(secrets)))
  }
  return { formatVersion: 1, namespaces }
}

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text)

describe('serializeSnapshot', () => {
  it('writes namespaces and paths in lexicographic order', () => {
    const snapshot: BackupSnapshot = {
      formatVersion: 1,
      namespaces: new Map([
        ['b', new Map([['z', '1'], ['a', '2']])],
        ['a', new Map()],
      ]),
    }
    expect(new TextDecoder().decode(serializeSnapshot(snapshot))).toBe(
      '{"format_version":1,"namespaces":[{"name":"a","secrets":[]},{"name":"b","secrets":[["a","2"],["z","1"]]}]}',
    )
  })

  it('orders integer-like paths as strings', () => {
    const snapshot = snapshotOf({ ns: { '9': 'nine', '10': 'ten' } })
    expect(new TextDecoder().decode(serializeSnapshot(snapshot))).toBe(
      '{"format_version":1,"namespaces":[{"name":"ns","secrets":[["10","ten"],["9","nine"]]}]}',
    )
  })

  it('is independent of insertion order', () => {
    const one = snapshotOf({ x: { a: '1', b: '2' }, y: { c: '3' } })
    const two = snapshotOf({ y: { c: '3' }, x: { b: '2', a: '1' } })
    expect(Buffer.from(serializeSnapshot(one)).equals(Buffer.from(serializeSnapshot(two)))).toBe(
      true,
    )
  })
})

describe('parseSnapshot', () => {
  it('reads back what was serialized', () => {
    const snapshot = snapshotOf({ myapp: { 'db/password': 'line1\nline2', key: '☃' } })
    const parsed = parseSnapshot(serializeSnapshot(snapshot))
    expect(parsed.formatVersion).toBe(1)
    expect(snapshotNamespaces(parsed)).toEqual(['myapp'])
    expect(parsed.namespaces.get('myapp')?.get('db/password')).toBe('line1\nline2')
    expect(parsed.namespaces.get('myapp')?.get('key')).toBe('☃')
    expect(snapshotSize(parsed)).toBe(2)
  })

  it.each([
    ['not JSON', 'nope', 'Backup snapshot is malformed: not valid UTF-8 JSON'],
    ['an array', '[]', 'Backup snapshot is malformed: expected an object'],
    [
      'another version',
      '{"format_version":2,"namespaces":[]}',
      'Backup snapshot is malformed: unsupported format_version 2',
    ],
    [
      'no namespaces array',
      '{"format_version":1}',
      'Backup snapshot is malformed: namespaces must be an array',
    ],
    [
      'a duplicate namespace',
      '{"format_version":1,"namespaces":[{"name":"a","secrets":[]},{"name":"a","secrets":[]}]}',
      'Backup snapshot is malformed: namespace "a" appears twice',
    ],
    [
      'a duplicate path',
      '{"format_version":1,"namespaces":[{"name":"a","secrets":[["k","1"],["k","2"]]}]}',
      'Backup snapshot is malformed: path "k" appears twice in "a"',
    ],
    [
      'a non-pair entry',
      '{"format_version":1,"namespaces":[{"name":"a","secrets":[["k"]]}]}',
      'Backup snapshot is malformed: secrets of "a" must be [path, value] pairs',
    ],
    [
      'a non-string value',
      '{"format_version":1,"namespaces":[{"name":"a","secrets":[["k",1]]}]}',
      'Backup snapshot is malformed: secrets of "a" must be [path, value] pairs',
    ],
  ])('rejects %s', (_label, text, message) => {
    let caught: unknown
    try {
      parseSnapshot(bytes(text))
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(CorruptBackupError)
    expect(caught).toHaveProperty('message', message)
  })

  it('rejects invalid UTF-8', () => {
    expect(() => parseSnapshot(new Uint8Array([0xff, 0xfe]))).toThrow(CorruptBackupError)
  })
})

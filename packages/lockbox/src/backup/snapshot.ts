/**
 * Canonical serialization of backup snapshots.
 *
 * @remarks
 * The plaintext is `{"format_version":1,"namespaces":[{"name":…,"secrets":[[path,value],…]},…]}`
 * with namespaces and paths in lexicographic order and no timestamp, so two
 * snapshots of unchanged data serialize to identical bytes. Arrays are used
 * instead of objects because object key order is not preserved for
 * integer-like keys.
 */

import { CorruptBackupError } from '../errors.js'
import type { BackupSnapshot } from './types.js'

/** Current snapshot format version. */
export const SNAPSHOT_FORMAT_VERSION = 1

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/** Namespaces of a snapshot in canonical order. */
export function snapshotNamespaces(snapshot: BackupSnapshot): string[] {
  return [...snapshot.namespaces.keys()].sort(compare)
}

/** Total number of secrets in a snapshot. */
export function snapshotSize(snapshot: BackupSnapshot): number {
  let size = 0
  for (const secrets of snapshot.namespaces.values()) {
    size += secrets.size
  }
  return size
}

/** Serialize a snapshot to its canonical byte form. */
export function serializeSnapshot(snapshot: BackupSnapshot): Uint8Array {
  const namespaces = snapshotNamespaces(snapshot).map((name) => {
    const secrets = snapshot.namespaces.get(name) ?? new Map<string, string>()
    return {
      name,
      secrets: [...secrets.entries()].sort(([a], [b]) => compare(a, b)),
    }
  })
  return new TextEncoder().encode(
    JSON.stringify({ format_version: SNAPSHOT_FORMAT_VERSION, namespaces }),
  )
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function corrupt(detail: string): CorruptBackupError {
  return new CorruptBackupError(`Backup snapshot is malformed: ${detail}`)
}

/**
 * Parse decrypted snapshot bytes.
 *
 * @throws {@link CorruptBackupError} on any deviation from the format
 */
export function parseSnapshot(bytes: Uint8Array): BackupSnapshot {
  let raw: unknown
  try {
    raw = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes))
  } catch {
    throw corrupt('not valid UTF-8 JSON')
  }
  if (!isObject(raw)) {
    throw corrupt('expected an object')
  }
  if (raw.format_version !== SNAPSHOT_FORMAT_VERSION) {
    throw corrupt(`unsupported format_version ${String(raw.format_version)}`)
  }
  if (!Array.isArray(raw.namespaces)) {
    throw corrupt('namespaces must be an array')
  }

  const namespaces = new Map<string, Map<string, string>>()
  for (const entry of raw.namespaces) {
    if (!isObject(entry) || typeof entry.name !== 'string' || !Array.isArray(entry.secrets)) {
      throw corrupt('each namespace needs a name and a secrets array')
    }
    if (namespaces.has(entry.name)) {
      throw corrupt(`namespace "${entry.name}" appears twice`)
    }
    const secrets = new Map<string, string>()
    for (const pair of entry.secrets) {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw corrupt(`secrets of "${entry.name}" must be [path, value] pairs`)
      }
      const [secretPath, value]: unknown[] = pair
      if (typeof secretPath !== 'string' || typeof value !== 'string') {
        throw corrupt(`secrets of "${entry.name}" must be [path, value] pairs`)
      }
      if (secrets.has(secretPath)) {
        throw corrupt(`path "${secretPath}" appears twice in "${entry.name}"`)
      }
      secrets.set(secretPath, value)
    }
    namespaces.set(entry.name, secrets)
  }

  return { formatVersion: SNAPSHOT_FORMAT_VERSION, namespaces }
}

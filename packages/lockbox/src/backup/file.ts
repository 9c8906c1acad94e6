/**
 * Reading backup files from disk.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { CorruptBackupError, FilesystemError } from '../errors.js'
import { BlobFormatError, parseBlob } from '../crypto/blob.js'
import type { EncryptedBlob } from '../crypto/blob.js'
import { isNotFound } from '../util/fs.js'
import type { BackupInfo } from './types.js'

/**
 * Read and structurally validate a backup file.
 *
 * @throws {@link FilesystemError} if the file cannot be read
 * @throws {@link CorruptBackupError} if it is not a well-formed backup blob
 */
export async function readBackupFile(filePath: string): Promise<EncryptedBlob> {
  const resolved = path.resolve(filePath)
  let text: string
  try {
    text = await fs.readFile(resolved, 'utf8')
  } catch (err) {
    const reason = isNotFound(err) ? 'does not exist' : 'is not readable'
    throw new FilesystemError(`Backup file ${resolved} ${reason}`, resolved, 'read')
  }

  let blob: EncryptedBlob
  try {
    blob = parseBlob(text)
  } catch (err) {
    if (err instanceof BlobFormatError) {
      throw new CorruptBackupError(`Backup file ${resolved} is damaged: ${err.message}`)
    }
    throw err
  }
  if (blob.kind !== 'backup') {
    throw new CorruptBackupError(`${resolved} is not a backup (kind "${blob.kind}")`)
  }
  if (blob.metadata.namespaces === undefined) {
    throw new CorruptBackupError(`Backup file ${resolved} does not list its namespaces`)
  }
  return blob
}

/** Cleartext triage of a backup file; needs no password. */
export async function inspectBackup(filePath: string): Promise<BackupInfo> {
  const blob = await readBackupFile(filePath)
  return {
    path: path.resolve(filePath),
    formatVersion: blob.formatVersion,
    createdAt: blob.metadata.createdAt,
    namespaces: blob.metadata.namespaces ?? [],
    kdf: blob.kdf,
  }
}

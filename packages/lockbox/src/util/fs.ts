/**
 * Filesystem primitives: owner-only atomic writes and exclusive file locks.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import lockfile from 'proper-lockfile'
import { FilesystemError } from '../errors.js'

/** Owner read/write. */
export const FILE_MODE = 0o600

/** Owner read/write/execute. */
export const DIR_MODE = 0o700

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

/** Returns `true` for a Node.js "no such file or directory" error. */
export function isNotFound(err: unknown): boolean {
  return hasCode(err, 'ENOENT')
}

/** Create a directory (and parents) with owner-only permissions. */
export async function ensureDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true, mode: DIR_MODE })
  } catch (err) {
    if (!hasCode(err, 'EEXIST')) {
      throw new FilesystemError(`Failed to create directory: ${dir}`, dir, 'write')
    }
  }
}

/** Check whether a path exists. */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Read a file, returning `undefined` when it does not exist.
 */
export async function readFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf8')
  } catch (err) {
    if (isNotFound(err)) {
      return undefined
    }
    throw new FilesystemError(`Failed to read ${filePath}`, filePath, 'read')
  }
}

async function fsyncFile(filePath: string): Promise<void> {
  const handle = await fs.open(filePath, 'r')
  try {
    await handle.sync()
  } finally {
    await handle.close()
  }
}

/**
 * Write `content` to `filePath` atomically with mode 0600.
 *
 * The data goes to a sibling temp file which is fsynced and then renamed over
 * the target; rename() is atomic on POSIX filesystems, so readers see either
 * the old file or the new one, never a truncated mix. On failure the temp file
 * is removed and the original is untouched.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath)
  await ensureDir(dir)
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`)
  try {
    await fs.writeFile(tmpPath, content, { encoding: 'utf8', mode: FILE_MODE })
    await fsyncFile(tmpPath)
    await fs.rename(tmpPath, filePath)
  } catch (err) {
    await fs.rm(tmpPath, { force: true })
    throw err
  }
}

/** Options for {@link withFileLock}. */
export interface FileLockOptions {
  /** How many times to retry acquiring a held lock. */
  retries?: number | undefined
  /** Consider a lock stale after this many milliseconds. */
  staleMs?: number | undefined
}

/**
 * Run `fn` while holding an exclusive lock associated with `filePath`.
 *
 * The lock is a `<filePath>.lock` directory managed by proper-lockfile, so the
 * target itself does not need to exist yet. Concurrent holders from other
 * processes wait (with retries) or fail with a {@link FilesystemError}.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options?: FileLockOptions,
): Promise<T> {
  const dir = path.dirname(filePath)
  await ensureDir(dir)

  let release: () => Promise<void>
  try {
    release = await lockfile.lock(dir, {
      lockfilePath: `${filePath}.lock`,
      realpath: false,
      stale: options?.staleMs ?? 30_000,
      retries: { retries: options?.retries ?? 5, minTimeout: 100, maxTimeout: 1000 },
    })
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new FilesystemError(`Failed to acquire lock for ${filePath}: ${reason}`, filePath, 'lock')
  }

  try {
    return await fn()
  } finally {
    await release()
  }
}

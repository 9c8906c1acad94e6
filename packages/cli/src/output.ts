/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import { BackupIncompleteError, PartialRestoreError } from 'lockbox'
import type { PathFailure } from 'lockbox'
import { ExitCode, exitCodeFor } from './exit-codes.js'

/** Check if stdout is a TTY at call time (not module load time). */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Wrap text in ANSI dim if stdout is a TTY. */
export function dim(text: string): string {
  return isTTY() ? `\x1b[2m${text}\x1b[22m` : text
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/** Write one line to stdout. */
export function println(text = ''): void {
  process.stdout.write(`${text}\n`)
}

/** Write one line to stderr. */
export function eprintln(text = ''): void {
  process.stderr.write(`${text}\n`)
}

/**
 * Print `err` (with per-secret detail for aggregate failures) to stderr and
 * return its exit code.
 */
export function reportError(err: unknown): ExitCode {
  eprintln(formatError(err))
  if (err instanceof BackupIncompleteError) {
    for (const failure of err.failures) {
      eprintln(`  ${failure.namespace}/${failure.path}: ${failure.reason}`)
    }
  }
  if (err instanceof PartialRestoreError) {
    for (const result of err.report.namespaces) {
      for (const failure of result.failed) {
        eprintln(`  ${result.namespace}/${failure.path}: ${failure.reason}`)
      }
    }
  }
  return exitCodeFor(err)
}

/**
 * Print the failed paths of a bulk operation on `namespace` to stderr.
 *
 * @returns {@link ExitCode.PARTIAL} if anything failed, else {@link ExitCode.OK}
 */
export function reportFailures(namespace: string, failed: readonly PathFailure[]): ExitCode {
  if (failed.length === 0) {
    return ExitCode.OK
  }
  eprintln(`${String(failed.length)} failed:`)
  for (const failure of failed) {
    eprintln(`  ${namespace}/${failure.path}: ${failure.reason}`)
  }
  return ExitCode.PARTIAL
}

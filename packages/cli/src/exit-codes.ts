import {
  BackupIncompleteError,
  ConfirmationRequiredError,
  PartialRestoreError,
  UserAbortedError,
  ValidationError,
} from 'lockbox'

/**
 * Process exit codes.
 *
 * @internal
 */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
  PARTIAL: 3,
  ABORTED: 130,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

function isParseArgsError(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('ERR_PARSE_ARGS_')
  )
}

/** Map an error to the exit code the CLI reports for it. */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof UserAbortedError) {
    return ExitCode.ABORTED
  }
  if (err instanceof BackupIncompleteError || err instanceof PartialRestoreError) {
    return ExitCode.PARTIAL
  }
  if (
    err instanceof ValidationError ||
    err instanceof ConfirmationRequiredError ||
    isParseArgsError(err)
  ) {
    return ExitCode.USAGE
  }
  return ExitCode.FAILURE
}

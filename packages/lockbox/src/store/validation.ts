/**
 * Namespace and secret-path validation.
 */

import { ValidationError } from '../errors.js'

const SEGMENT = /^[A-Za-z0-9._-]+$/
const MAX_NAMESPACE_LENGTH = 128
const MAX_PATH_LENGTH = 255

function isTraversal(segment: string): boolean {
  return segment === '.' || segment === '..'
}

function hasControlCharacter(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i)
    if (code < 0x20 || code === 0x7f) {
      return true
    }
  }
  return false
}

/** Whether `name` is a usable namespace. */
export function isValidNamespace(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= MAX_NAMESPACE_LENGTH &&
    SEGMENT.test(name) &&
    !isTraversal(name)
  )
}

/**
 * Validate a namespace name: non-empty, a single segment of
 * `[A-Za-z0-9._-]`, not `.` or `..`. Case is significant.
 *
 * @throws {@link ValidationError}
 */
export function validateNamespace(name: string): string {
  if (!isValidNamespace(name)) {
    throw new ValidationError(
      `Invalid namespace "${name}": use 1-${String(MAX_NAMESPACE_LENGTH)} characters from [A-Za-z0-9._-], not "." or ".."`,
      'namespace',
    )
  }
  return name
}

/** Whether `segment` of a secret path is safe to send to the store. */
function isSafeSegment(segment: string): boolean {
  return segment.length > 0 && !isTraversal(segment) && !hasControlCharacter(segment)
}

/**
 * Whether `secretPath` is a usable secret path. Any text is allowed in a
 * segment except control characters, so paths written by other store
 * clients (with spaces, say) can still be read, backed up and restored.
 */
export function isValidSecretPath(secretPath: string): boolean {
  if (secretPath.length === 0 || secretPath.length > MAX_PATH_LENGTH) {
    return false
  }
  return secretPath.split('/').every(isSafeSegment)
}

/**
 * Validate a slash-delimited secret path such as `database/password`.
 *
 * @throws {@link ValidationError}
 */
export function validateSecretPath(secretPath: string): string {
  if (!isValidSecretPath(secretPath)) {
    throw new ValidationError(
      `Invalid secret path ${JSON.stringify(secretPath)}: use "/"-separated non-empty segments without "." or ".." or control characters, at most ${String(MAX_PATH_LENGTH)} characters`,
      'path',
    )
  }
  return secretPath
}

/**
 * Validate a listing prefix. Unlike a path it may be empty or end in `/`.
 */
export function validatePrefix(prefix: string): string {
  const trimmed = prefix.endsWith('/') ? prefix.slice(0, -1) : prefix
  if (trimmed.length > 0 && !trimmed.split('/').every(isSafeSegment)) {
    throw new ValidationError(`Invalid prefix ${JSON.stringify(prefix)}`, 'prefix')
  }
  return prefix
}

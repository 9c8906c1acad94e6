/**
 * Shared harness for command tests: a scripted terminal, captured stdout and
 * stderr, and a config file pointing at a {@link TestLockbox}.
 */

import { onTestFinished, vi } from 'vitest'
import { UserAbortedError, defaultConfig, saveConfig, silentLogger } from 'lockbox'
import { TEST_CREDENTIAL, TestLockbox } from '@lockbox/test-helpers'
import type { TestLockboxOptions } from '@lockbox/test-helpers'
import type { CommandDeps } from '../src/context.js'
import type { Terminal } from '../src/prompt.js'

/** A terminal that answers prompts from a fixed list, like piped stdin. */
export interface ScriptedTerminal extends Terminal {
  /** Labels of every prompt, in order. */
  readonly prompts: string[]
  closed: boolean
}

export function scriptedTerminal(
  inputs: readonly string[],
  options: { interactive?: boolean } = {},
): ScriptedTerminal {
  const queue = [...inputs]
  const terminal: ScriptedTerminal = {
    interactive: options.interactive ?? false,
    prompts: [],
    closed: false,
    readSecret(label) {
      terminal.prompts.push(label)
      const next = queue.shift()
      if (next === undefined) {
        return Promise.reject(
          new UserAbortedError(`No input on stdin for "${label.replace(/:\s*$/, '')}"`),
        )
      }
      return Promise.resolve(next)
    },
    readValue(label) {
      terminal.prompts.push(label)
      return Promise.resolve(queue.splice(0).join('\n'))
    },
    close() {
      terminal.closed = true
    },
  }
  return terminal
}

/** Captured process output for one test. */
export interface CapturedOutput {
  stdout(): string
  stderr(): string
}

/**
 * Capture stdout and stderr writes and force plain (non-TTY) formatting for
 * the rest of the test.
 */
export function captureOutput(): CapturedOutput {
  let out = ''
  let err = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
    out += String(chunk)
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
    err += String(chunk)
    return true
  })
  Object.defineProperty(process.stdout, 'isTTY', { value: false, configurable: true })
  onTestFinished(() => {
    Object.defineProperty(process.stdout, 'isTTY', { value: undefined, configurable: true })
  })
  return { stdout: () => out, stderr: () => err }
}

/** A test lockbox plus everything a command needs to run against it. */
export interface CliFixture {
  readonly t: TestLockbox
  /** `--config-dir` flag pointing at the fixture's config file. */
  readonly configArgs: string[]
  deps(inputs: readonly string[], options?: { interactive?: boolean }): CommandDeps & {
    terminal: ScriptedTerminal
  }
  cleanup(): Promise<void>
}

/**
 * Create a {@link TestLockbox} and write a config file whose data directory
 * is the lockbox's temp directory.
 */
export async function createCliFixture(options?: TestLockboxOptions): Promise<CliFixture> {
  const t = await TestLockbox.create(options)
  await saveConfig(t.config.configDir, {
    ...defaultConfig(),
    defaultNamespace: t.config.defaultNamespace,
    dataDir: t.dir,
    kdf: { iterations: 10_000 },
    logLevel: 'silent',
  })
  return {
    t,
    configArgs: ['--config-dir', t.config.configDir],
    deps(inputs, depOptions) {
      return {
        env: {},
        terminal: scriptedTerminal(inputs, depOptions),
        logger: silentLogger(),
        transportFactory: t.store.factory(TEST_CREDENTIAL),
        retry: { attempts: 2, baseDelayMs: 1 },
      }
    },
    cleanup: () => t.cleanup(),
  }
}

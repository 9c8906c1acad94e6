import { UserAbortedError } from 'lockbox'

/**
 * Where the CLI reads passwords and secret values from.
 *
 * @internal
 */
export interface Terminal {
  /** `true` when input comes from a TTY and prompts are shown. */
  readonly interactive: boolean

  /** Read one secret with echo off, or the next line of piped stdin. */
  readSecret(label: string): Promise<string>

  /**
   * Read a secret value: a hidden prompt on a TTY, or every byte left on
   * piped stdin, trailing newline included.
   */
  readValue(label: string): Promise<string>

  /** Release stdin. */
  close(): void
}

const CTRL_C = '\u0003'
const CTRL_D = '\u0004'
const BACKSPACE = '\u007f'

function readHidden(label: string): Promise<string> {
  const stdin = process.stdin
  process.stderr.write(label)

  return new Promise((resolve, reject) => {
    let buffer = ''
    const wasRaw = stdin.isRaw

    const finish = (err?: Error): void => {
      stdin.removeListener('data', onData)
      stdin.setRawMode(wasRaw)
      stdin.pause()
      process.stderr.write('\n')
      if (err === undefined) {
        resolve(buffer)
      } else {
        reject(err)
      }
    }

    const onData = (chunk: Buffer | string): void => {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8')
      for (const ch of text) {
        if (ch === '\r' || ch === '\n') {
          finish()
          return
        }
        if (ch === CTRL_C || (ch === CTRL_D && buffer === '')) {
          finish(new UserAbortedError())
          return
        }
        if (ch === CTRL_D) {
          finish()
          return
        }
        if (ch === BACKSPACE || ch === '\b') {
          buffer = buffer.slice(0, -1)
          continue
        }
        buffer += ch
      }
    }

    stdin.setRawMode(true)
    stdin.resume()
    stdin.on('data', onData)
  })
}

const NEWLINE = 0x0a

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line
}

/**
 * Piped stdin read as raw bytes, so a value keeps its exact line endings.
 * Lines handed to {@link PipedInput.readLine} lose their `\n` or `\r\n`.
 */
class PipedInput {
  #chunks: AsyncIterator<unknown> | undefined
  #buffered = Buffer.alloc(0)
  #ended = false

  async readLine(): Promise<string | undefined> {
    for (;;) {
      const end = this.#buffered.indexOf(NEWLINE)
      if (end !== -1) {
        const line = this.#buffered.subarray(0, end).toString('utf8')
        this.#buffered = this.#buffered.subarray(end + 1)
        return stripCarriageReturn(line)
      }
      if (!(await this.#fill())) {
        if (this.#buffered.length === 0) {
          return undefined
        }
        return stripCarriageReturn(this.#take())
      }
    }
  }

  async readRest(): Promise<string> {
    for (;;) {
      if (!(await this.#fill())) {
        return this.#take()
      }
    }
  }

  close(): void {
    if (this.#chunks !== undefined && !this.#ended) {
      process.stdin.destroy()
    }
  }

  #take(): string {
    const text = this.#buffered.toString('utf8')
    this.#buffered = Buffer.alloc(0)
    return text
  }

  async #fill(): Promise<boolean> {
    if (this.#ended) {
      return false
    }
    this.#chunks ??= process.stdin[Symbol.asyncIterator]()
    const next = await this.#chunks.next()
    if (next.done === true) {
      this.#ended = true
      return false
    }
    const chunk: unknown = next.value
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    this.#buffered = Buffer.concat([this.#buffered, bytes])
    return true
  }
}

/**
 * A {@link Terminal} over the process's stdin and stderr.
 *
 * @internal
 */
export function createStdinTerminal(): Terminal {
  const interactive = process.stdin.isTTY ?? false
  const piped = new PipedInput()

  return {
    interactive,

    async readSecret(label) {
      if (interactive) {
        return readHidden(label)
      }
      const line = await piped.readLine()
      if (line === undefined) {
        throw new UserAbortedError(`No input on stdin for "${label.replace(/:\s*$/, '')}"`)
      }
      return line
    },

    async readValue(label) {
      if (interactive) {
        return readHidden(label)
      }
      return piped.readRest()
    },

    close() {
      piped.close()
    },
  }
}

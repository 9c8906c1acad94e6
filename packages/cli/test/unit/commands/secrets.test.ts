import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { TEST_CREDENTIAL, TEST_PASSWORD } from '@lockbox/test-helpers'
import { secretsCommand } from '../../../src/commands/secrets.js'
import { captureOutput, createCliFixture } from '../../helpers.js'
import type { CapturedOutput, CliFixture } from '../../helpers.js'

describe('secretsCommand', () => {
  let fixture: CliFixture
  let output: CapturedOutput

  beforeEach(async () => {
    fixture = await createCliFixture()
    output = captureOutput()
  })

  afterEach(async () => {
    await fixture.cleanup()
  })

  function run(args: string[], inputs: string[]): Promise<number> {
    return secretsCommand([...args, ...fixture.configArgs], fixture.deps(inputs))
  }

  describe('put', () => {
    it('stores the value read after the password', async () => {
      const deps = fixture.deps([TEST_PASSWORD, 'p@ss'])

      const code = await secretsCommand(
        ['put', 'db/password', '-n', 'myapp', ...fixture.configArgs],
        deps,
      )

      expect(code).toBe(0)
      expect(output.stdout()).toBe('Stored myapp/db/password\n')
      expect(deps.terminal.prompts).toEqual(['Key store password: ', 'Secret value: '])
      expect(fixture.t.store.entries('myapp')).toEqual({ 'db/password': 'p@ss' })
      expect(fixture.t.store.credentials).toEqual([TEST_CREDENTIAL])
    })

    it('keeps every remaining line of a multi-line value', async () => {
      expect(await run(['put', 'cert', '-n', 'myapp'], [TEST_PASSWORD, 'line one', 'line two'])).toBe(0)
      expect(fixture.t.store.entries('myapp')).toEqual({ cert: 'line one\nline two' })
    })

    it('uses the default namespace', async () => {
      expect(await run(['put', 'key'], [TEST_PASSWORD, 'v'])).toBe(0)
      expect(fixture.t.store.entries('shared')).toEqual({ key: 'v' })
    })

    it('rejects an empty value', async () => {
      expect(await run(['put', 'key'], [TEST_PASSWORD])).toBe(2)
      expect(output.stderr()).toBe('ValidationError: No secret value provided on stdin\n')
      expect(fixture.t.store.size).toBe(0)
    })

    it('rejects an invalid path', async () => {
      expect(await run(['put', '../escape'], [TEST_PASSWORD, 'v'])).toBe(2)
      expect(fixture.t.store.size).toBe(0)
    })
  })

  describe('get', () => {
    it('prints the value', async () => {
      fixture.t.store.seed('myapp', { 'db/password': 'p@ss' })
      expect(await run(['get', 'db/password', '--namespace', 'myapp'], [TEST_PASSWORD])).toBe(0)
      expect(output.stdout()).toBe('p@ss\n')
    })

    it('fails for a missing secret', async () => {
      expect(await run(['get', 'missing', '-n', 'myapp'], [TEST_PASSWORD])).toBe(1)
      expect(output.stderr()).toBe('SecretNotFoundError: Secret not found: myapp/missing\n')
    })

    it('gives up after three wrong passwords', async () => {
      fixture.t.store.seed('myapp', { key: 'v' })
      expect(await run(['get', 'key', '-n', 'myapp'], ['one', 'two', 'three'])).toBe(1)
      expect(output.stderr()).toBe('InvalidPasswordError: Invalid password (3 attempts)\n')
      expect(output.stdout()).toBe('')
    })

    it('exits 130 when no password is piped', async () => {
      expect(await run(['get', 'key'], [])).toBe(130)
      expect(output.stderr()).toBe('UserAbortedError: No input on stdin for "Key store password"\n')
    })

    it('fails when the store rejects the credential', async () => {
      fixture.t.store.seed('myapp', { key: 'v' })
      fixture.t.store.rejectCredential()
      expect(await run(['get', 'key', '-n', 'myapp'], [TEST_PASSWORD])).toBe(1)
      expect(output.stderr()).toBe(
        'AuthenticationError: Secret store rejected the credential (HTTP 403) for myapp/key\n',
      )
    })
  })

  describe('list', () => {
    beforeEach(() => {
      fixture.t.store.seed('myapp', { zeta: '1', 'db/user': '2', 'db/password': '3' })
    })

    it('prints every path in order', async () => {
      expect(await run(['list', '-n', 'myapp'], [TEST_PASSWORD])).toBe(0)
      expect(output.stdout()).toBe('db/password\ndb/user\nzeta\n')
    })

    it('filters by prefix', async () => {
      expect(await run(['list', 'db/', '-n', 'myapp'], [TEST_PASSWORD])).toBe(0)
      expect(output.stdout()).toBe('db/password\ndb/user\n')
    })
  })

  it('deletes a secret', async () => {
    fixture.t.store.seed('myapp', { a: '1', b: '2' })
    expect(await run(['delete', 'a', '-n', 'myapp'], [TEST_PASSWORD])).toBe(0)
    expect(output.stdout()).toBe('Deleted myapp/a\n')
    expect(fixture.t.store.entries('myapp')).toEqual({ b: '2' })
  })

  it('lists namespaces', async () => {
    fixture.t.store.seed('zeta', { k: 'v' })
    fixture.t.store.seed('alpha', { k: 'v' })
    expect(await run(['namespaces'], [TEST_PASSWORD])).toBe(0)
    expect(output.stdout()).toBe('alpha\nzeta\n')
  })

  describe('delete-namespace', () => {
    beforeEach(() => {
      fixture.t.store.seed('myapp', { a: '1', 'b/c': '2' })
      fixture.t.store.seed('other', { a: '3' })
    })

    it('requires the namespace name as confirmation', async () => {
      expect(await run(['delete-namespace', 'myapp'], [TEST_PASSWORD])).toBe(2)
      expect(output.stderr()).toBe(
        'ConfirmationRequiredError: Deleting namespace "myapp" requires confirming its exact name\n',
      )
      expect(fixture.t.store.size).toBe(3)
    })

    it('deletes the namespace when confirmed', async () => {
      expect(
        await run(['delete-namespace', 'myapp', '--confirm', 'myapp'], [TEST_PASSWORD]),
      ).toBe(0)
      expect(output.stdout()).toBe('Deleted 2 secrets from namespace myapp\n')
      expect(fixture.t.store.entries('other')).toEqual({ a: '3' })
      expect(fixture.t.store.size).toBe(1)
    })

    it('refuses the default namespace', async () => {
      fixture.t.store.seed('shared', { k: 'v' })
      expect(
        await run(['delete-namespace', 'shared', '--confirm', 'shared'], [TEST_PASSWORD]),
      ).toBe(2)
      expect(output.stderr()).toBe(
        'ValidationError: Refusing to delete the default namespace "shared"\n',
      )
      expect(fixture.t.store.entries('shared')).toEqual({ k: 'v' })
    })

    it('exits 3 and names the secrets it could not delete', async () => {
      fixture.t.store.failDeletes('myapp/b/c')

      const code = await run(['delete-namespace', 'myapp', '--confirm', 'myapp'], [TEST_PASSWORD])

      expect(code).toBe(3)
      expect(output.stdout()).toBe('Deleted 1 secrets from namespace myapp\n')
      expect(output.stderr()).toBe(
        '1 failed:\n  myapp/b/c: SecretStoreError: Secret store returned HTTP 400 for myapp/b/c\n',
      )
      expect(fixture.t.store.entries('myapp')).toEqual({ 'b/c': '2' })
    })
  })

  describe('copy-namespace', () => {
    beforeEach(() => {
      fixture.t.store.seed('myapp', { a: '1', 'team notes/db url': 'postgres://db' })
      fixture.t.store.seed('staging', { a: 'old', z: 'kept' })
    })

    it('copies every secret over the target', async () => {
      expect(await run(['copy-namespace', 'myapp', 'staging'], [TEST_PASSWORD])).toBe(0)
      expect(output.stdout()).toBe('Copied 2 secrets from myapp to staging\n')
      expect(fixture.t.store.entries('staging')).toEqual({
        a: '1',
        'team notes/db url': 'postgres://db',
        z: 'kept',
      })
      expect(fixture.t.store.entries('myapp')).toEqual({ a: '1', 'team notes/db url': 'postgres://db' })
    })

    it('exits 3 and names the secrets it could not copy', async () => {
      fixture.t.store.failWrites('staging/a')

      expect(await run(['copy-namespace', 'myapp', 'staging'], [TEST_PASSWORD])).toBe(3)
      expect(output.stdout()).toBe('Copied 1 secrets from myapp to staging\n')
      expect(output.stderr()).toBe(
        '1 failed:\n  staging/a: SecretStoreError: Secret store returned HTTP 400 for staging/a\n',
      )
      expect(fixture.t.store.entries('staging')).toMatchObject({ a: 'old' })
    })

    it('refuses to copy a namespace onto itself', async () => {
      expect(await run(['copy-namespace', 'myapp', 'myapp'], [TEST_PASSWORD])).toBe(2)
      expect(output.stderr()).toBe('ValidationError: Cannot copy namespace "myapp" onto itself\n')
    })

    it('needs a source and a target', async () => {
      expect(await run(['copy-namespace', 'myapp'], [])).toBe(2)
      expect(output.stderr()).toContain('Error: "secrets copy-namespace" needs 2 arguments\n')
    })
  })

  describe('bulk-set', () => {
    it('stores every entry of the JSON object', async () => {
      const deps = fixture.deps([TEST_PASSWORD, '{"db/user": "app", "db/password": "p@ss"}'])

      const code = await secretsCommand(['bulk-set', '-n', 'myapp', ...fixture.configArgs], deps)

      expect(code).toBe(0)
      expect(output.stdout()).toBe('Set 2 secrets in myapp\n')
      expect(deps.terminal.prompts).toEqual(['Key store password: ', 'Secrets (JSON): '])
      expect(fixture.t.store.entries('myapp')).toEqual({ 'db/user': 'app', 'db/password': 'p@ss' })
    })

    it('rejects input that is not a JSON object', async () => {
      expect(await run(['bulk-set', '-n', 'myapp'], [TEST_PASSWORD, '["a"]'])).toBe(2)
      expect(output.stderr()).toBe('ValidationError: bulk-set expects a JSON object on stdin\n')
      expect(fixture.t.store.size).toBe(0)
    })

    it('rejects a value that is not a string without echoing it', async () => {
      expect(
        await run(['bulk-set', '-n', 'myapp'], [TEST_PASSWORD, '{"a": "1", "port": 5432}']),
      ).toBe(2)
      expect(output.stderr()).toBe('ValidationError: Value for "port" must be a string\n')
      expect(fixture.t.store.size).toBe(0)
    })

    it('exits 3 and names the secrets it could not write', async () => {
      fixture.t.store.failWrites('myapp/b')

      expect(await run(['bulk-set', '-n', 'myapp'], [TEST_PASSWORD, '{"a": "1", "b": "2"}'])).toBe(3)
      expect(output.stdout()).toBe('Set 1 secrets in myapp\n')
      expect(output.stderr()).toBe(
        '1 failed:\n  myapp/b: SecretStoreError: Secret store returned HTTP 400 for myapp/b\n',
      )
      expect(fixture.t.store.entries('myapp')).toEqual({ a: '1' })
    })
  })

  describe('bulk-get', () => {
    beforeEach(() => {
      fixture.t.store.seed('myapp', { a: '1', 'b c': 'two words' })
    })

    it('prints the values as JSON', async () => {
      expect(await run(['bulk-get', 'a', 'b c', '-n', 'myapp'], [TEST_PASSWORD])).toBe(0)
      expect(output.stdout()).toBe('{\n  "a": "1",\n  "b c": "two words"\n}\n')
    })

    it('prints the values as env lines', async () => {
      expect(
        await run(['bulk-get', 'a', 'b c', '-n', 'myapp', '--format', 'env'], [TEST_PASSWORD]),
      ).toBe(0)
      expect(output.stdout()).toBe('a="1"\nb c="two words"\n')
    })

    it('exits 3 and names the missing paths', async () => {
      expect(await run(['bulk-get', 'a', 'nope', '-n', 'myapp'], [TEST_PASSWORD])).toBe(3)
      expect(output.stdout()).toBe('{\n  "a": "1"\n}\n')
      expect(output.stderr()).toBe('Not found: myapp/nope\n')
    })

    it('rejects an unknown format', async () => {
      expect(await run(['bulk-get', 'a', '--format', 'yaml'], [])).toBe(2)
      expect(output.stderr()).toBe('Error: --format must be json or env\n')
    })
  })

  describe('usage errors', () => {
    it('needs a path for get', async () => {
      expect(await run(['get'], [])).toBe(2)
      expect(output.stderr()).toContain('Error: "secrets get" needs an argument\n')
    })

    it('rejects an unknown subcommand', async () => {
      expect(await run(['bogus'], [])).toBe(2)
      expect(output.stderr()).toContain('Usage: lockbox secrets <command> [options]')
    })

    it('rejects an unknown option', async () => {
      expect(await run(['get', 'key', '--bogus'], [])).toBe(2)
    })

    it('rejects an unknown log level', async () => {
      expect(await run(['get', 'key', '--log-level', 'loud'], [])).toBe(2)
      expect(output.stderr()).toBe(
        'ValidationError: --log-level must be one of debug, info, warn, error, silent\n',
      )
    })
  })
})

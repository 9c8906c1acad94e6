import { parseArgs } from 'node:util'
import { ValidationError } from 'lockbox'
import { GLOBAL_OPTIONS, withContext } from '../context.js'
import type { CommandDeps } from '../context.js'
import { ExitCode } from '../exit-codes.js'
import { eprintln, println, reportError, reportFailures } from '../output.js'

const USAGE =
  'Usage: lockbox secrets <command> [options]\n\n' +
  'Commands:\n' +
  '  put <path> [--namespace <n>]             Store a secret (value read from stdin)\n' +
  '  get <path> [--namespace <n>]             Print a secret value\n' +
  '  list [prefix] [--namespace <n>]          List secret paths\n' +
  '  delete <path> [--namespace <n>]          Delete a secret\n' +
  '  bulk-set [--namespace <n>]               Store every entry of a JSON object read from stdin\n' +
  '  bulk-get <path>... [--format json|env]   Print several secrets\n' +
  '  namespaces                               List namespaces\n' +
  '  copy-namespace <source> <target>         Copy every secret into another namespace\n' +
  '  delete-namespace <n> --confirm <n>       Delete every secret in a namespace\n'

const SUBCOMMANDS = [
  'put',
  'get',
  'list',
  'delete',
  'bulk-set',
  'bulk-get',
  'namespaces',
  'copy-namespace',
  'delete-namespace',
] as const

type Subcommand = (typeof SUBCOMMANDS)[number]

function isSubcommand(value: string): value is Subcommand {
  return SUBCOMMANDS.some((name) => name === value)
}

/** How many positional arguments each subcommand needs after its name. */
const REQUIRED_ARGS: Partial<Record<Subcommand, number>> = {
  put: 1,
  get: 1,
  delete: 1,
  'bulk-get': 1,
  'copy-namespace': 2,
  'delete-namespace': 1,
}

/**
 * Parse the `bulk-set` input: a JSON object of secret path to string value.
 * Error messages name keys only.
 */
export function parseSecretsJson(text: string): Record<string, string> {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new ValidationError('bulk-set expects a JSON object on stdin', 'value')
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('bulk-set expects a JSON object on stdin', 'value')
  }
  const entries: [string, unknown][] = Object.entries(parsed)
  if (entries.length === 0) {
    throw new ValidationError('bulk-set got an empty object', 'value')
  }
  const secrets: Record<string, string> = {}
  for (const [key, value] of entries) {
    if (typeof value !== 'string') {
      throw new ValidationError(`Value for "${key}" must be a string`, 'value')
    }
    secrets[key] = value
  }
  return secrets
}

export async function secretsCommand(args: string[], deps: CommandDeps = {}): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        ...GLOBAL_OPTIONS,
        namespace: { type: 'string', short: 'n' },
        confirm: { type: 'string' },
        format: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })

    const [subcommand, ...operands] = positionals
    if (subcommand === undefined || !isSubcommand(subcommand)) {
      process.stderr.write(USAGE)
      return ExitCode.USAGE
    }
    const required = REQUIRED_ARGS[subcommand] ?? 0
    if (operands.length < required) {
      const wanted = required === 1 ? 'an argument' : `${String(required)} arguments`
      eprintln(`Error: "secrets ${subcommand}" needs ${wanted}`)
      process.stderr.write(USAGE)
      return ExitCode.USAGE
    }
    const format = values.format ?? 'json'
    if (format !== 'json' && format !== 'env') {
      eprintln('Error: --format must be json or env')
      return ExitCode.USAGE
    }

    return await withContext(values, deps, async (ctx) => {
      const namespace = values.namespace ?? ctx.config.defaultNamespace
      const target = operands[0] ?? ''

      switch (subcommand) {
        case 'put': {
          const client = await ctx.lockbox.client()
          const value = await ctx.terminal.readValue('Secret value: ')
          if (value.length === 0) {
            throw new ValidationError('No secret value provided on stdin', 'value')
          }
          await client.put(namespace, target, value)
          println(`Stored ${namespace}/${target}`)
          return ExitCode.OK
        }

        case 'get': {
          const client = await ctx.lockbox.client()
          println(await client.get(namespace, target))
          return ExitCode.OK
        }

        case 'list': {
          const client = await ctx.lockbox.client()
          for await (const found of client.list(namespace, operands[0])) {
            println(found)
          }
          return ExitCode.OK
        }

        case 'delete': {
          const client = await ctx.lockbox.client()
          await client.delete(namespace, target)
          println(`Deleted ${namespace}/${target}`)
          return ExitCode.OK
        }

        case 'bulk-set': {
          const client = await ctx.lockbox.client()
          const secrets = parseSecretsJson(await ctx.terminal.readValue('Secrets (JSON): '))
          const report = await client.putMany(namespace, secrets)
          println(`Set ${String(report.succeeded.length)} secrets in ${namespace}`)
          return reportFailures(namespace, report.failed)
        }

        case 'bulk-get': {
          const client = await ctx.lockbox.client()
          const result = await client.getMany(namespace, operands)
          if (format === 'json') {
            println(JSON.stringify(Object.fromEntries(result.values), null, 2))
          } else {
            for (const [secretPath, value] of result.values) {
              println(`${secretPath}=${JSON.stringify(value)}`)
            }
          }
          for (const secretPath of result.missing) {
            eprintln(`Not found: ${namespace}/${secretPath}`)
          }
          const code = reportFailures(namespace, result.failed)
          return result.missing.length > 0 ? ExitCode.PARTIAL : code
        }

        case 'namespaces': {
          const client = await ctx.lockbox.client()
          for (const name of await client.listNamespaces()) {
            println(name)
          }
          return ExitCode.OK
        }

        case 'copy-namespace': {
          const destination = operands[1] ?? ''
          const client = await ctx.lockbox.client()
          const report = await client.copyNamespace(target, destination)
          println(
            `Copied ${String(report.succeeded.length)} secrets from ${target} to ${destination}`,
          )
          return reportFailures(destination, report.failed)
        }

        case 'delete-namespace': {
          const client = await ctx.lockbox.client()
          const report = await client.deleteNamespace(target, values.confirm ?? '')
          println(`Deleted ${String(report.succeeded.length)} secrets from namespace ${target}`)
          return reportFailures(target, report.failed)
        }
      }
    })
  } catch (err) {
    return reportError(err)
  }
}

import * as crypto from 'node:crypto'
import { parseArgs } from 'node:util'
import { ValidationError } from 'lockbox'
import type { ReinitAuthorization } from 'lockbox'
import { GLOBAL_OPTIONS, readNewPassword, withContext } from '../context.js'
import type { CommandContext, CommandDeps } from '../context.js'
import { ExitCode } from '../exit-codes.js'
import { bold, dim, eprintln, println, reportError } from '../output.js'

const USAGE =
  'Usage: lockbox secure <command> [options]\n\n' +
  'Commands:\n' +
  '  init [--generate] [--force] [--destructive]   Encrypt the root credential (read from stdin)\n' +
  '  change-password                               Re-encrypt under a new password\n' +
  '  export-key <path> [--overwrite]               Copy the encrypted key store\n' +
  '  import-key <path> [--force]                   Install an exported key store\n' +
  '  status                                        Show key store details\n'

async function init(ctx: CommandContext, values: InitValues): Promise<number> {
  if (values.destructive === true && values.force !== true) {
    eprintln('Error: --destructive requires --force')
    return ExitCode.USAGE
  }

  let force: ReinitAuthorization | undefined
  if (values.force === true && (await ctx.lockbox.keyStore.exists())) {
    force =
      values.destructive === true
        ? { destructive: true }
        : { oldPassword: await ctx.terminal.readSecret('Current password: ') }
  }

  const generated = values.generate === true
  const credential = generated
    ? crypto.randomBytes(32).toString('hex')
    : await ctx.terminal.readSecret('Root credential: ')
  if (credential.length === 0) {
    throw new ValidationError('No root credential provided', 'credential')
  }
  const password = await readNewPassword(ctx.terminal, 'New password')

  await ctx.lockbox.keyStore.initialize(password, credential, { force })
  println(`Key store initialized at ${ctx.lockbox.keyStore.path}`)
  if (generated) {
    println(bold('Generated root credential (shown once, store it in the secret store):'))
    println(credential)
  }
  return ExitCode.OK
}

async function changePassword(ctx: CommandContext): Promise<number> {
  const oldPassword = await ctx.terminal.readSecret('Current password: ')
  const newPassword = await readNewPassword(ctx.terminal, 'New password')
  await ctx.lockbox.keyStore.changePassword(oldPassword, newPassword)
  println('Password changed.')
  return ExitCode.OK
}

async function status(ctx: CommandContext): Promise<number> {
  const keyStore = ctx.lockbox.keyStore
  if (!(await keyStore.exists())) {
    println(`Key store: not initialized ${dim(`(${keyStore.path})`)}`)
    println('Run "lockbox secure init" to create it.')
    return ExitCode.FAILURE
  }
  const info = await keyStore.inspect()
  println(`Key store: ${info.path}`)
  println(`  created:    ${info.createdAt}`)
  println(`  format:     v${String(info.formatVersion)}`)
  println(`  kdf:        ${info.kdf.algorithm}, ${String(info.kdf.iterations)} iterations`)
  println(`Secret store: ${ctx.config.store.address} (mount "${ctx.config.store.mount}")`)
  println(`Default namespace: ${ctx.config.defaultNamespace}`)
  return ExitCode.OK
}

interface InitValues {
  generate?: boolean | undefined
  force?: boolean | undefined
  destructive?: boolean | undefined
}

export async function secureCommand(args: string[], deps: CommandDeps = {}): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        ...GLOBAL_OPTIONS,
        generate: { type: 'boolean' },
        force: { type: 'boolean' },
        destructive: { type: 'boolean' },
        overwrite: { type: 'boolean' },
      },
      allowPositionals: true,
      strict: true,
    })

    const [subcommand, target] = positionals

    switch (subcommand) {
      case 'init':
        return await withContext(values, deps, (ctx) => init(ctx, values))

      case 'change-password':
        return await withContext(values, deps, changePassword)

      case 'export-key': {
        if (target === undefined) {
          eprintln('Usage: lockbox secure export-key <path> [--overwrite]')
          return ExitCode.USAGE
        }
        return await withContext(values, deps, async (ctx) => {
          await ctx.lockbox.keyStore.exportEncryptedKey(target, { overwrite: values.overwrite })
          println(`Encrypted key store exported to ${target}`)
          return ExitCode.OK
        })
      }

      case 'import-key': {
        if (target === undefined) {
          eprintln('Usage: lockbox secure import-key <path> [--force]')
          return ExitCode.USAGE
        }
        return await withContext(values, deps, async (ctx) => {
          await ctx.lockbox.keyStore.importEncryptedKey(target, { force: values.force })
          println(`Key store imported to ${ctx.lockbox.keyStore.path}`)
          return ExitCode.OK
        })
      }

      case 'status':
        return await withContext(values, deps, status)

      default:
        process.stderr.write(USAGE)
        return ExitCode.USAGE
    }
  } catch (err) {
    return reportError(err)
  }
}

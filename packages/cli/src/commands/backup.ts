import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { parseArgs } from 'node:util'
import {
  FilesystemError,
  assertRestoreComplete,
  inspectBackup,
  readBackupFile,
  snapshotSize,
  validateNamespace,
} from 'lockbox'
import type { RestoreReport } from 'lockbox'
import { GLOBAL_OPTIONS, readNewPassword, withContext } from '../context.js'
import type { CommandContext, CommandDeps } from '../context.js'
import { ExitCode } from '../exit-codes.js'
import { dim, eprintln, println, reportError } from '../output.js'

const USAGE =
  'Usage: lockbox backup <command> [options]\n\n' +
  'Commands:\n' +
  '  create [--namespace <n>]... [--output <path>] [--overwrite]   Write an encrypted backup\n' +
  '  restore <path> [--namespace <n>] [--dry-run]                  Restore a backup\n' +
  '  inspect <path>                                                Show backup metadata\n'

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/** Default file name for a backup taken at `now`. */
export function defaultBackupName(now: Date): string {
  return `lockbox-backup-${now.toISOString().replace(/[:.]/g, '-')}.json`
}

interface CreateValues {
  namespace?: string[] | undefined
  output?: string | undefined
  overwrite?: boolean | undefined
}

async function create(ctx: CommandContext, values: CreateValues): Promise<number> {
  const namespaces =
    values.namespace !== undefined && values.namespace.length > 0
      ? values.namespace
      : [ctx.config.defaultNamespace]
  const outputPath = path.resolve(
    values.output ?? path.join(ctx.config.backup.directory, defaultBackupName(new Date())),
  )
  if (values.overwrite !== true && (await pathExists(outputPath))) {
    throw new FilesystemError(
      `Refusing to overwrite existing file: ${outputPath}`,
      outputPath,
      'write',
    )
  }

  const engine = await ctx.lockbox.backups()
  const snapshot = await engine.snapshot(namespaces)
  const count = snapshotSize(snapshot)
  if (count === 0) {
    eprintln(`Warning: ${namespaces.join(', ')} contain no secrets; the backup will be empty`)
  }

  const password = await readNewPassword(ctx.terminal, 'Backup password')
  await engine.encrypt(snapshot, password, { outputPath })
  println(`Backed up ${String(count)} secrets from ${[...snapshot.namespaces.keys()].join(', ')}`)
  println(`Written to ${outputPath}`)
  return ExitCode.OK
}

function printReport(report: RestoreReport): void {
  const verb = report.dryRun ? 'would restore' : 'restored'
  for (const result of report.namespaces) {
    const from =
      result.sources.length === 1 && result.sources[0] === result.namespace
        ? ''
        : ` ${dim(`(from ${result.sources.join(', ')})`)}`
    const failed = result.failed.length > 0 ? `, ${String(result.failed.length)} failed` : ''
    println(`${result.namespace}${from}: ${verb} ${String(result.succeeded.length)}${failed}`)
    if (report.dryRun) {
      for (const secretPath of result.succeeded) {
        println(`  ${secretPath}`)
      }
    }
  }
}

interface RestoreValues {
  namespace?: string[] | undefined
  'dry-run'?: boolean | undefined
}

async function restore(ctx: CommandContext, file: string, values: RestoreValues): Promise<number> {
  if (values.namespace !== undefined && values.namespace.length > 1) {
    eprintln('Error: restore takes at most one --namespace')
    return ExitCode.USAGE
  }
  const targetNamespace =
    values.namespace?.[0] === undefined ? undefined : validateNamespace(values.namespace[0])
  const blob = await readBackupFile(file)
  const engine = await ctx.lockbox.backups()
  const snapshot = await engine.unlock(blob, () => ctx.terminal.readSecret('Backup password: '))
  const report = await engine.restoreSnapshot(snapshot, blob.metadata, {
    targetNamespace,
    dryRun: values['dry-run'],
  })
  printReport(report)
  assertRestoreComplete(report)
  return ExitCode.OK
}

async function inspect(file: string): Promise<number> {
  const info = await inspectBackup(file)
  println(`Backup: ${info.path}`)
  println(`  created:    ${info.createdAt}`)
  println(`  format:     v${String(info.formatVersion)}`)
  println(`  namespaces: ${info.namespaces.join(', ')}`)
  println(`  kdf:        ${info.kdf.algorithm}, ${String(info.kdf.iterations)} iterations`)
  return ExitCode.OK
}

export async function backupCommand(args: string[], deps: CommandDeps = {}): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        ...GLOBAL_OPTIONS,
        namespace: { type: 'string', short: 'n', multiple: true },
        output: { type: 'string', short: 'o' },
        overwrite: { type: 'boolean' },
        'dry-run': { type: 'boolean' },
      },
      allowPositionals: true,
      strict: true,
    })

    const [subcommand, file] = positionals

    switch (subcommand) {
      case 'create':
        return await withContext(values, deps, (ctx) => create(ctx, values))

      case 'restore': {
        if (file === undefined) {
          eprintln('Usage: lockbox backup restore <path> [--namespace <n>] [--dry-run]')
          return ExitCode.USAGE
        }
        return await withContext(values, deps, (ctx) => restore(ctx, file, values))
      }

      case 'inspect': {
        if (file === undefined) {
          eprintln('Usage: lockbox backup inspect <path>')
          return ExitCode.USAGE
        }
        return await inspect(file)
      }

      default:
        process.stderr.write(USAGE)
        return ExitCode.USAGE
    }
  } catch (err) {
    return reportError(err)
  }
}

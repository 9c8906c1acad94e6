#!/usr/bin/env node
/**
 * CLI entry point for lockbox.
 *
 * Each command group is lazy-loaded via dynamic import() so only the
 * requested group's module (and its dependencies) is loaded.
 *
 * argv layout: [node, script, group, ...commandArgs]
 *
 * @internal
 */

const [group, ...commandArgs] = process.argv.slice(2)

function printHelp(): void {
  process.stdout.write(
    'Usage: lockbox <command> <subcommand> [options]\n\n' +
      'Commands:\n' +
      '  secure    Manage the encrypted root credential (init, change-password, export-key, import-key, status)\n' +
      '  secrets   Read and write secrets (put, get, list, delete, bulk-set, bulk-get, namespaces,\n' +
      '            copy-namespace, delete-namespace)\n' +
      '  backup    Encrypted namespace backups (create, restore, inspect)\n' +
      '  config    Manage configuration (init, show)\n\n' +
      'Global options:\n' +
      '  --config-dir <dir>    Directory holding config.json\n' +
      '  --log-level <level>   debug, info, warn, error or silent (diagnostics go to stderr)\n\n' +
      'Passwords are read from the terminal with echo off, or one per line from piped stdin.\n',
  )
}

async function main(): Promise<number> {
  if (group === undefined || group === '--help' || group === '-h') {
    printHelp()
    return 0
  }

  switch (group) {
    case 'secure': {
      const { secureCommand } = await import('./commands/secure.js')
      return secureCommand(commandArgs)
    }
    case 'secrets': {
      const { secretsCommand } = await import('./commands/secrets.js')
      return secretsCommand(commandArgs)
    }
    case 'backup': {
      const { backupCommand } = await import('./commands/backup.js')
      return backupCommand(commandArgs)
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${group}\n`)
      printHelp()
      return 2
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })

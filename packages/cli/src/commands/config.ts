import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { parseArgs } from 'node:util'
import {
  CONFIG_FILE_NAME,
  defaultConfig,
  getDefaultConfigDir,
  loadConfig,
  resolveConfig,
  saveConfig,
} from 'lockbox'
import { GLOBAL_OPTIONS } from '../context.js'
import type { CommandDeps } from '../context.js'
import { ExitCode } from '../exit-codes.js'
import { eprintln, println, reportError } from '../output.js'

export async function configCommand(args: string[], deps: CommandDeps = {}): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        ...GLOBAL_OPTIONS,
        force: { type: 'boolean' },
      },
      allowPositionals: true,
      strict: true,
    })

    const configDir = values['config-dir'] ?? getDefaultConfigDir()
    const subcommand = positionals[0]

    switch (subcommand) {
      case 'init': {
        const configPath = path.join(configDir, CONFIG_FILE_NAME)
        if (values.force !== true) {
          try {
            await fs.access(configPath)
            eprintln(`Config already exists at ${configPath}`)
            return ExitCode.FAILURE
          } catch {
            // not there yet
          }
        }
        const written = await saveConfig(configDir, defaultConfig())
        println(`Config created at ${written}`)
        return ExitCode.OK
      }

      case 'show': {
        const file = await loadConfig(configDir)
        const resolved = resolveConfig(file, deps.env ?? process.env, { configDir })
        println(JSON.stringify(resolved, null, 2))
        return ExitCode.OK
      }

      default:
        eprintln('Usage: lockbox config <init|show> [--force] [--config-dir <dir>]')
        return ExitCode.USAGE
    }
  } catch (err) {
    return reportError(err)
  }
}

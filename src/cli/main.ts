import * as path from 'path'
import { Command, CommanderError } from 'commander'
import pc from 'picocolors'

import { formatError, UsageError } from '../core/errors.js'
import type { HierarchyReader } from '../core/types.js'
import { configureLogging, createDebugLogger } from '../utils/debug.js'
import type { ExplorerSession } from '../tui/session.js'
import type { CanopyConfig } from './config.js'

export const VERSION = '0.1.0'
export const USAGE = 'Usage: canopy /path/to/file.h5'

const log = createDebugLogger('cli')

export interface CliDeps {
  loadConfig: (configPath?: string) => CanopyConfig
  openReader: (filePath: string) => Promise<HierarchyReader>
  createSession: (reader: HierarchyReader, fileName: string, config: CanopyConfig) => ExplorerSession
  launch: (session: ExplorerSession) => Promise<void>
  writeOut: (text: string) => void
  writeErr: (text: string) => void
}

interface ProgramOptions {
  config?: string
}

function buildProgram(deps: CliDeps, onParsed: (files: string[], options: ProgramOptions) => void): Command {
  return new Command()
    .name('canopy')
    .description('Browse the hierarchy of an HDF5 file in the terminal')
    .version(VERSION, '-V, --version', 'Print version')
    .argument('[files...]', 'HDF5 file to open')
    .option('-c, --config <file>', 'Read settings from this file instead of .canopyrc')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.writeOut(text),
      writeErr: (text) => deps.writeErr(text),
    })
    .action((files: string[], options: ProgramOptions) => {
      onParsed(files, options)
    })
}

/**
 * Parses arguments, opens the file and runs the explorer until it quits.
 * Resolves to the process exit status.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let files: string[] = []
  let configPath: string | undefined
  const program = buildProgram(deps, (parsed, options) => {
    files = parsed
    configPath = options.config === undefined ? undefined : path.resolve(process.cwd(), options.config)
  })

  try {
    program.parse(argv, { from: 'user' })
    if (files.length !== 1) {
      throw new UsageError(USAGE)
    }
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    if (error instanceof UsageError) {
      deps.writeErr(`${error.message}\n`)
      return 1
    }
    throw error
  }

  const [file] = files
  if (file === undefined) return 1

  let config: CanopyConfig
  try {
    config = deps.loadConfig(configPath)
  } catch (error) {
    deps.writeErr(`${pc.red(formatError(error))}\n`)
    return 1
  }
  configureLogging({ debug: config.debug, logFile: config.logFile })

  let reader: HierarchyReader
  try {
    reader = await deps.openReader(path.resolve(process.cwd(), file))
  } catch (error) {
    deps.writeErr(`${pc.red(formatError(error))}\n`)
    return 1
  }

  log.info('starting session', { file })
  const session = deps.createSession(reader, path.basename(file), config)
  await deps.launch(session)
  return 0
}

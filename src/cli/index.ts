#!/usr/bin/env node
import pc from 'picocolors'

import { formatError } from '../core/errors.js'
import { openH5File } from '../reader/h5-reader.js'
import { launchTUI } from '../tui/index.js'
import { ExplorerSession } from '../tui/session.js'
import { loadConfig, loadConfigFromFile } from './config.js'
import { runCli, VERSION } from './main.js'

runCli(process.argv.slice(2), {
  loadConfig: (configPath) => (configPath === undefined ? loadConfig() : loadConfigFromFile(configPath)),
  openReader: openH5File,
  createSession: (reader, fileName, config) =>
    new ExplorerSession({ reader, fileName, config, version: VERSION }),
  launch: launchTUI,
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
})
  .then((status) => {
    process.exit(status)
  })
  .catch((error: unknown) => {
    process.stderr.write(`${pc.red(formatError(error))}\n`)
    process.exit(1)
  })

import { afterEach, beforeEach, describe, test, expect } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { configureLogging, createDebugLogger } from './debug.js'

describe('createDebugLogger', () => {
  let dir: string
  let logFile: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'canopy-log-'))
    logFile = path.join(dir, 'canopy.log')
    configureLogging({ debug: true, logFile })
  })

  afterEach(() => {
    configureLogging({ debug: false, logFile: null })
    fs.rmSync(dir, { recursive: true, force: true })
  })

  test('writes prefixed lines with their data to the log file', () => {
    createDebugLogger('cursor').child('poll').info('moved', { row: 3 })
    const text = fs.readFileSync(logFile, 'utf-8')
    expect(text).toContain('[INFO][cursor:poll] moved\n{\n  "row": 3\n}\n')
  })

  test('debug lines are dropped once debugging is off', () => {
    configureLogging({ debug: false })
    const log = createDebugLogger('modes')
    log.debug('hidden')
    log.warn('shown')
    const text = fs.readFileSync(logFile, 'utf-8')
    expect(text).not.toContain('hidden')
    expect(text).toContain('[WARN][modes] shown')
  })
})

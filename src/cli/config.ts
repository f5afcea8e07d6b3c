import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'

/**
 * Configuration options for canopy, read from .canopyrc or .canopyrc.json
 */
export const configSchema = z
  .object({
    /** Delay between cursor checks of the background poll task */
    pollIntervalMs: z.number().int().positive().default(50),
    /** Elements rendered by one values request before truncating */
    maxValueElements: z.number().int().positive().default(1000),
    /** Elements read for statistics and plots */
    maxPlotElements: z.number().int().positive().default(1_000_000),
    histogramBins: z.number().int().positive().default(50),
    plotWidth: z.number().int().min(8).default(60),
    plotHeight: z.number().int().min(4).default(15),
    debug: z.boolean().default(false),
    logFile: z.string().min(1).optional(),
  })
  .strict()

export type CanopyConfig = z.infer<typeof configSchema>

export const DEFAULT_CONFIG: CanopyConfig = configSchema.parse({})

/**
 * Config file names to search for, in order of priority
 */
const CONFIG_FILES = ['.canopyrc', '.canopyrc.json']

/**
 * Find the config file in the given directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let currentDir = startDir

  while (true) {
    for (const configFile of CONFIG_FILES) {
      const configPath = path.join(currentDir, configFile)
      if (fs.existsSync(configPath)) {
        return configPath
      }
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached filesystem root
      break
    }
    currentDir = parentDir
  }

  return null
}

/**
 * Validate config object and return typed config with defaults filled in
 */
export function parseConfig(raw: unknown, configPath: string): CanopyConfig {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const reasons = result.error.issues
      .map((issue) => `'${issue.path.join('.') || '(root)'}' ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid config in ${configPath}: ${reasons}`)
  }
  return result.data
}

function loadJsonConfig(configPath: string): CanopyConfig {
  const content = fs.readFileSync(configPath, 'utf-8')
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(
        `Invalid JSON in config file: ${configPath}\n` +
          `Reason: ${error.message}`
      )
    }
    throw error
  }
  return parseConfig(raw, configPath)
}

/**
 * Load configuration, searching upwards from the given directory
 *
 * @param startDir - Directory to start searching from (defaults to cwd)
 * @returns Loaded config, or the defaults when no config file is found
 */
export function loadConfig(startDir?: string): CanopyConfig {
  const configPath = findConfigFile(startDir || process.cwd())
  if (!configPath) {
    return DEFAULT_CONFIG
  }
  return loadJsonConfig(configPath)
}

/**
 * Load config from a specific file path
 */
export function loadConfigFromFile(configPath: string): CanopyConfig {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }
  return loadJsonConfig(configPath)
}

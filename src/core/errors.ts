export class ReadError extends Error {
  readonly code = 'READ_ERROR'
  readonly path: string
  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options)
    this.name = 'ReadError'
    this.path = path
  }
}

export class IndexOutOfRangeError extends Error {
  readonly code = 'INDEX_OUT_OF_RANGE'
  readonly row: number
  readonly rowCount: number
  constructor(row: number, rowCount: number) {
    super(`Row ${row} is outside the tree (${rowCount} rows)`)
    this.name = 'IndexOutOfRangeError'
    this.row = row
    this.rowCount = rowCount
  }
}

export class InvalidUserInputError extends Error {
  readonly code = 'INVALID_USER_INPUT'
  constructor(message: string) {
    super(message)
    this.name = 'InvalidUserInputError'
  }
}

export class UsageError extends Error {
  readonly code = 'USAGE_ERROR'
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/** Raised by the quit binding; the only error the handler boundary lets through. */
export class UserInterrupt extends Error {
  readonly code = 'USER_INTERRUPT'
  constructor() {
    super('Interrupted by user')
    this.name = 'UserInterrupt'
  }
}

export function formatError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  return `ERROR: ${message}`
}

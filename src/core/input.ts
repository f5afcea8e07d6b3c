// Parsers for text captured from the mini buffer

import { InvalidUserInputError } from './errors.js'
import type { IndexRange } from './types.js'

const RANGE_PATTERN = /^\s*(\d+)\s*-\s*(\d+)\s*$/

/** "2-5" → { start: 2, end: 5 }, end exclusive */
export function parseRange(text: string): IndexRange {
  const match = RANGE_PATTERN.exec(text)
  if (!match) {
    throw new InvalidUserInputError(`Invalid range "${text}", expected start-end`)
  }
  const start = Number.parseInt(match[1] ?? '', 10)
  const end = Number.parseInt(match[2] ?? '', 10)
  if (end <= start) {
    throw new InvalidUserInputError(`Invalid range "${text}", end must be greater than start`)
  }
  return { start, end }
}

export function parsePositiveInt(text: string, what: string): number {
  const trimmed = text.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidUserInputError(`Invalid ${what} "${text}", expected a positive integer`)
  }
  const value = Number.parseInt(trimmed, 10)
  if (value <= 0) {
    throw new InvalidUserInputError(`Invalid ${what} "${text}", expected a positive integer`)
  }
  return value
}

export function parseNodePath(text: string): string {
  const trimmed = text.trim()
  if (trimmed.length === 0) {
    throw new InvalidUserInputError('Empty path')
  }
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`
}

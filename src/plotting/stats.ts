import { InvalidUserInputError } from '../core/errors.js'

export interface Summary {
  count: number
  min: number
  max: number
  mean: number
  /** Population standard deviation */
  std: number
}

/** Non-finite values are left out */
export function summarize(values: readonly number[]): Summary {
  let count = 0
  let min = Infinity
  let max = -Infinity
  let sum = 0
  for (const value of values) {
    if (!Number.isFinite(value)) continue
    count++
    sum += value
    if (value < min) min = value
    if (value > max) max = value
  }
  if (count === 0) {
    throw new InvalidUserInputError('No finite numeric values')
  }

  const mean = sum / count
  let squares = 0
  for (const value of values) {
    if (!Number.isFinite(value)) continue
    squares += (value - mean) ** 2
  }
  return { count, min, max, mean, std: Math.sqrt(squares / count) }
}

/** Up to four significant digits, without trailing zeros */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value)
  return String(Number(value.toPrecision(4)))
}

// Text-art density plot of two equally long datasets

import { InvalidUserInputError } from '../core/errors.js'
import { formatNumber, summarize } from './stats.js'

export const DENSITY_RAMP = ' .:-=+*#%@'

export interface DensityOptions {
  width: number
  height: number
}

interface Axis {
  path: string
  values: number[]
}

/** Counts per cell, row 0 at the bottom */
export function binPairs(
  xs: readonly number[],
  ys: readonly number[],
  width: number,
  height: number
): number[][] {
  if (xs.length !== ys.length) {
    throw new InvalidUserInputError(
      `Datasets differ in length (${xs.length} and ${ys.length})`
    )
  }
  const x = summarize(xs)
  const y = summarize(ys)
  const grid = Array.from({ length: height }, () => new Array<number>(width).fill(0))

  for (let i = 0; i < xs.length; i++) {
    const xv = xs[i] ?? NaN
    const yv = ys[i] ?? NaN
    if (!Number.isFinite(xv) || !Number.isFinite(yv)) continue
    const column = cell(xv, x.min, x.max, width)
    const row = cell(yv, y.min, y.max, height)
    const line = grid[row]
    if (line) line[column] = (line[column] ?? 0) + 1
  }
  return grid
}

function cell(value: number, min: number, max: number, cells: number): number {
  if (max === min) return 0
  return Math.min(cells - 1, Math.floor(((value - min) / (max - min)) * cells))
}

export function shade(count: number, peak: number): string {
  if (count <= 0 || peak <= 0) return DENSITY_RAMP[0] ?? ' '
  const last = DENSITY_RAMP.length - 1
  const index = Math.max(1, Math.ceil((count / peak) * last))
  return DENSITY_RAMP[Math.min(last, index)] ?? '@'
}

export class DensityPlotter {
  readonly defaultText = 'Pick the x axis with x and the y axis with y, then draw with p'
  private x: Axis | null = null
  private y: Axis | null = null

  constructor(private readonly options: DensityOptions) {}

  /** Number of selected axes */
  get size(): number {
    return (this.x ? 1 : 0) + (this.y ? 1 : 0)
  }

  setX(path: string, values: number[]): void {
    summarize(values)
    this.x = { path, values }
  }

  setY(path: string, values: number[]): void {
    summarize(values)
    this.y = { path, values }
  }

  reset(): void {
    this.x = null
    this.y = null
  }

  describe(): string {
    const x = this.x?.path ?? '<unset>'
    const y = this.y?.path ?? '<unset>'
    return `x: ${x}\ny: ${y}`
  }

  render(): string {
    if (!this.x || !this.y) {
      throw new InvalidUserInputError('Select both x and y datasets before plotting')
    }
    const { width, height } = this.options
    const grid = binPairs(this.x.values, this.y.values, width, height)
    let peak = 0
    for (const line of grid) {
      for (const count of line) peak = Math.max(peak, count)
    }

    const rows: string[] = []
    for (let row = height - 1; row >= 0; row--) {
      const line = grid[row] ?? []
      rows.push(`|${line.map((count) => shade(count, peak)).join('')}`)
    }
    rows.push(`+${'-'.repeat(width)}`)

    const xs = summarize(this.x.values)
    const ys = summarize(this.y.values)
    rows.push(`x: ${this.x.path} [${formatNumber(xs.min)}, ${formatNumber(xs.max)}]`)
    rows.push(`y: ${this.y.path} [${formatNumber(ys.min)}, ${formatNumber(ys.max)}]`)
    return rows.join('\n')
  }
}

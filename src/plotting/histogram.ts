// Text-art histogram of one dataset

import { InvalidUserInputError } from '../core/errors.js'
import { formatNumber, summarize } from './stats.js'

export interface HistogramOptions {
  bins: number
  barWidth?: number
}

export interface Bin {
  lo: number
  hi: number
  count: number
}

export function binValues(values: readonly number[], bins: number): Bin[] {
  if (!Number.isInteger(bins) || bins <= 0) {
    throw new InvalidUserInputError(`Invalid bin count ${bins}`)
  }
  const { min, max } = summarize(values)
  const width = (max - min) / bins
  const result: Bin[] = []
  for (let i = 0; i < bins; i++) {
    result.push({ lo: min + i * width, hi: i === bins - 1 ? max : min + (i + 1) * width, count: 0 })
  }
  for (const value of values) {
    if (!Number.isFinite(value)) continue
    const index = width === 0 ? 0 : Math.min(bins - 1, Math.floor((value - min) / width))
    const bin = result[index]
    if (bin) bin.count++
  }
  return result
}

export class HistogramPlotter {
  readonly defaultText = 'Select a dataset with e, set bins with b, draw with h'
  private selection: { path: string; values: number[] } | null = null
  private bins: number
  private logScale = false
  private readonly barWidth: number

  constructor(options: HistogramOptions) {
    this.bins = options.bins
    this.barWidth = options.barWidth ?? 40
  }

  /** Number of selected datasets */
  get size(): number {
    return this.selection ? 1 : 0
  }

  get binCount(): number {
    return this.bins
  }

  get isLogScale(): boolean {
    return this.logScale
  }

  select(path: string, values: number[]): void {
    summarize(values)
    this.selection = { path, values }
  }

  setBins(bins: number): void {
    if (!Number.isInteger(bins) || bins <= 0) {
      throw new InvalidUserInputError(`Invalid bin count ${bins}`)
    }
    this.bins = bins
  }

  toggleLogScale(): boolean {
    this.logScale = !this.logScale
    return this.logScale
  }

  reset(): void {
    this.selection = null
    this.logScale = false
  }

  describe(): string {
    if (!this.selection) return this.defaultText
    const scale = this.logScale ? ', log counts' : ''
    return `${this.selection.path} (${this.selection.values.length} values, ${this.bins} bins${scale})`
  }

  render(): string {
    if (!this.selection) {
      throw new InvalidUserInputError('No dataset selected for the histogram')
    }
    const bins = binValues(this.selection.values, this.bins)
    const scaled = bins.map((bin) => (this.logScale ? Math.log10(bin.count + 1) : bin.count))
    const labels = bins.map((bin) => `${formatNumber(bin.lo)} .. ${formatNumber(bin.hi)}`)
    let peak = 0
    let labelWidth = 0
    for (let i = 0; i < bins.length; i++) {
      peak = Math.max(peak, scaled[i] ?? 0)
      labelWidth = Math.max(labelWidth, labels[i]?.length ?? 0)
    }

    const rows = bins.map((bin, i) => {
      const value = scaled[i] ?? 0
      const bar = peak === 0 ? 0 : Math.round((value / peak) * this.barWidth)
      return `${(labels[i] ?? '').padStart(labelWidth)} | ${'█'.repeat(bar)} ${bin.count}`
    })
    return [this.describe(), ...rows].join('\n')
  }
}

/**
 * HierarchyReader over a plain in-memory tree. Backs the tests and any
 * caller that already holds its data in memory.
 */

import { ReadError } from '../core/errors.js'
import type { ChildEntry, HierarchyReader } from '../core/types.js'
import {
  elementCount,
  formatAttributes,
  formatDatasetMetadata,
  formatGroupMetadata,
  formatRows,
} from './format.js'

export interface MemoryGroup {
  kind: 'group'
  attrs: Record<string, unknown>
  children: Record<string, MemoryEntry>
}

export interface MemoryDataset {
  kind: 'dataset'
  attrs: Record<string, unknown>
  /** First axis outermost; nested arrays make extra dimensions */
  values: unknown[]
  dtype: string
}

export type MemoryEntry = MemoryGroup | MemoryDataset

export function group(
  children: Record<string, MemoryEntry> = {},
  attrs: Record<string, unknown> = {}
): MemoryGroup {
  return { kind: 'group', attrs, children }
}

export function dataset(
  values: unknown[],
  attrs: Record<string, unknown> = {},
  dtype?: string
): MemoryDataset {
  const first = values[0]
  const inferred = typeof first === 'string' ? 'string' : 'float64'
  return { kind: 'dataset', attrs, values, dtype: dtype ?? inferred }
}

function shapeOf(values: unknown[]): number[] {
  const shape = [values.length]
  let first: unknown = values[0]
  while (Array.isArray(first)) {
    shape.push(first.length)
    first = first[0]
  }
  return shape
}

function flatten(values: readonly unknown[]): unknown[] {
  const flat: unknown[] = []
  for (const value of values) {
    if (Array.isArray(value)) flat.push(...flatten(value))
    else flat.push(value)
  }
  return flat
}

export class MemoryReader implements HierarchyReader {
  /** Number of listChildren calls per path */
  readonly listCalls = new Map<string, number>()
  private readonly failing = new Set<string>()
  private closed = false

  constructor(private readonly root: MemoryGroup) {}

  /** Makes every later call for `path` fail with ReadError */
  failOn(path: string): void {
    this.failing.add(path)
  }

  recover(path: string): void {
    this.failing.delete(path)
  }

  get isClosed(): boolean {
    return this.closed
  }

  listChildren(path: string): ChildEntry[] {
    this.listCalls.set(path, (this.listCalls.get(path) ?? 0) + 1)
    const entry = this.groupAt(path)
    return Object.entries(entry.children).map(([name, child]): ChildEntry => ({
      name,
      kind: child.kind === 'group' ? 'container' : 'leaf',
      hasChildren: child.kind === 'group' && Object.keys(child.children).length > 0,
    }))
  }

  getMetadata(path: string): string {
    const entry = this.resolve(path)
    if (entry.kind === 'group') {
      return formatGroupMetadata(path, Object.keys(entry.children).length)
    }
    return formatDatasetMetadata({ path, shape: shapeOf(entry.values), dtype: entry.dtype })
  }

  getAttributes(path: string): string {
    return formatAttributes(Object.entries(this.resolve(path).attrs))
  }

  getLength(path: string): number {
    const entry = this.resolve(path)
    return entry.kind === 'dataset' ? entry.values.length : 0
  }

  getRowSize(path: string): number {
    const entry = this.resolve(path)
    return entry.kind === 'dataset' ? elementCount(shapeOf(entry.values).slice(1)) : 1
  }

  getValues(path: string, start: number, end: number): string {
    return formatRows(this.datasetAt(path).values.slice(start, end), 1)
  }

  getNumbers(path: string, start: number, end: number): number[] {
    return flatten(this.datasetAt(path).values.slice(start, end)).map((value) => {
      if (typeof value === 'number') return value
      if (typeof value === 'bigint' || typeof value === 'boolean') return Number(value)
      throw new ReadError(path, 'dataset is not numeric')
    })
  }

  close(): void {
    this.closed = true
  }

  private resolve(path: string): MemoryEntry {
    if (this.closed) throw new ReadError(path, 'file is closed')
    if (this.failing.has(path)) throw new ReadError(path, 'unreadable')

    let entry: MemoryEntry = this.root
    for (const segment of path.split('/').filter((part) => part.length > 0)) {
      const next: MemoryEntry | undefined =
        entry.kind === 'group' ? entry.children[segment] : undefined
      if (!next) throw new ReadError(path, 'no such object')
      entry = next
    }
    return entry
  }

  private groupAt(path: string): MemoryGroup {
    const entry = this.resolve(path)
    if (entry.kind !== 'group') throw new ReadError(path, 'not a group')
    return entry
  }

  private datasetAt(path: string): MemoryDataset {
    const entry = this.resolve(path)
    if (entry.kind !== 'dataset') throw new ReadError(path, 'not a dataset')
    return entry
  }
}

/**
 * HierarchyReader for HDF5 files, backed by h5wasm.
 *
 * Groups become containers and datasets become leaves. Everything else
 * (named datatypes, dangling links) shows up as a childless leaf.
 */

import * as path from 'path'
import h5wasm from 'h5wasm/node'
import { ReadError } from '../core/errors.js'
import type { ChildEntry, HierarchyReader } from '../core/types.js'
import {
  elementCount,
  formatAttributes,
  formatDatasetMetadata,
  formatElement,
  formatGroupMetadata,
  formatRows,
  toArray,
} from './format.js'
import { createDebugLogger } from '../utils/debug.js'

const log = createDebugLogger('h5')

type H5File = InstanceType<typeof h5wasm.File>
type H5Group = InstanceType<typeof h5wasm.Group>
type H5Dataset = InstanceType<typeof h5wasm.Dataset>

export async function openH5File(filePath: string): Promise<H5Reader> {
  await h5wasm.ready
  let file: H5File
  try {
    file = new h5wasm.File(filePath, 'r')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ReadError(filePath, `cannot open file: ${message}`, { cause: error })
  }
  log.info('opened file', { filePath })
  return new H5Reader(file, path.basename(filePath))
}

export class H5Reader implements HierarchyReader {
  constructor(
    private readonly file: H5File,
    readonly fileName: string
  ) {}

  listChildren(nodePath: string): ChildEntry[] {
    return this.read(nodePath, () => {
      const group = this.groupAt(nodePath)
      return group.keys().map((name): ChildEntry => {
        const child = group.get(name)
        if (child instanceof h5wasm.Group) {
          return { name, kind: 'container', hasChildren: child.keys().length > 0 }
        }
        return { name, kind: 'leaf', hasChildren: false }
      })
    })
  }

  getMetadata(nodePath: string): string {
    return this.read(nodePath, () => {
      const entity = this.entityAt(nodePath)
      if (entity instanceof h5wasm.Dataset) {
        return formatDatasetMetadata({
          path: nodePath,
          shape: entity.shape,
          dtype: describeDtype(entity.dtype),
          chunks: entity.metadata.chunks,
        })
      }
      return formatGroupMetadata(nodePath, entity.keys().length)
    })
  }

  getAttributes(nodePath: string): string {
    return this.read(nodePath, () => {
      const entity = this.entityAt(nodePath)
      const entries = Object.entries(entity.attrs).map(
        ([name, attribute]): [string, unknown] => [name, attribute.json_value]
      )
      return formatAttributes(entries)
    })
  }

  getLength(nodePath: string): number {
    return this.read(nodePath, () => {
      const entity = this.entityAt(nodePath)
      if (!(entity instanceof h5wasm.Dataset)) return 0
      const shape = entity.shape
      if (shape === null) return 0
      return shape.length === 0 ? 1 : (shape[0] ?? 0)
    })
  }

  getRowSize(nodePath: string): number {
    return this.read(nodePath, () => {
      const entity = this.entityAt(nodePath)
      if (!(entity instanceof h5wasm.Dataset) || entity.shape === null) return 1
      return elementCount(entity.shape.slice(1))
    })
  }

  getValues(nodePath: string, start: number, end: number): string {
    return this.read(nodePath, () => {
      const { flat, rowSize } = this.slice(nodePath, start, end)
      return formatRows(flat, rowSize)
    })
  }

  getNumbers(nodePath: string, start: number, end: number): number[] {
    return this.read(nodePath, () => {
      const { flat } = this.slice(nodePath, start, end)
      return flat.map((value) => {
        if (typeof value === 'number') return value
        if (typeof value === 'bigint' || typeof value === 'boolean') return Number(value)
        throw new ReadError(nodePath, `dataset is not numeric (found ${formatElement(value)})`)
      })
    })
  }

  close(): void {
    this.file.close()
    log.info('closed file', { fileName: this.fileName })
  }

  private slice(nodePath: string, start: number, end: number): { flat: unknown[]; rowSize: number } {
    const dataset = this.datasetAt(nodePath)
    const shape = dataset.shape
    if (shape === null) {
      return { flat: [], rowSize: 1 }
    }
    if (shape.length === 0) {
      return { flat: toArray(dataset.value), rowSize: 1 }
    }
    const rowSize = elementCount(shape.slice(1))
    return { flat: toArray(dataset.slice([[start, end]])), rowSize }
  }

  private entityAt(nodePath: string): H5Group | H5Dataset {
    const entity = nodePath === '/' ? this.file : this.file.get(nodePath)
    if (entity instanceof h5wasm.Group || entity instanceof h5wasm.Dataset) {
      return entity
    }
    throw new ReadError(nodePath, entity ? 'unsupported object type' : 'no such object')
  }

  private groupAt(nodePath: string): H5Group {
    const entity = this.entityAt(nodePath)
    if (!(entity instanceof h5wasm.Group)) throw new ReadError(nodePath, 'not a group')
    return entity
  }

  private datasetAt(nodePath: string): H5Dataset {
    const entity = this.entityAt(nodePath)
    if (!(entity instanceof h5wasm.Dataset)) throw new ReadError(nodePath, 'not a dataset')
    return entity
  }

  /** Turns whatever the library throws into a ReadError for `nodePath` */
  private read<T>(nodePath: string, fn: () => T): T {
    try {
      return fn()
    } catch (error) {
      if (error instanceof ReadError) throw error
      const message = error instanceof Error ? error.message : String(error)
      log.warn('read failed', { nodePath, message })
      throw new ReadError(nodePath, message, { cause: error })
    }
  }
}

function describeDtype(dtype: unknown): string {
  return typeof dtype === 'string' ? dtype : JSON.stringify(dtype)
}

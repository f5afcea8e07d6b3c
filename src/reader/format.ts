// Display text shared by the reader implementations

export type AttributeEntry = [name: string, value: unknown]

export interface DatasetDescription {
  path: string
  shape: readonly number[] | null
  dtype: string
  chunks?: readonly number[] | null
}

export function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === 'function'
  )
}

/** Flattens whatever the reader returned into a plain array */
export function toArray(value: unknown): unknown[] {
  if (value === null || value === undefined) return []
  if (Array.isArray(value)) return value
  if (isIterable(value)) return Array.from(value)
  return [value]
}

export function formatElement(value: unknown): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value)
  }
  if (value === null || value === undefined) return 'null'
  if (isIterable(value)) {
    return `[${Array.from(value, formatElement).join(', ')}]`
  }
  return JSON.stringify(value)
}

export function formatShape(shape: readonly number[] | null): string {
  if (shape === null) return 'null'
  if (shape.length === 0) return '() scalar'
  if (shape.length === 1) return `(${shape[0]},)`
  return `(${shape.join(', ')})`
}

export function elementCount(shape: readonly number[] | null): number {
  if (shape === null) return 0
  return shape.reduce((total, extent) => total * extent, 1)
}

export function formatGroupMetadata(path: string, members: number): string {
  return [`Group: ${path}`, `Members: ${members}`].join('\n')
}

export function formatDatasetMetadata(description: DatasetDescription): string {
  const lines = [
    `Dataset: ${description.path}`,
    `Shape: ${formatShape(description.shape)}`,
    `Dtype: ${description.dtype}`,
    `Size: ${elementCount(description.shape)}`,
  ]
  if (description.chunks) {
    lines.push(`Chunks: ${formatShape(description.chunks)}`)
  }
  return lines.join('\n')
}

export function formatAttributes(entries: readonly AttributeEntry[]): string {
  if (entries.length === 0) return 'No attributes'
  return entries.map(([name, value]) => `${name}: ${formatElement(value)}`).join('\n')
}

/**
 * One line per first-axis element; each line holds `rowSize` flattened
 * values.
 */
export function formatRows(flat: readonly unknown[], rowSize: number): string {
  if (rowSize <= 1) {
    return flat.map(formatElement).join('\n')
  }
  const rows: string[] = []
  for (let offset = 0; offset < flat.length; offset += rowSize) {
    rows.push(formatElement(flat.slice(offset, offset + rowSize)))
  }
  return rows.join('\n')
}

/**
 * Arena of lazily populated hierarchy nodes.
 *
 * Nodes are addressed by index and never freed, so collapsing a container
 * only hides its children and re-expanding it costs nothing.
 */

import { InvalidUserInputError, ReadError } from './errors.js'
import type { ChildEntry, HierarchyNode, HierarchyReader, IndexRange, NodeId } from './types.js'

export interface NodeStoreOptions {
  /** Largest number of elements a single values request renders */
  maxValueElements: number
  /** Largest number of elements fetched for statistics and plots */
  maxPlotElements: number
}

export const ROOT_ID: NodeId = 0

export function childPath(parentPath: string, name: string): string {
  return parentPath === '/' ? `/${name}` : `${parentPath}/${name}`
}

export class NodeStore {
  private readonly nodes: HierarchyNode[] = []

  constructor(
    readonly reader: HierarchyReader,
    rootName: string,
    private readonly options: NodeStoreOptions
  ) {
    this.nodes.push({
      id: ROOT_ID,
      name: rootName,
      path: '/',
      kind: 'container',
      hasChildren: true,
      depth: 0,
      parent: null,
      children: null,
      isExpanded: false,
    })
  }

  get root(): HierarchyNode {
    return this.get(ROOT_ID)
  }

  get size(): number {
    return this.nodes.length
  }

  get(id: NodeId): HierarchyNode {
    const node = this.nodes[id]
    if (!node) {
      throw new RangeError(`Unknown node id ${id}`)
    }
    return node
  }

  /**
   * Children of a container, fetched from the reader on first use only.
   * A failed fetch caches nothing.
   */
  expand(id: NodeId): HierarchyNode[] {
    const node = this.get(id)
    if (node.children) {
      return node.children.map((childId) => this.get(childId))
    }
    if (node.kind !== 'container') {
      return []
    }

    let entries: ChildEntry[]
    try {
      entries = this.reader.listChildren(node.path)
    } catch (error) {
      if (error instanceof ReadError) throw error
      const message = error instanceof Error ? error.message : String(error)
      throw new ReadError(node.path, message, { cause: error })
    }

    const base = this.nodes.length
    const children = entries.map((entry, index): HierarchyNode => ({
      id: base + index,
      name: entry.name,
      path: childPath(node.path, entry.name),
      kind: entry.kind,
      hasChildren: entry.kind === 'container' && entry.hasChildren,
      depth: node.depth + 1,
      parent: node.id,
      children: null,
      isExpanded: false,
    }))
    this.nodes.push(...children)
    node.children = children.map((child) => child.id)
    return children
  }

  parentOf(id: NodeId): HierarchyNode | null {
    const parent = this.get(id).parent
    return parent === null ? null : this.get(parent)
  }

  metadataText(id: NodeId): string {
    return this.reader.getMetadata(this.get(id).path)
  }

  attributeText(id: NodeId): string {
    return this.reader.getAttributes(this.get(id).path)
  }

  valueText(id: NodeId, range?: IndexRange): string {
    const node = this.requireLeaf(id)
    const window = this.resolveWindow(node, range, this.options.maxValueElements)
    const text = this.reader.getValues(node.path, window.start, window.end)
    if (!window.truncated) {
      return text
    }
    const shown = (window.end - window.start) * window.rowSize
    return `${text}\n… truncated: showing ${shown} of ${window.requested * window.rowSize} elements`
  }

  numbers(id: NodeId, range?: IndexRange): number[] {
    const node = this.requireLeaf(id)
    const window = this.resolveWindow(node, range, this.options.maxPlotElements)
    return this.reader.getNumbers(node.path, window.start, window.end)
  }

  private requireLeaf(id: NodeId): HierarchyNode {
    const node = this.get(id)
    if (node.kind !== 'leaf') {
      throw new InvalidUserInputError(`${node.path} is not a dataset`)
    }
    return node
  }

  private resolveWindow(
    node: HierarchyNode,
    range: IndexRange | undefined,
    cap: number
  ): { start: number; end: number; requested: number; rowSize: number; truncated: boolean } {
    const length = this.reader.getLength(node.path)
    const rowSize = Math.max(1, this.reader.getRowSize(node.path))
    const start = range?.start ?? 0
    let end = range ? Math.min(range.end, length) : length

    if (range) {
      if (start < 0 || range.end <= start) {
        throw new InvalidUserInputError(`Invalid range ${start}-${range.end}`)
      }
      if (start >= length) {
        throw new InvalidUserInputError(
          `Range ${start}-${range.end} is outside ${node.path} (length ${length})`
        )
      }
    }

    // The cap counts elements; whole first-axis rows are kept, at least one
    const rowCap = Math.max(1, Math.floor(cap / rowSize))
    const requested = end - start
    const truncated = requested > rowCap
    if (truncated) {
      end = start + rowCap
    }
    return { start, end, requested, rowSize, truncated }
  }
}

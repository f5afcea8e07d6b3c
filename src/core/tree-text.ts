/**
 * The tree pane's outline text.
 *
 * One line per visible node, a parallel row → node index and the total
 * character count are kept in step on every splice:
 *
 *   lines.length === lineIndex.length
 *   length === sum(line lengths) + (lines.length - 1)
 */

import { IndexOutOfRangeError, InvalidUserInputError } from './errors.js'
import { ROOT_ID, type NodeStore } from './node-store.js'
import type { HierarchyNode, NodeId, TreeSnapshot } from './types.js'

const INDENT = '    '
const GLYPH_COLLAPSED = '▶ '
const GLYPH_EXPANDED = '▼ '
const GLYPH_NONE = '  '

export function renderLine(node: HierarchyNode): string {
  let glyph = GLYPH_NONE
  if (node.kind === 'container' && node.hasChildren) {
    glyph = node.isExpanded ? GLYPH_EXPANDED : GLYPH_COLLAPSED
  }
  return INDENT.repeat(node.depth) + glyph + node.name
}

export class TreeText {
  private lines: string[] = []
  private lineIndex: NodeId[] = []
  private length = 0
  private cachedText: string | null = null

  constructor(readonly store: NodeStore) {}

  initialize(): void {
    const root = this.store.get(ROOT_ID)
    const line = renderLine(root)
    this.lines = [line]
    this.lineIndex = [root.id]
    this.length = line.length
    this.cachedText = null
  }

  /**
   * Splices the node's visible subtree in after `row`.
   * Returns the number of inserted rows; 0 when there was nothing to do.
   * Children that were expanded before a collapse come back expanded.
   */
  expandNode(node: HierarchyNode, row: number): number {
    this.requireRow(node, row)
    if (node.kind !== 'container' || !node.hasChildren || node.isExpanded) {
      return 0
    }

    // Throws before anything is touched if the reader fails
    this.store.expand(node.id)

    const ids: NodeId[] = []
    this.collectVisible(node, ids)
    const inserted = ids.map((id) => renderLine(this.store.get(id)))

    node.isExpanded = true
    this.replaceLine(row, renderLine(node))

    this.lines.splice(row + 1, 0, ...inserted)
    this.lineIndex.splice(row + 1, 0, ...ids)
    this.length += charCount(inserted)
    this.cachedText = null
    return inserted.length
  }

  /**
   * Removes every row below `row` that is deeper than the node.
   * Children stay cached on the node. Returns the number of removed rows.
   */
  collapseNode(node: HierarchyNode, row: number): number {
    this.requireRow(node, row)
    if (!node.isExpanded) {
      return 0
    }

    let end = row + 1
    while (end < this.lineIndex.length && this.depthAt(end) > node.depth) {
      end++
    }

    const removed = this.lines.splice(row + 1, end - row - 1)
    this.lineIndex.splice(row + 1, end - row - 1)
    this.length -= charCount(removed)

    node.isExpanded = false
    this.replaceLine(row, renderLine(node))
    this.cachedText = null
    return removed.length
  }

  toggleNode(row: number): number {
    const node = this.nodeAtRow(row)
    return node.isExpanded ? this.collapseNode(node, row) : this.expandNode(node, row)
  }

  /**
   * Expands every container on the way to `path` and returns the row
   * the target ends up on.
   */
  expandPath(path: string): number {
    const segments = path.split('/').filter((segment) => segment.length > 0)
    let row = 0
    let node = this.nodeAtRow(row)

    for (const segment of segments) {
      if (node.kind !== 'container') {
        throw new InvalidUserInputError(`${node.path} is not a Group`)
      }
      this.expandNode(node, row)
      const match = (node.children ?? [])
        .map((id) => this.store.get(id))
        .find((child) => child.name === segment)
      if (!match) {
        throw new InvalidUserInputError(`No such node: ${path}`)
      }
      node = match
      row = this.rowOfNode(match.id)
    }
    return row
  }

  nodeAtRow(row: number): HierarchyNode {
    const id = this.lineIndex[row]
    if (!Number.isInteger(row) || row < 0 || id === undefined) {
      throw new IndexOutOfRangeError(row, this.lineIndex.length)
    }
    return this.store.get(id)
  }

  /** -1 when the node is hidden under a collapsed ancestor */
  rowOfNode(id: NodeId): number {
    return this.lineIndex.indexOf(id)
  }

  rowCount(): number {
    return this.lines.length
  }

  lineLength(row: number): number {
    const line = this.lines[row]
    if (line === undefined) {
      throw new IndexOutOfRangeError(row, this.lines.length)
    }
    return line.length
  }

  totalLength(): number {
    return this.length
  }

  text(): string {
    if (this.cachedText === null) {
      this.cachedText = this.lines.join('\n')
    }
    return this.cachedText
  }

  snapshot(): TreeSnapshot {
    return { lines: this.lines.slice(), length: this.length }
  }

  nodeIds(): readonly NodeId[] {
    return this.lineIndex
  }

  private depthAt(row: number): number {
    return this.nodeAtRow(row).depth
  }

  private collectVisible(node: HierarchyNode, out: NodeId[]): void {
    for (const childId of node.children ?? []) {
      out.push(childId)
      const child = this.store.get(childId)
      if (child.isExpanded) {
        this.collectVisible(child, out)
      }
    }
  }

  private replaceLine(row: number, line: string): void {
    this.length += line.length - this.lineLength(row)
    this.lines[row] = line
  }

  private requireRow(node: HierarchyNode, row: number): void {
    if (this.nodeAtRow(row).id !== node.id) {
      throw new IndexOutOfRangeError(row, this.lineIndex.length)
    }
  }
}

/** Characters added or removed by splicing `lines` into a non-empty buffer */
function charCount(lines: readonly string[]): number {
  let total = 0
  for (const line of lines) {
    total += line.length + 1
  }
  return total
}

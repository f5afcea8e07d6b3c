/**
 * Keeps the display surface's absolute cursor offset and the tree's rows
 * in agreement, and watches the cursor from a background task so the side
 * panes follow it.
 */

import { formatError, IndexOutOfRangeError, ReadError } from './errors.js'
import type { TreeText } from './tree-text.js'
import type { DisplaySurface } from './types.js'
import { isAbortError, sleepWithAbort } from '../utils/sleep.js'
import { createDebugLogger } from '../utils/debug.js'

const log = createDebugLogger('cursor')
const pollLog = log.child('poll')

export interface CursorSyncOptions {
  pollIntervalMs: number
}

export class CursorSync {
  private lastRow: number | null = null

  constructor(
    private readonly tree: TreeText,
    private readonly surface: DisplaySurface,
    private readonly options: CursorSyncOptions
  ) {}

  /** rowCount() when the offset lies past the end of the text */
  rowOf(offset: number): number {
    const rows = this.tree.rowCount()
    let end = 0
    for (let row = 0; row < rows; row++) {
      end += this.tree.lineLength(row) + 1
      if (end > offset) return row
    }
    return rows
  }

  offsetOfRowStart(row: number): number {
    const last = Math.min(Math.max(0, row), this.tree.rowCount())
    let offset = 0
    for (let r = 0; r < last; r++) {
      offset += this.tree.lineLength(r) + 1
    }
    return this.clampOffset(offset)
  }

  clampOffset(offset: number): number {
    return Math.min(Math.max(0, offset), this.tree.totalLength())
  }

  currentRow(): number {
    return this.rowOf(this.surface.getCursorOffset())
  }

  /** Start of the last row, never negative */
  lastRowStart(): number {
    const rows = this.tree.rowCount()
    if (rows === 0) return 0
    return Math.max(0, this.tree.totalLength() - this.tree.lineLength(rows - 1))
  }

  /** Pushes the current tree text with the cursor at `targetOffset`, clamped */
  reposition(targetOffset: number): number {
    const offset = this.clampOffset(targetOffset)
    this.surface.setDocument(this.tree.snapshot(), offset)
    this.surface.invalidate()
    return offset
  }

  moveToRow(row: number): number {
    const rows = this.tree.rowCount()
    const target = Math.min(Math.max(0, row), rows - 1)
    return this.reposition(this.offsetOfRowStart(target))
  }

  /** Moves by whole rows, keeping the column where the new line allows it */
  moveRows(delta: number): number {
    const rows = this.tree.rowCount()
    const offset = this.surface.getCursorOffset()
    const row = Math.min(this.rowOf(offset), rows - 1)
    const column = Math.max(0, offset - this.offsetOfRowStart(row))
    const target = Math.min(Math.max(0, row + delta), rows - 1)
    const start = this.offsetOfRowStart(target)
    return this.reposition(start + Math.min(column, this.tree.lineLength(target)))
  }

  /** Makes the next refresh() update the side panes even if the row is unchanged */
  forgetRow(): void {
    this.lastRow = null
  }

  /**
   * One poll step. Returns true when the row had changed and the panes
   * were rewritten.
   */
  refresh(): boolean {
    const row = this.currentRow()
    if (row === this.lastRow) {
      return false
    }
    this.lastRow = row

    try {
      const node = this.tree.nodeAtRow(row)
      const store = this.tree.store
      this.surface.setPane('metadata', store.metadataText(node.id))
      this.surface.setPane('attributes', store.attributeText(node.id))
    } catch (error) {
      if (error instanceof IndexOutOfRangeError) {
        log.debug('cursor fell off the end, clamping', { row, rows: error.rowCount })
        this.reposition(this.lastRowStart())
        this.surface.setPane('metadata', '')
        this.surface.setPane('attributes', '')
      } else if (error instanceof ReadError) {
        this.surface.setPane('metadata', formatError(error))
        this.surface.setPane('attributes', '')
      } else {
        throw error
      }
    }

    this.surface.invalidate()
    return true
  }

  /**
   * Watches the cursor until `signal` aborts, sleeping between checks.
   */
  async pollLoop(signal: AbortSignal): Promise<void> {
    pollLog.debug('started', { intervalMs: this.options.pollIntervalMs })
    while (!signal.aborted) {
      try {
        this.refresh()
      } catch (error) {
        pollLog.error('step failed', error)
        this.surface.print(formatError(error))
      }
      try {
        await sleepWithAbort(this.options.pollIntervalMs, signal)
      } catch (error) {
        if (isAbortError(error)) break
        throw error
      }
    }
    pollLog.debug('stopped')
  }
}

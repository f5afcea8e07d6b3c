/**
 * ExplorerSession
 * The one application context: owns the reader, the node arena, the tree
 * text, the cursor, the modes, the plotters and the UI store.
 */

import { CursorSync } from '../core/cursor-sync.js'
import { formatError } from '../core/errors.js'
import { ModeController } from '../core/mode-controller.js'
import { NodeStore } from '../core/node-store.js'
import { TreeText } from '../core/tree-text.js'
import type { HierarchyNode, HierarchyReader } from '../core/types.js'
import { DensityPlotter } from '../plotting/density.js'
import { HistogramPlotter } from '../plotting/histogram.js'
import type { CanopyConfig } from '../cli/config.js'
import { createDebugLogger } from '../utils/debug.js'
import { createBindings } from './bindings/index.js'
import { createUiStore, type UiStore } from './state.js'
import { StoreSurface } from './surface.js'

const log = createDebugLogger('session')

export interface ExplorerSessionOptions {
  reader: HierarchyReader
  fileName: string
  config: CanopyConfig
  version?: string
}

export interface CurrentNode {
  node: HierarchyNode
  row: number
}

export class ExplorerSession {
  readonly reader: HierarchyReader
  readonly fileName: string
  readonly config: CanopyConfig
  readonly ui: UiStore
  readonly surface: StoreSurface
  readonly nodes: NodeStore
  readonly tree: TreeText
  readonly cursor: CursorSync
  readonly modes: ModeController
  readonly histogram: HistogramPlotter
  readonly density: DensityPlotter

  private pollAbort: AbortController | null = null
  private pollTask: Promise<void> | null = null

  constructor(options: ExplorerSessionOptions) {
    this.reader = options.reader
    this.fileName = options.fileName
    this.config = options.config

    this.histogram = new HistogramPlotter({ bins: options.config.histogramBins })
    this.density = new DensityPlotter({
      width: options.config.plotWidth,
      height: options.config.plotHeight,
    })

    const welcome = options.version
      ? `Welcome to canopy! (v${options.version})`
      : 'Welcome to canopy!'
    this.ui = createUiStore({
      message: welcome,
      plotText: this.density.defaultText,
      histogramText: this.histogram.defaultText,
    })
    this.surface = new StoreSurface(this.ui)

    this.nodes = new NodeStore(options.reader, options.fileName, {
      maxValueElements: options.config.maxValueElements,
      maxPlotElements: options.config.maxPlotElements,
    })
    this.tree = new TreeText(this.nodes)
    this.cursor = new CursorSync(this.tree, this.surface, {
      pollIntervalMs: options.config.pollIntervalMs,
    })
    this.modes = new ModeController(this.surface)
    this.modes.setBindings(createBindings(this))
    this.modes.onChange((mode) => this.ui.getState().setMode(mode, this.modes.hints()))

    this.tree.initialize()
    this.cursor.reposition(0)
    this.ui.getState().setMode(this.modes.mode, this.modes.hints())
  }

  /**
   * Node under the cursor. A cursor past the end is pulled back onto the
   * last row first.
   */
  currentNode(): CurrentNode {
    let row = this.cursor.currentRow()
    if (row >= this.tree.rowCount()) {
      this.cursor.reposition(this.cursor.lastRowStart())
      row = this.tree.rowCount() - 1
    }
    return { node: this.tree.nodeAtRow(row), row }
  }

  print(message: string): void {
    this.surface.print(message)
  }

  /** Returns false when no binding in the current mode wanted the key */
  handleKey(key: string): boolean {
    return this.modes.dispatch(key)
  }

  setInput(text: string): void {
    this.ui.getState().setInput(text)
  }

  /** Starts the background cursor watcher */
  start(): void {
    if (this.pollTask) return
    const abort = new AbortController()
    this.pollAbort = abort
    this.pollTask = this.cursor.pollLoop(abort.signal).catch((error: unknown) => {
      log.error('poll loop crashed', error)
      this.print(formatError(error))
    })
  }

  async stop(): Promise<void> {
    this.pollAbort?.abort()
    await this.pollTask
    this.pollAbort = null
    this.pollTask = null
  }

  async close(): Promise<void> {
    await this.stop()
    this.reader.close()
  }
}

// Public API: the explorer core, readers and plotting, usable without the TUI

export * from './core/types.js'
export * from './core/errors.js'
export { NodeStore, ROOT_ID, childPath } from './core/node-store.js'
export { TreeText, renderLine } from './core/tree-text.js'
export { CursorSync, type CursorSyncOptions } from './core/cursor-sync.js'
export {
  ModeController,
  ESCAPE_KEY,
  ENTER_KEY,
  type Mode,
  type LeaderMode,
  type BindableMode,
  type Binding,
  type BindingTable,
  type InputCallback,
} from './core/mode-controller.js'
export { parseRange, parsePositiveInt, parseNodePath } from './core/input.js'

export { H5Reader, openH5File } from './reader/h5-reader.js'
export { MemoryReader, group, dataset } from './reader/memory-reader.js'

export { summarize, formatNumber, type Summary } from './plotting/stats.js'
export { HistogramPlotter, binValues } from './plotting/histogram.js'
export { DensityPlotter, DENSITY_RAMP, binPairs } from './plotting/density.js'

export { loadConfig, parseConfig, DEFAULT_CONFIG, type CanopyConfig } from './cli/config.js'
export { createDebugLogger, configureLogging } from './utils/debug.js'

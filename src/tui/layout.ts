// Pane heights for a given terminal size and UI state

export interface LayoutInput {
  rows: number
  hasPrompt: boolean
  showHotkeys: boolean
  valuesVisible: boolean
  plotVisible: boolean
  histogramVisible: boolean
  attributesExpanded: boolean
}

export interface PaneHeights {
  tree: number
  metadata: number
  attributes: number
  values: number
  plot: number
  histogram: number
}

export const METADATA_HEIGHT = 10
export const SIDE_PANE_HEIGHT = 10
const HOTKEYS_HEIGHT = 3
const MINI_BUFFER_HEIGHT = 3
const PROMPT_HEIGHT = 3
const MIN_PANE = 4

export function computeLayout(input: LayoutInput): PaneHeights {
  const bottom =
    MINI_BUFFER_HEIGHT +
    (input.showHotkeys ? HOTKEYS_HEIGHT : 0) +
    (input.hasPrompt ? PROMPT_HEIGHT : 0)
  const body = Math.max(input.rows - bottom, MIN_PANE * 2)

  const metadata = Math.min(METADATA_HEIGHT, Math.floor(body / 2))
  const tree = body - metadata

  if (input.attributesExpanded) {
    return { tree, metadata, attributes: body, values: 0, plot: 0, histogram: 0 }
  }

  const values = input.valuesVisible ? SIDE_PANE_HEIGHT : 0
  const plot = input.plotVisible ? SIDE_PANE_HEIGHT : 0
  const histogram = input.histogramVisible ? SIDE_PANE_HEIGHT : 0
  const attributes = Math.max(MIN_PANE, body - values - plot - histogram)
  return { tree, metadata, attributes, values, plot, histogram }
}

// Histogram mode

import { parsePositiveInt } from '../../core/input.js'
import type { Binding } from '../../core/mode-controller.js'
import type { ExplorerSession } from '../session.js'

function selectData(session: ExplorerSession): void {
  const { node } = session.currentNode()
  session.histogram.select(node.path, session.nodes.numbers(node.id))
  session.surface.setPane('histogram', session.histogram.describe())
}

function editBins(session: ExplorerSession): void {
  session.modes.requestInput(
    'Number of bins:',
    (text) => {
      session.histogram.setBins(parsePositiveInt(text, 'bin count'))
      session.surface.setPane('histogram', session.histogram.describe())
    },
    String(session.histogram.binCount)
  )
}

function toggleLogScale(session: ExplorerSession): void {
  const enabled = session.histogram.toggleLogScale()
  session.print(`Log scale ${enabled ? 'on' : 'off'}`)
  session.surface.setPane('histogram', session.histogram.describe())
}

export function drawHistogram(session: ExplorerSession): void {
  session.surface.setPane('histogram', session.histogram.render())
  session.modes.returnToNormal()
}

function resetHistogram(session: ExplorerSession): void {
  session.histogram.reset()
  session.surface.setPane('histogram', session.histogram.defaultText)
}

export function histogramBindings(session: ExplorerSession): Binding[] {
  return [
    { key: 'e', label: 'Select Data', run: () => selectData(session) },
    { key: 'b', label: 'Edit Bins', run: () => editBins(session) },
    { key: 'x', label: 'Toggle Log Scale', run: () => toggleLogScale(session) },
    { key: 'h', label: 'Show Histogram', run: () => drawHistogram(session) },
    { key: 'r', label: 'Reset', run: () => resetHistogram(session) },
  ]
}

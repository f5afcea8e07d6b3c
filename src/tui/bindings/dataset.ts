/**
 * Dataset mode: values and summary statistics of the dataset under the
 * cursor.
 */

import { parseRange } from '../../core/input.js'
import type { Binding } from '../../core/mode-controller.js'
import type { HierarchyNode, IndexRange } from '../../core/types.js'
import { formatNumber, summarize, type Summary } from '../../plotting/stats.js'
import type { ExplorerSession } from '../session.js'

function showValues(session: ExplorerSession, node: HierarchyNode, range?: IndexRange): void {
  const text = session.nodes.valueText(node.id, range)
  const title = range ? `Values: ${node.path} [${range.start}:${range.end}]` : `Values: ${node.path}`
  session.ui.getState().showValues(title, text)
}

export function showDefaultValues(session: ExplorerSession): void {
  const { node } = session.currentNode()
  showValues(session, node)
  session.modes.returnToNormal()
}

export function showValuesInRange(session: ExplorerSession): void {
  const { node } = session.currentNode()
  session.modes.requestInput('Enter index range (start-end):', (text) => {
    showValues(session, node, parseRange(text))
    session.modes.returnToNormal()
  })
}

function printStatistic(
  session: ExplorerSession,
  describe: (summary: Summary) => string
): void {
  const { node } = session.currentNode()
  const summary = summarize(session.nodes.numbers(node.id))
  session.print(`${node.path}: ${describe(summary)}`)
  session.modes.returnToNormal()
}

export function closeValues(session: ExplorerSession): void {
  session.ui.getState().hideValues()
  session.modes.returnToNormal()
}

export function datasetBindings(session: ExplorerSession): Binding[] {
  return [
    { key: 'v', label: 'Show Values', run: () => showDefaultValues(session) },
    { key: 'V', label: 'Show Values In Range', run: () => showValuesInRange(session) },
    {
      key: 'm',
      label: 'Min/Max',
      run: () =>
        printStatistic(session, (s) => `min=${formatNumber(s.min)}, max=${formatNumber(s.max)}`),
    },
    {
      key: 'M',
      label: 'Mean',
      run: () => printStatistic(session, (s) => `mean=${formatNumber(s.mean)}`),
    },
    {
      key: 's',
      label: 'Standard Deviation',
      run: () => printStatistic(session, (s) => `std=${formatNumber(s.std)}`),
    },
    { key: 'c', label: 'Close Value View', run: () => closeValues(session) },
  ]
}

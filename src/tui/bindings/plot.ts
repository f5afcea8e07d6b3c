// Plotting mode: density plot of one dataset against another

import type { Binding } from '../../core/mode-controller.js'
import type { ExplorerSession } from '../session.js'

function selectAxis(session: ExplorerSession, axis: 'x' | 'y'): void {
  const { node } = session.currentNode()
  const values = session.nodes.numbers(node.id)
  if (axis === 'x') session.density.setX(node.path, values)
  else session.density.setY(node.path, values)
  session.surface.setPane('plot', session.density.describe())
}

export function drawDensity(session: ExplorerSession): void {
  session.surface.setPane('plot', session.density.render())
  session.modes.returnToNormal()
}

export function resetDensity(session: ExplorerSession): void {
  session.density.reset()
  session.surface.setPane('plot', session.density.defaultText)
}

export function plotBindings(session: ExplorerSession): Binding[] {
  return [
    { key: 'x', label: 'Select x-axis', run: () => selectAxis(session, 'x') },
    { key: 'y', label: 'Select y-axis', run: () => selectAxis(session, 'y') },
    { key: 'p', label: 'Plot', run: () => drawDensity(session) },
    { key: 'r', label: 'Reset', run: () => resetDensity(session) },
  ]
}

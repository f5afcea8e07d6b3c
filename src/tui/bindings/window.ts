// Window mode: choose which pane receives the arrow keys

import type { Binding } from '../../core/mode-controller.js'
import type { PaneId } from '../../core/types.js'
import type { ExplorerSession } from '../session.js'

export function focusPane(session: ExplorerSession, pane: PaneId): void {
  const state = session.ui.getState()
  if (pane === 'values' && !state.valuesVisible) {
    session.print('No values are shown')
  } else {
    state.setFocused(pane)
  }
  session.modes.returnToNormal()
}

export function windowBindings(session: ExplorerSession): Binding[] {
  return [
    { key: 't', label: 'Focus on Tree', run: () => focusPane(session, 'tree') },
    { key: 'a', label: 'Focus on Attributes', run: () => focusPane(session, 'attributes') },
    { key: 'v', label: 'Focus on Values', run: () => focusPane(session, 'values') },
    { key: 'p', label: 'Focus on Plot', run: () => focusPane(session, 'plot') },
    { key: 'h', label: 'Focus on Histogram', run: () => focusPane(session, 'histogram') },
  ]
}

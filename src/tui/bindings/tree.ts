/**
 * Tree bindings, live in normal mode.
 */

import type { Binding } from '../../core/mode-controller.js'
import type { PaneId } from '../../core/types.js'
import type { ExplorerSession } from '../session.js'
import type { SidePane } from '../state.js'

const SIDE_PANES: readonly PaneId[] = ['metadata', 'attributes', 'values', 'plot', 'histogram']

function isSidePane(pane: PaneId): pane is SidePane {
  return SIDE_PANES.includes(pane)
}

/** Moves the tree cursor, or scrolls whichever side pane has focus */
export function moveOrScroll(session: ExplorerSession, delta: number): void {
  const { focused, scrollPane } = session.ui.getState()
  if (isSidePane(focused)) {
    scrollPane(focused, delta)
    return
  }
  session.cursor.moveRows(delta)
}

/**
 * Expands or collapses the group under the cursor, loading its children
 * the first time only.
 */
export function expandCollapseNode(session: ExplorerSession): void {
  const { node, row } = session.currentNode()

  if (node.kind === 'leaf') {
    session.print(`${node.path} is not a Group`)
    return
  }
  if (!node.hasChildren) {
    session.print(`${node.path} has no children`)
    return
  }

  const offset = session.surface.getCursorOffset()
  if (node.isExpanded) {
    session.tree.collapseNode(node, row)
  } else {
    session.tree.expandNode(node, row)
  }
  session.cursor.reposition(offset)
}

export function treeBindings(session: ExplorerSession): Binding[] {
  return [
    { key: 'return', label: 'Open Group', run: () => expandCollapseNode(session) },
    { key: 'up', label: 'Up', run: () => moveOrScroll(session, -1) },
    { key: 'down', label: 'Down', run: () => moveOrScroll(session, 1) },
    { key: '{', label: 'Move Up 10 Lines', run: () => moveOrScroll(session, -10) },
    { key: '}', label: 'Move Down 10 Lines', run: () => moveOrScroll(session, 10) },
  ]
}

// Jump mode: move the cursor across the tree in large steps

import { parseNodePath } from '../../core/input.js'
import type { Binding } from '../../core/mode-controller.js'
import type { ExplorerSession } from '../session.js'

export function jumpToTop(session: ExplorerSession): void {
  session.cursor.moveToRow(0)
}

export function jumpToBottom(session: ExplorerSession): void {
  session.cursor.moveToRow(session.tree.rowCount() - 1)
}

export function jumpToParent(session: ExplorerSession): void {
  const { node } = session.currentNode()
  const parent = session.nodes.parentOf(node.id)
  if (!parent) {
    session.print(`${node.path} is the root`)
    return
  }
  session.cursor.moveToRow(session.tree.rowOfNode(parent.id))
}

export function jumpToNextSibling(session: ExplorerSession): void {
  const { node } = session.currentNode()
  const siblings = session.nodes.parentOf(node.id)?.children ?? []
  const next = siblings[siblings.indexOf(node.id) + 1]
  if (next === undefined) {
    session.print(`${node.path} has no next sibling`)
    return
  }
  session.cursor.moveToRow(session.tree.rowOfNode(next))
}

/** Prompts for a path, opens every group on the way and lands on it */
export function jumpToPath(session: ExplorerSession): void {
  session.modes.requestInput('Jump to path:', (text) => {
    const row = session.tree.expandPath(parseNodePath(text))
    session.cursor.moveToRow(row)
    session.modes.returnToNormal()
  })
}

function thenNormal(session: ExplorerSession, action: (session: ExplorerSession) => void): () => void {
  return () => {
    action(session)
    session.modes.returnToNormal()
  }
}

export function jumpBindings(session: ExplorerSession): Binding[] {
  return [
    { key: 't', label: 'Jump to Top', run: thenNormal(session, jumpToTop) },
    { key: 'b', label: 'Jump to Bottom', run: thenNormal(session, jumpToBottom) },
    { key: 'p', label: 'Jump to Parent', run: thenNormal(session, jumpToParent) },
    { key: 'n', label: 'Jump to Next Sibling', run: thenNormal(session, jumpToNextSibling) },
    { key: 'K', label: 'Jump to Path', run: () => jumpToPath(session) },
  ]
}

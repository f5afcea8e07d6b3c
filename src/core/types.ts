// Core types shared by the tree model, the cursor and the mode controller

export type NodeKind = 'container' | 'leaf'

export type NodeId = number

export interface HierarchyNode {
  id: NodeId
  name: string
  path: string
  kind: NodeKind
  hasChildren: boolean
  depth: number
  parent: NodeId | null
  /** null until the first expansion */
  children: NodeId[] | null
  isExpanded: boolean
}

export interface ChildEntry {
  name: string
  kind: NodeKind
  hasChildren: boolean
}

export interface IndexRange {
  start: number
  end: number
}

/**
 * Read-only access to one hierarchical file.
 * Every method throws ReadError when the file cannot answer.
 */
export interface HierarchyReader {
  listChildren(path: string): ChildEntry[]
  getMetadata(path: string): string
  getAttributes(path: string): string
  /** Extent of the first axis; 0 for containers, 1 for scalars */
  getLength(path: string): number
  /** Elements in one first-axis element: 1 for 1-D datasets, scalars and containers */
  getRowSize(path: string): number
  /** Formatted elements for the half-open range, one per line */
  getValues(path: string, start: number, end: number): string
  getNumbers(path: string, start: number, end: number): number[]
  close(): void
}

export type PaneId =
  | 'tree'
  | 'metadata'
  | 'attributes'
  | 'values'
  | 'plot'
  | 'histogram'
  | 'miniBuffer'

export interface TreeSnapshot {
  lines: readonly string[]
  length: number
}

/**
 * What the core needs from whatever draws the panes.
 * Positions in the tree pane are absolute character offsets.
 */
export interface DisplaySurface {
  getCursorOffset(): number
  /** Replaces the tree document and cursor in one step */
  setDocument(snapshot: TreeSnapshot, cursorOffset: number): void
  setPane(pane: Exclude<PaneId, 'tree' | 'miniBuffer'>, text: string): void
  focus(pane: PaneId): void
  print(message: string): void
  showPrompt(prompt: string, initialText: string): void
  clearPrompt(): void
  /** Text currently typed into the input surface */
  readInput(): string
  invalidate(): void
}

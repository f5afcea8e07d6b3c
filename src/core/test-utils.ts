import { dataset, group, MemoryReader, type MemoryGroup } from '../reader/memory-reader.js'
import { NodeStore } from './node-store.js'
import { TreeText } from './tree-text.js'
import type { DisplaySurface, PaneId, TreeSnapshot } from './types.js'

type SidePane = Exclude<PaneId, 'tree' | 'miniBuffer'>

/** DisplaySurface that keeps everything it is told, for assertions */
export class RecordingSurface implements DisplaySurface {
  cursor = 0
  document: TreeSnapshot = { lines: [], length: 0 }
  panes: Partial<Record<SidePane, string>> = {}
  focused: PaneId = 'tree'
  messages: string[] = []
  prompt: string | null = null
  input = ''
  invalidations = 0

  get lastMessage(): string | undefined {
    return this.messages[this.messages.length - 1]
  }

  getCursorOffset(): number {
    return this.cursor
  }

  setDocument(snapshot: TreeSnapshot, cursorOffset: number): void {
    this.document = snapshot
    this.cursor = cursorOffset
  }

  setPane(pane: SidePane, text: string): void {
    this.panes[pane] = text
  }

  focus(pane: PaneId): void {
    this.focused = pane
  }

  print(message: string): void {
    this.messages.push(message)
  }

  showPrompt(prompt: string, initialText: string): void {
    this.prompt = prompt
    this.input = initialText
  }

  clearPrompt(): void {
    this.prompt = null
    this.input = ''
  }

  readInput(): string {
    return this.input
  }

  invalidate(): void {
    this.invalidations++
  }
}

/**
 * /
 * ├── grp_a
 * │   ├── x        [1, 2, 3, 4]
 * │   └── nested
 * │       └── deep [5]
 * ├── grp_b        (empty)
 * └── values       [10 .. 15], units=m
 */
export function sampleTree(): MemoryGroup {
  return group(
    {
      grp_a: group(
        {
          x: dataset([1, 2, 3, 4]),
          nested: group({ deep: dataset([5]) }),
        },
        { title: 'first group' }
      ),
      grp_b: group(),
      values: dataset([10, 11, 12, 13, 14, 15], { units: 'm' }),
    },
    { version: 2 }
  )
}

export interface TreeFixture {
  reader: MemoryReader
  store: NodeStore
  tree: TreeText
}

export function createTreeFixture(
  root: MemoryGroup = sampleTree(),
  limits = { maxValueElements: 1000, maxPlotElements: 1000 }
): TreeFixture {
  const reader = new MemoryReader(root)
  const store = new NodeStore(reader, 'sample.h5', limits)
  const tree = new TreeText(store)
  tree.initialize()
  return { reader, store, tree }
}

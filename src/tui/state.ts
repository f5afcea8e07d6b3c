/**
 * UI state shared by the key handlers, the poll task and the ink components.
 * Every writer replaces whole values; nothing edits pane text in place.
 */

import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Mode } from '../core/mode-controller.js'
import type { PaneId, TreeSnapshot } from '../core/types.js'

export type SidePane = 'metadata' | 'attributes' | 'values' | 'plot' | 'histogram'

export interface PromptState {
  text: string
  input: string
}

export interface UiState {
  document: TreeSnapshot
  cursor: number
  panes: Record<SidePane, string>
  scroll: Record<SidePane, number>
  valuesTitle: string
  valuesVisible: boolean
  attributesExpanded: boolean
  focused: PaneId
  message: string
  prompt: PromptState | null
  mode: Mode
  hints: string[]
  revision: number

  setDocument: (document: TreeSnapshot, cursor: number) => void
  setPane: (pane: SidePane, text: string) => void
  showValues: (title: string, text: string) => void
  hideValues: () => void
  scrollPane: (pane: SidePane, delta: number) => void
  setFocused: (pane: PaneId) => void
  setMessage: (message: string) => void
  setPrompt: (prompt: PromptState | null) => void
  setInput: (input: string) => void
  setMode: (mode: Mode, hints: string[]) => void
  toggleAttributes: () => void
  restoreLayout: () => void
  invalidate: () => void
}

export type UiStore = StoreApi<UiState>

const EMPTY_PANES: Record<SidePane, string> = {
  metadata: '',
  attributes: '',
  values: '',
  plot: '',
  histogram: '',
}

const ZERO_SCROLL: Record<SidePane, number> = {
  metadata: 0,
  attributes: 0,
  values: 0,
  plot: 0,
  histogram: 0,
}

export interface UiStoreInit {
  message?: string
  plotText?: string
  histogramText?: string
}

export function createUiStore(init: UiStoreInit = {}): UiStore {
  return createStore<UiState>()((set) => ({
    document: { lines: [], length: 0 },
    cursor: 0,
    panes: {
      ...EMPTY_PANES,
      plot: init.plotText ?? '',
      histogram: init.histogramText ?? '',
    },
    scroll: { ...ZERO_SCROLL },
    valuesTitle: 'Values',
    valuesVisible: false,
    attributesExpanded: false,
    focused: 'tree',
    message: init.message ?? '',
    prompt: null,
    mode: 'normal',
    hints: [],
    revision: 0,

    setDocument: (document, cursor) => set({ document, cursor }),
    setPane: (pane, text) =>
      set((state) => ({
        panes: { ...state.panes, [pane]: text },
        scroll: { ...state.scroll, [pane]: 0 },
      })),
    showValues: (title, text) =>
      set((state) => ({
        valuesTitle: title,
        valuesVisible: true,
        panes: { ...state.panes, values: text },
        scroll: { ...state.scroll, values: 0 },
      })),
    hideValues: () =>
      set((state) => ({
        valuesTitle: 'Values',
        valuesVisible: false,
        panes: { ...state.panes, values: '' },
        focused: state.focused === 'values' ? 'tree' : state.focused,
      })),
    scrollPane: (pane, delta) =>
      set((state) => {
        const lines = state.panes[pane].split('\n').length
        const next = Math.min(Math.max(0, state.scroll[pane] + delta), Math.max(0, lines - 1))
        return { scroll: { ...state.scroll, [pane]: next } }
      }),
    setFocused: (focused) => set({ focused }),
    setMessage: (message) => set({ message }),
    setPrompt: (prompt) => set({ prompt }),
    setInput: (input) =>
      set((state) => (state.prompt ? { prompt: { ...state.prompt, input } } : {})),
    setMode: (mode, hints) => set({ mode, hints }),
    toggleAttributes: () => set((state) => ({ attributesExpanded: !state.attributesExpanded })),
    restoreLayout: () =>
      set({ attributesExpanded: false, focused: 'tree' }),
    invalidate: () => set((state) => ({ revision: state.revision + 1 })),
  }))
}

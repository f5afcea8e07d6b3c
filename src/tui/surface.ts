// DisplaySurface implemented on the UI store

import type { DisplaySurface, PaneId, TreeSnapshot } from '../core/types.js'
import type { SidePane, UiStore } from './state.js'

export class StoreSurface implements DisplaySurface {
  constructor(private readonly store: UiStore) {}

  getCursorOffset(): number {
    return this.store.getState().cursor
  }

  setDocument(snapshot: TreeSnapshot, cursorOffset: number): void {
    this.store.getState().setDocument(snapshot, cursorOffset)
  }

  setPane(pane: SidePane, text: string): void {
    this.store.getState().setPane(pane, text)
  }

  focus(pane: PaneId): void {
    this.store.getState().setFocused(pane)
  }

  print(message: string): void {
    this.store.getState().setMessage(message)
  }

  showPrompt(prompt: string, initialText: string): void {
    this.store.getState().setPrompt({ text: prompt, input: initialText })
  }

  clearPrompt(): void {
    this.store.getState().setPrompt(null)
  }

  readInput(): string {
    return this.store.getState().prompt?.input ?? ''
  }

  invalidate(): void {
    this.store.getState().invalidate()
  }
}

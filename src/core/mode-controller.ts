/**
 * Modal key dispatch.
 *
 * A static table maps each mode to its bindings and one field holds the
 * active mode, so no two modes can be active together. Input capture is
 * the `awaitingInput` mode plus a stored continuation that fires once.
 */

import { formatError, InvalidUserInputError, UserInterrupt } from './errors.js'
import type { DisplaySurface } from './types.js'
import { createDebugLogger } from '../utils/debug.js'

const log = createDebugLogger('modes')

export type Mode =
  | 'normal'
  | 'jump'
  | 'dataset'
  | 'window'
  | 'plot'
  | 'histogram'
  | 'awaitingInput'

/** Modes reached through a leader key */
export type LeaderMode = Exclude<Mode, 'normal' | 'awaitingInput'>

export type BindableMode = Exclude<Mode, 'awaitingInput'>

export interface Binding {
  key: string
  label: string
  run: () => void
}

export type BindingTable = Record<BindableMode, Binding[]>

export type InputCallback = (text: string) => void

interface PendingInput {
  prompt: string
  resume: BindableMode
  callback: InputCallback
}

export const ESCAPE_KEY = 'escape'
export const ENTER_KEY = 'return'

function emptyTable(): BindingTable {
  return { normal: [], jump: [], dataset: [], window: [], plot: [], histogram: [] }
}

export class ModeController {
  private current: Mode = 'normal'
  private pending: PendingInput | null = null
  private table: BindingTable = emptyTable()
  private listeners = new Set<(mode: Mode) => void>()

  constructor(private readonly surface: DisplaySurface) {}

  get mode(): Mode {
    return this.current
  }

  isActive(mode: Mode): boolean {
    return this.current === mode
  }

  get pendingPrompt(): string | null {
    return this.pending?.prompt ?? null
  }

  setBindings(table: BindingTable): void {
    this.table = table
  }

  onChange(listener: (mode: Mode) => void): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  enter(mode: LeaderMode): void {
    this.setMode(mode)
  }

  returnToNormal(): void {
    this.setMode('normal')
  }

  /** Backs out of whatever is active: pending input first, then the sub-mode */
  escape(): boolean {
    if (this.current === 'awaitingInput') {
      this.cancelInput()
      return true
    }
    if (this.current === 'normal') return false
    this.returnToNormal()
    return true
  }

  /** Labels of the bindings live in the current mode */
  hints(): string[] {
    if (this.current === 'awaitingInput') return []
    const labels = this.table[this.current].map((binding) => `${binding.key} → ${binding.label}`)
    if (this.current !== 'normal') labels.push('Esc → Back')
    return labels
  }

  /**
   * Routes one key. Returns false when nothing in the current mode wants
   * it, which includes every key typed while input is awaited.
   */
  dispatch(key: string): boolean {
    const mode = this.current
    if (mode === 'awaitingInput') {
      if (key === ESCAPE_KEY) return this.escape()
      if (key === ENTER_KEY) {
        this.submitInput(this.surface.readInput())
        return true
      }
      return false
    }

    const binding = this.table[mode].find((candidate) => candidate.key === key)
    if (binding) {
      log.debug('dispatch', { mode, key })
      this.guard(binding.run)
      return true
    }
    if (key === ESCAPE_KEY) return this.escape()
    return false
  }

  /**
   * Suspends key routing and asks the user for a line of text. The
   * callback runs once, on submit, and validates the text itself.
   */
  requestInput(prompt: string, callback: InputCallback, initialText = ''): void {
    if (this.pending || this.current === 'awaitingInput') {
      throw new InvalidUserInputError('Another input is already pending')
    }
    this.pending = { prompt, resume: this.current, callback }
    this.setMode('awaitingInput')
    this.surface.showPrompt(prompt, initialText)
    this.surface.focus('miniBuffer')
    this.surface.invalidate()
  }

  /** Returns true when the callback accepted the text */
  submitInput(text: string): boolean {
    const pending = this.pending
    if (!pending) return false
    this.pending = null

    this.surface.clearPrompt()
    this.surface.focus('tree')
    this.setMode(pending.resume)

    const accepted = this.guard(() => pending.callback(text))
    if (!accepted) {
      this.returnToNormal()
    }
    this.surface.invalidate()
    return accepted
  }

  cancelInput(): void {
    if (!this.pending) return
    this.pending = null
    this.surface.clearPrompt()
    this.surface.focus('tree')
    this.returnToNormal()
    this.surface.print('Input cancelled')
  }

  /**
   * Runs a handler so that its failure becomes a one-line message.
   * Only a user interrupt gets through.
   */
  guard(handler: () => void): boolean {
    try {
      handler()
      return true
    } catch (error) {
      if (error instanceof UserInterrupt) throw error
      log.debug('handler failed', error)
      this.surface.print(formatError(error))
      return false
    }
  }

  private setMode(mode: Mode): void {
    if (mode === this.current) return
    log.state('mode', this.current, mode)
    this.current = mode
    for (const listener of this.listeners) listener(mode)
  }
}

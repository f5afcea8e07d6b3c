import { describe, test, expect, vi } from 'vitest'
import { InvalidUserInputError, UserInterrupt } from './errors.js'
import { ModeController, type BindingTable, type Mode } from './mode-controller.js'
import { RecordingSurface } from './test-utils.js'

function setup() {
  const surface = new RecordingSurface()
  const modes = new ModeController(surface)
  const calls: string[] = []
  const table: BindingTable = {
    normal: [
      { key: 'x', label: 'Run X', run: () => calls.push('normal:x') },
      { key: 'd', label: 'Dataset Mode', run: () => modes.enter('dataset') },
      {
        key: 'q',
        label: 'Exit',
        run: () => {
          throw new UserInterrupt()
        },
      },
      {
        key: 'f',
        label: 'Fail',
        run: () => {
          throw new Error('handler broke')
        },
      },
    ],
    jump: [{ key: 't', label: 'Jump to Top', run: () => calls.push('jump:t') }],
    dataset: [
      { key: 'x', label: 'Dataset X', run: () => calls.push('dataset:x') },
      {
        key: 'V',
        label: 'Show Values In Range',
        run: () =>
          modes.requestInput('Enter index range (start-end):', (text) => {
            calls.push(`range:${text}`)
            modes.returnToNormal()
          }),
      },
    ],
    window: [],
    plot: [],
    histogram: [],
  }
  modes.setBindings(table)
  return { surface, modes, calls }
}

describe('ModeController', () => {
  test('starts in normal mode', () => {
    const { modes } = setup()
    expect(modes.mode).toBe('normal')
    expect(modes.isActive('normal')).toBe(true)
    expect(modes.pendingPrompt).toBeNull()
  })

  test('only the active mode receives keys', () => {
    const { modes, calls } = setup()
    expect(modes.dispatch('x')).toBe(true)
    modes.enter('jump')
    expect(modes.isActive('jump')).toBe(true)
    expect(modes.isActive('normal')).toBe(false)
    expect(modes.dispatch('x')).toBe(false)
    expect(modes.dispatch('t')).toBe(true)
    expect(calls).toEqual(['normal:x', 'jump:t'])
  })

  test('the same key does different things per mode', () => {
    const { modes, calls } = setup()
    modes.dispatch('x')
    modes.dispatch('d')
    modes.dispatch('x')
    expect(calls).toEqual(['normal:x', 'dataset:x'])
  })

  test('escape leaves a sub-mode and is unbound in normal mode', () => {
    const { modes } = setup()
    modes.enter('plot')
    expect(modes.dispatch('escape')).toBe(true)
    expect(modes.mode).toBe('normal')
    expect(modes.dispatch('escape')).toBe(false)
  })

  test('escape backs out of pending input and sub-modes alike', () => {
    const { modes, surface } = setup()
    expect(modes.escape()).toBe(false)
    modes.enter('histogram')
    modes.requestInput('Number of bins:', vi.fn())
    expect(modes.escape()).toBe(true)
    expect(modes.pendingPrompt).toBeNull()
    expect(modes.mode).toBe('normal')
    expect(surface.lastMessage).toBe('Input cancelled')
  })

  test('hints list the bindings of the active mode', () => {
    const { modes } = setup()
    modes.enter('jump')
    expect(modes.hints()).toEqual(['t → Jump to Top', 'Esc → Back'])
    modes.returnToNormal()
    expect(modes.hints()).toEqual(['x → Run X', 'd → Dataset Mode', 'q → Exit', 'f → Fail'])
  })

  test('listeners hear every mode change until they unsubscribe', () => {
    const { modes } = setup()
    const seen: Mode[] = []
    const off = modes.onChange((mode) => seen.push(mode))
    modes.enter('window')
    modes.enter('window')
    modes.returnToNormal()
    off()
    modes.enter('jump')
    expect(seen).toEqual(['window', 'normal'])
  })

  describe('handler failures', () => {
    test('are printed and leave the controller usable', () => {
      const { modes, surface, calls } = setup()
      expect(modes.dispatch('f')).toBe(true)
      expect(surface.lastMessage).toBe('ERROR: handler broke')
      modes.dispatch('x')
      expect(calls).toEqual(['normal:x'])
    })

    test('a user interrupt gets through', () => {
      const { modes } = setup()
      expect(() => modes.dispatch('q')).toThrow(UserInterrupt)
    })
  })

  describe('requestInput', () => {
    test('captures the keyboard until the text is submitted', () => {
      const { modes, surface, calls } = setup()
      const callback = vi.fn()
      modes.enter('dataset')
      modes.requestInput('Number of bins:', callback, '50')

      expect(modes.mode).toBe('awaitingInput')
      expect(modes.pendingPrompt).toBe('Number of bins:')
      expect(modes.hints()).toEqual([])
      expect(surface.prompt).toBe('Number of bins:')
      expect(surface.input).toBe('50')
      expect(surface.focused).toBe('miniBuffer')

      expect(modes.dispatch('x')).toBe(false)
      expect(calls).toEqual([])

      surface.input = '12'
      expect(modes.dispatch('return')).toBe(true)
      expect(callback).toHaveBeenCalledTimes(1)
      expect(callback).toHaveBeenCalledWith('12')
      expect(modes.mode).toBe('dataset')
      expect(surface.prompt).toBeNull()
      expect(surface.focused).toBe('tree')
    })

    test('fires the callback only once', () => {
      const { modes } = setup()
      const callback = vi.fn()
      modes.requestInput('Jump to path:', callback)
      expect(modes.submitInput('/a')).toBe(true)
      expect(modes.submitInput('/b')).toBe(false)
      modes.dispatch('return')
      expect(callback).toHaveBeenCalledTimes(1)
    })

    test('escape cancels without calling back', () => {
      const { modes, surface } = setup()
      const callback = vi.fn()
      modes.enter('jump')
      modes.requestInput('Jump to path:', callback)

      expect(modes.dispatch('escape')).toBe(true)
      expect(callback).not.toHaveBeenCalled()
      expect(modes.mode).toBe('normal')
      expect(surface.lastMessage).toBe('Input cancelled')
      expect(surface.prompt).toBeNull()
    })

    test('a second request while one is pending is rejected', () => {
      const { modes } = setup()
      modes.requestInput('first', vi.fn())
      expect(() => modes.requestInput('second', vi.fn())).toThrow(InvalidUserInputError)
      expect(modes.pendingPrompt).toBe('first')
    })

    test('a failing callback is reported and returns to normal mode', () => {
      const { modes, surface } = setup()
      modes.enter('histogram')
      modes.requestInput('Number of bins:', () => {
        throw new InvalidUserInputError('Invalid bin count "x", expected a positive integer')
      })
      expect(modes.submitInput('x')).toBe(false)
      expect(surface.lastMessage).toBe('ERROR: Invalid bin count "x", expected a positive integer')
      expect(modes.mode).toBe('normal')
    })

    test('a range typed in dataset mode reaches its handler', () => {
      const { modes, surface, calls } = setup()
      modes.dispatch('d')
      modes.dispatch('V')
      expect(surface.prompt).toBe('Enter index range (start-end):')

      surface.input = '2-5'
      modes.dispatch('return')
      expect(calls).toEqual(['range:2-5'])
      expect(modes.mode).toBe('normal')
    })
  })
})

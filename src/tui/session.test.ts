import { describe, test, expect, vi } from 'vitest'
import { UserInterrupt } from '../core/errors.js'
import { sampleTree } from '../core/test-utils.js'
import { DEFAULT_CONFIG } from '../cli/config.js'
import { MemoryReader } from '../reader/memory-reader.js'
import { ExplorerSession } from './session.js'

function setup() {
  const reader = new MemoryReader(sampleTree())
  const session = new ExplorerSession({ reader, fileName: 'sample.h5', config: DEFAULT_CONFIG })
  const press = (...keys: string[]) => {
    for (const key of keys) session.handleKey(key)
  }
  const state = () => session.ui.getState()
  return { reader, session, press, state }
}

/** Root expanded; rows start at 0, 12, 24 and 36 */
function expanded() {
  const context = setup()
  context.press('return')
  return context
}

describe('ExplorerSession', () => {
  test('opens on the collapsed root in normal mode', () => {
    const { state } = setup()
    expect(state().document).toEqual({ lines: ['▶ sample.h5'], length: 11 })
    expect(state().cursor).toBe(0)
    expect(state().message).toBe('Welcome to canopy!')
    expect(state().mode).toBe('normal')
    expect(state().hints).toContain('d → Dataset Mode')
  })

  test('shows the version in the welcome message', () => {
    const session = new ExplorerSession({
      reader: new MemoryReader(sampleTree()),
      fileName: 'sample.h5',
      config: DEFAULT_CONFIG,
      version: '1.2.3',
    })
    expect(session.ui.getState().message).toBe('Welcome to canopy! (v1.2.3)')
  })

  describe('tree navigation', () => {
    test('enter expands and collapses the group under the cursor', () => {
      const { press, state } = setup()
      press('return')
      expect(state().document.lines).toEqual([
        '▼ sample.h5',
        '    ▶ grp_a',
        '      grp_b',
        '      values',
      ])
      expect(state().cursor).toBe(0)

      press('return')
      expect(state().document.lines).toEqual(['▶ sample.h5'])
    })

    test('arrow keys move by rows and stop at the last one', () => {
      const { press, state } = expanded()
      press('down', 'down')
      expect(state().cursor).toBe(24)
      press('}')
      expect(state().cursor).toBe(36)
      press('up')
      expect(state().cursor).toBe(24)
      press('{')
      expect(state().cursor).toBe(0)
    })

    test('enter on datasets and empty groups explains itself', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('return')
      expect(state().message).toBe('/values is not a Group')

      session.cursor.moveToRow(2)
      press('return')
      expect(state().message).toBe('/grp_b has no children')
      expect(state().document.lines).toHaveLength(4)
    })

    test('a cursor past the end is pulled back onto the last row', () => {
      const { session, state } = expanded()
      session.surface.setDocument(session.tree.snapshot(), 999)
      expect(session.currentNode()).toMatchObject({ row: 3, node: { path: '/values' } })
      expect(state().cursor).toBe(36)
    })
  })

  describe('modes', () => {
    test('leader keys switch the hints and escape goes back', () => {
      const { press, state } = setup()
      press('d')
      expect(state().mode).toBe('dataset')
      expect(state().hints).toContain('v → Show Values')
      expect(state().hints).toContain('Esc → Back')
      press('escape')
      expect(state().mode).toBe('normal')
    })

    test('q interrupts the session', () => {
      const { session } = setup()
      expect(() => session.handleKey('q')).toThrow(UserInterrupt)
    })

    test('a and r toggle the attribute layout', () => {
      const { press, state } = setup()
      press('a')
      expect(state().attributesExpanded).toBe(true)
      press('r')
      expect(state().attributesExpanded).toBe(false)
    })
  })

  describe('dataset mode', () => {
    test('v shows every value of the dataset', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('d', 'v')
      expect(state().valuesVisible).toBe(true)
      expect(state().valuesTitle).toBe('Values: /values')
      expect(state().panes.values).toBe('10\n11\n12\n13\n14\n15')
      expect(state().mode).toBe('normal')
    })

    test('V asks for a range and shows only that slice', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('d', 'V')
      expect(state().mode).toBe('awaitingInput')
      expect(state().prompt).toEqual({ text: 'Enter index range (start-end):', input: '' })

      session.setInput('2-5')
      press('return')
      expect(state().valuesTitle).toBe('Values: /values [2:5]')
      expect(state().panes.values).toBe('12\n13\n14')
      expect(state().prompt).toBeNull()
      expect(state().mode).toBe('normal')
    })

    test('a malformed range is reported and nothing is shown', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('d', 'V')
      session.setInput('oops')
      press('return')
      expect(state().message).toBe('ERROR: Invalid range "oops", expected start-end')
      expect(state().valuesVisible).toBe(false)
      expect(state().mode).toBe('normal')
    })

    test('statistics are printed to the mini buffer', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('d', 'm')
      expect(state().message).toBe('/values: min=10, max=15')
      press('d', 'M')
      expect(state().message).toBe('/values: mean=12.5')
      press('d', 's')
      expect(state().message).toBe('/values: std=1.708')
    })

    test('groups have no values', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(1)
      press('d', 'v')
      expect(state().message).toBe('ERROR: /grp_a is not a dataset')
      expect(state().valuesVisible).toBe(false)
    })

    test('c closes the values pane', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('d', 'v', 'd', 'c')
      expect(state().valuesVisible).toBe(false)
      expect(state().panes.values).toBe('')
    })
  })

  describe('jump mode', () => {
    test('top and bottom', () => {
      const { press, state } = expanded()
      press('j', 'b')
      expect(state().cursor).toBe(36)
      expect(state().mode).toBe('normal')
      press('j', 't')
      expect(state().cursor).toBe(0)
    })

    test('parent and next sibling', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(1)
      press('j', 'n')
      expect(state().cursor).toBe(24)
      press('j', 'p')
      expect(state().cursor).toBe(0)
      press('j', 'p')
      expect(state().message).toBe('/ is the root')

      session.cursor.moveToRow(3)
      press('j', 'n')
      expect(state().message).toBe('/values has no next sibling')
    })

    test('K opens the groups on a typed path and lands on it', () => {
      const { session, press, state } = setup()
      press('j', 'K')
      session.setInput('grp_a/nested/deep')
      press('return')

      expect(state().document.lines[4]).toBe(`${' '.repeat(14)}deep`)
      expect(state().cursor).toBe(53)
      expect(session.currentNode().node.path).toBe('/grp_a/nested/deep')
      expect(state().mode).toBe('normal')
    })

    test('K on a missing path reports it', () => {
      const { session, press, state } = setup()
      press('j', 'K')
      session.setInput('/nowhere')
      press('return')
      expect(state().message).toBe('ERROR: No such node: /nowhere')
    })

    test('escape while typing cancels the jump', () => {
      const { session, press, state } = setup()
      press('j', 'K')
      session.setInput('/grp_a')
      press('escape')
      expect(state().message).toBe('Input cancelled')
      expect(state().document.lines).toEqual(['▶ sample.h5'])
      expect(state().mode).toBe('normal')
    })
  })

  describe('window mode', () => {
    test('arrow keys go to the focused pane instead of the tree', () => {
      const { press, state } = expanded()
      press('w', 'a')
      expect(state().focused).toBe('attributes')
      press('down')
      expect(state().cursor).toBe(0)

      press('w', 't')
      expect(state().focused).toBe('tree')
      press('down')
      expect(state().cursor).toBe(12)
    })

    test('values can only be focused while shown', () => {
      const { press, state } = setup()
      press('w', 'v')
      expect(state().message).toBe('No values are shown')
      expect(state().focused).toBe('tree')
    })
  })

  describe('histogram mode', () => {
    test('select, rebin and draw', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('H', 'e')
      expect(state().panes.histogram).toBe('/values (6 values, 50 bins)')

      press('b')
      expect(state().prompt).toEqual({ text: 'Number of bins:', input: '50' })
      session.setInput('3')
      press('return')
      expect(state().mode).toBe('histogram')
      expect(state().panes.histogram).toBe('/values (6 values, 3 bins)')

      press('h')
      expect(state().mode).toBe('normal')
      const bar = '█'.repeat(40)
      expect(state().panes.histogram.split('\n')).toEqual([
        '/values (6 values, 3 bins)',
        `   10 .. 11.67 | ${bar} 2`,
        `11.67 .. 13.33 | ${bar} 2`,
        `   13.33 .. 15 | ${bar} 2`,
      ])
    })

    test('x toggles the log scale', () => {
      const { press, state } = setup()
      press('H', 'x')
      expect(state().message).toBe('Log scale on')
      press('x')
      expect(state().message).toBe('Log scale off')
    })

    test('drawing without a selection is an error', () => {
      const { press, state } = setup()
      press('H', 'h')
      expect(state().message).toBe('ERROR: No dataset selected for the histogram')
    })
  })

  describe('plot mode', () => {
    test('pick both axes and draw the density plot', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('p', 'x')
      expect(state().panes.plot).toBe('x: /values\ny: <unset>')
      press('y')
      expect(state().panes.plot).toBe('x: /values\ny: /values')

      press('p')
      expect(state().mode).toBe('normal')
      const lines = state().panes.plot.split('\n')
      expect(lines).toHaveLength(DEFAULT_CONFIG.plotHeight + 3)
      expect(lines[DEFAULT_CONFIG.plotHeight]).toBe(`+${'-'.repeat(DEFAULT_CONFIG.plotWidth)}`)
      expect(lines[lines.length - 1]).toBe('y: /values [10, 15]')
    })

    test('r resets both axes', () => {
      const { session, press, state } = expanded()
      session.cursor.moveToRow(3)
      press('p', 'x', 'r')
      expect(session.density.size).toBe(0)
      expect(state().panes.plot).toBe(session.density.defaultText)
    })
  })

  test('the watcher fills the side panes until the session closes', async () => {
    const { session, reader, state } = expanded()
    session.start()
    await vi.waitFor(() => {
      expect(state().panes.metadata).toBe('Group: /\nMembers: 3')
    })
    session.cursor.moveToRow(3)
    await vi.waitFor(() => {
      expect(state().panes.attributes).toBe('units: m')
    })

    await session.close()
    expect(reader.isClosed).toBe(true)
  })
})

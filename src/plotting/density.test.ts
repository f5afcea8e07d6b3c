import { describe, test, expect } from 'vitest'
import { binPairs, DensityPlotter, shade } from './density.js'

describe('binPairs', () => {
  test('counts points per cell with row 0 at the bottom', () => {
    expect(binPairs([0, 1, 2, 3], [0, 1, 2, 3], 2, 2)).toEqual([
      [2, 0],
      [0, 2],
    ])
  })

  test('requires datasets of the same length', () => {
    expect(() => binPairs([1, 2], [1, 2, 3], 4, 4)).toThrow(
      'Datasets differ in length (2 and 3)'
    )
  })
})

describe('shade', () => {
  test('maps counts onto the ramp, never blank for a non-empty cell', () => {
    expect(shade(0, 5)).toBe(' ')
    expect(shade(5, 5)).toBe('@')
    expect(shade(5, 10)).toBe('+')
    expect(shade(1, 100)).toBe('.')
  })
})

describe('DensityPlotter', () => {
  test('describes the chosen axes', () => {
    const plotter = new DensityPlotter({ width: 2, height: 2 })
    expect(plotter.describe()).toBe('x: <unset>\ny: <unset>')
    plotter.setX('/x', [0, 1])
    expect(plotter.size).toBe(1)
    expect(plotter.describe()).toBe('x: /x\ny: <unset>')
  })

  test('needs both axes to render', () => {
    const plotter = new DensityPlotter({ width: 2, height: 2 })
    plotter.setX('/x', [0, 1])
    expect(() => plotter.render()).toThrow('Select both x and y datasets before plotting')
  })

  test('renders the grid top row first with axis ranges below', () => {
    const plotter = new DensityPlotter({ width: 2, height: 2 })
    plotter.setX('/x', [0, 1, 2, 3])
    plotter.setY('/y', [0, 1, 2, 3])
    expect(plotter.render()).toBe(['| @', '|@ ', '+--', 'x: /x [0, 3]', 'y: /y [0, 3]'].join('\n'))
  })

  test('reset forgets both axes', () => {
    const plotter = new DensityPlotter({ width: 2, height: 2 })
    plotter.setX('/x', [0, 1])
    plotter.setY('/y', [0, 1])
    plotter.reset()
    expect(plotter.size).toBe(0)
  })
})

import { describe, test, expect } from 'vitest'
import { computeLayout, type LayoutInput } from './layout.js'

const BASE: LayoutInput = {
  rows: 40,
  hasPrompt: false,
  showHotkeys: true,
  valuesVisible: false,
  plotVisible: false,
  histogramVisible: false,
  attributesExpanded: false,
}

describe('computeLayout', () => {
  test('attributes fill the right column when nothing else is shown', () => {
    expect(computeLayout(BASE)).toEqual({
      tree: 24,
      metadata: 10,
      attributes: 34,
      values: 0,
      plot: 0,
      histogram: 0,
    })
  })

  test('extra panes take room from the attributes', () => {
    const heights = computeLayout({ ...BASE, valuesVisible: true, histogramVisible: true })
    expect(heights).toMatchObject({ attributes: 14, values: 10, plot: 0, histogram: 10 })
  })

  test('expanded attributes hide the other right-hand panes', () => {
    const heights = computeLayout({ ...BASE, valuesVisible: true, attributesExpanded: true })
    expect(heights).toMatchObject({ attributes: 34, values: 0 })
  })

  test('the prompt takes rows from the body', () => {
    expect(computeLayout({ ...BASE, hasPrompt: true }).tree).toBe(21)
  })

  test('small terminals still get usable panes', () => {
    expect(computeLayout({ ...BASE, rows: 10 })).toMatchObject({ tree: 4, metadata: 4 })
  })
})

import { describe, test, expect } from 'vitest'
import { colors, getMessageColor, getModeColor } from './colors.js'

describe('colors', () => {
  test('each mode has a color', () => {
    expect(getModeColor('normal')).toBe(colors.blue)
    expect(getModeColor('dataset')).toBe(colors.green)
    expect(getModeColor('histogram')).toBe(colors.orange)
    expect(getModeColor('awaitingInput')).toBe(colors.red)
  })

  test('errors in the mini buffer are red', () => {
    expect(getMessageColor('ERROR: /a: unreadable')).toBe(colors.red)
    expect(getMessageColor('Log scale on')).toBe(colors.fg)
  })
})

import type { Key } from 'ink'

export type InkKey = Pick<
  Key,
  'return' | 'escape' | 'upArrow' | 'downArrow' | 'pageUp' | 'pageDown' | 'ctrl'
>

/** Binding key name for an ink input event; null for keys nothing binds */
export function keyName(input: string, key: InkKey): string | null {
  if (key.return) return 'return'
  if (key.escape) return 'escape'
  if (key.upArrow) return 'up'
  if (key.downArrow) return 'down'
  if (key.pageUp) return '{'
  if (key.pageDown) return '}'
  if (key.ctrl && input.length === 1) return `ctrl+${input.toLowerCase()}`
  if (input.length === 1) return input
  return null
}

export function shouldQuit(name: string | null): boolean {
  return name === 'ctrl+c' || name === 'ctrl+q'
}

/**
 * Slice of `total` rows to draw so that `selected` stays in view,
 * centred where possible.
 */
export function visibleWindow(
  total: number,
  selected: number,
  maxHeight: number
): { start: number; end: number } {
  if (maxHeight <= 0) return { start: 0, end: 0 }
  if (total <= maxHeight) return { start: 0, end: total }

  const targetPosition = Math.floor(maxHeight / 2)
  let start = Math.max(0, selected - targetPosition)
  let end = Math.min(total, start + maxHeight)
  if (end === total) {
    start = Math.max(0, total - maxHeight)
    end = total
  }
  return { start, end }
}

/** Row holding `offset` in text made of `lines` joined by newlines */
export function rowAtOffset(lines: readonly string[], offset: number): number {
  let end = 0
  for (let row = 0; row < lines.length; row++) {
    end += (lines[row]?.length ?? 0) + 1
    if (end > offset) return row
  }
  return Math.max(0, lines.length - 1)
}

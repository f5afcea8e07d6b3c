// Tokyo Night color palette and mode colors

import type { Mode } from '../../core/mode-controller.js'

export const colors = {
  bg: '#1a1b26',
  bgHighlight: '#24283b',
  fg: '#c0caf5',
  blue: '#7aa2f7',
  cyan: '#7dcfff',
  purple: '#bb9af7',
  green: '#9ece6a',
  red: '#f7768e',
  orange: '#e0af68',
  comment: '#565f89',
} as const

export function getModeColor(mode: Mode): string {
  switch (mode) {
    case 'normal': return colors.blue
    case 'jump': return colors.cyan
    case 'dataset': return colors.green
    case 'window': return colors.purple
    case 'plot':
    case 'histogram': return colors.orange
    case 'awaitingInput': return colors.red
  }
}

export function getMessageColor(message: string): string {
  return message.startsWith('ERROR:') ? colors.red : colors.fg
}

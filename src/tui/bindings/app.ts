/**
 * Application bindings: leader keys, layout toggles and quit.
 */

import { UserInterrupt } from '../../core/errors.js'
import type { Binding, LeaderMode } from '../../core/mode-controller.js'
import type { ExplorerSession } from '../session.js'

const LEADERS: Array<{ key: string; mode: LeaderMode; label: string }> = [
  { key: 'd', mode: 'dataset', label: 'Dataset Mode' },
  { key: 'w', mode: 'window', label: 'Window Mode' },
  { key: 'j', mode: 'jump', label: 'Jump Mode' },
  { key: 'p', mode: 'plot', label: 'Plotting Mode' },
  { key: 'H', mode: 'histogram', label: 'Histogram Mode' },
]

export function appBindings(session: ExplorerSession): Binding[] {
  const leaders = LEADERS.map(({ key, mode, label }): Binding => ({
    key,
    label,
    run: () => session.modes.enter(mode),
  }))

  return [
    ...leaders,
    {
      key: 'a',
      label: 'Expand Attributes',
      run: () => session.ui.getState().toggleAttributes(),
    },
    {
      key: 'r',
      label: 'Restore Layout',
      run: () => session.ui.getState().restoreLayout(),
    },
    {
      key: 'q',
      label: 'Exit',
      run: () => {
        throw new UserInterrupt()
      },
    },
  ]
}

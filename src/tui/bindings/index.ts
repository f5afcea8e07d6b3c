// Static (mode, key) → handler table

import type { BindingTable } from '../../core/mode-controller.js'
import type { ExplorerSession } from '../session.js'
import { appBindings } from './app.js'
import { datasetBindings } from './dataset.js'
import { histogramBindings } from './histogram.js'
import { jumpBindings } from './jump.js'
import { plotBindings } from './plot.js'
import { treeBindings } from './tree.js'
import { windowBindings } from './window.js'

export function createBindings(session: ExplorerSession): BindingTable {
  return {
    normal: [...treeBindings(session), ...appBindings(session)],
    jump: jumpBindings(session),
    dataset: datasetBindings(session),
    window: windowBindings(session),
    plot: plotBindings(session),
    histogram: histogramBindings(session),
  }
}

// Main TUI application: tree and metadata on the left, attributes, values
// and plots on the right, hotkeys and the mini buffer along the bottom

import { useCallback } from 'react'
import { Box, useApp, useInput, useStdout } from 'ink'
import { useStore } from 'zustand'
import { UserInterrupt } from '../core/errors.js'
import { keyName, shouldQuit } from './appNavigation.js'
import { Pane } from './components/shared/Pane.js'
import { TreePane } from './components/views/TreePane.js'
import { HotkeyBar, MiniBuffer } from './components/layout/StatusBar.js'
import { computeLayout } from './layout.js'
import type { ExplorerSession } from './session.js'

export interface AppProps {
  session: ExplorerSession
}

export function App({ session }: AppProps) {
  const { exit } = useApp()
  const { stdout } = useStdout()
  const state = useStore(session.ui)

  const handleQuit = useCallback(() => {
    exit()
  }, [exit])

  useInput((input, key) => {
    const name = keyName(input, key)
    if (shouldQuit(name)) {
      handleQuit()
      return
    }
    if (name === null) return

    try {
      session.handleKey(name)
    } catch (error) {
      if (error instanceof UserInterrupt) {
        handleQuit()
        return
      }
      throw error
    }
  })

  const plotVisible = state.mode === 'plot' || session.density.size > 0
  const histogramVisible = state.mode === 'histogram' || session.histogram.size > 0
  const heights = computeLayout({
    rows: stdout.rows ?? 24,
    hasPrompt: state.prompt !== null,
    showHotkeys: state.hints.length > 0,
    valuesVisible: state.valuesVisible,
    plotVisible,
    histogramVisible,
    attributesExpanded: state.attributesExpanded,
  })

  return (
    <Box flexDirection="column" width="100%">
      <Box flexDirection="row">
        <Box flexDirection="column" width="50%">
          <TreePane
            title={`File: ${session.fileName}`}
            document={state.document}
            cursor={state.cursor}
            height={heights.tree}
            focused={state.focused === 'tree'}
          />
          <Pane title="Metadata" text={state.panes.metadata} height={heights.metadata} />
        </Box>
        <Box flexDirection="column" width="50%">
          <Pane
            title="Attributes"
            text={state.panes.attributes}
            height={heights.attributes}
            focused={state.focused === 'attributes'}
            scroll={state.scroll.attributes}
          />
          {heights.values > 0 && (
            <Pane
              title={state.valuesTitle}
              text={state.panes.values}
              height={heights.values}
              focused={state.focused === 'values'}
              scroll={state.scroll.values}
            />
          )}
          {heights.plot > 0 && (
            <Pane
              title="Plotting"
              text={state.panes.plot}
              height={heights.plot}
              focused={state.focused === 'plot'}
              scroll={state.scroll.plot}
            />
          )}
          {heights.histogram > 0 && (
            <Pane
              title="Histogram"
              text={state.panes.histogram}
              height={heights.histogram}
              focused={state.focused === 'histogram'}
              scroll={state.scroll.histogram}
            />
          )}
        </Box>
      </Box>
      <HotkeyBar mode={state.mode} hints={state.hints} />
      <MiniBuffer
        message={state.message}
        prompt={state.prompt}
        onInput={(text) => session.setInput(text)}
      />
    </Box>
  )
}

// TUI entry point: renders the explorer with ink and runs the cursor
// watcher until the user quits

import { render } from 'ink'
import { App } from './App.js'
import type { ExplorerSession } from './session.js'

export async function launchTUI(session: ExplorerSession): Promise<void> {
  const instance = render(<App session={session} />, { exitOnCtrlC: false })
  session.start()
  try {
    await instance.waitUntilExit()
  } finally {
    await session.close()
  }
}

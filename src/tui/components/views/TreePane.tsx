/**
 * TreePane
 * Draws the outline text with the cursor row highlighted, windowed so the
 * cursor stays in view.
 */

import { Box, Text } from 'ink'
import type { TreeSnapshot } from '../../../core/types.js'
import { rowAtOffset, visibleWindow } from '../../appNavigation.js'
import { colors } from '../../utils/colors.js'
import { PANE_CHROME } from '../shared/Pane.js'

export interface TreePaneProps {
  title: string
  document: TreeSnapshot
  cursor: number
  height: number
  focused: boolean
}

export function TreePane({ title, document, cursor, height, focused }: TreePaneProps) {
  const selectedRow = rowAtOffset(document.lines, cursor)
  const { start, end } = visibleWindow(document.lines.length, selectedRow, height - PANE_CHROME)
  const rows = document.lines.slice(start, end)

  return (
    <Box
      flexDirection="column"
      height={height}
      borderStyle="round"
      borderColor={focused ? colors.blue : colors.comment}
      overflow="hidden"
    >
      <Text bold color={focused ? colors.blue : colors.fg} wrap="truncate-end">
        {title}
      </Text>
      {rows.map((line, index) => {
        const isSelected = start + index === selectedRow
        return (
          <Text
            key={start + index}
            wrap="truncate-end"
            backgroundColor={isSelected ? colors.bgHighlight : undefined}
            color={isSelected ? colors.cyan : undefined}
          >
            {line}
          </Text>
        )
      })}
    </Box>
  )
}

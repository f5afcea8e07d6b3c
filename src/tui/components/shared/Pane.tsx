// Bordered text pane that draws a scrolled window of its text

import { Box, Text } from 'ink'
import { colors } from '../../utils/colors.js'
import { paneLines } from '../../utils/format.js'

export interface PaneProps {
  title: string
  text: string
  height: number
  focused?: boolean
  scroll?: number
}

/** Border rows plus the title row */
export const PANE_CHROME = 3

export function Pane({ title, text, height, focused = false, scroll = 0 }: PaneProps) {
  const lines = paneLines(text, scroll, height - PANE_CHROME)

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
      {lines.map((line, index) => (
        <Text key={index} wrap="truncate-end">
          {line}
        </Text>
      ))}
    </Box>
  )
}

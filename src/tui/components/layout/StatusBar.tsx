// Hotkey hints for the active mode, the prompt and the mini buffer

import { Box, Text } from 'ink'
import TextInput from 'ink-text-input'
import type { Mode } from '../../../core/mode-controller.js'
import type { PromptState } from '../../state.js'
import { colors, getMessageColor, getModeColor } from '../../utils/colors.js'

export interface HotkeyBarProps {
  mode: Mode
  hints: string[]
}

export function HotkeyBar({ mode, hints }: HotkeyBarProps) {
  if (hints.length === 0) return null

  return (
    <Box borderStyle="round" borderColor={colors.comment} paddingLeft={1} paddingRight={1}>
      <Text color={getModeColor(mode)} bold>
        {`[${mode}] `}
      </Text>
      <Text color={colors.comment} wrap="truncate-end">
        {hints.join('  ')}
      </Text>
    </Box>
  )
}

export interface MiniBufferProps {
  message: string
  prompt: PromptState | null
  onInput: (text: string) => void
}

export function MiniBuffer({ message, prompt, onInput }: MiniBufferProps) {
  return (
    <Box flexDirection="column">
      {prompt && (
        <Box borderStyle="round" borderColor={colors.orange} paddingLeft={1}>
          <Text color={colors.orange}>{prompt.text}</Text>
        </Box>
      )}
      <Box borderStyle="round" borderColor={prompt ? colors.blue : colors.comment} paddingLeft={1}>
        {prompt ? (
          <TextInput value={prompt.input} onChange={onInput} focus />
        ) : (
          <Text color={getMessageColor(message)} wrap="truncate-end">
            {message}
          </Text>
        )}
      </Box>
    </Box>
  )
}

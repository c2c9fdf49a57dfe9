import figures from 'figures'
import { Box, Text } from 'ink'
import React from 'react'
import type { Message } from '@app/query'
import { getTheme } from '@utils/theme'

function formatSeconds(durationMs: number): string {
  return `${(durationMs / 1000).toFixed(1)}s`
}

export function ChatMessage({ message }: { message: Message }): React.ReactNode {
  const theme = getTheme()

  switch (message.type) {
    case 'user':
      return (
        <Box marginTop={1}>
          <Text color={theme.user}>
            {figures.pointer} {message.text}
          </Text>
        </Box>
      )
    case 'assistant': {
      const meta = [
        message.agent,
        message.toolCalls.length > 0 ? `tools: ${message.toolCalls.join(', ')}` : '',
        message.retriesUsed > 0 ? `retries: ${message.retriesUsed}` : '',
        formatSeconds(message.durationMs),
      ].filter(Boolean)
      return (
        <Box flexDirection="column" marginTop={1}>
          <Box>
            <Box minWidth={2}>
              <Text color={theme.haven}>{figures.bullet}</Text>
            </Box>
            <Text color={theme.text}>{message.text}</Text>
          </Box>
          <Text color={theme.secondaryText}>  {meta.join(' · ')}</Text>
        </Box>
      )
    }
    case 'command':
      return (
        <Box flexDirection="column" marginTop={1}>
          <Text color={theme.secondaryText}>/{message.command}</Text>
          <Text color={theme.text}>{message.text}</Text>
        </Box>
      )
    case 'error':
      return (
        <Box marginTop={1}>
          <Text color={theme.error}>
            {figures.cross} {message.text}
          </Text>
        </Box>
      )
  }
}

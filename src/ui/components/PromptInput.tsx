import figures from 'figures'
import { Box, Text, useInput } from 'ink'
import React, { useState } from 'react'
import { getTheme } from '@utils/theme'

type Props = {
  isDisabled: boolean
  onSubmit: (value: string) => void
}

export function PromptInput({ isDisabled, onSubmit }: Props): React.ReactNode {
  const theme = getTheme()
  const [value, setValue] = useState('')

  useInput(
    (input, key) => {
      if (key.return) {
        const trimmed = value.trim()
        if (!trimmed) return
        setValue('')
        onSubmit(trimmed)
        return
      }
      if (key.backspace || key.delete) {
        setValue(current => current.slice(0, -1))
        return
      }
      if (key.ctrl || key.meta || key.escape || key.tab) return
      if (key.upArrow || key.downArrow || key.leftArrow || key.rightArrow) return
      if (input) {
        setValue(current => current + input)
      }
    },
    { isActive: !isDisabled },
  )

  return (
    <Box
      borderStyle="round"
      borderColor={theme.secondaryBorder}
      paddingX={1}
      marginTop={1}
    >
      <Text color={isDisabled ? theme.secondaryText : theme.haven}>
        {figures.pointer}{' '}
      </Text>
      {value.length > 0 ? (
        <Text color={theme.text}>
          {value}
          {isDisabled ? '' : '█'}
        </Text>
      ) : (
        <Text color={theme.secondaryText}>
          {isDisabled ? 'Waiting for the assistant…' : 'How are you feeling today?'}
        </Text>
      )}
    </Box>
  )
}

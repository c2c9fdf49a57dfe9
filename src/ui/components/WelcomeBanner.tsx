import { Box, Text } from 'ink'
import React from 'react'
import { ASCII_LOGO, PRODUCT_NAME } from '@constants/product'
import { MACRO } from '@constants/macros'
import type { ConfigIssue } from '@core/config/validator'
import { getTheme } from '@utils/theme'

type Props = {
  userId: string
  persistState: boolean
  warnings: ConfigIssue[]
}

export function WelcomeBanner({
  userId,
  persistState,
  warnings,
}: Props): React.ReactNode {
  const theme = getTheme()
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color={theme.haven}>{ASCII_LOGO}</Text>
      <Box
        borderStyle="round"
        borderColor={theme.secondaryBorder}
        flexDirection="column"
        paddingX={1}
        marginTop={1}
      >
        <Text color={theme.text}>
          <Text bold>{PRODUCT_NAME}</Text> v{MACRO.VERSION} · support, tasks,
          goals and answers
        </Text>
        <Text color={theme.secondaryText}>
          Talking as <Text color={theme.text}>{userId}</Text>
          {persistState ? '' : ' · nothing will be saved'}
        </Text>
        <Text color={theme.secondaryText}>
          /help for commands · esc to interrupt · ctrl+c to quit
        </Text>
      </Box>
      {warnings.map(warning => (
        <Text key={warning.message} color={theme.warning}>
          ⚠ {warning.message}
        </Text>
      ))}
    </Box>
  )
}

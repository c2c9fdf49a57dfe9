import { Box, useApp, useInput } from 'ink'
import React, { useCallback, useEffect, useRef, useState } from 'react'
import {
  createUserMessage,
  runAssistantTurn,
  runSlashCommand,
  type Message,
} from '@app/query'
import { isSlashCommandInput } from '@commands'
import { MessageList } from '@components/MessageList'
import { PromptInput } from '@components/PromptInput'
import { RequestStatusIndicator } from '@components/RequestStatusIndicator'
import { WelcomeBanner } from '@components/WelcomeBanner'
import type { ConfigIssue } from '@core/config/validator'
import type { AssistantSession } from '@services/ai/assistantRuntime'
import { logError } from '@utils/log'

type Props = {
  session: AssistantSession
  warnings: ConfigIssue[]
  initialPrompt?: string
}

export function Chat({ session, warnings, initialPrompt }: Props): React.ReactNode {
  const { exit } = useApp()
  const [messages, setMessages] = useState<Message[]>([])
  const [isLoading, setIsLoading] = useState(false)
  const abortControllerRef = useRef<AbortController | null>(null)

  const appendMessage = useCallback((message: Message) => {
    setMessages(current => [...current, message])
  }, [])

  const onSubmit = useCallback(
    async (input: string) => {
      appendMessage(createUserMessage(input))

      if (isSlashCommandInput(input)) {
        appendMessage(await runSlashCommand(input, { session, exit }))
        return
      }

      const controller = new AbortController()
      abortControllerRef.current = controller
      setIsLoading(true)
      try {
        appendMessage(
          await runAssistantTurn({
            session,
            prompt: input,
            signal: controller.signal,
          }),
        )
      } finally {
        abortControllerRef.current = null
        setIsLoading(false)
      }
    },
    [appendMessage, exit, session],
  )

  const submit = useCallback(
    (input: string) => {
      onSubmit(input).catch(logError)
    },
    [onSubmit],
  )

  useInput((input, key) => {
    if (key.escape) {
      abortControllerRef.current?.abort()
      return
    }
    if (key.ctrl && input === 'c') {
      abortControllerRef.current?.abort()
      exit()
    }
  })

  useEffect(() => {
    if (initialPrompt?.trim()) {
      submit(initialPrompt.trim())
    }
    // Only the prompt given on the command line is sent automatically.
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [])

  return (
    <Box flexDirection="column">
      <MessageList
        banner={
          <WelcomeBanner
            userId={session.userId}
            persistState={session.persistState}
            warnings={warnings}
          />
        }
        messages={messages}
      />
      {isLoading && <RequestStatusIndicator />}
      <PromptInput isDisabled={isLoading} onSubmit={submit} />
    </Box>
  )
}

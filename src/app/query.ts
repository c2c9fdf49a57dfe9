import { randomUUID } from 'crypto'
import {
  queryAssistant,
  type AssistantSession,
} from '@services/ai/assistantRuntime'
import type { AssistantTurnProgress } from '@services/ai/types/assistant'
import { findCommand, parseSlashCommand, type CommandContext } from '@commands'
import { logError } from '@utils/log'
import { debug as debugLogger } from '@utils/log/debugLogger'
import { setRequestStatus } from '@utils/session/requestStatus'

export const INTERRUPT_MESSAGE = '[Request interrupted by user]'

export type UserMessage = {
  type: 'user'
  uuid: string
  text: string
  createdAt: number
}

export type AssistantMessage = {
  type: 'assistant'
  uuid: string
  text: string
  agent: string
  toolCalls: string[]
  retriesUsed: number
  durationMs: number
  createdAt: number
}

export type CommandMessage = {
  type: 'command'
  uuid: string
  command: string
  text: string
  createdAt: number
}

export type ErrorMessage = {
  type: 'error'
  uuid: string
  text: string
  createdAt: number
}

export type Message = UserMessage | AssistantMessage | CommandMessage | ErrorMessage

export function createUserMessage(text: string): UserMessage {
  return { type: 'user', uuid: randomUUID(), text, createdAt: Date.now() }
}

export function createErrorMessage(text: string): ErrorMessage {
  return { type: 'error', uuid: randomUUID(), text, createdAt: Date.now() }
}

export function createCommandMessage(command: string, text: string): CommandMessage {
  return {
    type: 'command',
    uuid: randomUUID(),
    command,
    text,
    createdAt: Date.now(),
  }
}

function reportProgress(progress: AssistantTurnProgress): void {
  if (progress.kind === 'delegating') {
    setRequestStatus({ kind: 'delegating', detail: progress.agent })
    return
  }
  if (progress.kind === 'tool') {
    setRequestStatus({ kind: 'tool', detail: progress.name })
    return
  }
  setRequestStatus({
    kind: 'retrying',
    detail: `${progress.attempt}/${progress.totalAttempts}`,
  })
}

function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true
  return error instanceof Error && error.message === 'Request cancelled by user'
}

export async function runSlashCommand(
  input: string,
  context: CommandContext,
): Promise<CommandMessage | ErrorMessage> {
  const parsed = parseSlashCommand(input)
  if (!parsed) {
    return createErrorMessage(`Not a command: ${input}`)
  }

  const command = findCommand(parsed.name)
  if (!command) {
    return createErrorMessage(
      `Unknown command: /${parsed.name}. Type /help for the list of commands.`,
    )
  }

  try {
    const output = await command.call(parsed.args, context)
    debugLogger.info('COMMAND_RUN', { command: command.name })
    return createCommandMessage(command.userFacingName(), output)
  } catch (error) {
    logError(error)
    return createErrorMessage(
      `/${command.userFacingName()} failed: ${error instanceof Error ? error.message : String(error)}`,
    )
  }
}

/**
 * Runs one prompt through the assistant and maps the outcome to a message.
 * Request status is driven from here so the spinner reflects delegation and
 * tool calls while the turn is in flight.
 */
export async function runAssistantTurn(params: {
  session: AssistantSession
  prompt: string
  signal?: AbortSignal
}): Promise<AssistantMessage | ErrorMessage> {
  const startedAt = Date.now()
  setRequestStatus({ kind: 'thinking' })
  try {
    const result = await queryAssistant({
      session: params.session,
      prompt: params.prompt,
      signal: params.signal,
      onProgress: reportProgress,
    })
    return {
      type: 'assistant',
      uuid: randomUUID(),
      text: result.text,
      agent: result.respondingAgent,
      toolCalls: result.toolCalls,
      retriesUsed: result.retriesUsed,
      durationMs: Date.now() - startedAt,
      createdAt: Date.now(),
    }
  } catch (error) {
    if (isCancellation(error, params.signal)) {
      return createErrorMessage(INTERRUPT_MESSAGE)
    }
    logError(error)
    return createErrorMessage(
      `Error: ${error instanceof Error ? error.message : String(error)}`,
    )
  } finally {
    setRequestStatus({ kind: 'idle' })
  }
}

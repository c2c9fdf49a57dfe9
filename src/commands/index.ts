import type { AssistantSession } from '@services/ai/assistantRuntime'
import exit from './exit'
import goals from './goals'
import help from './help'
import memory from './memory'
import reminders from './reminders'
import reset from './reset'
import tasks from './tasks'
import trace from './trace'

export type CommandContext = {
  session: AssistantSession
  exit: () => void
}

export type LocalCommand = {
  type: 'local'
  name: string
  description: string
  aliases?: string[]
  argumentHint?: string
  isEnabled: boolean
  isHidden: boolean
  userFacingName(): string
  call(args: string, context: CommandContext): Promise<string>
}

export type Command = LocalCommand

export function getCommands(): Command[] {
  return [help, tasks, reminders, goals, memory, trace, reset, exit].filter(
    command => command.isEnabled,
  )
}

export function findCommand(name: string): Command | undefined {
  const normalized = name.trim().toLowerCase()
  return getCommands().find(
    command =>
      command.name === normalized || command.aliases?.includes(normalized) === true,
  )
}

export function isSlashCommandInput(input: string): boolean {
  return /^\/[a-zA-Z?]/.test(input.trim())
}

export function parseSlashCommand(
  input: string,
): { name: string; args: string } | null {
  const trimmed = input.trim()
  if (!isSlashCommandInput(trimmed)) return null

  const withoutSlash = trimmed.slice(1)
  const spaceIndex = withoutSlash.search(/\s/)
  if (spaceIndex === -1) {
    return { name: withoutSlash.toLowerCase(), args: '' }
  }
  return {
    name: withoutSlash.slice(0, spaceIndex).toLowerCase(),
    args: withoutSlash.slice(spaceIndex + 1).trim(),
  }
}

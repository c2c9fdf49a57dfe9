import { beforeAll, describe, expect, test } from 'vitest'

import { findCommand, getCommands, isSlashCommandInput, parseSlashCommand } from '@commands'
import { parseGoalId } from '@commands/goals'
import { formatUserMemory } from '@commands/memory'
import { formatTraceLine } from '@commands/trace'
import { runSlashCommand } from '@app/query'
import { DEFAULT_GLOBAL_CONFIG } from '@core/config/defaults'
import {
  openAssistantSession,
  type AssistantSession,
} from '@services/ai/assistantRuntime'
import { captureSyntheticTraceEvent, createEventTrace } from '@services/ai/assistantEvents'
import { createEmptyUserMemory } from '@tools/assistant/memoryTools'

describe('slash command parsing', () => {
  test('recognizes commands and splits arguments', () => {
    expect(isSlashCommandInput('/tasks')).toBe(true)
    expect(isSlashCommandInput('  /?')).toBe(true)
    expect(isSlashCommandInput('/ not a command')).toBe(false)
    expect(isSlashCommandInput('I feel /meh')).toBe(false)

    expect(parseSlashCommand('/Goals  #3 ')).toEqual({ name: 'goals', args: '#3' })
    expect(parseSlashCommand('/trace')).toEqual({ name: 'trace', args: '' })
    expect(parseSlashCommand('hello')).toBeNull()
  })

  test('finds commands by name or alias', () => {
    expect(findCommand('quit')?.name).toBe('exit')
    expect(findCommand('CLEAR')?.name).toBe('reset')
    expect(findCommand('?')?.name).toBe('help')
    expect(findCommand('tag')).toBeUndefined()
    expect(getCommands().map(command => command.name)).toEqual([
      'help',
      'tasks',
      'reminders',
      'goals',
      'memory',
      'trace',
      'reset',
      'exit',
    ])
  })

  test('parses goal ids with or without a hash', () => {
    expect(parseGoalId('#3')).toBe(3)
    expect(parseGoalId(' 12 ')).toBe(12)
    expect(parseGoalId('three')).toBeNull()
  })
})

describe('command formatting', () => {
  test('formats remembered details', () => {
    const memory = createEmptyUserMemory()
    memory.personal_details.name = 'Ana'
    memory.interests.push('chess', 'hiking')
    memory.history.push('moved cities')
    memory.therapeutic_patterns.triggers.stressed = {
      helpful_responses: [{ response: '4-7-8 breathing', timestamp: '' }],
      unhelpful_responses: [],
    }
    memory.journal_entry = 'today was calm'

    expect(formatUserMemory(memory)).toBe(
      [
        '⎿  name: Ana',
        '⎿  interests: chess, hiking',
        '⎿  history: 1 entry',
        '⎿  when stressed: helped: 4-7-8 breathing',
        '⎿  journal_entry: today was calm',
      ].join('\n'),
    )
    expect(formatUserMemory(createEmptyUserMemory())).toBe('⎿  Nothing remembered yet.')
  })

  test('formats runner and synthetic trace entries', () => {
    expect(
      formatTraceLine(
        {
          author: 'personal_assistant',
          partial: true,
          functionCalls: [{ name: 'transfer_to_agent' }],
          functionResponses: [],
          actions: { transferToAgent: 'task_manager' },
          textPreview: 'One moment',
        },
        1,
      ),
    ).toBe(
      '⎿    1. event personal_assistant [partial] calls:1 responses:0 -> task_manager | One moment',
    )
    expect(
      formatTraceLine(
        { kind: 'retry', author: 'HavenRuntime', synthetic: true, textPreview: 'Retry attempt 2/5' },
        7,
      ),
    ).toBe('⎿    7. retry HavenRuntime | Retry attempt 2/5')
  })
})

describe('commands against a session', () => {
  let session: AssistantSession
  let exitCalls = 0
  const context = () => ({
    session,
    exit: () => {
      exitCalls += 1
    },
  })

  beforeAll(async () => {
    session = await openAssistantSession({
      config: { ...DEFAULT_GLOBAL_CONFIG, persistState: false },
      apiKey: 'test-key',
      userId: 'ana',
    })
  })

  test('help lists every command with aligned descriptions', async () => {
    const message = await runSlashCommand('/?', context())

    expect(message.type).toBe('command')
    const lines = message.text.split('\n')
    expect(lines).toHaveLength(9)
    expect(lines[3]).toBe('⎿  /goals [id]     List your goals, or show one goal in full')
    expect(lines[5]).toBe('⎿  /trace [count]  Show the event trace of the last assistant turn')
    expect(lines[8]).toBe('⎿  Anything else you type goes to the assistant.')
  })

  test('state commands read an empty session', async () => {
    expect((await runSlashCommand('/tasks', context())).text).toBe('You have no tasks.')
    expect((await runSlashCommand('/reminders', context())).text).toBe(
      'You have no reminders scheduled.',
    )
    expect((await runSlashCommand('/goals', context())).text).toBe(
      "You don't have any goals yet. Let's create one!",
    )
    expect((await runSlashCommand('/goals 2', context())).text).toBe('❌ No goals found.')
    expect((await runSlashCommand('/goals two', context())).text).toBe('Usage: /goals [id]')
    expect((await runSlashCommand('/memory', context())).text).toBe(
      '⎿  Nothing remembered yet.',
    )
  })

  test('trace shows the tail of the last turn', async () => {
    expect((await runSlashCommand('/trace', context())).text).toBe(
      '⎿  No trace yet. Send a message first.',
    )

    const trace = createEventTrace()
    captureSyntheticTraceEvent(trace, { kind: 'turn_start', text: 'Starting assistant turn' })
    captureSyntheticTraceEvent(trace, { kind: 'turn_end', text: 'Turn answered by task_manager' })
    session.lastTrace = trace

    expect((await runSlashCommand('/trace 1', context())).text).toBe(
      [
        '⎿  Last turn: 2 entries (showing last 1)',
        '⎿    2. turn_end HavenRuntime | Turn answered by task_manager',
      ].join('\n'),
    )
  })

  test('reset starts over and exit asks the app to close', async () => {
    expect((await runSlashCommand('/clear', context())).text).toBe(
      '⎿  Conversation and saved state cleared for ana.',
    )
    expect(session.lastTrace).toBeUndefined()

    expect((await runSlashCommand('/quit', context())).text).toBe('⎿  Take care!')
    expect(exitCalls).toBe(1)
  })

  test('unknown commands point at /help', async () => {
    expect(await runSlashCommand('/dance', context())).toMatchObject({
      type: 'error',
      text: 'Unknown command: /dance. Type /help for the list of commands.',
    })
  })
})

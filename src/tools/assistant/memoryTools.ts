import { FunctionTool } from '@google/adk'
import { z } from 'zod'
import { debug as debugLogger } from '@utils/log/debugLogger'
import type {
  PatternEntry,
  TherapeuticPatterns,
  TriggerHistory,
  UserMemory,
} from '@services/ai/types/assistant'
import {
  STATE_KEYS,
  isRecord,
  resolveToolSession,
  systemClock,
  type Clock,
  type SessionStateAccess,
} from './sessionState'

export function createEmptyUserMemory(): UserMemory {
  return {
    personal_details: {},
    preferences: {},
    therapeutic_patterns: {
      triggers: {},
      preferred_styles: [],
      avoided_styles: [],
    },
    history: [],
    interests: [],
  }
}

function hasOwnKey(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key)
}

function toStringRecord(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {}
  return Object.fromEntries(
    Object.entries(value).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string',
    ),
  )
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string')
}

function toPatternEntries(value: unknown): PatternEntry[] {
  if (!Array.isArray(value)) return []
  const entries: PatternEntry[] = []
  for (const item of value) {
    if (!isRecord(item) || typeof item.response !== 'string') continue
    entries.push({
      response: item.response,
      timestamp: typeof item.timestamp === 'string' ? item.timestamp : '',
    })
  }
  return entries
}

function toTherapeuticPatterns(value: unknown): TherapeuticPatterns {
  if (!isRecord(value)) {
    return createEmptyUserMemory().therapeutic_patterns
  }

  // fromEntries defines own keys, so a trigger named __proto__ survives
  const triggers: Record<string, TriggerHistory> = Object.fromEntries(
    Object.entries(isRecord(value.triggers) ? value.triggers : {}).flatMap(
      ([trigger, history]): Array<[string, TriggerHistory]> =>
        isRecord(history)
          ? [
              [
                trigger,
                {
                  helpful_responses: toPatternEntries(history.helpful_responses),
                  unhelpful_responses: toPatternEntries(history.unhelpful_responses),
                },
              ],
            ]
          : [],
    ),
  )

  return {
    triggers,
    preferred_styles: toStringList(value.preferred_styles),
    avoided_styles: toStringList(value.avoided_styles),
  }
}

export function normalizeUserMemory(value: unknown): UserMemory {
  if (!isRecord(value)) return createEmptyUserMemory()

  return {
    ...value,
    personal_details: toStringRecord(value.personal_details),
    preferences: toStringRecord(value.preferences),
    therapeutic_patterns: toTherapeuticPatterns(value.therapeutic_patterns),
    history: toStringList(value.history),
    interests: toStringList(value.interests),
  }
}

function readAllMemories(state: SessionStateAccess): Record<string, unknown> {
  const value = state.get(STATE_KEYS.userMemories)
  return isRecord(value) ? { ...value } : {}
}

function readUserMemory(state: SessionStateAccess, userId: string): UserMemory {
  const memories = readAllMemories(state)
  return normalizeUserMemory(
    hasOwnKey(memories, userId) ? memories[userId] : undefined,
  )
}

function writeUserMemory(
  state: SessionStateAccess,
  userId: string,
  memory: UserMemory,
): void {
  state.set(STATE_KEYS.userMemories, {
    ...readAllMemories(state),
    [userId]: memory,
  })
}

export function loadMemory(
  state: SessionStateAccess,
  userId: string,
): { user_id: string; memory: UserMemory } {
  debugLogger.debug('MEMORY_LOAD', { userId })
  const memories = readAllMemories(state)

  if (!hasOwnKey(memories, userId)) {
    const memory = createEmptyUserMemory()
    writeUserMemory(state, userId, memory)
    debugLogger.info('MEMORY_CREATED', { userId })
    return { user_id: userId, memory }
  }

  const memory = normalizeUserMemory(memories[userId])
  debugLogger.debug('MEMORY_LOADED', { userId, keys: Object.keys(memory) })
  return { user_id: userId, memory }
}

export function saveToMemory(
  state: SessionStateAccess,
  userId: string,
  input: { key: string; value: string },
): string {
  const { key, value } = input
  debugLogger.debug('MEMORY_SAVE', { userId, key })
  const memory = readUserMemory(state, userId)

  let next: UserMemory
  if (key === 'name') {
    next = {
      ...memory,
      personal_details: { ...memory.personal_details, name: value },
    }
  } else if (key === 'interests') {
    next = { ...memory, interests: [...memory.interests, value] }
  } else if (key === 'preferences') {
    next = { ...memory, preferences: { ...memory.preferences, general: value } }
  } else if (key === 'history') {
    next = { ...memory, history: [...memory.history, value] }
  } else {
    next = { ...memory, [key]: value }
  }

  writeUserMemory(state, userId, next)
  debugLogger.info('MEMORY_SAVED', { userId, key })
  return `✓ Saved ${key} to memory`
}

export function saveTherapeuticPattern(
  state: SessionStateAccess,
  userId: string,
  input: { trigger: string; response: string; helpful: boolean },
  clock: Clock = systemClock,
): string {
  const memory = readUserMemory(state, userId)
  const patterns = memory.therapeutic_patterns
  const triggerKey = input.trigger.toLowerCase().trim()
  const history: TriggerHistory = hasOwnKey(patterns.triggers, triggerKey)
    ? patterns.triggers[triggerKey]
    : { helpful_responses: [], unhelpful_responses: [] }
  const entry: PatternEntry = {
    response: input.response,
    timestamp: clock().toISOString(),
  }

  const nextHistory: TriggerHistory = input.helpful
    ? { ...history, helpful_responses: [...history.helpful_responses, entry] }
    : {
        ...history,
        unhelpful_responses: [...history.unhelpful_responses, entry],
      }

  writeUserMemory(state, userId, {
    ...memory,
    therapeutic_patterns: {
      ...patterns,
      triggers: { ...patterns.triggers, [triggerKey]: nextHistory },
    },
  })

  debugLogger.info('THERAPEUTIC_PATTERN_SAVED', {
    userId,
    trigger: triggerKey,
    helpful: input.helpful,
  })

  if (input.helpful) {
    return `✓ Marked as helpful for '${input.trigger}'`
  }
  return `✓ Marked as unhelpful for '${input.trigger}' - will try different approach next time`
}

export const loadMemoryTool = new FunctionTool({
  name: 'load_memory',
  description:
    'Load the user memory: personal details, preferences, therapeutic patterns (what helped and what did not), history and interests.',
  parameters: z.object({}),
  execute: (_input, toolContext) => {
    const { state, userId } = resolveToolSession('load_memory', toolContext)
    return loadMemory(state, userId)
  },
})

export const saveToMemoryTool = new FunctionTool({
  name: 'save_to_memory',
  description:
    'Save information to the user memory. Use key "name" for their name, "interests" to add an interest, "preferences" for communication preferences, "history" to log an event, or any other key to store a value.',
  parameters: z.object({
    key: z
      .string()
      .describe('Category: name, interests, preferences, history, or a custom key'),
    value: z.string().describe('Value to store'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession('save_to_memory', toolContext)
    return saveToMemory(state, userId, input)
  },
})

export const saveTherapeuticPatternTool = new FunctionTool({
  name: 'save_therapeutic_pattern',
  description:
    'Record whether a coping suggestion helped the user with a given emotional trigger.',
  parameters: z.object({
    trigger: z
      .string()
      .describe('Emotional trigger, e.g. "overwhelmed" or "stressed"'),
    response: z.string().describe('The technique or response that was given'),
    helpful: z.boolean().describe('True if the user found it helpful'),
  }),
  execute: (input, toolContext) => {
    const { state, userId } = resolveToolSession(
      'save_therapeutic_pattern',
      toolContext,
    )
    return saveTherapeuticPattern(state, userId, input)
  },
})

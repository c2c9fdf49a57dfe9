import type { Command } from '@commands'
import { getAssistantStateSnapshot } from '@services/ai/assistantRuntime'
import { normalizeUserMemory } from '@tools/assistant/memoryTools'
import { STATE_KEYS, isRecord } from '@tools/assistant/sessionState'
import type { UserMemory } from '@services/ai/types/assistant'

const BUILT_IN_MEMORY_KEYS = new Set([
  'personal_details',
  'preferences',
  'therapeutic_patterns',
  'history',
  'interests',
])

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value)
}

export function formatUserMemory(memory: UserMemory): string {
  const lines: string[] = []

  for (const [key, value] of Object.entries(memory.personal_details)) {
    lines.push(`${key}: ${value}`)
  }
  if (memory.interests.length > 0) {
    lines.push(`interests: ${memory.interests.join(', ')}`)
  }
  for (const [key, value] of Object.entries(memory.preferences)) {
    lines.push(`preference (${key}): ${value}`)
  }
  if (memory.history.length > 0) {
    lines.push(`history: ${memory.history.length} entr${memory.history.length === 1 ? 'y' : 'ies'}`)
  }

  for (const [trigger, history] of Object.entries(
    memory.therapeutic_patterns.triggers,
  )) {
    const helpful = history.helpful_responses.map(entry => entry.response)
    const unhelpful = history.unhelpful_responses.map(entry => entry.response)
    const parts = [
      helpful.length > 0 ? `helped: ${helpful.join(', ')}` : '',
      unhelpful.length > 0 ? `did not help: ${unhelpful.join(', ')}` : '',
    ].filter(Boolean)
    lines.push(`when ${trigger}: ${parts.join('; ')}`)
  }

  for (const [key, value] of Object.entries(memory)) {
    if (BUILT_IN_MEMORY_KEYS.has(key)) continue
    lines.push(`${key}: ${formatValue(value)}`)
  }

  if (lines.length === 0) {
    return '⎿  Nothing remembered yet.'
  }
  return lines.map(line => `⎿  ${line}`).join('\n')
}

const memory = {
  type: 'local',
  name: 'memory',
  description: 'Show what the assistant remembers about you',
  isEnabled: true,
  isHidden: false,
  userFacingName() {
    return 'memory'
  },
  async call(_args, context) {
    const state = await getAssistantStateSnapshot(context.session)
    const memories = state.get(STATE_KEYS.userMemories)
    const raw = isRecord(memories) ? memories[context.session.userId] : undefined
    return formatUserMemory(normalizeUserMemory(raw))
  },
} satisfies Command

export default memory

import { describe, expect, test } from 'vitest'

import {
  createEmptyUserMemory,
  loadMemory,
  normalizeUserMemory,
  saveTherapeuticPattern,
  saveToMemory,
} from '@tools/assistant/memoryTools'
import { STATE_KEYS } from '@tools/assistant/sessionState'
import { createFakeState, fixedClock } from './helpers/fakeState'

function memoryOf(state: ReturnType<typeof createFakeState>, userId: string) {
  return loadMemory(state, userId).memory
}

describe('memory tools', () => {
  test('load_memory creates and stores an empty record for a new user', () => {
    const state = createFakeState()

    const result = loadMemory(state, 'ana')

    expect(result).toEqual({ user_id: 'ana', memory: createEmptyUserMemory() })
    expect(state.data[STATE_KEYS.userMemories]).toEqual({
      ana: createEmptyUserMemory(),
    })
  })

  test('load_memory returns the existing record unchanged', () => {
    const state = createFakeState()
    saveToMemory(state, 'ana', { key: 'name', value: 'Ana' })
    const writesBefore = state.writes.length

    const result = loadMemory(state, 'ana')

    expect(result.memory.personal_details).toEqual({ name: 'Ana' })
    expect(state.writes.length).toBe(writesBefore)
  })

  test('save_to_memory routes well-known keys', () => {
    const state = createFakeState()

    expect(saveToMemory(state, 'ana', { key: 'name', value: 'Ana' })).toBe(
      '✓ Saved name to memory',
    )
    saveToMemory(state, 'ana', { key: 'interests', value: 'hiking' })
    saveToMemory(state, 'ana', { key: 'interests', value: 'chess' })
    saveToMemory(state, 'ana', { key: 'preferences', value: 'short answers' })
    saveToMemory(state, 'ana', { key: 'history', value: 'moved cities' })

    const memory = memoryOf(state, 'ana')
    expect(memory.personal_details).toEqual({ name: 'Ana' })
    expect(memory.interests).toEqual(['hiking', 'chess'])
    expect(memory.preferences).toEqual({ general: 'short answers' })
    expect(memory.history).toEqual(['moved cities'])
  })

  test('save_to_memory stores other keys at the top level, last write wins', () => {
    const state = createFakeState()

    saveToMemory(state, 'ana', { key: 'journal_entry', value: 'first' })
    saveToMemory(state, 'ana', { key: 'journal_entry', value: 'second' })

    expect(memoryOf(state, 'ana').journal_entry).toBe('second')
  })

  test('memories of different users stay separate', () => {
    const state = createFakeState()

    saveToMemory(state, 'ana', { key: 'name', value: 'Ana' })
    saveToMemory(state, 'ben', { key: 'name', value: 'Ben' })

    expect(memoryOf(state, 'ana').personal_details.name).toBe('Ana')
    expect(memoryOf(state, 'ben').personal_details.name).toBe('Ben')
  })

  test('save_therapeutic_pattern normalizes the trigger and records the outcome', () => {
    const state = createFakeState()
    const clock = fixedClock('2025-03-04T10:00:00.000Z')

    const helpful = saveTherapeuticPattern(
      state,
      'ana',
      { trigger: '  Stressed ', response: '4-7-8 breathing', helpful: true },
      clock,
    )
    const unhelpful = saveTherapeuticPattern(
      state,
      'ana',
      { trigger: 'stressed', response: 'short walk', helpful: false },
      clock,
    )

    expect(helpful).toBe("✓ Marked as helpful for '  Stressed '")
    expect(unhelpful).toBe(
      "✓ Marked as unhelpful for 'stressed' - will try different approach next time",
    )
    expect(memoryOf(state, 'ana').therapeutic_patterns.triggers).toEqual({
      stressed: {
        helpful_responses: [
          { response: '4-7-8 breathing', timestamp: '2025-03-04T10:00:00.000Z' },
        ],
        unhelpful_responses: [
          { response: 'short walk', timestamp: '2025-03-04T10:00:00.000Z' },
        ],
      },
    })
  })

  test('save_therapeutic_pattern accepts triggers named like object builtins', () => {
    const state = createFakeState()
    const clock = fixedClock('2025-03-04T10:00:00.000Z')
    const entry = { response: 'name it out loud', timestamp: '2025-03-04T10:00:00.000Z' }

    expect(
      saveTherapeuticPattern(
        state,
        'ana',
        { trigger: 'Constructor', response: 'name it out loud', helpful: true },
        clock,
      ),
    ).toBe("✓ Marked as helpful for 'Constructor'")
    expect(
      saveTherapeuticPattern(
        state,
        'ana',
        { trigger: '__proto__', response: 'name it out loud', helpful: false },
        clock,
      ),
    ).toBe(
      "✓ Marked as unhelpful for '__proto__' - will try different approach next time",
    )

    const stored = memoryOf(state, 'ana').therapeutic_patterns.triggers
    expect(Object.entries(stored)).toEqual([
      ['constructor', { helpful_responses: [entry], unhelpful_responses: [] }],
      ['__proto__', { helpful_responses: [], unhelpful_responses: [entry] }],
    ])

    const reloaded = normalizeUserMemory(
      JSON.parse(JSON.stringify(memoryOf(state, 'ana'))),
    ).therapeutic_patterns.triggers
    expect(Object.keys(reloaded)).toEqual(['constructor', '__proto__'])
  })

  test('normalizeUserMemory fills missing sections and drops malformed values', () => {
    const memory = normalizeUserMemory({
      personal_details: { name: 'Ana', age: 40 },
      interests: ['chess', 3],
      mood: 'calm',
    })

    expect(memory.personal_details).toEqual({ name: 'Ana' })
    expect(memory.interests).toEqual(['chess'])
    expect(memory.history).toEqual([])
    expect(memory.therapeutic_patterns).toEqual({
      triggers: {},
      preferred_styles: [],
      avoided_styles: [],
    })
    expect(memory.mood).toBe('calm')
  })
})

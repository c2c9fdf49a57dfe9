import { describe, expect, test } from 'vitest'

import {
  FALLBACK_USER_ID,
  USER_ID_STATE_KEY,
  ensureList,
  replaceAt,
  resolveStateUserId,
  resolveToolSession,
} from '@tools/assistant/sessionState'
import { createFakeState } from './helpers/fakeState'

describe('session state helpers', () => {
  test('reads the user id stored in session state', () => {
    expect(resolveStateUserId(createFakeState({ [USER_ID_STATE_KEY]: ' ana ' }))).toBe('ana')
    expect(resolveStateUserId(createFakeState())).toBe(FALLBACK_USER_ID)
    expect(resolveStateUserId(createFakeState({ [USER_ID_STATE_KEY]: 7 }))).toBe(
      FALLBACK_USER_ID,
    )
  })

  test('tools refuse to run without a session context', () => {
    expect(() => resolveToolSession('get_tasks', undefined)).toThrow(
      'Tool get_tasks was invoked without a session context',
    )
    const state = createFakeState({ [USER_ID_STATE_KEY]: 'ben' })
    expect(resolveToolSession('get_tasks', { state }).userId).toBe('ben')
  })

  test('ensureList only writes when the key is missing or malformed', () => {
    const state = createFakeState({ tasks: [1], goals: 'oops' })

    ensureList(state, 'tasks')
    ensureList(state, 'goals')
    ensureList(state, 'reminders')

    expect(state.writes).toEqual(['goals', 'reminders'])
    expect(state.data).toEqual({ tasks: [1], goals: [], reminders: [] })
  })

  test('replaceAt returns a new list', () => {
    const items = ['a', 'b', 'c']

    expect(replaceAt(items, 1, 'x')).toEqual(['a', 'x', 'c'])
    expect(items).toEqual(['a', 'b', 'c'])
  })
})

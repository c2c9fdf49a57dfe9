import { beforeEach, describe, expect, test } from 'vitest'

import {
  getRequestStatus,
  resetRequestStatusForTests,
  setRequestStatus,
  subscribeRequestStatus,
  type RequestStatus,
} from '@utils/session/requestStatus'
import { getRequestStatusLabel } from '@components/RequestStatusIndicator'

describe('request status', () => {
  beforeEach(() => {
    resetRequestStatusForTests()
  })

  test('keeps requestStartedAt across non-idle transitions', () => {
    setRequestStatus({ kind: 'thinking' })
    const start = getRequestStatus().requestStartedAt

    setRequestStatus({ kind: 'delegating', detail: 'task_manager' })
    setRequestStatus({ kind: 'tool', detail: 'create_task' })

    expect(start).not.toBeNull()
    expect(getRequestStatus().requestStartedAt).toBe(start)
  })

  test('clears requestStartedAt on idle', () => {
    setRequestStatus({ kind: 'thinking' })
    setRequestStatus({ kind: 'idle' })

    expect(getRequestStatus().requestStartedAt).toBeNull()
  })

  test('notifies subscribers until they unsubscribe', () => {
    const seen: string[] = []
    const unsubscribe = subscribeRequestStatus(status => seen.push(status.kind))

    setRequestStatus({ kind: 'thinking' })
    unsubscribe()
    setRequestStatus({ kind: 'idle' })

    expect(seen).toEqual(['thinking'])
  })

  test('labels statuses for the spinner', () => {
    const at = (status: Omit<RequestStatus, 'updatedAt' | 'requestStartedAt'>) =>
      getRequestStatusLabel({ ...status, updatedAt: 0, requestStartedAt: 0 })

    expect(at({ kind: 'thinking' })).toBe('Thinking')
    expect(at({ kind: 'delegating', detail: 'therapeutic_support' })).toBe('Listening')
    expect(at({ kind: 'delegating', detail: 'somebody_else' })).toBe('Working')
    expect(at({ kind: 'retrying', detail: '2/5' })).toBe('Retrying (2/5)')
    expect(at({ kind: 'tool', detail: 'get_tasks' })).toBe('Running tool: get_tasks')
  })
})

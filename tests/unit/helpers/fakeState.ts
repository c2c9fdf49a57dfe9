import type { SessionStateAccess } from '@tools/assistant/sessionState'

export type FakeState = SessionStateAccess & {
  data: Record<string, unknown>
  writes: string[]
}

export function createFakeState(initial: Record<string, unknown> = {}): FakeState {
  const data: Record<string, unknown> = { ...initial }
  const writes: string[] = []
  return {
    data,
    writes,
    get: key => data[key],
    set: (key, value) => {
      writes.push(key)
      data[key] = value
    },
  }
}

export function fixedClock(iso: string): () => Date {
  return () => new Date(iso)
}

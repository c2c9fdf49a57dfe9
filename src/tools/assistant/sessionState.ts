import type { z } from 'zod'

/**
 * The slice of ADK's session `State` the assistant tools rely on. Writes go
 * through `set` with a fresh value so the runner records a state delta;
 * mutating a value returned by `get` in place is not tracked.
 */
export interface SessionStateAccess {
  get(key: string): unknown
  set(key: string, value: unknown): void
}

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

export const USER_ID_STATE_KEY = 'assistant:user_id'
export const FALLBACK_USER_ID = 'local-user'

export const STATE_KEYS = {
  userMemories: 'user_memories',
  tasks: 'tasks',
  reminders: 'reminders',
  goals: 'goals',
} as const

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

export function readRawList(state: SessionStateAccess, key: string): unknown[] {
  const value = state.get(key)
  return Array.isArray(value) ? [...value] : []
}

export function readTypedList<T>(
  state: SessionStateAccess,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T[] {
  const items: T[] = []
  for (const raw of readRawList(state, key)) {
    const parsed = schema.safeParse(raw)
    if (parsed.success) items.push(parsed.data)
  }
  return items
}

export function ensureList(state: SessionStateAccess, key: string): void {
  if (!Array.isArray(state.get(key))) {
    state.set(key, [])
  }
}

export function resolveStateUserId(state: SessionStateAccess): string {
  const value = state.get(USER_ID_STATE_KEY)
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim()
  }
  return FALLBACK_USER_ID
}

export function resolveToolSession(
  toolName: string,
  toolContext: { state: SessionStateAccess } | undefined,
): { state: SessionStateAccess; userId: string } {
  if (!toolContext) {
    throw new Error(`Tool ${toolName} was invoked without a session context`)
  }
  return {
    state: toolContext.state,
    userId: resolveStateUserId(toolContext.state),
  }
}

export type OwnedRecordMatch<T> = {
  index: number
  record: T
  raw: Record<string, unknown>
}

export function findOwnedRecord<T extends { id: number; user_id: string }>(
  items: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  id: number,
  userId: string,
): OwnedRecordMatch<T> | null {
  for (let index = 0; index < items.length; index += 1) {
    const raw = items[index]
    if (!isRecord(raw)) continue
    const parsed = schema.safeParse(raw)
    if (parsed.success && parsed.data.id === id && parsed.data.user_id === userId) {
      return { index, record: parsed.data, raw }
    }
  }
  return null
}

export function replaceAt<T>(items: T[], index: number, value: T): T[] {
  return items.map((item, position) => (position === index ? value : item))
}

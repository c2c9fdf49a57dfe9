import { createHash } from 'crypto'
import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'fs'
import { join } from 'path'
import { ensureConfigSubdir } from '@core/config/paths'
import { debug as debugLogger } from '@utils/log/debugLogger'
import { logError } from '@utils/log'
import { isRecord } from '@tools/assistant/sessionState'
import { describeError } from '@services/ai/agents/resilience'

export type AssistantPersistedStateKey = {
  namespace: string
  conversationKey?: string
}

type ResolvedStateKey = {
  namespace: string
  conversationKey: string
}

type StateEnvelope = ResolvedStateKey & {
  version: 1
  savedAt: string
  state: Record<string, unknown>
}

const STATE_DIR_NAME = 'state'
const DEFAULT_KEY_PART = 'default'
const STATE_LOCK_TIMEOUT_MS = 2_000
const STATE_LOCK_STALE_MS = 45_000
const STATE_LOCK_RETRY_MS = 15

function normalizeConversationKey(conversationKey?: string): string {
  return conversationKey?.trim() || DEFAULT_KEY_PART
}

function normalizeNamespace(namespace: string): string {
  const safe = namespace
    .trim()
    .replace(/[^a-zA-Z0-9_-]/g, '_')
    .slice(0, 64)
  return safe || DEFAULT_KEY_PART
}

function resolveKey(key: AssistantPersistedStateKey): ResolvedStateKey {
  return {
    namespace: normalizeNamespace(key.namespace),
    conversationKey: normalizeConversationKey(key.conversationKey),
  }
}

function digestOf(key: ResolvedStateKey, length: number): string {
  return createHash('sha1')
    .update(`${key.namespace}::${key.conversationKey}`)
    .digest('hex')
    .slice(0, length)
}

function getStateFilePath(key: AssistantPersistedStateKey): string {
  const resolved = resolveKey(key)
  return join(
    ensureConfigSubdir(STATE_DIR_NAME),
    `${resolved.namespace}-${digestOf(resolved, 20)}.json`,
  )
}

function waitSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms)
}

function tryCreateLock(lockPath: string): boolean {
  try {
    mkdirSync(lockPath)
    return true
  } catch (error) {
    if (isRecord(error) && error.code === 'EEXIST') return false
    throw error
  }
}

function lockAgeMs(lockPath: string): number | undefined {
  try {
    return Date.now() - statSync(lockPath).mtimeMs
  } catch {
    // released between mkdir and stat
    return undefined
  }
}

/** Runs `work` while holding a directory lock next to the state file. */
function withStateLock<T>(filePath: string, work: () => T): T {
  const lockPath = `${filePath}.lock`
  const deadline = Date.now() + STATE_LOCK_TIMEOUT_MS

  while (!tryCreateLock(lockPath)) {
    const ageMs = lockAgeMs(lockPath)
    if (ageMs !== undefined && ageMs > STATE_LOCK_STALE_MS) {
      debugLogger.warn('ASSISTANT_STATE_LOCK_STALE', { lockPath, ageMs })
      rmSync(lockPath, { recursive: true, force: true })
      continue
    }
    if (Date.now() >= deadline) {
      throw new Error(`Timed out acquiring assistant state lock: ${lockPath}`)
    }
    waitSync(STATE_LOCK_RETRY_MS)
  }

  try {
    return work()
  } finally {
    rmSync(lockPath, { recursive: true, force: true })
  }
}

function replaceFile(filePath: string, contents: string): void {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`
  try {
    writeFileSync(tempPath, contents, 'utf8')
    renameSync(tempPath, filePath)
  } finally {
    rmSync(tempPath, { force: true })
  }
}

function toJsonRecord(state: Record<string, unknown> | undefined): Record<string, unknown> {
  try {
    const copy: unknown = JSON.parse(JSON.stringify(state ?? {}))
    return isRecord(copy) ? copy : {}
  } catch (error) {
    logError(error)
    debugLogger.warn('ASSISTANT_STATE_SERIALIZE_FAILED', {
      error: describeError(error),
    })
    return {}
  }
}

export function loadAssistantPersistedState(
  key: AssistantPersistedStateKey,
): Record<string, unknown> {
  const filePath = getStateFilePath(key)
  if (!existsSync(filePath)) return {}

  try {
    const envelope: unknown = JSON.parse(readFileSync(filePath, 'utf8'))
    return isRecord(envelope) && isRecord(envelope.state) ? envelope.state : {}
  } catch (error) {
    logError(error)
    debugLogger.warn('ASSISTANT_STATE_LOAD_FAILED', {
      filePath,
      error: describeError(error),
    })
    return {}
  }
}

export function saveAssistantPersistedState(
  key: AssistantPersistedStateKey,
  state: Record<string, unknown> | undefined,
): void {
  const filePath = getStateFilePath(key)
  const envelope: StateEnvelope = {
    ...resolveKey(key),
    version: 1,
    savedAt: new Date().toISOString(),
    state: toJsonRecord(state),
  }

  try {
    withStateLock(filePath, () =>
      replaceFile(filePath, JSON.stringify(envelope, null, 2)),
    )
  } catch (error) {
    logError(error)
    debugLogger.warn('ASSISTANT_STATE_SAVE_FAILED', {
      filePath,
      error: describeError(error),
    })
  }
}

/** Returns true when a persisted file existed and was removed. */
export function clearAssistantPersistedState(
  key: AssistantPersistedStateKey,
): boolean {
  const filePath = getStateFilePath(key)
  if (!existsSync(filePath)) return false

  withStateLock(filePath, () => rmSync(filePath, { force: true }))
  debugLogger.info('ASSISTANT_STATE_CLEARED', { filePath })
  return true
}

export function buildDeterministicAssistantSessionId(
  namespace: string,
  conversationKey?: string,
): string {
  return `hv_${digestOf(resolveKey({ namespace, conversationKey }), 28)}`
}

export const __testOnly = {
  normalizeConversationKey,
  normalizeNamespace,
  getStateFilePath,
  STATE_LOCK_STALE_MS,
}

import {
  InMemoryMemoryService,
  InMemorySessionService,
  Runner,
  type BaseAgent,
} from '@google/adk'
import type { Content } from '@google/genai'
import { ADK_APP_NAME } from '@constants/product'
import {
  AGENT_MODEL_KEYS,
  type GlobalConfig,
  type ModelSelection,
  type RetryOptions,
} from '@core/config/schema'
import { debug as debugLogger } from '@utils/log/debugLogger'
import { USER_ID_STATE_KEY, isRecord } from '@tools/assistant/sessionState'
import type { SessionStateAccess } from '@tools/assistant/sessionState'
import type {
  AssistantTurnProgress,
  AssistantTurnResult,
} from '@services/ai/types/assistant'
import { ROOT_AGENT_NAME } from '@services/ai/prompts/assistantPrompts'
import {
  buildAssistantAgentTree,
  computeRetryDelayWithOverload,
  describeError,
  maybeSwitchGeminiFailoverModel,
} from '@services/ai/agents'
import {
  buildDeterministicAssistantSessionId,
  clearAssistantPersistedState,
  loadAssistantPersistedState,
  saveAssistantPersistedState,
} from './assistantStateStore'
import {
  captureRunnerEventWithLifecycle,
  captureSyntheticTraceEvent,
  createEventTrace,
  extractEventText,
  extractFunctionResponseResultText,
  formatEventDiagnostics,
  getEventFunctionCalls,
  getEventFunctionResponses,
  maybeThrowOnLlmResponseError,
  type AssistantEventView,
  type EventTrace,
} from './assistantEvents'

const STATE_NAMESPACE = 'assistant'
const TEMP_STATE_PREFIX = 'temp:'
const CANCELLED_MESSAGE = 'Request cancelled by user'

const DEFAULT_ATTEMPT_TIMEOUT_MS = 120_000
const DEFAULT_GLOBAL_TIMEOUT_MS = 420_000
const DEFAULT_MAX_EVENTS = 200
const DEFAULT_MAX_TOOL_CALLS = 40

const TRANSIENT_ERROR_TOKENS = [
  'timeout',
  'timed out',
  'temporary',
  'temporarily unavailable',
  'network',
  'connection reset',
  'econn',
  'fetch failed',
  'overloaded',
  'service unavailable',
  'empty output',
]

// Status codes that count in an error message even when the config leaves them out.
const TRANSIENT_MESSAGE_STATUS_CODES = [429, 503]
const EXECUTION_BUDGET_MESSAGE = 'Assistant turn execution budget exceeded'

type ExecutionBudget = {
  startedAtMs: number
  deadlineAtMs: number
  maxRuntimeMs: number
  maxEvents: number
  maxToolCalls: number
  eventsSeen: number
  toolCallsSeen: number
}

/** The slice of a `Runner` the turn loop drives. */
export type AssistantEventSource = {
  runAsync(params: {
    userId: string
    sessionId: string
    newMessage: Content
  }): AsyncIterable<AssistantEventView>
}

export type AssistantEventSourceFactory = (params: {
  appName: string
  agent: BaseAgent
  sessionService: InMemorySessionService
  memoryService: InMemoryMemoryService
}) => AssistantEventSource

export type AssistantSession = {
  appName: string
  userId: string
  sessionId: string
  conversationKey: string
  persistState: boolean
  retry: RetryOptions
  models: ModelSelection
  apiKey?: string
  failoverUsed: boolean
  sessionService: InMemorySessionService
  memoryService: InMemoryMemoryService
  createEventSource: AssistantEventSourceFactory
  runner: AssistantEventSource
  lastTrace?: EventTrace
}

export type OpenAssistantSessionParams = {
  config: GlobalConfig
  apiKey?: string
  userId?: string
  persistState?: boolean
  /** Builds what runs the agent tree. Defaults to an ADK `Runner`. */
  createEventSource?: AssistantEventSourceFactory
}

export type QueryAssistantParams = {
  session: AssistantSession
  prompt: string
  signal?: AbortSignal
  onProgress?: (progress: AssistantTurnProgress) => void
}

function readPositiveIntEnv(name: string): number | undefined {
  const raw = process.env[name]
  if (!raw) return undefined
  const parsed = Number.parseInt(raw, 10)
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined
  return parsed
}

function readBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase()
  if (!raw) return defaultValue
  return !(raw === '0' || raw === 'false' || raw === 'off' || raw === 'no')
}

function isDeterministicModeEnabled(): boolean {
  return readBooleanEnv('HAVEN_DETERMINISTIC_MODE', false)
}

function getAttemptTimeoutMs(): number {
  return (
    readPositiveIntEnv('HAVEN_TURN_ATTEMPT_TIMEOUT_MS') ??
    DEFAULT_ATTEMPT_TIMEOUT_MS
  )
}

function getGlobalTimeoutMs(): number {
  return (
    readPositiveIntEnv('HAVEN_TURN_GLOBAL_TIMEOUT_MS') ?? DEFAULT_GLOBAL_TIMEOUT_MS
  )
}

function createExecutionBudget(): ExecutionBudget {
  const startedAtMs = Date.now()
  const maxRuntimeMs = getAttemptTimeoutMs()
  return {
    startedAtMs,
    deadlineAtMs: startedAtMs + maxRuntimeMs,
    maxRuntimeMs,
    maxEvents: readPositiveIntEnv('HAVEN_TURN_MAX_EVENTS') ?? DEFAULT_MAX_EVENTS,
    maxToolCalls:
      readPositiveIntEnv('HAVEN_TURN_MAX_TOOL_CALLS') ?? DEFAULT_MAX_TOOL_CALLS,
    eventsSeen: 0,
    toolCallsSeen: 0,
  }
}

function runtimeExceededMessage(budget: ExecutionBudget): string {
  return `${EXECUTION_BUDGET_MESSAGE}: runtime ${Date.now() - budget.startedAtMs}ms > ${budget.maxRuntimeMs}ms`
}

function enforceExecutionBudgetOrThrow(
  budget: ExecutionBudget,
  event: AssistantEventView,
): void {
  if (Date.now() > budget.deadlineAtMs) {
    throw new Error(runtimeExceededMessage(budget))
  }

  budget.eventsSeen += 1
  if (budget.eventsSeen > budget.maxEvents) {
    throw new Error(
      `${EXECUTION_BUDGET_MESSAGE}: events ${budget.eventsSeen} > ${budget.maxEvents}`,
    )
  }

  budget.toolCallsSeen += getEventFunctionCalls(event).length
  if (budget.toolCallsSeen > budget.maxToolCalls) {
    throw new Error(
      `${EXECUTION_BUDGET_MESSAGE}: tool_calls ${budget.toolCallsSeen} > ${budget.maxToolCalls}`,
    )
  }
}

function computeRetryDelayMs(params: {
  attempt: number
  retry: RetryOptions
  random?: () => number
}): number {
  const attempt = Math.max(0, Math.floor(params.attempt))
  const deterministic = isDeterministicModeEnabled()
  const jitterRatio = deterministic ? 0 : params.retry.jitterRatio
  const randomFn = params.random ?? (deterministic ? () => 0.5 : Math.random)
  const randomValue = Math.min(1, Math.max(0, randomFn()))

  const exponentialDelay = Math.min(
    params.retry.maxDelayMs,
    params.retry.initialDelayMs * params.retry.expBase ** Math.min(attempt, 10),
  )
  const jitterWindow = Math.max(
    0,
    Math.floor(exponentialDelay * Math.max(0, jitterRatio)),
  )
  const jitter = Math.floor((randomValue * 2 - 1) * jitterWindow)
  return Math.max(0, Math.round(exponentialDelay + jitter))
}

function createScopedAbortControl(params: {
  parentSignal?: AbortSignal
  timeoutMs: number
  timeoutErrorMessage: string
}): {
  signal: AbortSignal
  cleanup: () => void
  didTimeout: () => boolean
  timeoutErrorMessage: string
} {
  const controller = new AbortController()
  let timedOut = false
  const timer = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, Math.max(1, params.timeoutMs))

  const onParentAbort = () => controller.abort()
  if (params.parentSignal) {
    params.parentSignal.addEventListener('abort', onParentAbort, { once: true })
    if (params.parentSignal.aborted) {
      controller.abort()
    }
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      clearTimeout(timer)
      params.parentSignal?.removeEventListener('abort', onParentAbort)
    },
    didTimeout: () => timedOut,
    timeoutErrorMessage: params.timeoutErrorMessage,
  }
}

async function getNextRunnerEvent(params: {
  iterator: AsyncIterator<AssistantEventView>
  signal?: AbortSignal
  budget: ExecutionBudget
}): Promise<IteratorResult<AssistantEventView>> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined
  let onAbort: (() => void) | undefined

  const abortPromise = new Promise<IteratorResult<AssistantEventView>>(
    (_, reject) => {
      if (!params.signal) return
      if (params.signal.aborted) {
        reject(new Error(CANCELLED_MESSAGE))
        return
      }
      onAbort = () => reject(new Error(CANCELLED_MESSAGE))
      params.signal.addEventListener('abort', onAbort, { once: true })
    },
  )

  const timeoutPromise = new Promise<IteratorResult<AssistantEventView>>(
    (_, reject) => {
      const remainingMs = Math.max(0, params.budget.deadlineAtMs - Date.now())
      if (remainingMs <= 0) {
        reject(new Error(runtimeExceededMessage(params.budget)))
        return
      }
      timeoutId = setTimeout(() => {
        reject(new Error(runtimeExceededMessage(params.budget)))
      }, remainingMs)
    },
  )

  try {
    return await Promise.race([
      params.iterator.next(),
      abortPromise,
      timeoutPromise,
    ])
  } finally {
    if (timeoutId) clearTimeout(timeoutId)
    if (onAbort && params.signal) {
      params.signal.removeEventListener('abort', onAbort)
    }
  }
}

async function consumeRunnerEvents(params: {
  source: AssistantEventSource
  userId: string
  sessionId: string
  prompt: string
  signal?: AbortSignal
  budget: ExecutionBudget
  onEvent: (event: AssistantEventView) => void
}): Promise<void> {
  const stream = params.source.runAsync({
    userId: params.userId,
    sessionId: params.sessionId,
    newMessage: { role: 'user', parts: [{ text: params.prompt }] },
  })
  const iterator = stream[Symbol.asyncIterator]()

  try {
    while (true) {
      const nextResult = await getNextRunnerEvent({
        iterator,
        signal: params.signal,
        budget: params.budget,
      })
      if (nextResult.done) break

      const event = nextResult.value
      enforceExecutionBudgetOrThrow(params.budget, event)
      params.onEvent(event)
    }
  } finally {
    try {
      await iterator.return?.()
    } catch (error) {
      debugLogger.warn('ASSISTANT_EVENT_STREAM_CLOSE_FAILED', {
        error: describeError(error),
      })
    }
  }
}

function extractStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined
  for (const candidate of [error.status, error.code]) {
    if (typeof candidate === 'number') return candidate
    if (typeof candidate === 'string' && /^\d{3}$/.test(candidate.trim())) {
      return Number.parseInt(candidate, 10)
    }
  }
  return undefined
}

function isRetryableAssistantError(
  error: unknown,
  retry: Pick<RetryOptions, 'httpStatusCodes'>,
): boolean {
  const message = describeError(error).toLowerCase()
  if (message.includes(CANCELLED_MESSAGE.toLowerCase())) return false
  if (message.includes(EXECUTION_BUDGET_MESSAGE.toLowerCase())) return false

  const status = extractStatusCode(error)
  if (typeof status === 'number') {
    if (status === 408 || status === 409) return true
    if (retry.httpStatusCodes.includes(status)) return true
  }

  if (!message) return false
  const codes = [...retry.httpStatusCodes, ...TRANSIENT_MESSAGE_STATUS_CODES]
  if (new RegExp(`\\b(?:${codes.join('|')})\\b`).test(message)) {
    return true
  }
  return TRANSIENT_ERROR_TOKENS.some(token => message.includes(token))
}

async function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  if (!ms || ms <= 0) return
  await new Promise<void>((resolve, reject) => {
    let settled = false
    if (signal?.aborted) {
      reject(new Error(CANCELLED_MESSAGE))
      return
    }

    const timeout = setTimeout(() => {
      settled = true
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    const onAbort = () => {
      if (settled) return
      clearTimeout(timeout)
      signal?.removeEventListener('abort', onAbort)
      reject(new Error(CANCELLED_MESSAGE))
    }

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

function selectFailoverModels(
  models: ModelSelection,
  error: unknown,
): { models: ModelSelection; switched: boolean } {
  const next: ModelSelection = { ...models }
  let switched = false
  for (const key of AGENT_MODEL_KEYS) {
    const candidate = maybeSwitchGeminiFailoverModel({
      currentModelName: models[key],
      error,
      failoverAlreadyUsed: false,
    })
    if (candidate.switched) {
      next[key] = candidate.modelName
      switched = true
    }
  }
  return { models: next, switched }
}

const createAssistantRunner: AssistantEventSourceFactory = params =>
  new Runner({
    appName: params.appName,
    agent: params.agent,
    sessionService: params.sessionService,
    memoryService: params.memoryService,
  })

function toPersistableState(
  state: Record<string, unknown>,
): Record<string, unknown> {
  const persisted: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(state)) {
    if (key === USER_ID_STATE_KEY || key.startsWith(TEMP_STATE_PREFIX)) continue
    persisted[key] = value
  }
  return persisted
}

export async function openAssistantSession(
  params: OpenAssistantSessionParams,
): Promise<AssistantSession> {
  const userId = params.userId?.trim() || params.config.userId
  const persistState = params.persistState ?? params.config.persistState
  const conversationKey = userId
  const sessionId = buildDeterministicAssistantSessionId(
    STATE_NAMESPACE,
    conversationKey,
  )
  const initialState = persistState
    ? loadAssistantPersistedState({ namespace: STATE_NAMESPACE, conversationKey })
    : {}

  const tree = buildAssistantAgentTree({
    models: params.config.models,
    apiKey: params.apiKey,
  })
  const sessionService = new InMemorySessionService()
  const memoryService = new InMemoryMemoryService()
  const createEventSource = params.createEventSource ?? createAssistantRunner
  const runner = createEventSource({
    appName: ADK_APP_NAME,
    agent: tree.root,
    sessionService,
    memoryService,
  })

  await sessionService.createSession({
    appName: ADK_APP_NAME,
    userId,
    sessionId,
    state: { ...initialState, [USER_ID_STATE_KEY]: userId },
  })

  debugLogger.info('ASSISTANT_SESSION_OPENED', {
    appName: ADK_APP_NAME,
    userId,
    sessionId,
    persistState,
    restoredKeys: Object.keys(initialState).sort(),
  })

  return {
    appName: ADK_APP_NAME,
    userId,
    sessionId,
    conversationKey,
    persistState,
    retry: params.config.retry,
    models: tree.models,
    apiKey: params.apiKey,
    failoverUsed: false,
    sessionService,
    memoryService,
    createEventSource,
    runner,
  }
}

export async function getAssistantSessionState(
  session: AssistantSession,
): Promise<Record<string, unknown>> {
  const stored = await session.sessionService.getSession({
    appName: session.appName,
    userId: session.userId,
    sessionId: session.sessionId,
  })
  return stored && isRecord(stored.state) ? stored.state : {}
}

/**
 * Detached copy of the session state for local commands. Writes land in the
 * copy only and never reach the running session.
 */
export async function getAssistantStateSnapshot(
  session: AssistantSession,
): Promise<SessionStateAccess> {
  const state: Record<string, unknown> = {
    ...(await getAssistantSessionState(session)),
  }
  return {
    get: key => state[key],
    set: (key, value) => {
      state[key] = value
    },
  }
}

async function persistAssistantSessionState(
  session: AssistantSession,
): Promise<void> {
  if (!session.persistState) return
  try {
    const state = await getAssistantSessionState(session)
    saveAssistantPersistedState(
      { namespace: STATE_NAMESPACE, conversationKey: session.conversationKey },
      toPersistableState(state),
    )
  } catch (error) {
    debugLogger.warn('ASSISTANT_STATE_PERSIST_SNAPSHOT_FAILED', {
      conversationKey: session.conversationKey,
      error: describeError(error),
    })
  }
}

/**
 * Drops the persisted state for the session's user, then starts over with an
 * empty session under the same id. A failure to clear the file leaves the
 * running session untouched.
 */
export async function resetAssistantSession(
  session: AssistantSession,
): Promise<void> {
  clearAssistantPersistedState({
    namespace: STATE_NAMESPACE,
    conversationKey: session.conversationKey,
  })
  await session.sessionService.deleteSession({
    appName: session.appName,
    userId: session.userId,
    sessionId: session.sessionId,
  })
  await session.sessionService.createSession({
    appName: session.appName,
    userId: session.userId,
    sessionId: session.sessionId,
    state: { [USER_ID_STATE_KEY]: session.userId },
  })
  session.lastTrace = undefined
  debugLogger.info('ASSISTANT_SESSION_RESET', {
    userId: session.userId,
    sessionId: session.sessionId,
  })
}

export function clearPersistedStateForUser(userId: string): boolean {
  return clearAssistantPersistedState({
    namespace: STATE_NAMESPACE,
    conversationKey: userId,
  })
}

type SingleTurnResult = Omit<AssistantTurnResult, 'retriesUsed' | 'trace'>

async function runSingleTurnPass(params: {
  source: AssistantEventSource
  userId: string
  sessionId: string
  prompt: string
  signal?: AbortSignal
  trace: EventTrace
  onProgress?: (progress: AssistantTurnProgress) => void
}): Promise<SingleTurnResult> {
  const budget = createExecutionBudget()
  const agentsVisited: string[] = []
  const toolCalls: string[] = []
  let currentAuthor = ROOT_AGENT_NAME
  let finalText = ''
  let respondingAgent = ROOT_AGENT_NAME
  let fallbackText = ''
  let fallbackAgent = ROOT_AGENT_NAME
  let lastEvent: AssistantEventView | undefined

  await consumeRunnerEvents({
    source: params.source,
    userId: params.userId,
    sessionId: params.sessionId,
    prompt: params.prompt,
    signal: params.signal,
    budget,
    onEvent: event => {
      lastEvent = event
      captureRunnerEventWithLifecycle(params.trace, event)
      maybeThrowOnLlmResponseError(event)

      const author = event.author?.trim() ?? ''
      if (!author || author === 'user') return

      if (!agentsVisited.includes(author)) agentsVisited.push(author)
      if (author !== currentAuthor) {
        currentAuthor = author
        params.onProgress?.({ kind: 'delegating', agent: author })
      }

      for (const call of getEventFunctionCalls(event)) {
        const name = call.name ?? 'unknown'
        toolCalls.push(name)
        params.onProgress?.({ kind: 'tool', name })
      }

      if (event.partial === true) return

      const text = extractEventText(event)
      if (text) {
        finalText = text
        respondingAgent = author
        return
      }
      for (const response of getEventFunctionResponses(event)) {
        const resultText = extractFunctionResponseResultText(response)
        if (resultText) {
          fallbackText = resultText
          fallbackAgent = author
        }
      }
    },
  })

  const text = finalText || fallbackText
  if (!text) {
    throw new Error(
      `Assistant returned empty output.${formatEventDiagnostics(lastEvent)}`,
    )
  }

  return {
    text,
    respondingAgent: finalText ? respondingAgent : fallbackAgent,
    agentsVisited,
    toolCalls,
  }
}

function switchSessionToFailoverModels(
  session: AssistantSession,
  error: unknown,
): boolean {
  if (session.failoverUsed) return false
  const failover = selectFailoverModels(session.models, error)
  if (!failover.switched) return false

  const tree = buildAssistantAgentTree({
    models: failover.models,
    apiKey: session.apiKey,
  })
  session.runner = session.createEventSource({
    appName: session.appName,
    agent: tree.root,
    sessionService: session.sessionService,
    memoryService: session.memoryService,
  })
  session.models = tree.models
  session.failoverUsed = true
  debugLogger.warn('ASSISTANT_MODEL_FAILOVER', {
    models: tree.models,
    error: describeError(error),
  })
  return true
}

export async function queryAssistant(
  params: QueryAssistantParams,
): Promise<AssistantTurnResult> {
  const { session } = params
  const maxRetries = Math.max(0, session.retry.attempts - 1)
  const globalTimeoutMs = getGlobalTimeoutMs()
  const attemptTimeoutMs = getAttemptTimeoutMs()
  const globalControl = createScopedAbortControl({
    parentSignal: params.signal,
    timeoutMs: globalTimeoutMs,
    timeoutErrorMessage: `Assistant turn global timeout exceeded (${globalTimeoutMs}ms)`,
  })
  const effectiveSignal = globalControl.signal
  const trace = createEventTrace()
  session.lastTrace = trace

  debugLogger.api('ASSISTANT_TURN_START', {
    userId: session.userId,
    sessionId: session.sessionId,
    maxRetries,
    promptLength: params.prompt.length,
    globalTimeoutMs,
    attemptTimeoutMs,
  })
  captureSyntheticTraceEvent(trace, {
    kind: 'turn_start',
    text: 'Starting assistant turn',
    metadata: {
      sessionId: session.sessionId,
      models: session.models,
      deterministicMode: isDeterministicModeEnabled(),
    },
  })

  let retriesUsed = 0
  try {
    while (true) {
      const attemptControl = createScopedAbortControl({
        parentSignal: effectiveSignal,
        timeoutMs: attemptTimeoutMs,
        timeoutErrorMessage: `Assistant turn attempt timeout exceeded (${attemptTimeoutMs}ms)`,
      })
      try {
        const result = await runSingleTurnPass({
          source: session.runner,
          userId: session.userId,
          sessionId: session.sessionId,
          prompt: params.prompt,
          signal: attemptControl.signal,
          trace,
          onProgress: params.onProgress,
        })
        await persistAssistantSessionState(session)

        captureSyntheticTraceEvent(trace, {
          kind: 'turn_end',
          text: `Turn answered by ${result.respondingAgent}`,
          metadata: {
            agentsVisited: result.agentsVisited,
            toolCalls: result.toolCalls,
            retriesUsed,
          },
        })
        debugLogger.api('ASSISTANT_TURN_SUCCESS', {
          respondingAgent: result.respondingAgent,
          agentsVisited: result.agentsVisited,
          toolCalls: result.toolCalls,
          retriesUsed,
          outputLength: result.text.length,
        })

        return {
          ...result,
          retriesUsed,
          trace: { entries: trace.entries, droppedCount: trace.dropped.value },
        }
      } catch (error) {
        const normalizedError = attemptControl.didTimeout()
          ? new Error(attemptControl.timeoutErrorMessage)
          : error
        captureSyntheticTraceEvent(trace, {
          kind: 'error',
          text: describeError(normalizedError),
          metadata: { attempt: retriesUsed + 1 },
        })

        const shouldRetry =
          retriesUsed < maxRetries &&
          !effectiveSignal.aborted &&
          isRetryableAssistantError(normalizedError, session.retry)

        if (!shouldRetry) {
          const finalError = globalControl.didTimeout()
            ? new Error(globalControl.timeoutErrorMessage)
            : normalizedError
          debugLogger.error('ASSISTANT_TURN_FAILURE', {
            retriesUsed,
            error: describeError(finalError),
          })
          throw finalError
        }

        switchSessionToFailoverModels(session, normalizedError)
        const delayMs = computeRetryDelayWithOverload(
          computeRetryDelayMs({ attempt: retriesUsed, retry: session.retry }),
          normalizedError,
        )
        captureSyntheticTraceEvent(trace, {
          kind: 'retry',
          text: `Retry attempt ${retriesUsed + 2}/${maxRetries + 1}`,
          metadata: { delayMs, models: session.models },
        })
        debugLogger.warn('ASSISTANT_TURN_RETRY', {
          attempt: retriesUsed + 1,
          maxRetries,
          delayMs,
          error: describeError(normalizedError),
        })
        params.onProgress?.({
          kind: 'retry',
          attempt: retriesUsed + 2,
          totalAttempts: maxRetries + 1,
          delayMs,
        })
        await abortableDelay(delayMs, effectiveSignal)
        retriesUsed += 1
      } finally {
        attemptControl.cleanup()
      }
    }
  } finally {
    globalControl.cleanup()
  }
}

export const __testOnly = {
  STATE_NAMESPACE,
  createExecutionBudget,
  enforceExecutionBudgetOrThrow,
  computeRetryDelayMs,
  createScopedAbortControl,
  consumeRunnerEvents,
  runSingleTurnPass,
  extractStatusCode,
  isRetryableAssistantError,
  abortableDelay,
  selectFailoverModels,
  switchSessionToFailoverModels,
  toPersistableState,
}

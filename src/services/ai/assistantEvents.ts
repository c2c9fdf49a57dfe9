import { isRecord } from '@tools/assistant/sessionState'

const EVENT_TRACE_MAX_ENTRIES = 240
const RUNTIME_TRACE_AUTHOR = 'HavenRuntime'

type FunctionCallView = {
  name?: string
  args?: Record<string, unknown>
}

type FunctionResponseView = {
  name?: string
  response?: Record<string, unknown>
}

type PartView = {
  text?: string
  thought?: boolean
  functionCall?: FunctionCallView
  functionResponse?: FunctionResponseView
}

/**
 * The fields of a runner event the assistant reads. ADK's `Event` satisfies
 * this shape, and tests build plain objects against it.
 */
export type AssistantEventView = {
  id?: string
  invocationId?: string
  author?: string
  timestamp?: number
  branch?: string
  partial?: boolean
  content?: { role?: string; parts?: PartView[] }
  errorCode?: string
  errorMessage?: string
  interrupted?: boolean
  finishReason?: string
  actions?: {
    stateDelta?: Record<string, unknown>
    transferToAgent?: string
    escalate?: boolean
  }
}

export type TraceKind =
  | 'turn_start'
  | 'turn_end'
  | 'tool_start'
  | 'tool_end'
  | 'error'
  | 'retry'

export type DroppedCounter = { value: number }

export type EventTrace = {
  entries: Record<string, unknown>[]
  dropped: DroppedCounter
}

export function createEventTrace(): EventTrace {
  return { entries: [], dropped: { value: 0 } }
}

function eventParts(event: AssistantEventView): PartView[] {
  return event.content?.parts ?? []
}

export function getEventFunctionCalls(event: AssistantEventView): FunctionCallView[] {
  return eventParts(event).flatMap(part =>
    part.functionCall ? [part.functionCall] : [],
  )
}

export function getEventFunctionResponses(
  event: AssistantEventView,
): FunctionResponseView[] {
  return eventParts(event).flatMap(part =>
    part.functionResponse ? [part.functionResponse] : [],
  )
}

export function extractEventText(event: AssistantEventView): string {
  return eventParts(event)
    .filter(part => part.thought !== true && typeof part.text === 'string')
    .map(part => part.text ?? '')
    .join('')
    .trim()
}

export function extractFunctionResponseResultText(
  functionResponse: FunctionResponseView,
): string {
  const payload = functionResponse.response
  if (!payload) return ''

  const rawResult = payload.result ?? payload.output
  if (typeof rawResult === 'string') {
    return rawResult.trim()
  }
  if (!isRecord(rawResult) && !Array.isArray(rawResult)) {
    return ''
  }
  return JSON.stringify(rawResult)
}

export function extractBestEventText(event: AssistantEventView): string {
  const direct = extractEventText(event)
  if (direct.length > 0) return direct

  const responses = getEventFunctionResponses(event)
  for (let index = responses.length - 1; index >= 0; index -= 1) {
    const candidate = extractFunctionResponseResultText(responses[index])
    if (candidate.length > 0) return candidate
  }
  return ''
}

export function formatEventDiagnostics(event?: AssistantEventView): string {
  if (!event) return ''

  const diagnostics: Record<string, unknown> = {}
  if (event.author) diagnostics.author = event.author
  if (event.finishReason) diagnostics.finishReason = event.finishReason
  if (event.interrupted === true) diagnostics.interrupted = true

  const parts = eventParts(event)
  if (parts.length > 0) {
    diagnostics.partTypes = parts.slice(0, 8).map(part => {
      if (typeof part.text === 'string') return part.thought ? 'thought' : 'text'
      if (part.functionCall) return 'functionCall'
      if (part.functionResponse) return 'functionResponse'
      return 'unknown'
    })
  }

  if (Object.keys(diagnostics).length === 0) return ''
  return ` Diagnostics=${JSON.stringify(diagnostics)}`
}

export function maybeThrowOnLlmResponseError(event: AssistantEventView): void {
  if (event.interrupted === true) {
    throw new Error('LLM generation was interrupted.')
  }

  const errorMessage = event.errorMessage?.trim() ?? ''
  const errorCode = event.errorCode?.trim() ?? ''
  if (errorMessage || errorCode) {
    const prefix = errorCode ? `LLM error (${errorCode})` : 'LLM error'
    throw new Error(`${prefix}: ${errorMessage || 'Unknown error'}`)
  }

  // Safety blocks arrive as a final response with nothing in it.
  if (event.finishReason === 'SAFETY' && !extractEventText(event)) {
    throw new Error('LLM output was blocked by safety filters.')
  }
}

export function safePreview(text: string, maxLen = 180): string {
  const trimmed = text.trim()
  if (trimmed.length <= maxLen) return trimmed
  return `${trimmed.slice(0, maxLen)}...`
}

export function buildEventSnapshot(
  event: AssistantEventView,
): Record<string, unknown> {
  const text = extractEventText(event)
  const stateDelta = event.actions?.stateDelta ?? {}

  return {
    id: event.id,
    invocationId: event.invocationId,
    author: event.author || 'unknown',
    timestamp: event.timestamp,
    branch: event.branch,
    partial: event.partial === true,
    hasText: text.length > 0,
    textPreview: text.length > 0 ? safePreview(text) : undefined,
    functionCalls: getEventFunctionCalls(event).map(call => ({
      name: call.name,
      args: call.args ? Object.keys(call.args).sort() : [],
    })),
    functionResponses: getEventFunctionResponses(event).map(response => ({
      name: response.name,
      preview: safePreview(extractFunctionResponseResultText(response), 120),
    })),
    actions: {
      transferToAgent: event.actions?.transferToAgent,
      escalate: event.actions?.escalate === true,
      stateDeltaKeys: Object.keys(stateDelta).sort(),
    },
  }
}

let syntheticTraceSequence = 0

function pushTraceEntry(trace: EventTrace, entry: Record<string, unknown>): void {
  if (trace.entries.length >= EVENT_TRACE_MAX_ENTRIES) {
    trace.dropped.value += 1
    return
  }
  trace.entries.push(entry)
}

export function captureSyntheticTraceEvent(
  trace: EventTrace,
  params: {
    kind: TraceKind
    text: string
    metadata?: Record<string, unknown>
  },
): void {
  const now = Date.now()
  syntheticTraceSequence += 1
  pushTraceEntry(trace, {
    id: `synthetic-${params.kind}-${now}-${syntheticTraceSequence}`,
    author: RUNTIME_TRACE_AUTHOR,
    timestamp: now,
    synthetic: true,
    kind: params.kind,
    textPreview: safePreview(params.text),
    metadata: params.metadata ?? {},
  })
}

export function captureRunnerEventWithLifecycle(
  trace: EventTrace,
  event: AssistantEventView,
): void {
  pushTraceEntry(trace, buildEventSnapshot(event))

  for (const call of getEventFunctionCalls(event)) {
    captureSyntheticTraceEvent(trace, {
      kind: 'tool_start',
      text: `Tool start: ${call.name ?? 'unknown'}`,
      metadata: {
        toolName: call.name,
        agent: event.author,
        argsKeys: call.args ? Object.keys(call.args).sort() : [],
      },
    })
  }

  for (const response of getEventFunctionResponses(event)) {
    captureSyntheticTraceEvent(trace, {
      kind: 'tool_end',
      text: `Tool end: ${response.name ?? 'unknown'}`,
      metadata: {
        toolName: response.name,
        resultPreview: safePreview(extractFunctionResponseResultText(response), 160),
      },
    })
  }
}

export const __testOnly = {
  EVENT_TRACE_MAX_ENTRIES,
  RUNTIME_TRACE_AUTHOR,
}

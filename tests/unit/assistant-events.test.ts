import { describe, expect, test } from 'vitest'

import {
  __testOnly,
  buildEventSnapshot,
  captureRunnerEventWithLifecycle,
  captureSyntheticTraceEvent,
  createEventTrace,
  extractBestEventText,
  extractEventText,
  extractFunctionResponseResultText,
  formatEventDiagnostics,
  maybeThrowOnLlmResponseError,
  safePreview,
  type AssistantEventView,
} from '@services/ai/assistantEvents'

describe('assistant events', () => {
  test('extractEventText joins text parts and skips thoughts', () => {
    const event: AssistantEventView = {
      content: {
        parts: [
          { text: 'thinking...', thought: true },
          { text: ' Hello ' },
          { text: 'there ' },
        ],
      },
    }

    expect(extractEventText(event)).toBe('Hello there')
  })

  test('function response text prefers result, then output, and serializes objects', () => {
    expect(
      extractFunctionResponseResultText({ response: { result: '  ✓ done  ' } }),
    ).toBe('✓ done')
    expect(
      extractFunctionResponseResultText({ response: { output: { count: 2 } } }),
    ).toBe('{"count":2}')
    expect(extractFunctionResponseResultText({ response: { result: 3 } })).toBe('')
    expect(extractFunctionResponseResultText({})).toBe('')
  })

  test('extractBestEventText falls back to the last function response', () => {
    const event: AssistantEventView = {
      content: {
        parts: [
          { functionResponse: { name: 'get_tasks', response: { result: 'first' } } },
          { functionResponse: { name: 'get_reminders', response: { result: 'second' } } },
        ],
      },
    }

    expect(extractBestEventText(event)).toBe('second')
  })

  test('maybeThrowOnLlmResponseError maps error fields to messages', () => {
    expect(() => maybeThrowOnLlmResponseError({ interrupted: true })).toThrow(
      'LLM generation was interrupted.',
    )
    expect(() =>
      maybeThrowOnLlmResponseError({ errorCode: '503', errorMessage: 'overloaded' }),
    ).toThrow('LLM error (503): overloaded')
    expect(() => maybeThrowOnLlmResponseError({ errorMessage: 'boom' })).toThrow(
      'LLM error: boom',
    )
    expect(() => maybeThrowOnLlmResponseError({ finishReason: 'SAFETY' })).toThrow(
      'LLM output was blocked by safety filters.',
    )
    expect(() =>
      maybeThrowOnLlmResponseError({
        finishReason: 'SAFETY',
        content: { parts: [{ text: 'partial answer' }] },
      }),
    ).not.toThrow()
  })

  test('formatEventDiagnostics lists author and part types', () => {
    expect(formatEventDiagnostics(undefined)).toBe('')
    expect(
      formatEventDiagnostics({
        author: 'task_manager',
        content: { parts: [{ text: 'x', thought: true }, { functionCall: { name: 'a' } }] },
      }),
    ).toBe(' Diagnostics={"author":"task_manager","partTypes":["thought","functionCall"]}')
  })

  test('safePreview trims and truncates', () => {
    expect(safePreview('  short  ')).toBe('short')
    expect(safePreview('abcdef', 3)).toBe('abc...')
  })

  test('buildEventSnapshot summarizes calls, responses and actions', () => {
    const snapshot = buildEventSnapshot({
      id: 'e1',
      author: 'personal_assistant',
      content: {
        parts: [{ functionCall: { name: 'save_to_memory', args: { value: 'x', key: 'name' } } }],
      },
      actions: { transferToAgent: 'task_manager', stateDelta: { tasks: [], goals: [] } },
    })

    expect(snapshot).toEqual({
      id: 'e1',
      invocationId: undefined,
      author: 'personal_assistant',
      timestamp: undefined,
      branch: undefined,
      partial: false,
      hasText: false,
      textPreview: undefined,
      functionCalls: [{ name: 'save_to_memory', args: ['key', 'value'] }],
      functionResponses: [],
      actions: {
        transferToAgent: 'task_manager',
        escalate: false,
        stateDeltaKeys: ['goals', 'tasks'],
      },
    })
  })

  test('captureRunnerEventWithLifecycle adds tool start and end entries', () => {
    const trace = createEventTrace()

    captureRunnerEventWithLifecycle(trace, {
      author: 'task_manager',
      content: {
        parts: [
          { functionCall: { name: 'create_task', args: { title: 'x' } } },
          { functionResponse: { name: 'create_task', response: { result: '✓ Task created: x' } } },
        ],
      },
    })

    expect(trace.entries.map(entry => entry.kind ?? 'event')).toEqual([
      'event',
      'tool_start',
      'tool_end',
    ])
    expect(trace.entries[1]).toMatchObject({
      author: __testOnly.RUNTIME_TRACE_AUTHOR,
      synthetic: true,
      textPreview: 'Tool start: create_task',
      metadata: { toolName: 'create_task', agent: 'task_manager', argsKeys: ['title'] },
    })
    expect(trace.entries[2]).toMatchObject({
      textPreview: 'Tool end: create_task',
      metadata: { toolName: 'create_task', resultPreview: '✓ Task created: x' },
    })
  })

  test('trace stops growing at its cap and counts what it dropped', () => {
    const trace = createEventTrace()
    const total = __testOnly.EVENT_TRACE_MAX_ENTRIES + 5

    for (let index = 0; index < total; index += 1) {
      captureSyntheticTraceEvent(trace, { kind: 'retry', text: `retry ${index}` })
    }

    expect(trace.entries).toHaveLength(__testOnly.EVENT_TRACE_MAX_ENTRIES)
    expect(trace.dropped.value).toBe(5)
  })
})

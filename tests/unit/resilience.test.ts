import { describe, expect, test } from 'vitest'

import {
  MIN_OVERLOAD_RETRY_DELAY_MS,
  computeRetryDelayWithOverload,
  describeError,
  isModelOverloadError,
  maybeSwitchGeminiFailoverModel,
} from '@services/ai/agents/resilience'

describe('model resilience', () => {
  test('recognizes overload and quota errors', () => {
    expect(isModelOverloadError(new Error('503 Service Unavailable'))).toBe(true)
    expect(isModelOverloadError('The model is experiencing high demand')).toBe(true)
    expect(isModelOverloadError(new Error('RESOURCE_EXHAUSTED: quota exceeded'))).toBe(true)
    expect(isModelOverloadError(new Error('Invalid API key'))).toBe(false)
    expect(isModelOverloadError(undefined)).toBe(false)
  })

  test('raises the retry delay to the overload minimum', () => {
    expect(computeRetryDelayWithOverload(1_000, new Error('overloaded'))).toBe(
      MIN_OVERLOAD_RETRY_DELAY_MS,
    )
    expect(computeRetryDelayWithOverload(9_000, new Error('overloaded'))).toBe(9_000)
    expect(computeRetryDelayWithOverload(1_000, new Error('fetch failed'))).toBe(1_000)
  })

  test('switches to the twin model once', () => {
    expect(
      maybeSwitchGeminiFailoverModel({
        currentModelName: 'gemini-2.5-flash-lite',
        error: new Error('overloaded'),
        failoverAlreadyUsed: false,
      }),
    ).toEqual({ modelName: 'gemini-2.5-flash', switched: true })

    expect(
      maybeSwitchGeminiFailoverModel({
        currentModelName: 'gemini-2.5-flash-lite',
        error: new Error('overloaded'),
        failoverAlreadyUsed: true,
      }),
    ).toEqual({ modelName: 'gemini-2.5-flash-lite', switched: false })

    expect(
      maybeSwitchGeminiFailoverModel({
        currentModelName: 'gemini-2.5-flash-lite',
        error: new Error('bad request'),
        failoverAlreadyUsed: false,
      }),
    ).toEqual({ modelName: 'gemini-2.5-flash-lite', switched: false })
  })

  test('describes any thrown value', () => {
    expect(describeError(new Error('boom'))).toBe('boom')
    expect(describeError('plain')).toBe('plain')
    expect(describeError(null)).toBe('')
    expect(describeError(42)).toBe('42')
  })
})

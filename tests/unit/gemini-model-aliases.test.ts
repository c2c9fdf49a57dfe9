import { describe, expect, test } from 'vitest'

import {
  getGeminiFailoverTwinModelName,
  isKnownGeminiModelName,
  normalizeGeminiModelName,
} from '@utils/model/geminiAliases'

describe('gemini model aliases', () => {
  test('maps short aliases to canonical names', () => {
    expect(normalizeGeminiModelName('flash')).toBe('gemini-2.5-flash')
    expect(normalizeGeminiModelName(' Flash Lite ')).toBe('gemini-2.5-flash-lite')
    expect(normalizeGeminiModelName('gemini_pro')).toBe('gemini-2.5-pro')
  })

  test('passes unknown names through trimmed', () => {
    expect(normalizeGeminiModelName('  my-tuned-model ')).toBe('my-tuned-model')
    expect(isKnownGeminiModelName('my-tuned-model')).toBe(false)
    expect(isKnownGeminiModelName('gemini-2.0-flash')).toBe(true)
  })

  test('returns failover twins', () => {
    expect(getGeminiFailoverTwinModelName('flash-lite')).toBe('gemini-2.5-flash')
    expect(getGeminiFailoverTwinModelName('gemini-2.5-flash')).toBe('gemini-2.5-flash-lite')
    expect(getGeminiFailoverTwinModelName('gemini-2.0-flash-lite')).toBeNull()
  })
})

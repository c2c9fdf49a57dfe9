import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { DEFAULT_GLOBAL_CONFIG } from '@core/config/defaults'
import {
  exportApiKeyToEnvironment,
  resolveGeminiApiKey,
  sanitizeCandidateApiKey,
  validateGlobalConfig,
} from '@core/config/validator'

const ENV_KEYS = [
  'HAVEN_GEMINI_API_KEY',
  'GOOGLE_GENAI_API_KEY',
  'GEMINI_API_KEY',
  'GOOGLE_API_KEY',
] as const

describe('config validator', () => {
  const originalEnv = new Map(ENV_KEYS.map(key => [key, process.env[key]]))

  beforeEach(() => {
    for (const key of ENV_KEYS) delete process.env[key]
  })

  afterEach(() => {
    for (const [key, value] of originalEnv) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  })

  test('ignores placeholder keys', () => {
    expect(sanitizeCandidateApiKey('  test-key  ')).toBe('test-key')
    expect(sanitizeCandidateApiKey('YOUR_API_KEY_HERE')).toBe('')
    expect(sanitizeCandidateApiKey('please-replace_me')).toBe('')
    expect(sanitizeCandidateApiKey(undefined)).toBe('')
  })

  test('prefers the environment over the config file', () => {
    expect(resolveGeminiApiKey({ apiKey: 'test-key-file' })).toBe('test-key-file')

    process.env.GOOGLE_API_KEY = 'test-key-google'
    expect(resolveGeminiApiKey({ apiKey: 'test-key-file' })).toBe('test-key-google')

    process.env.HAVEN_GEMINI_API_KEY = 'test-key-haven'
    expect(resolveGeminiApiKey({ apiKey: 'test-key-file' })).toBe('test-key-haven')
  })

  test('exports the key without overwriting existing variables', () => {
    process.env.GEMINI_API_KEY = 'test-key-existing'

    exportApiKeyToEnvironment('test-key')

    expect(process.env.GEMINI_API_KEY).toBe('test-key-existing')
    expect(process.env.GOOGLE_GENAI_API_KEY).toBe('test-key')
  })

  test('a missing key is an error', () => {
    expect(validateGlobalConfig(DEFAULT_GLOBAL_CONFIG)).toEqual([
      {
        severity: 'error',
        message:
          'No Gemini API key found. Set GEMINI_API_KEY or add "apiKey" to the config file.',
      },
    ])
  })

  test('unknown models and disabled retries are warnings', () => {
    const issues = validateGlobalConfig({
      ...DEFAULT_GLOBAL_CONFIG,
      apiKey: 'test-key',
      models: { ...DEFAULT_GLOBAL_CONFIG.models, search: 'my-tuned-model' },
      retry: { ...DEFAULT_GLOBAL_CONFIG.retry, attempts: 1 },
    })

    expect(issues).toEqual([
      {
        severity: 'warning',
        message:
          'Unknown model "my-tuned-model" for the search agent; it will be passed to Gemini as-is.',
      },
      {
        severity: 'warning',
        message: 'retry.attempts is 1: failed turns will not be retried.',
      },
    ])
  })
})

import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'

import { getGlobalConfig, parseGlobalConfig } from '@core/config/loader'
import { DEFAULT_GLOBAL_CONFIG } from '@core/config/defaults'

const ENV_KEYS = [
  'HAVEN_USER_ID',
  'HAVEN_MODEL',
  'HAVEN_GOAL_MODEL',
  'HAVEN_PERSIST_STATE',
  'HAVEN_LOG_LEVEL',
] as const

describe('config loader', () => {
  let configDir = ''
  const originalConfigDir = process.env.HAVEN_CONFIG_DIR
  const originalEnv = new Map(ENV_KEYS.map(key => [key, process.env[key]]))

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'haven-config-'))
    process.env.HAVEN_CONFIG_DIR = configDir
    for (const key of ENV_KEYS) delete process.env[key]
  })

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true })
    process.env.HAVEN_CONFIG_DIR = originalConfigDir
    for (const [key, value] of originalEnv) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  })

  test('returns defaults when there is no config file', () => {
    const config = getGlobalConfig()

    expect(config).toEqual(DEFAULT_GLOBAL_CONFIG)
    expect(config.userId).toBe('local-user')
    expect(config.models.goal).toBe('gemini-2.0-flash')
    expect(config.retry.attempts).toBe(5)
    expect(config.persistState).toBe(true)
  })

  test('reads the file, migrates legacy fields and normalizes model aliases', () => {
    writeFileSync(
      join(configDir, 'config.json'),
      JSON.stringify({ user_id: 'ana', model: 'flash', persistState: false }),
    )

    const config = getGlobalConfig()

    expect(config.userId).toBe('ana')
    expect(config.persistState).toBe(false)
    expect(config.models.root).toBe('gemini-2.5-flash')
    expect(config.models.journal).toBe('gemini-2.5-flash')
  })

  test('environment variables win over the file', () => {
    writeFileSync(join(configDir, 'config.json'), JSON.stringify({ userId: 'ana' }))
    process.env.HAVEN_USER_ID = 'ben'
    process.env.HAVEN_MODEL = 'flash-lite'
    process.env.HAVEN_GOAL_MODEL = 'pro'
    process.env.HAVEN_PERSIST_STATE = 'off'
    process.env.HAVEN_LOG_LEVEL = 'WARN'

    const config = getGlobalConfig()

    expect(config.userId).toBe('ben')
    expect(config.models.task).toBe('gemini-2.5-flash-lite')
    expect(config.models.goal).toBe('gemini-2.5-pro')
    expect(config.persistState).toBe(false)
    expect(config.logLevel).toBe('warn')
  })

  test('falls back to defaults when the file is not valid JSON', () => {
    writeFileSync(join(configDir, 'config.json'), '{ nope')

    expect(getGlobalConfig()).toEqual(DEFAULT_GLOBAL_CONFIG)
  })

  test('rejects values outside the schema with the offending path', () => {
    expect(() => parseGlobalConfig({ retry: { attempts: 0 } })).toThrow(
      /retry\.attempts: /,
    )
  })
})

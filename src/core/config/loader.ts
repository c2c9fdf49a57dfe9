import { existsSync, readFileSync } from 'fs'
import { debug as debugLogger } from '@utils/log/debugLogger'
import { logError } from '@utils/log'
import { normalizeGeminiModelName } from '@utils/model/geminiAliases'
import { applyConfigMigrations } from './migrations'
import { getConfigFilePath } from './paths'
import {
  AGENT_MODEL_KEYS,
  GlobalConfigSchema,
  LOG_LEVELS,
  type GlobalConfig,
} from './schema'

type RawConfig = Record<string, unknown>

function readRawConfigFile(filePath: string): RawConfig {
  if (!existsSync(filePath)) return {}

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf8'))
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      debugLogger.warn('CONFIG_FILE_NOT_AN_OBJECT', { filePath })
      return {}
    }
    return { ...parsed }
  } catch (error) {
    logError(error)
    debugLogger.warn('CONFIG_FILE_READ_FAILED', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    })
    return {}
  }
}

function readBooleanEnv(name: string): boolean | undefined {
  const raw = process.env[name]?.trim().toLowerCase()
  if (!raw) return undefined
  return !(raw === '0' || raw === 'false' || raw === 'off' || raw === 'no')
}

function applyEnvOverrides(config: RawConfig): RawConfig {
  const next: RawConfig = { ...config }

  const userId = process.env.HAVEN_USER_ID?.trim()
  if (userId) next.userId = userId

  const models: Record<string, unknown> =
    next.models && typeof next.models === 'object' && !Array.isArray(next.models)
      ? { ...next.models }
      : {}
  const allModels = process.env.HAVEN_MODEL?.trim()
  for (const key of AGENT_MODEL_KEYS) {
    const byAgent = process.env[`HAVEN_${key.toUpperCase()}_MODEL`]?.trim()
    if (byAgent) {
      models[key] = byAgent
    } else if (allModels) {
      models[key] = allModels
    }
  }
  next.models = models

  const persistState = readBooleanEnv('HAVEN_PERSIST_STATE')
  if (persistState !== undefined) next.persistState = persistState

  const logLevel = process.env.HAVEN_LOG_LEVEL?.trim().toLowerCase()
  if (logLevel && LOG_LEVELS.some(level => level === logLevel)) {
    next.logLevel = logLevel
  }

  return next
}

function normalizeModels(config: GlobalConfig): GlobalConfig {
  const models = { ...config.models }
  for (const key of AGENT_MODEL_KEYS) {
    models[key] = normalizeGeminiModelName(models[key])
  }
  return { ...config, models }
}

export function parseGlobalConfig(raw: RawConfig): GlobalConfig {
  const result = GlobalConfigSchema.safeParse(raw)
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid ${getConfigFilePath()}: ${details}`)
  }
  return normalizeModels(result.data)
}

export function getGlobalConfig(): GlobalConfig {
  const filePath = getConfigFilePath()
  const raw = applyEnvOverrides(applyConfigMigrations(readRawConfigFile(filePath)))
  return parseGlobalConfig(raw)
}

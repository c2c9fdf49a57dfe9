import { AGENT_MODEL_KEYS } from './schema'

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

function readFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

export function migrateLegacyModelField(config: RawConfig): RawConfig {
  const legacyModel = typeof config.model === 'string' ? config.model.trim() : ''
  if (!legacyModel) return config

  const existingModels = isRecord(config.models) ? config.models : {}
  const models: Record<string, unknown> = {}
  for (const key of AGENT_MODEL_KEYS) {
    models[key] = existingModels[key] ?? legacyModel
  }

  const { model: _legacy, ...rest } = config
  return { ...rest, models }
}

export function migrateSnakeCaseRetryOptions(config: RawConfig): RawConfig {
  const legacy = config.retry_options
  if (!isRecord(legacy)) return config

  const existingRetry = isRecord(config.retry) ? config.retry : {}
  const retry: Record<string, unknown> = { ...existingRetry }

  const attempts = readFiniteNumber(legacy.attempts)
  if (attempts !== undefined && retry.attempts === undefined) {
    retry.attempts = Math.floor(attempts)
  }
  const expBase = readFiniteNumber(legacy.exp_base)
  if (expBase !== undefined && retry.expBase === undefined) {
    retry.expBase = expBase
  }
  // legacy initial_delay is expressed in seconds
  const initialDelay = readFiniteNumber(legacy.initial_delay)
  if (initialDelay !== undefined && retry.initialDelayMs === undefined) {
    retry.initialDelayMs = Math.round(initialDelay * 1_000)
  }
  if (
    Array.isArray(legacy.http_status_codes) &&
    retry.httpStatusCodes === undefined
  ) {
    retry.httpStatusCodes = legacy.http_status_codes
      .map(readFiniteNumber)
      .filter((code): code is number => code !== undefined)
      .map(code => Math.floor(code))
  }

  const { retry_options: _legacy, ...rest } = config
  return { ...rest, retry }
}

export function migrateSnakeCaseUserId(config: RawConfig): RawConfig {
  if (typeof config.user_id !== 'string') return config

  const { user_id: legacyUserId, ...rest } = config
  if (typeof rest.userId === 'string' && rest.userId.trim()) {
    return rest
  }
  return { ...rest, userId: legacyUserId }
}

export function applyConfigMigrations(config: RawConfig): RawConfig {
  const migrated = migrateSnakeCaseUserId(
    migrateSnakeCaseRetryOptions(migrateLegacyModelField(config)),
  )
  if (migrated.version === undefined || migrated.version === 0) {
    return { ...migrated, version: 1 }
  }
  return migrated
}

import { debug as debugLogger } from '@utils/log/debugLogger'
import { isKnownGeminiModelName } from '@utils/model/geminiAliases'
import { AGENT_MODEL_KEYS, type GlobalConfig } from './schema'

const API_KEY_ENV_NAMES = [
  'HAVEN_GEMINI_API_KEY',
  'GOOGLE_GENAI_API_KEY',
  'GEMINI_API_KEY',
  'GOOGLE_API_KEY',
] as const

export type ConfigIssue = {
  severity: 'error' | 'warning'
  message: string
}

export function sanitizeCandidateApiKey(value: string | undefined): string {
  const cleaned = String(value || '').trim()
  if (!cleaned) return ''
  const lower = cleaned.toLowerCase()
  if (
    lower === 'your_api_key_here' ||
    lower.includes('replace_me') ||
    lower.includes('changeme')
  ) {
    return ''
  }
  return cleaned
}

export function resolveGeminiApiKey(config: Pick<GlobalConfig, 'apiKey'>): string {
  for (const name of API_KEY_ENV_NAMES) {
    const candidate = sanitizeCandidateApiKey(process.env[name])
    if (candidate) return candidate
  }
  return sanitizeCandidateApiKey(config.apiKey)
}

export function exportApiKeyToEnvironment(apiKey: string): void {
  if (!apiKey) return
  if (!process.env.GEMINI_API_KEY) {
    process.env.GEMINI_API_KEY = apiKey
  }
  if (!process.env.GOOGLE_GENAI_API_KEY) {
    process.env.GOOGLE_GENAI_API_KEY = apiKey
  }
}

export function validateGlobalConfig(config: GlobalConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = []

  if (!resolveGeminiApiKey(config)) {
    issues.push({
      severity: 'error',
      message: `No Gemini API key found. Set GEMINI_API_KEY or add "apiKey" to the config file.`,
    })
  }

  for (const key of AGENT_MODEL_KEYS) {
    const modelName = config.models[key]
    if (!isKnownGeminiModelName(modelName)) {
      issues.push({
        severity: 'warning',
        message: `Unknown model "${modelName}" for the ${key} agent; it will be passed to Gemini as-is.`,
      })
    }
  }

  if (config.retry.attempts <= 1) {
    issues.push({
      severity: 'warning',
      message: 'retry.attempts is 1: failed turns will not be retried.',
    })
  }

  if (issues.length > 0) {
    debugLogger.warn('CONFIG_VALIDATION_ISSUES', {
      issues: issues.map(issue => `${issue.severity}: ${issue.message}`),
    })
  }

  return issues
}

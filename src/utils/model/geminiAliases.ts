const GEMINI_ALIAS_TO_CANONICAL: Record<string, string> = {
  'flash-lite': 'gemini-2.5-flash-lite',
  'gemini-flash-lite': 'gemini-2.5-flash-lite',
  'gemini-2.5-flash-lite': 'gemini-2.5-flash-lite',
  'gemini2.5-flash-lite': 'gemini-2.5-flash-lite',
  flash: 'gemini-2.5-flash',
  'gemini-flash': 'gemini-2.5-flash',
  'gemini-2.5-flash': 'gemini-2.5-flash',
  'gemini2.5-flash': 'gemini-2.5-flash',
  'gemini-2.0-flash': 'gemini-2.0-flash',
  'gemini2-flash': 'gemini-2.0-flash',
  'gemini-2.0-flash-lite': 'gemini-2.0-flash-lite',
  pro: 'gemini-2.5-pro',
  'gemini-pro': 'gemini-2.5-pro',
  'gemini-2.5-pro': 'gemini-2.5-pro',
}

const KNOWN_GEMINI_MODELS = new Set(Object.values(GEMINI_ALIAS_TO_CANONICAL))

const GEMINI_FAILOVER_TWINS: Record<string, string> = {
  'gemini-2.5-flash-lite': 'gemini-2.5-flash',
  'gemini-2.5-flash': 'gemini-2.5-flash-lite',
  'gemini-2.0-flash': 'gemini-2.0-flash-lite',
  'gemini-2.5-pro': 'gemini-2.5-flash',
}

function normalizeAliasKey(value: string): string {
  return value.trim().toLowerCase().replace(/[_\s]+/g, '-')
}

export function normalizeGeminiModelName(modelName: string): string {
  const trimmed = modelName.trim()
  if (!trimmed) return modelName

  const aliasKey = normalizeAliasKey(trimmed)
  return GEMINI_ALIAS_TO_CANONICAL[aliasKey] || trimmed
}

export function isKnownGeminiModelName(modelName: string): boolean {
  return KNOWN_GEMINI_MODELS.has(normalizeGeminiModelName(modelName))
}

export function getGeminiFailoverTwinModelName(
  modelName: string,
): string | null {
  const canonical = normalizeGeminiModelName(modelName)
  return GEMINI_FAILOVER_TWINS[canonical] || null
}

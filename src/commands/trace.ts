import type { Command } from '@commands'
import { isRecord } from '@tools/assistant/sessionState'

const DEFAULT_TAIL = 40

function parseCount(raw: string | undefined, fallback: number, max = 240): number {
  if (!raw) return fallback
  const parsed = Number.parseInt(raw, 10)
  if (!Number.isFinite(parsed)) return fallback
  return Math.max(1, Math.min(max, parsed))
}

function countOf(value: unknown): number {
  return Array.isArray(value) ? value.length : 0
}

export function formatTraceLine(event: Record<string, unknown>, index: number): string {
  const kind =
    typeof event.kind === 'string' && event.kind.trim().length > 0
      ? event.kind.trim()
      : 'event'
  const author =
    typeof event.author === 'string' && event.author.trim().length > 0
      ? event.author
      : 'unknown'
  const partial = event.partial === true ? ' [partial]' : ''
  const transferToAgent = isRecord(event.actions)
    ? event.actions.transferToAgent
    : undefined
  const transfer =
    typeof transferToAgent === 'string' && transferToAgent.length > 0
      ? ` -> ${transferToAgent}`
      : ''
  const counts =
    event.synthetic === true
      ? ''
      : ` calls:${countOf(event.functionCalls)} responses:${countOf(event.functionResponses)}`
  const preview =
    typeof event.textPreview === 'string' && event.textPreview.trim().length > 0
      ? ` | ${event.textPreview}`
      : ''

  return `⎿    ${index}. ${kind} ${author}${partial}${counts}${transfer}${preview}`
}

const trace = {
  type: 'local',
  name: 'trace',
  description: 'Show the event trace of the last assistant turn',
  argumentHint: '[count]',
  isEnabled: true,
  isHidden: false,
  userFacingName() {
    return 'trace'
  },
  async call(args, context) {
    const lastTrace = context.session.lastTrace
    if (!lastTrace || lastTrace.entries.length === 0) {
      return '⎿  No trace yet. Send a message first.'
    }

    const tail = parseCount(args.trim() || undefined, DEFAULT_TAIL)
    const entries = lastTrace.entries
    const start = Math.max(0, entries.length - tail)
    const header = [
      `⎿  Last turn: ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}` +
        (lastTrace.dropped.value > 0 ? `, ${lastTrace.dropped.value} dropped` : '') +
        (start > 0 ? ` (showing last ${entries.length - start})` : ''),
    ]
    const lines = entries
      .slice(start)
      .map((event, offset) => formatTraceLine(event, start + offset + 1))
    return [...header, ...lines].join('\n')
  },
} satisfies Command

export default trace

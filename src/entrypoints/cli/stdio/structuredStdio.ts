import type { AssistantTurnProgress } from '@services/ai/types/assistant'

export type StructuredStdioRecord =
  | {
      type: 'system'
      subtype: 'init'
      sessionId: string
      userId: string
      models: Record<string, string>
    }
  | { type: 'progress'; progress: AssistantTurnProgress }
  | {
      type: 'result'
      subtype: 'success'
      text: string
      respondingAgent: string
      agentsVisited: string[]
      toolCalls: string[]
      retriesUsed: number
      durationMs: number
    }
  | { type: 'result'; subtype: 'command'; command: string; text: string }
  | { type: 'result'; subtype: 'error'; error: string; durationMs: number }

type LineSink = { write(chunk: string): unknown }

/** Writes one JSON object per line; nothing else goes to stdout in print mode. */
export class HavenStructuredStdio {
  constructor(private readonly stdout: LineSink) {}

  write(record: StructuredStdioRecord): void {
    this.stdout.write(`${JSON.stringify(record)}\n`)
  }
}

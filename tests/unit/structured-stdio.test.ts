import { describe, expect, test } from 'vitest'

import { HavenStructuredStdio } from '../../src/entrypoints/cli/stdio/structuredStdio'

describe('structured stdio', () => {
  test('writes one JSON record per line', () => {
    const chunks: string[] = []
    const stdio = new HavenStructuredStdio({ write: chunk => chunks.push(chunk) })

    stdio.write({ type: 'progress', progress: { kind: 'tool', name: 'get_tasks' } })
    stdio.write({
      type: 'result',
      subtype: 'error',
      error: 'LLM error (503): overloaded',
      durationMs: 12,
    })

    expect(chunks).toEqual([
      '{"type":"progress","progress":{"kind":"tool","name":"get_tasks"}}\n',
      '{"type":"result","subtype":"error","error":"LLM error (503): overloaded","durationMs":12}\n',
    ])
  })
})

#!/usr/bin/env tsx
import { Command } from 'commander'
import { render } from 'ink'
import React from 'react'
import { z } from 'zod'
import { MACRO } from '@constants/macros'
import { PRODUCT_COMMAND } from '@constants/product'
import { runSlashCommand } from '@app/query'
import { isSlashCommandInput } from '@commands'
import { getGlobalConfig } from '@core/config/loader'
import { AGENT_MODEL_KEYS, type GlobalConfig } from '@core/config/schema'
import {
  exportApiKeyToEnvironment,
  resolveGeminiApiKey,
  validateGlobalConfig,
} from '@core/config/validator'
import {
  clearPersistedStateForUser,
  openAssistantSession,
  queryAssistant,
} from '@services/ai/assistantRuntime'
import { HavenStructuredStdio } from './cli/stdio/structuredStdio'
import { Chat } from '@screens/Chat'
import { logError } from '@utils/log'
import { debug as debugLogger, resetLogFiles, setLogLevel } from '@utils/log/debugLogger'
import { normalizeGeminiModelName } from '@utils/model/geminiAliases'

const CliOptionsSchema = z.object({
  user: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).optional(),
  print: z.boolean().default(false),
  persist: z.boolean().default(true),
  reset: z.boolean().default(false),
})

type CliOptions = z.infer<typeof CliOptionsSchema>

function applyCliOverrides(config: GlobalConfig, options: CliOptions): GlobalConfig {
  const next: GlobalConfig = {
    ...config,
    userId: options.user ?? config.userId,
    persistState: options.persist && config.persistState,
  }
  if (options.model) {
    const model = normalizeGeminiModelName(options.model)
    const models = { ...config.models }
    for (const key of AGENT_MODEL_KEYS) {
      models[key] = model
    }
    next.models = models
  }
  return next
}

async function runPrintMode(params: {
  prompt: string
  config: GlobalConfig
  apiKey: string
}): Promise<number> {
  const stdio = new HavenStructuredStdio(process.stdout)
  const session = await openAssistantSession({
    config: params.config,
    apiKey: params.apiKey,
  })
  stdio.write({
    type: 'system',
    subtype: 'init',
    sessionId: session.sessionId,
    userId: session.userId,
    models: session.models,
  })

  const startedAt = Date.now()
  if (isSlashCommandInput(params.prompt)) {
    const message = await runSlashCommand(params.prompt, {
      session,
      exit: () => {},
    })
    if (message.type === 'error') {
      stdio.write({
        type: 'result',
        subtype: 'error',
        error: message.text,
        durationMs: Date.now() - startedAt,
      })
      return 1
    }
    stdio.write({
      type: 'result',
      subtype: 'command',
      command: message.command,
      text: message.text,
    })
    return 0
  }

  try {
    const result = await queryAssistant({
      session,
      prompt: params.prompt,
      onProgress: progress => stdio.write({ type: 'progress', progress }),
    })
    stdio.write({
      type: 'result',
      subtype: 'success',
      text: result.text,
      respondingAgent: result.respondingAgent,
      agentsVisited: result.agentsVisited,
      toolCalls: result.toolCalls,
      retriesUsed: result.retriesUsed,
      durationMs: Date.now() - startedAt,
    })
    return 0
  } catch (error) {
    logError(error)
    stdio.write({
      type: 'result',
      subtype: 'error',
      error: error instanceof Error ? error.message : String(error),
      durationMs: Date.now() - startedAt,
    })
    return 1
  }
}

async function main(): Promise<void> {
  const program = new Command()
  program
    .name(PRODUCT_COMMAND)
    .description(MACRO.DESCRIPTION)
    .version(MACRO.VERSION)
    .argument('[prompt...]', 'send this message first')
    .option('-u, --user <id>', 'user id whose memory, tasks and goals are used')
    .option('-m, --model <name>', 'Gemini model for every agent')
    .option('-p, --print', 'answer a single prompt as JSON lines and exit')
    .option('--no-persist', 'keep state in memory only')
    .option('--reset', 'clear the saved state for this user before starting')
    .parse(process.argv)

  const options = CliOptionsSchema.parse(program.opts())
  const promptWords: string[] = program.args
  const prompt = promptWords.join(' ').trim()

  if (!options.print) {
    resetLogFiles()
  }

  const config = applyCliOverrides(getGlobalConfig(), options)
  setLogLevel(config.logLevel)

  const apiKey = resolveGeminiApiKey(config)
  const issues = validateGlobalConfig(config)
  const errors = issues.filter(issue => issue.severity === 'error')
  if (errors.length > 0) {
    for (const issue of errors) {
      process.stderr.write(`${issue.message}\n`)
    }
    process.exitCode = 1
    return
  }
  exportApiKeyToEnvironment(apiKey)

  if (options.reset) {
    const cleared = clearPersistedStateForUser(config.userId)
    debugLogger.info('CLI_STATE_RESET', { userId: config.userId, cleared })
  }

  if (options.print) {
    if (!prompt) {
      process.stderr.write('--print needs a prompt.\n')
      process.exitCode = 1
      return
    }
    process.exitCode = await runPrintMode({ prompt, config, apiKey })
    return
  }

  const session = await openAssistantSession({ config, apiKey })
  const warnings = issues.filter(issue => issue.severity === 'warning')
  const { waitUntilExit } = render(
    <Chat session={session} warnings={warnings} initialPrompt={prompt} />,
    { exitOnCtrlC: false },
  )
  await waitUntilExit()
}

main().catch(error => {
  logError(error)
  process.stderr.write(
    `${error instanceof Error ? error.message : String(error)}\n`,
  )
  process.exitCode = 1
})

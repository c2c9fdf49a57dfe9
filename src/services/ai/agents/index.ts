import { Gemini, type LlmAgent } from '@google/adk'
import type { AgentModelKey, ModelSelection } from '@core/config/schema'
import { debug as debugLogger } from '@utils/log/debugLogger'
import { createGoalRefinementAgent } from './goalRefinementAgent'
import { createJournalAgent } from './journalAgent'
import { createRootAgent } from './rootAgent'
import { createSearchAgent } from './searchAgent'
import { createTaskAgent } from './taskAgent'
import { createTherapeuticAgent } from './therapeuticAgent'

const AGENT_LABELS: Record<AgentModelKey, string> = {
  root: 'root orchestrator',
  therapeutic: 'therapeutic support',
  task: 'task management',
  goal: 'goal refinement',
  search: 'search',
  journal: 'journal analysis',
}

export type AssistantAgentTreeOptions = {
  models: ModelSelection
  apiKey?: string
}

export type AssistantAgentTree = {
  root: LlmAgent
  models: ModelSelection
}

export function buildAssistantAgentTree(
  options: AssistantAgentTreeOptions,
): AssistantAgentTree {
  const apiKey = options.apiKey?.trim() || undefined
  const modelCache = new Map<string, Gemini>()
  const modelFor = (key: AgentModelKey): Gemini => {
    const modelName = options.models[key]
    debugLogger.debug('AGENT_INIT', {
      message: `Initializing ${AGENT_LABELS[key]} agent`,
      model: modelName,
    })
    const cached = modelCache.get(modelName)
    if (cached) return cached
    const model = new Gemini({ model: modelName, apiKey })
    modelCache.set(modelName, model)
    return model
  }

  const subAgents = [
    createTherapeuticAgent(modelFor('therapeutic')),
    createTaskAgent(modelFor('task')),
    createGoalRefinementAgent(modelFor('goal')),
    createSearchAgent(modelFor('search')),
    createJournalAgent(modelFor('journal')),
  ]
  const root = createRootAgent(modelFor('root'), subAgents)

  debugLogger.info('ASSISTANT_AGENT_TREE_BUILT', {
    root: root.name,
    subAgents: subAgents.map(agent => agent.name),
    models: options.models,
  })

  return { root, models: options.models }
}

export {
  computeRetryDelayWithOverload,
  describeError,
  isModelOverloadError,
  maybeSwitchGeminiFailoverModel,
} from './resilience'

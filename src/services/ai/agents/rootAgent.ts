import { LlmAgent, type BaseAgent, type Gemini } from '@google/adk'
import {
  ROOT_AGENT_INSTRUCTION,
  ROOT_AGENT_NAME,
} from '@services/ai/prompts/assistantPrompts'
import { loadMemoryTool, saveToMemoryTool } from '@tools/assistant'

export function createRootAgent(model: Gemini, subAgents: BaseAgent[]): LlmAgent {
  return new LlmAgent({
    name: ROOT_AGENT_NAME,
    model,
    description:
      'Personal assistant for emotional wellbeing, task management, goal setting and daily support.',
    instruction: ROOT_AGENT_INSTRUCTION,
    tools: [loadMemoryTool, saveToMemoryTool],
    subAgents,
  })
}

import { LlmAgent, type Gemini } from '@google/adk'
import {
  THERAPEUTIC_AGENT_INSTRUCTION,
  THERAPEUTIC_AGENT_NAME,
} from '@services/ai/prompts/assistantPrompts'
import { loadMemoryTool, saveTherapeuticPatternTool } from '@tools/assistant'

export function createTherapeuticAgent(model: Gemini): LlmAgent {
  return new LlmAgent({
    name: THERAPEUTIC_AGENT_NAME,
    model,
    description:
      'Provides empathetic emotional support and coping strategies, and learns which ones help.',
    instruction: THERAPEUTIC_AGENT_INSTRUCTION,
    tools: [loadMemoryTool, saveTherapeuticPatternTool],
  })
}

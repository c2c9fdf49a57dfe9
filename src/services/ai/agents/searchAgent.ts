import { GOOGLE_SEARCH, LlmAgent, type Gemini } from '@google/adk'
import {
  SEARCH_AGENT_INSTRUCTION,
  SEARCH_AGENT_NAME,
} from '@services/ai/prompts/assistantPrompts'

// Gemini's grounded search runs server-side, so this agent carries no function tools.
export function createSearchAgent(model: Gemini): LlmAgent {
  return new LlmAgent({
    name: SEARCH_AGENT_NAME,
    model,
    description:
      'Searches the web for evidence-based information and answers factual questions.',
    instruction: SEARCH_AGENT_INSTRUCTION,
    tools: [GOOGLE_SEARCH],
  })
}
